export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Accessors over untyped API payloads. Each one tolerates a missing parent,
// a missing key or a value of the wrong type and returns an empty value instead.

export function getString(source: unknown, key: string): string {
  if (!isPlainObject(source)) return '';
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

export function getNumber(source: unknown, key: string): number {
  if (!isPlainObject(source)) return 0;
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? Math.trunc(value) : 0;
}

export function getObject(source: unknown, key: string): PlainObject | undefined {
  if (!isPlainObject(source)) return undefined;
  const value = source[key];
  return isPlainObject(value) ? value : undefined;
}

export function getObjectList(source: unknown, key: string): PlainObject[] {
  if (!isPlainObject(source)) return [];
  const value = source[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isPlainObject);
}
