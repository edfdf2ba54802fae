import { table, getBorderCharacters, type TableUserConfig } from 'table';
import { c } from './colors.js';

export const BOX_TABLE_CONFIG: TableUserConfig = {
  border: getBorderCharacters('ramac'),
  columnDefault: {
    paddingLeft: 1,
    paddingRight: 1,
  },
};

export function renderBoxTable(rows: string[][], config: TableUserConfig = BOX_TABLE_CONFIG): string[] {
  if (rows.length === 0) {
    return [];
  }
  return table(rows, config).trimEnd().split('\n');
}

export interface TableColumn<T> {
  header: string;
  value: (row: T) => string;
}

export function headerCells<T>(columns: readonly TableColumn<T>[]): string[] {
  return columns.map((col) => col.header);
}

export function rowCells<T>(row: T, columns: readonly TableColumn<T>[]): string[] {
  return columns.map((col) => col.value(row));
}

export function formatKeyValues(pairs: Array<[string, string]>): string[] {
  if (pairs.length === 0) {
    return [];
  }
  const width = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${c.dim(padRight(key, width))} : ${value}`);
}

function padRight(text: string, width: number): string {
  if (text.length >= width) {
    return text;
  }
  return text + ' '.repeat(width - text.length);
}
