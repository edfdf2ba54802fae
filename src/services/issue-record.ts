import { ValidationError } from '../lib/errors.js';
import { getObject, getObjectList, getString } from '../utils/object.js';
import { classifyStatus, normalizeStatusName } from './status-classifier.js';

export interface IssueComment {
  readonly url: string;
  readonly created: string;
}

export const NO_COMMENT: IssueComment = Object.freeze({ url: '', created: '' });

export interface IssueRecord {
  readonly key: string;
  readonly url: string;
  readonly summary: string;
  readonly statusName: string;
  readonly assignee: string;
  readonly priority: string;
  readonly created: string;
  readonly updated: string;
  readonly targetEnd: string;
  readonly parentKey: string;
  readonly parentSummary: string;
  readonly parentURL: string;
  readonly trending: string;
  readonly emoji: string;
  readonly comment: IssueComment;
}

/** Logical custom field slots, mapped to tracker field names in config. */
export type CustomFieldSlot = 'targetEnd';

export const CUSTOM_FIELD_SLOTS: readonly CustomFieldSlot[] = ['targetEnd'];

export type FieldNames = Record<CustomFieldSlot, string>;

/** Slot to tracker field ID (e.g. `customfield_10022`); unresolved slots are absent. */
export type FieldIds = Partial<Record<CustomFieldSlot, string>>;

export const DEFAULT_FIELD_NAMES: FieldNames = {
  targetEnd: 'Target end',
};

export interface NormalizeContext {
  serverUrl: string;
  fieldIds: FieldIds;
  now?: Date;
}

export interface ParentRef {
  key: string;
  summary: string;
}

export function browseUrl(serverUrl: string, key: string): string {
  return `${serverUrl}/browse/${key}`;
}

export function normalizeIssue(raw: unknown, context: NormalizeContext, parent?: ParentRef): IssueRecord {
  const fields = getObject(raw, 'fields');
  const key = getString(raw, 'key');

  const statusName = normalizeStatusName(getString(getObject(fields, 'status'), 'name') || 'Unknown');
  const assignee = getString(getObject(fields, 'assignee'), 'displayName') || 'N/A';
  const priority = getString(getObject(fields, 'priority'), 'name') || 'None';
  const targetEndId = context.fieldIds.targetEnd;
  const targetEnd = targetEndId ? getString(fields, targetEndId) : '';
  const summary = getString(fields, 'summary');
  const url = browseUrl(context.serverUrl, key);

  const parentKey = parent?.key || key;
  const parentSummary = parent?.summary || summary;
  const parentURL = parentKey === key ? url : browseUrl(context.serverUrl, parentKey);

  return {
    key,
    url,
    summary,
    statusName,
    assignee,
    priority,
    created: getString(fields, 'created'),
    updated: getString(fields, 'updated'),
    targetEnd,
    parentKey,
    parentSummary,
    parentURL,
    ...classifyStatus(statusName, targetEnd, context.now),
    comment: NO_COMMENT,
  };
}

/** Keys of the subtasks and linked issues referenced by a raw parent issue. */
export function childKeys(raw: unknown): { subtasks: string[]; linked: string[] } {
  const fields = getObject(raw, 'fields');
  const subtasks = getObjectList(fields, 'subtasks')
    .map((ref) => getString(ref, 'key'))
    .filter((key) => key !== '');
  const linked = getObjectList(fields, 'issuelinks')
    .map((link) => getObject(link, 'outwardIssue') ?? getObject(link, 'inwardIssue'))
    .map((ref) => getString(ref, 'key'))
    .filter((key) => key !== '');
  return { subtasks, linked };
}

export interface FieldDefinition {
  id: string;
  name: string;
}

export interface FieldResolution {
  fieldIds: FieldIds;
  missing: ValidationError[];
}

/**
 * Resolves configured field names against the tracker's field catalog. Names
 * with no match stay unresolved and are reported, never thrown.
 */
export function resolveFieldIds(catalog: FieldDefinition[], names: FieldNames): FieldResolution {
  const fieldIds: FieldIds = {};
  const missing: ValidationError[] = [];
  for (const slot of CUSTOM_FIELD_SLOTS) {
    const name = names[slot];
    const match = catalog.find((field) => field.name === name);
    if (match && match.id) {
      fieldIds[slot] = match.id;
    } else {
      missing.push(new ValidationError(`Custom field "${name}" not found in the field catalog`));
    }
  }
  return { fieldIds, missing };
}

/** IDs to request alongside the standard fields. */
export function customFieldIds(fieldIds: FieldIds): string[] {
  return Object.values(fieldIds).filter((id): id is string => typeof id === 'string' && id !== '');
}
