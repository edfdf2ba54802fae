import { TransportError } from '../../src/lib/errors.js';
import type { Logger, LogLevel } from '../../src/logger.js';
import type { IssueSource } from '../../src/providers/types.js';
import { findLatestComment } from '../../src/services/comments.js';
import { NO_COMMENT, type FieldDefinition, type FieldIds, type IssueRecord } from '../../src/services/issue-record.js';
import type { PlainObject } from '../../src/utils/object.js';

export const SERVER = 'https://tracker.example.com';
export const TARGET_END_FIELD = 'customfield_10500';

export interface RawIssueFields {
  summary?: string;
  status?: string;
  assignee?: string;
  priority?: string;
  created?: string;
  updated?: string;
  targetEnd?: string;
  subtasks?: string[];
  links?: Array<{ outward?: string; inward?: string }>;
}

export function rawIssue(key: string, shape: RawIssueFields = {}): PlainObject {
  const fields: PlainObject = {
    summary: shape.summary ?? `Summary of ${key}`,
    created: shape.created ?? '2024-05-01T09:00:00.000+0000',
    updated: shape.updated ?? '2024-06-01T10:00:00.000+0000',
  };
  if (shape.status) fields.status = { name: shape.status };
  if (shape.assignee) fields.assignee = { displayName: shape.assignee };
  if (shape.priority) fields.priority = { name: shape.priority };
  if (shape.targetEnd) fields[TARGET_END_FIELD] = shape.targetEnd;
  if (shape.subtasks) fields.subtasks = shape.subtasks.map((sub) => ({ key: sub }));
  if (shape.links) {
    fields.issuelinks = shape.links.map((link) => ({
      ...(link.outward ? { outwardIssue: { key: link.outward } } : {}),
      ...(link.inward ? { inwardIssue: { key: link.inward } } : {}),
    }));
  }
  return { key, fields };
}

export function makeRecord(overrides: Partial<IssueRecord> & { key: string }): IssueRecord {
  const { key, ...rest } = overrides;
  const url = rest.url ?? `${SERVER}/browse/${key}`;
  return {
    key,
    url,
    summary: `Summary of ${key}`,
    statusName: 'in progress',
    assignee: 'N/A',
    priority: 'None',
    created: '2024-05-01T09:00:00.000+0000',
    updated: '2024-06-01T10:00:00.000+0000',
    targetEnd: '',
    parentKey: key,
    parentSummary: `Summary of ${key}`,
    parentURL: url,
    trending: 'in progress',
    emoji: '🟢',
    comment: NO_COMMENT,
    ...rest,
  };
}

export interface MemoryLogger extends Logger {
  entries: Array<{ level: LogLevel; message: string }>;
  messages: (level: LogLevel) => string[];
}

export function createMemoryLogger(): MemoryLogger {
  const entries: Array<{ level: LogLevel; message: string }> = [];
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    messages: (level) => entries.filter((entry) => entry.level === level).map((entry) => entry.message),
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    isVerbose: () => true,
    setLevel: () => {},
  };
}

/** In-memory tracker: issues by key, comment lists by key, JQL results by query. */
export class FakeIssueSource implements IssueSource {
  readonly serverUrl = SERVER;
  readonly issues = new Map<string, PlainObject>();
  readonly comments = new Map<string, PlainObject[]>();
  /** JQL to result keys; a raw payload in the list is returned as-is. */
  readonly queries = new Map<string, Array<string | PlainObject>>();
  catalog: FieldDefinition[] | Error = [{ id: TARGET_END_FIELD, name: 'Target end' }];
  connectionError?: Error;
  commentError?: Error;

  readonly getIssueCalls: string[] = [];
  readonly commentLookups: string[][] = [];
  readonly requestedFieldIds: FieldIds[] = [];

  add(raw: PlainObject, comments: PlainObject[] = []): this {
    const key = String(raw.key);
    this.issues.set(key, raw);
    if (comments.length > 0) this.comments.set(key, comments);
    return this;
  }

  async testConnection(): Promise<void> {
    if (this.connectionError) throw this.connectionError;
  }

  async fieldCatalog(): Promise<FieldDefinition[]> {
    if (this.catalog instanceof Error) throw this.catalog;
    return this.catalog;
  }

  async getIssue(key: string, fieldIds: FieldIds): Promise<PlainObject> {
    this.getIssueCalls.push(key);
    this.requestedFieldIds.push(fieldIds);
    const raw = this.issues.get(key);
    if (!raw) throw new TransportError('API error: 404', { status: 404 });
    return raw;
  }

  async searchIssues(jql: string): Promise<PlainObject[]> {
    const keys = this.queries.get(jql);
    if (!keys) throw new TransportError('API error: 400', { status: 400 });
    return keys.flatMap((entry) => {
      if (typeof entry !== 'string') return [entry];
      const raw = this.issues.get(entry);
      return raw ? [raw] : [];
    });
  }

  async mostRecentComments(keys: readonly string[]): Promise<Map<string, PlainObject>> {
    this.commentLookups.push([...keys]);
    if (this.commentError) throw this.commentError;
    const result = new Map<string, PlainObject>();
    for (const key of keys) {
      const latest = findLatestComment(this.comments.get(key) ?? []);
      if (latest) result.set(key, latest);
    }
    return result;
  }
}
