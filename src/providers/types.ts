import type { FieldDefinition, FieldIds } from '../services/issue-record.js';
import type { PlainObject } from '../utils/object.js';

/**
 * Read access to the issue tracker. Every method rejects with a
 * `TransportError` when the tracker cannot be reached or answers with an error.
 */
export interface IssueSource {
  /** Base URL the browse links are built from. */
  readonly serverUrl: string;
  fieldCatalog(): Promise<FieldDefinition[]>;
  getIssue(key: string, fieldIds: FieldIds): Promise<PlainObject>;
  /** Every issue matching the query, across as many pages as needed. */
  searchIssues(jql: string, fieldIds: FieldIds): Promise<PlainObject[]>;
  /** Issue key to its most recent comment; issues without comments are left out. */
  mostRecentComments(keys: readonly string[]): Promise<Map<string, PlainObject>>;
  testConnection(): Promise<void>;
}
