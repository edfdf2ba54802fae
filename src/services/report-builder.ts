import { errorMessage } from '../lib/errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { IssueSource } from '../providers/types.js';
import { renderReport, type OutputFormat } from '../render/index.js';
import type { PlainObject } from '../utils/object.js';
import { attachComments } from './comments.js';
import {
  childKeys,
  normalizeIssue,
  resolveFieldIds,
  type FieldIds,
  type FieldNames,
  type IssueRecord,
  type NormalizeContext,
} from './issue-record.js';
import { selectIssues, type SelectionFilters } from './issue-selection.js';

export interface ReportRequest {
  title: string;
  /** Issue keys to report on; ignored when `jql` is set. */
  keys: readonly string[];
  jql?: string;
  /** Report on the subtasks and linked issues of the requested issues instead of the issues themselves. */
  showChildren: boolean;
  filters: SelectionFilters;
  format: OutputFormat;
  fieldNames: FieldNames;
  relativeDates?: boolean;
}

export interface ReportContext {
  source: IssueSource;
  now: Date;
  logger?: Logger;
}

export interface IssueCollection {
  parents: IssueRecord[];
  children: IssueRecord[];
}

export interface ReportResult {
  output: string;
  /** Rows that survived filtering. */
  rows: IssueRecord[];
}

const defaultLogger = createLogger();

/** Field IDs for this run. Lookup problems only cost the optional columns. */
export async function resolveFields(source: IssueSource, names: FieldNames, logger: Logger): Promise<FieldIds> {
  try {
    const catalog = await source.fieldCatalog();
    const { fieldIds, missing } = resolveFieldIds(catalog, names);
    for (const problem of missing) {
      logger.warn(problem.message);
    }
    return fieldIds;
  } catch (error) {
    logger.warn(`Could not load custom fields: ${errorMessage(error)}`);
    return {};
  }
}

async function fetchIssue(
  source: IssueSource,
  key: string,
  normalize: NormalizeContext,
  logger: Logger,
  parent?: { key: string; summary: string },
): Promise<IssueRecord | undefined> {
  logger.debug(`Fetching one issue: ${key}`);
  try {
    const raw = await source.getIssue(key, normalize.fieldIds);
    const issue = normalizeIssue(raw, normalize, parent);
    if (issue.key === '') {
      logger.warn(`Skipping ${key}: the tracker returned an issue without a key`);
      return undefined;
    }
    return issue;
  } catch (error) {
    logger.error(`Failed to fetch issue ${key}: ${errorMessage(error)}`);
    return undefined;
  }
}

export async function collectParents(
  source: IssueSource,
  request: Pick<ReportRequest, 'keys' | 'jql'>,
  normalize: NormalizeContext,
  logger: Logger,
): Promise<IssueRecord[]> {
  if (request.jql) {
    logger.info(`Executing JQL query: ${request.jql}`);
    // A failed query leaves nothing to report on, so it propagates.
    const raws = await source.searchIssues(request.jql, normalize.fieldIds);
    const issues = raws
      .map((raw) => normalizeIssue(raw, normalize))
      .filter((issue) => {
        if (issue.key !== '') return true;
        logger.warn('Skipping a search result without a key');
        return false;
      });
    logger.info(`Found ${issues.length} issues from JQL query`);
    return issues;
  }

  const parents: IssueRecord[] = [];
  for (const key of request.keys) {
    const issue = await fetchIssue(source, key, normalize, logger);
    if (issue) parents.push(issue);
  }
  return parents;
}

/** Subtasks, then linked issues, of one parent, each carrying the parent's key and summary. */
export async function collectChildren(
  source: IssueSource,
  parent: IssueRecord,
  normalize: NormalizeContext,
  logger: Logger,
): Promise<IssueRecord[]> {
  let raw: PlainObject;
  try {
    raw = await source.getIssue(parent.key, normalize.fieldIds);
  } catch (error) {
    logger.error(`Failed to get subtasks and linked issues for ${parent.key}: ${errorMessage(error)}`);
    return [];
  }

  const ref = { key: parent.key, summary: parent.summary };
  const { subtasks, linked } = childKeys(raw);
  const children: IssueRecord[] = [];
  for (const [kind, keys] of [['subtasks', subtasks], ['linked issues', linked]] as const) {
    let found = 0;
    for (const key of keys) {
      const child = await fetchIssue(source, key, normalize, logger, ref);
      if (child) {
        children.push(child);
        found += 1;
      }
    }
    logger.info(`  Found ${found} ${kind} for ${parent.key}`);
  }
  return children;
}

/** Parents, optional children, and the most recent comment of every one of them. */
export async function collectIssues(
  source: IssueSource,
  request: Pick<ReportRequest, 'keys' | 'jql' | 'showChildren' | 'fieldNames'>,
  now: Date,
  logger: Logger,
): Promise<IssueCollection> {
  const fieldIds = await resolveFields(source, request.fieldNames, logger);
  const normalize: NormalizeContext = { serverUrl: source.serverUrl, fieldIds, now };

  const parents = await collectParents(source, request, normalize, logger);
  const children: IssueRecord[] = [];
  if (request.showChildren) {
    for (const parent of parents) {
      children.push(...(await collectChildren(source, parent, normalize, logger)));
    }
  }

  const keys = [...parents, ...children].map((issue) => issue.key);
  const latest = await source.mostRecentComments(keys);
  return {
    parents: attachComments(parents, latest),
    children: attachComments(children, latest),
  };
}

export async function buildReport(request: ReportRequest, context: ReportContext): Promise<ReportResult> {
  const logger = context.logger ?? defaultLogger;
  logger.info(`Generating report titled '${request.title}'`);

  const { parents, children } = await collectIssues(context.source, request, context.now, logger);
  const target = request.showChildren ? children : parents;
  const rows = selectIssues(target, request.filters, logger);
  logger.debug(`Rendering ${request.format} report for ${rows.length} issues`);

  const output = renderReport(request.format, rows, {
    title: request.title,
    showChildren: request.showChildren,
    serverUrl: context.source.serverUrl,
    generatedAt: context.now,
    relativeDates: request.relativeDates,
    now: context.now,
  });
  return { output, rows };
}
