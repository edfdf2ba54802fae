import fetch, { type Response } from 'node-fetch';
import { ConfigurationError, TransportError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../logger.js';
import { findLatestComment } from '../services/comments.js';
import { customFieldIds, type FieldDefinition, type FieldIds } from '../services/issue-record.js';
import { getNumber, getObject, getObjectList, getString, isPlainObject, type PlainObject } from '../utils/object.js';
import type { IssueSource } from './types.js';

const ISSUE_FIELDS = ['summary', 'status', 'assignee', 'priority', 'created', 'updated', 'subtasks', 'issuelinks'];
const SEARCH_FIELDS = ['summary', 'status', 'assignee', 'priority', 'created', 'updated'];
const BODY_EXCERPT_LENGTH = 500;

const logger = createLogger();

export interface JiraClientOptions {
  server: string;
  email?: string;
  apiToken: string;
  search: { pageSize: number; maxResults: number };
}

export interface PageRequest {
  startAt: number;
  maxResults: number;
}

export interface PageLimits {
  pageSize: number;
  maxResults: number;
}

export function firstPage(limits: PageLimits): PageRequest {
  return { startAt: 0, maxResults: Math.min(limits.pageSize, limits.maxResults) };
}

/**
 * The page after `current`, or undefined once the server total or the result
 * cap is reached, or the server returned a short page.
 */
export function nextPage(
  current: PageRequest,
  progress: { received: number; collected: number; total: number },
  limits: PageLimits,
): PageRequest | undefined {
  if (progress.collected >= progress.total || progress.collected >= limits.maxResults) {
    return undefined;
  }
  if (progress.received < current.maxResults) {
    return undefined;
  }
  const remaining = limits.maxResults - progress.collected;
  return {
    startAt: current.startAt + current.maxResults,
    maxResults: Math.min(limits.pageSize, remaining),
  };
}

export function isCloudServer(server: string): boolean {
  return server.toLowerCase().includes('.atlassian.net');
}

export function bulkCommentJql(keys: readonly string[]): string {
  return `key in (${keys.map((key) => JSON.stringify(key)).join(',')})`;
}

export class JiraClient implements IssueSource {
  readonly serverUrl: string;
  readonly apiVersion: '2' | '3';
  private readonly authorization: string;
  private readonly limits: PageLimits;

  constructor(options: JiraClientOptions) {
    this.serverUrl = options.server.replace(/\/+$/, '');
    this.limits = options.search;
    if (isCloudServer(this.serverUrl)) {
      if (!options.email) {
        throw new ConfigurationError('JIRA_EMAIL is required for Jira Cloud authentication');
      }
      this.apiVersion = '3';
      this.authorization = `Basic ${Buffer.from(`${options.email}:${options.apiToken}`).toString('base64')}`;
      logger.debug(`Using Jira Cloud authentication (API v${this.apiVersion})`);
    } else {
      this.apiVersion = '2';
      this.authorization = `Bearer ${options.apiToken}`;
      logger.debug(`Using Jira Server/Data Center authentication (API v${this.apiVersion})`);
    }
  }

  async testConnection(): Promise<void> {
    await this.getJson('myself');
  }

  async fieldCatalog(): Promise<FieldDefinition[]> {
    const body = await this.request('field');
    if (!Array.isArray(body)) {
      throw new TransportError('Unexpected response from field catalog: expected a list');
    }
    return body
      .filter(isPlainObject)
      .map((field) => ({ id: getString(field, 'id'), name: getString(field, 'name') }));
  }

  async getIssue(key: string, fieldIds: FieldIds): Promise<PlainObject> {
    const fields = [...ISSUE_FIELDS, ...customFieldIds(fieldIds)].join(',');
    return this.getJson(`issue/${encodeURIComponent(key)}`, { fields });
  }

  async searchIssues(jql: string, fieldIds: FieldIds): Promise<PlainObject[]> {
    const fields = [...SEARCH_FIELDS, ...customFieldIds(fieldIds)].join(',');
    const all: PlainObject[] = [];
    let page: PageRequest | undefined = firstPage(this.limits);

    while (page) {
      logger.debug(`Fetching issues: startAt=${page.startAt}, maxResults=${page.maxResults}`);
      const response = await this.getJson('search', {
        jql,
        fields,
        startAt: String(page.startAt),
        maxResults: String(page.maxResults),
      });
      const issues = getObjectList(response, 'issues');
      const total = getNumber(response, 'total');
      all.push(...issues);
      logger.debug(`Fetched ${issues.length} issues (total so far: ${all.length}, server total: ${total})`);
      page = nextPage(page, { received: issues.length, collected: all.length, total }, this.limits);
    }

    logger.debug(`Fetched ${all.length} issues total`);
    return all.slice(0, this.limits.maxResults);
  }

  async getComments(key: string): Promise<PlainObject[]> {
    const response = await this.getJson(`issue/${encodeURIComponent(key)}/comment`);
    return getObjectList(response, 'comments');
  }

  async mostRecentComments(keys: readonly string[]): Promise<Map<string, PlainObject>> {
    const result = new Map<string, PlainObject>();
    if (keys.length === 0) {
      return result;
    }
    if (keys.length === 1) {
      const [key] = keys;
      const latest = findLatestComment(await this.getComments(key));
      if (latest) result.set(key, latest);
      return result;
    }

    // One search request carrying the comment field replaces a request per issue.
    const response = await this.getJson('search', {
      jql: bulkCommentJql(keys),
      fields: 'comment',
      maxResults: String(keys.length),
    });
    for (const issue of getObjectList(response, 'issues')) {
      const comments = getObjectList(getObject(getObject(issue, 'fields'), 'comment'), 'comments');
      const latest = findLatestComment(comments);
      if (latest) result.set(getString(issue, 'key'), latest);
    }
    return result;
  }

  private async getJson(endpoint: string, params: Record<string, string> = {}): Promise<PlainObject> {
    const body = await this.request(endpoint, params);
    if (!isPlainObject(body)) {
      throw new TransportError(`Unexpected response from ${endpoint}: expected an object`);
    }
    return body;
  }

  private async request(endpoint: string, params: Record<string, string> = {}): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.serverUrl}/rest/api/${this.apiVersion}/${endpoint.replace(/^\/+/, '')}${query ? `?${query}` : ''}`;
    logger.debug(`Request: GET ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { method: 'GET', headers: this.headers() });
    } catch (error) {
      throw new TransportError(`Request to ${endpoint} failed: ${errorMessage(error)}`, { cause: error });
    }
    logger.debug(`Response: ${response.status}`);

    if (!response.ok) {
      const text = await response.text();
      logger.debug(`API error body: ${text.slice(0, BODY_EXCERPT_LENGTH)}`);
      throw new TransportError(`API error: ${response.status}`, { status: response.status });
    }
    try {
      return await response.json();
    } catch (error) {
      throw new TransportError(`Invalid JSON from ${endpoint}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: this.authorization,
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
  }
}
