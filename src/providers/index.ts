import type { CliConfig } from '../config/config.js';
import { JiraClient } from './jira.js';
import type { IssueSource } from './types.js';

export type { IssueSource } from './types.js';

export type IssueSourceFactory = (config: CliConfig) => IssueSource;

export const createIssueSource: IssueSourceFactory = (config) =>
  new JiraClient({
    server: config.tracker.server,
    email: config.tracker.email,
    apiToken: config.tracker.apiToken,
    search: config.search,
  });
