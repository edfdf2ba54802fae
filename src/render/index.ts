import type { IssueRecord } from '../services/issue-record.js';
import { renderCsv } from './csv.js';
import { renderJson } from './json.js';
import { renderMarkdown } from './markdown.js';
import { renderSlack } from './slack.js';
import type { OutputFormat, RenderOptions } from './types.js';
import { renderUrl } from './url.js';

export type { OutputFormat, RenderOptions } from './types.js';

export interface FormatFlags {
  json?: boolean;
  csv?: boolean;
  slack?: boolean;
  url?: boolean;
}

/** When several flags are set: json, then csv, slack, url; markdown otherwise. */
export function pickOutputFormat(flags: FormatFlags): OutputFormat {
  if (flags.json) return 'json';
  if (flags.csv) return 'csv';
  if (flags.slack) return 'slack';
  if (flags.url) return 'url';
  return 'markdown';
}

export function renderReport(format: OutputFormat, issues: readonly IssueRecord[], options: RenderOptions): string {
  switch (format) {
    case 'json':
      return renderJson(issues);
    case 'csv':
      return renderCsv(issues, options);
    case 'slack':
      return renderSlack(issues);
    case 'url':
      return renderUrl(issues, options.serverUrl);
    case 'markdown':
      return renderMarkdown(issues, options);
  }
}
