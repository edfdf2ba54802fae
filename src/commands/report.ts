import { Command, InvalidArgumentError } from 'commander';
import process from 'node:process';
import { createInterface } from 'node:readline/promises';
import { loadConfig } from '../config/config.js';
import { daysBefore, parseCalendarDate } from '../lib/dates.js';
import { TransportError, ValidationError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../logger.js';
import { createIssueSource, type IssueSourceFactory } from '../providers/index.js';
import { pickOutputFormat } from '../render/index.js';
import { buildReport, type ReportRequest } from '../services/report-builder.js';
import { resetOutputFile, writeReport } from '../services/output-writer.js';

const logger = createLogger();

export interface ReportCommandDeps {
  createSource?: IssueSourceFactory;
  readStdin?: () => Promise<string[]>;
  now?: () => Date;
  stdout?: NodeJS.WritableStream;
}

interface ReportOptions {
  jql?: string;
  children?: boolean;
  since?: string;
  needsUpdate: number;
  title?: string;
  outputFile?: string;
  individual?: boolean;
  stdin?: boolean;
  json?: boolean;
  csv?: boolean;
  slack?: boolean;
  url?: boolean;
  relativeDates?: boolean;
}

// Keeps the cutoff date well inside the range a Date can hold.
const MAX_DAYS = 36500;

function parseDays(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_DAYS) {
    throw new InvalidArgumentError(`Expected a whole number of days between 0 and ${MAX_DAYS}.`);
  }
  return parsed;
}

/** One key per line; blank lines are skipped. */
export async function readKeysFromStdin(): Promise<string[]> {
  const rl = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const keys: string[] = [];
  try {
    for await (const line of rl) {
      const key = line.trim();
      if (key) keys.push(key);
    }
  } finally {
    rl.close();
  }
  return keys;
}

export function registerReportCommand(program: Command, deps: ReportCommandDeps = {}): void {
  program
    .command('report', { isDefault: true })
    .description('Generate a status report for issues and, optionally, their subtasks and linked issues')
    .argument('[keys...]', 'issue keys, e.g. PROJ-123')
    .option('--jql <query>', 'JQL query to fetch issues (alternative to specifying keys)')
    .option('--children', 'render the subtasks and linked issues of the referenced issues')
    .option('--since <date>', 'only include issues updated on or after this date (YYYY-MM-DD)')
    .option('--needs-update <days>', 'exclude issues with a comment in the past N days (0 disables)', parseDays, 0)
    .option('--title <title>', 'custom title for the report')
    .option('-o, --output-file <path>', 'write/append the report to this file')
    .option('-i, --individual', 'generate a separate report for each issue key')
    .option('-s, --stdin', 'read issue keys from stdin (one per line)')
    .option('--json', 'output in JSON format')
    .option('--csv', "output in CSV format ('cat separated value': 🐱)")
    .option('--slack', 'output as a chat-formatted numbered list')
    .option('--url', 'output a single issue search URL listing the filtered keys')
    .option('--relative-dates', 'add "(N days ago)" to last-update links in markdown')
    .addHelpText(
      'after',
      `\nExamples:\n  $ snippets PROJECT-123 PROJECT-456\n  $ snippets --jql "project = MYPROJ AND status != Done"\n  $ snippets --children --since 2025-01-01 PROJECT-123\n  $ snippets --title "Weekly Status" --slack PROJECT-123 PROJECT-456\n  $ cat issues.txt | snippets --stdin --children -o status.md\n\nEnvironment:\n  JIRA_SERVER     Jira server URL (required)\n  JIRA_API_TOKEN  API token or Personal Access Token (required)\n  JIRA_EMAIL      Account email (required for Cloud) or username (Server)\n`,
    )
    .action(async (keys: string[], options: ReportOptions) => {
      await runReport(keys, options, deps);
    });
}

async function runReport(args: string[], options: ReportOptions, deps: ReportCommandDeps): Promise<void> {
  const keys = [...args];
  if (options.stdin) {
    logger.info('Reading issue keys from stdin...');
    keys.push(...(await (deps.readStdin ?? readKeysFromStdin)()));
  }
  if (keys.length === 0 && !options.jql) {
    throw new ValidationError('No issue keys or JQL query provided. Run with --help for usage.');
  }

  const now = (deps.now ?? (() => new Date()))();
  const since = options.since ? parseCalendarDate(options.since) : undefined;
  if (since) logger.info(`Filtering issues updated after ${since.toISOString()}`);
  const noCommentSince = options.needsUpdate > 0 ? daysBefore(now, options.needsUpdate) : undefined;
  if (noCommentSince) logger.info(`Filtering issues with no comment since ${noCommentSince.toISOString()}`);

  const config = loadConfig();
  const source = (deps.createSource ?? createIssueSource)(config);
  try {
    await source.testConnection();
  } catch (error) {
    throw new TransportError(
      `Failed to connect to Jira (${errorMessage(error)}). Check your credentials and server URL.\n` +
        "For Jira Server/Data Center, ensure you're using a valid Personal Access Token (PAT).",
      { cause: error },
    );
  }
  logger.debug(`Connected to Jira server: ${config.tracker.server}`);

  if (options.outputFile) {
    resetOutputFile(options.outputFile);
  }

  const base: Omit<ReportRequest, 'keys'> = {
    title: options.title ?? config.report.title,
    jql: options.jql,
    showChildren: options.children === true,
    filters: { since, noCommentSince },
    format: pickOutputFormat(options),
    fieldNames: config.fields,
    relativeDates: options.relativeDates === true,
  };

  // --individual splits key lists; a JQL query is always one report.
  const batches = options.individual && !options.jql ? keys.map((key) => [key]) : [keys];
  logger.info(`Processing ${keys.length} issues...`);

  for (const batch of batches) {
    try {
      const { output } = await buildReport({ ...base, keys: batch }, { source, now });
      writeReport(output, { outputFile: options.outputFile, stdout: deps.stdout });
    } catch (error) {
      logger.error(`Report for ${options.jql ?? batch.join(', ')} failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  }
}
