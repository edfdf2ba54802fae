import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { ConfigurationError } from '../lib/errors.js';
import { createLogger } from '../logger.js';
import { DEFAULT_FIELD_NAMES, type FieldNames } from '../services/issue-record.js';
import { isPlainObject, type PlainObject } from '../utils/object.js';

const CONFIG_FILE_CANDIDATES = ['snippets.config.yaml', 'snippets.config.yml'];

export const DEFAULT_TITLE = 'Snippets!';
export const DEFAULT_PAGE_SIZE = 50;
export const DEFAULT_MAX_RESULTS = 1000;

export interface TrackerConfig {
  /** Base URL without trailing slashes. */
  server: string;
  /** Account email (Cloud) or username (Server/Data Center). */
  email?: string;
  apiToken: string;
}

export interface SearchConfig {
  pageSize: number;
  maxResults: number;
}

export interface ReportDefaults {
  title: string;
}

export interface CliMetadata {
  version: string;
  generator: string;
}

export interface CliConfig {
  tracker: TrackerConfig;
  fields: FieldNames;
  search: SearchConfig;
  report: ReportDefaults;
  metadata: CliMetadata;
}

/** The shape accepted in snippets.config.yaml. The API token is only read from the environment. */
export interface FileConfig {
  server?: string;
  email?: string;
  fields?: Partial<FieldNames>;
  search?: Partial<SearchConfig>;
  report?: Partial<ReportDefaults>;
}

export interface ConfigResolution {
  config?: CliConfig;
  configPath?: string;
  source: 'filesystem' | 'env' | 'none';
  version: string;
  /** Environment variables that must be set before the tracker can be reached. */
  missing: string[];
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const logger = createLogger();

function optionalString(source: PlainObject, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  logger.warn(`Ignoring ${where}.${key}: expected a string`);
  return undefined;
}

function optionalPositiveInt(source: PlainObject, key: string, where: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isInteger(value) && value > 0) return value;
  logger.warn(`Ignoring ${where}.${key}: expected a positive integer`);
  return undefined;
}

function section(source: PlainObject, key: string): PlainObject {
  const value = source[key];
  if (value === undefined || value === null) return {};
  if (isPlainObject(value)) return value;
  logger.warn(`Ignoring ${key}: expected a mapping`);
  return {};
}

export function parseFileConfig(parsed: unknown, configPath: string): FileConfig {
  if (!isPlainObject(parsed)) {
    logger.warn(`Ignoring invalid config at ${configPath}`);
    return {};
  }
  const fields = section(parsed, 'fields');
  const search = section(parsed, 'search');
  const report = section(parsed, 'report');
  return {
    server: optionalString(parsed, 'server', 'config'),
    email: optionalString(parsed, 'email', 'config'),
    fields: { targetEnd: optionalString(fields, 'targetEnd', 'fields') },
    search: {
      pageSize: optionalPositiveInt(search, 'pageSize', 'search'),
      maxResults: optionalPositiveInt(search, 'maxResults', 'search'),
    },
    report: { title: optionalString(report, 'title', 'report') },
  };
}

function applyDefaults(fileConfig: FileConfig, pkgVersion: string): Omit<CliConfig, 'tracker'> {
  return {
    fields: {
      targetEnd: fileConfig.fields?.targetEnd ?? DEFAULT_FIELD_NAMES.targetEnd,
    },
    search: {
      pageSize: fileConfig.search?.pageSize ?? DEFAULT_PAGE_SIZE,
      maxResults: fileConfig.search?.maxResults ?? DEFAULT_MAX_RESULTS,
    },
    report: {
      title: fileConfig.report?.title || DEFAULT_TITLE,
    },
    metadata: {
      version: pkgVersion,
      generator: `jira-snippets@${pkgVersion}`,
    },
  };
}

export function resolveConfig(options: LoadConfigOptions = {}): ConfigResolution {
  const env = options.env ?? process.env;
  const startDir = fs.realpathSync(options.cwd ?? process.cwd());
  const located = locateConfigFile(startDir, env);
  const pkgVersion = readPackageVersion();

  let fileConfig: FileConfig = {};
  if (located) {
    const fileContent = fs.readFileSync(located.configPath, 'utf8');
    fileConfig = parseFileConfig(YAML.parse(fileContent), located.configPath);
  }

  const server = (env.JIRA_SERVER || fileConfig.server || '').trim().replace(/\/+$/, '');
  const apiToken = (env.JIRA_API_TOKEN ?? '').trim();
  const email = (env.JIRA_EMAIL || fileConfig.email || '').trim();

  const missing: string[] = [];
  if (!server) missing.push('JIRA_SERVER');
  if (!apiToken) missing.push('JIRA_API_TOKEN');

  const base = {
    configPath: located?.configPath,
    source: located?.source ?? 'none',
    version: pkgVersion,
    missing,
  } satisfies Omit<ConfigResolution, 'config'>;

  if (missing.length > 0) {
    return base;
  }
  return {
    ...base,
    config: {
      tracker: { server, apiToken, email: email || undefined },
      ...applyDefaults(fileConfig, pkgVersion),
    },
  };
}

const MISSING_HINTS: Record<string, string> = {
  JIRA_SERVER: 'export JIRA_SERVER=https://mycompany.atlassian.net',
  JIRA_API_TOKEN: 'export JIRA_API_TOKEN=your-token',
};

export function loadConfig(options: LoadConfigOptions = {}): CliConfig {
  const resolution = resolveConfig(options);
  if (!resolution.config) {
    const lines = resolution.missing.map(
      (name) => `${name} environment variable is not set.\nExample: ${MISSING_HINTS[name] ?? `export ${name}=...`}`,
    );
    throw new ConfigurationError(lines.join('\n'));
  }
  return resolution.config;
}

interface ConfigFileLocation {
  configPath: string;
  source: 'filesystem' | 'env';
}

function locateConfigFile(startDir: string, env: NodeJS.ProcessEnv): ConfigFileLocation | undefined {
  let currentDir = startDir;
  while (true) {
    for (const candidate of CONFIG_FILE_CANDIDATES) {
      const filePath = path.join(currentDir, candidate);
      if (fs.existsSync(filePath)) {
        return { configPath: fs.realpathSync(filePath), source: 'filesystem' };
      }
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  const envConfig = env.SNIPPETS_CONFIG_PATH;
  if (envConfig && fs.existsSync(envConfig)) {
    return { configPath: fs.realpathSync(envConfig), source: 'env' };
  }
  return undefined;
}

export function readPackageVersion(): string {
  const pkgPath = path.resolve(fileURLToPath(new URL('.', import.meta.url)), '../..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
  return isPlainObject(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
}
