import process from 'node:process';
import { c } from './lib/colors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  isVerbose: () => boolean;
  setLevel: (next: LogLevel) => void;
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function resolveLevel(): LogLevel {
  const raw = process.env.SNIPPETS_LOG_LEVEL?.toLowerCase();
  if (raw && isLogLevel(raw)) {
    return raw;
  }
  if (process.env.DEBUG === '*' || process.env.DEBUG?.includes('snippets')) {
    return 'debug';
  }
  return 'warn';
}

// Every module creates its own logger, but they all share one level so that
// --verbose and --quiet reach loggers created at import time.
let sharedLevel: LogLevel = resolveLevel();

// stdout carries the rendered report, so every level writes to stderr.
export function createLogger(): Logger {
  return {
    debug(message: string) {
      if (LEVELS[sharedLevel] <= LEVELS.debug) {
        process.stderr.write(`${c.dim('[debug]')} ${message}\n`);
      }
    },
    info(message: string) {
      if (LEVELS[sharedLevel] <= LEVELS.info) {
        process.stderr.write(`${message}\n`);
      }
    },
    warn(message: string) {
      if (LEVELS[sharedLevel] <= LEVELS.warn) {
        process.stderr.write(`${c.warn('[warn]')} ${message}\n`);
      }
    },
    error(message: string) {
      process.stderr.write(`${c.error('[error]')} ${message}\n`);
    },
    isVerbose() {
      return LEVELS[sharedLevel] <= LEVELS.debug;
    },
    setLevel(next: LogLevel) {
      sharedLevel = next;
    },
  };
}
