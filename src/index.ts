#!/usr/bin/env node
import process from 'node:process';
import { buildProgram } from './cli.js';
import { createLogger } from './logger.js';

const logger = createLogger();

async function main(): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync(sanitizeArgv(process.argv));
  } catch (error) {
    logger.error(String(error instanceof Error ? error.message : error));
    if (error instanceof Error && logger.isVerbose()) {
      logger.error(error.stack ?? '');
    }
    process.exitCode = 1;
  }
}

// `npm start -- PROJ-1` leaves a literal `--` in front of the user arguments.
function sanitizeArgv(argv: string[]): string[] {
  if (argv[2] !== '--') {
    return argv;
  }
  return [...argv.slice(0, 2), ...argv.slice(3)];
}

await main();
