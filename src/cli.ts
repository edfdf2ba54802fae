import { Command } from 'commander';
import process from 'node:process';
import { registerCheckCommand } from './commands/check.js';
import { registerConfigCommand } from './commands/config.js';
import { registerReportCommand, type ReportCommandDeps } from './commands/report.js';
import { registerVersionCommand } from './commands/version.js';
import { readPackageVersion } from './config/config.js';
import { setEnabled as setColorEnabled } from './lib/colors.js';
import { createLogger } from './logger.js';

const logger = createLogger();

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  color?: boolean;
}

export function buildProgram(deps: ReportCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('snippets')
    .description('Status reports for Jira issues, their subtasks and linked issues')
    .configureHelp({
      sortSubcommands: true,
      sortOptions: true,
    })
    .option('-v, --verbose', 'enable verbose debug logging')
    .option('-q, --quiet', 'only log errors')
    .option('--no-color', 'disable colored diagnostics')
    .hook('preAction', (thisCommand) => {
      const opts: GlobalOptions = thisCommand.optsWithGlobals();
      const baseColor = Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined;
      setColorEnabled(opts.color !== false && baseColor);
      if (opts.verbose) {
        logger.setLevel('debug');
        logger.debug('Verbose mode enabled');
      } else if (opts.quiet) {
        logger.setLevel('error');
      }
    });

  registerReportCommand(program, deps);
  registerCheckCommand(program, deps.createSource);
  registerConfigCommand(program);
  registerVersionCommand(program, readPackageVersion());

  return program;
}
