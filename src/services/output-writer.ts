import fs from 'node:fs';
import process from 'node:process';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../logger.js';

/** Written between reports appended to the same file. */
export const REPORT_SEPARATOR = '\n\n\n\n';

const logger = createLogger();

export interface WriteReportOptions {
  outputFile?: string;
  stdout?: NodeJS.WritableStream;
}

/**
 * Prints the report, or appends it to `outputFile`. A file that cannot be
 * written is reported and the report goes to stdout instead.
 */
export function writeReport(output: string, options: WriteReportOptions = {}): void {
  const stdout = options.stdout ?? process.stdout;
  if (!options.outputFile) {
    stdout.write(`${output}\n`);
    return;
  }
  try {
    const existing = fs.existsSync(options.outputFile) ? fs.statSync(options.outputFile).size : 0;
    const payload = existing > 0 ? `${REPORT_SEPARATOR}${output}` : output;
    fs.appendFileSync(options.outputFile, payload, 'utf8');
    logger.debug(`Wrote report to ${options.outputFile}`);
  } catch (error) {
    logger.error(`Error opening file ${options.outputFile}: ${errorMessage(error)}`);
    stdout.write(`${output}\n`);
  }
}

/** Starts a run with an empty output file so earlier runs are not appended to. */
export function resetOutputFile(outputFile: string): void {
  if (!fs.existsSync(outputFile)) {
    return;
  }
  try {
    fs.rmSync(outputFile);
    logger.info(`Removed existing file: ${outputFile}`);
  } catch (error) {
    logger.warn(`Could not remove existing file ${outputFile}: ${errorMessage(error)}`);
  }
}
