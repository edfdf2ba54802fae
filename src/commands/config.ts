import { Command } from 'commander';
import process from 'node:process';
import { resolveConfig } from '../config/config.js';
import { c } from '../lib/colors.js';
import { renderBoxTable } from '../lib/printer.js';

const REDACTED = '********';

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the resolved configuration (the API token is redacted)')
    .option('-j, --json', 'output as JSON')
    .action((options: { json?: boolean }) => {
      const resolution = resolveConfig();
      const config = resolution.config;
      const redacted = config ? { ...config, tracker: { ...config.tracker, apiToken: REDACTED } } : null;

      if (options.json) {
        const payload = {
          version: resolution.version,
          configPath: resolution.configPath ?? null,
          missing: resolution.missing,
          config: redacted,
        };
        process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`);
        return;
      }

      console.log(c.heading('Snippets Configuration'));
      if (!config) {
        console.log(`config file: ${resolution.configPath ?? '(none)'}`);
        console.log(c.warn(`Missing environment: ${resolution.missing.join(', ')}`));
        return;
      }
      const rows = [
        [c.bold('Field'), c.bold('Value')],
        ['Server', config.tracker.server],
        ['Email', config.tracker.email ?? ''],
        ['API token', REDACTED],
        ['Config file', resolution.configPath ?? '(none)'],
        ['Target end field', config.fields.targetEnd],
        ['Page size', String(config.search.pageSize)],
        ['Max results', String(config.search.maxResults)],
        ['Default title', config.report.title],
        ['Generator', config.metadata.generator],
      ];
      for (const line of renderBoxTable(rows)) {
        console.log(line);
      }
    });
}
