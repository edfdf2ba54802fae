import { Command } from 'commander';
import { loadConfig } from '../config/config.js';
import { c } from '../lib/colors.js';
import { TransportError, errorMessage } from '../lib/errors.js';
import { formatKeyValues } from '../lib/printer.js';
import { createIssueSource, type IssueSourceFactory } from '../providers/index.js';
import { isCloudServer } from '../providers/jira.js';

export function registerCheckCommand(program: Command, createSource: IssueSourceFactory = createIssueSource): void {
  program
    .command('check')
    .description('Verify the server URL and credentials by calling the tracker')
    .action(async () => {
      const config = loadConfig();
      const source = createSource(config);
      try {
        await source.testConnection();
      } catch (error) {
        throw new TransportError(`Connection test failed: ${errorMessage(error)}`, { cause: error });
      }
      const lines = formatKeyValues([
        ['Server', source.serverUrl],
        ['Deployment', isCloudServer(source.serverUrl) ? 'cloud' : 'server/data center'],
        ['Account', config.tracker.email ?? '(token only)'],
        ['Status', c.ok('connected')],
      ]);
      for (const line of lines) console.log(line);
    });
}
