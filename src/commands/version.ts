import figlet from 'figlet';
import { Command } from 'commander';

export function registerVersionCommand(program: Command, version: string): void {
  program
    .command('version')
    .description('Print the CLI version')
    .option('--plain', 'print only the version line')
    .action((options: { plain?: boolean }) => {
      const line = `snippets ${version}`;
      if (options.plain) {
        process.stdout.write(`${line}\n`);
        return;
      }
      let banner: string;
      try {
        banner = figlet.textSync('snippets');
      } catch {
        banner = '';
      }
      process.stdout.write(banner ? `${banner}\n${line}\n` : `${line}\n`);
    });
}
