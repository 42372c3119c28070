// CLI setup with Commander

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { askCommand } from './commands/ask.js';
import { interactiveCommand } from './commands/interactive.js';
import { configCommand } from './commands/config.js';
import { infoCommand } from './commands/info.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('issue-scout')
    .description('Investigate GitHub issues and answer questions about repositories')
    .version('0.1.0');

  program
    .command('analyze <issue-url>')
    .description('Investigate a GitHub issue and print a report')
    .option('-v, --verbose', 'Show tool activity and list the files created')
    .action(analyzeCommand);

  program
    .command('ask <repo> <question...>')
    .description('Ask a question about a repository (owner/repo)')
    .option('-v, --verbose', 'Show tool activity and list the files created')
    .action(askCommand);

  program
    .command('interactive')
    .description('Start an interactive session; files and plan carry over between questions')
    .option('-v, --verbose', 'Show tool activity and list the files created')
    .action(interactiveCommand);

  program
    .command('config')
    .description('Show credential status, or read and write configuration')
    .option('--set <key=value>', 'Set a configuration value')
    .option('--get <key>', 'Get a configuration value')
    .option('--list', 'Print the full configuration (credentials masked)')
    .action(configCommand);

  program
    .command('info')
    .description('Show capabilities, sub-agents and tools')
    .action(infoCommand);

  return program;
}
