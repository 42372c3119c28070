// interactive: a question loop that keeps files and plan between turns

import { input } from '@inquirer/prompts';
import chalk from 'chalk';
import { ErrorHandler } from '../../utils/error-handler.js';
import { log } from '../../utils/logger.js';
import { createAgentSession, loadValidatedConfig, printReport, runWithProgress } from './shared.js';
import type { RunOptions } from './shared.js';
import type { AppConfig } from '../../utils/config.js';

export const EXIT_COMMANDS: readonly string[] = ['exit', 'quit', 'q'];

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.includes(line.trim().toLowerCase());
}

function isPromptClosed(error: unknown): boolean {
  // Ctrl+C / Ctrl+D
  return error instanceof Error && error.name === 'ExitPromptError';
}

export async function interactiveCommand(options: RunOptions): Promise<void> {
  let config: AppConfig;
  try {
    config = await loadValidatedConfig();
  } catch (error) {
    ErrorHandler.handle(error, { context: 'interactive', exitProcess: true });
    return;
  }

  log.info(chalk.bold('issue-scout interactive mode'));
  log.info(chalk.gray('Paste an issue URL or ask about a repository (owner/repo). Type exit to leave.'));
  log.newline();

  // One agent for the whole session so state carries over
  const session = createAgentSession(config, options);

  while (true) {
    let line: string;
    try {
      line = await input({ message: chalk.cyan('You:') });
    } catch (error) {
      if (isPromptClosed(error)) break;
      throw error;
    }

    if (isExitCommand(line)) break;
    if (!line.trim()) continue;

    try {
      const result = await runWithProgress(session, (agent) => agent.chat(line));
      printReport(result, options);
    } catch (error) {
      ErrorHandler.handle(error, { context: 'interactive' });
    }
  }

  log.info(chalk.gray('Goodbye!'));
}
