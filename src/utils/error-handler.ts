/**
 * Error reporting at the CLI boundary
 * Tools never throw to the coordinator; anything that reaches this handler
 * escaped a command or the interactive loop.
 */

import chalk from 'chalk';
import { logger } from './logger.js';
import { AgentError, formatUserError, getErrorMessage } from './errors.js';

export interface ErrorHandlingOptions {
  /** Append the stack trace (defaults to on when DEBUG or NODE_ENV=development) */
  includeStack?: boolean;
  /** Command or phase that failed, shown as a heading */
  context?: string;
  /** Exit the process after reporting (default: false) */
  exitProcess?: boolean;
  /** Overrides the exit status chosen from the error kind */
  exitCode?: number;
}

export const GENERIC_SUGGESTION =
  'Re-run with DEBUG=1 for a stack trace; if it persists, check `issue-scout config`.';

/** 2 for bad input or setup, 1 for everything else */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AgentError && (error.kind === 'configuration' || error.kind === 'validation')) {
    return 2;
  }
  return 1;
}

/**
 * The report printed for an error: heading, what/why/next, and optionally
 * the stack. Always ends with a `Next:` line.
 */
export function renderError(error: unknown, options: Pick<ErrorHandlingOptions, 'context' | 'includeStack'> = {}): string {
  const lines: string[] = [];

  if (options.context) {
    lines.push(chalk.red.bold(`Error in ${options.context}:`));
  }

  const explained = formatUserError(error);
  lines.push(chalk.red(explained));
  if (!explained.includes('  Next: ')) {
    lines.push(chalk.yellow(`  Next: ${GENERIC_SUGGESTION}`));
  }

  if (options.includeStack && error instanceof Error && error.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.gray(error.stack));
  }

  return lines.join('\n');
}

function stackByDefault(): boolean {
  return process.env.NODE_ENV === 'development' || Boolean(process.env.DEBUG);
}

export class ErrorHandler {
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const context = options.context;
    process.stderr.write(`${renderError(error, { context, includeStack: options.includeStack ?? stackByDefault() })}\n\n`);
    logger.child(context || 'error').debug(getErrorMessage(error));

    if (options.exitProcess) {
      process.exit(options.exitCode ?? exitCodeFor(error));
    }
  }
}

export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
