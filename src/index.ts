#!/usr/bin/env node

// issue-scout - Entry Point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { handleError } from './utils/error-handler.js';

const includeStack = process.env.NODE_ENV === 'development' || Boolean(process.env.DEBUG);

async function main(): Promise<void> {
  try {
    const program = createCLI();
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError && (error.code === 'commander.version' || error.code === 'commander.helpDisplayed')) {
      return;
    }
    handleError(error, { context: 'main', includeStack, exitProcess: true });
  }
}

process.on('unhandledRejection', (reason) => {
  handleError(reason, { context: 'unhandledRejection', includeStack });
});

process.on('uncaughtException', (error) => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true,
    exitProcess: true,
  });
});

void main();
