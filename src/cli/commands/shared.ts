// Helpers shared by the agent-running commands

import chalk from 'chalk';
import { createIssueScoutAgent } from '../../agent/index.js';
import type { AgentRunResult, IssueScoutAgent } from '../../agent/index.js';
import { loadConfig, validateConfig } from '../../utils/config.js';
import type { AppConfig } from '../../utils/config.js';
import { ConfigurationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { ProgressSpinner } from '../ui/progress.js';

export interface RunOptions {
  verbose?: boolean;
}

/**
 * Load configuration and refuse to go on without every credential.
 */
export async function loadValidatedConfig(): Promise<AppConfig> {
  const config = await loadConfig();
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConfigurationError('Configuration is incomplete', {
      reason: `Missing: ${validation.missing.join(', ')}`,
      suggestion: 'Set the missing variables in your .env file (see .env.example), then run `issue-scout config`.',
    });
  }
  return config;
}

export interface AgentSession {
  agent: IssueScoutAgent;
  progress: ProgressSpinner;
}

export function createAgentSession(config: AppConfig, options: RunOptions): AgentSession {
  const progress = new ProgressSpinner(options.verbose);
  return { agent: createIssueScoutAgent(config, progress.listener), progress };
}

/**
 * Run one agent call behind a spinner that reports progress.
 */
export async function runWithProgress(
  session: AgentSession,
  run: (agent: IssueScoutAgent) => Promise<AgentRunResult>
): Promise<AgentRunResult> {
  session.progress.start('Starting investigation...');
  try {
    const result = await run(session.agent);
    session.progress.succeed('Investigation complete');
    return result;
  } catch (error) {
    session.progress.fail('Investigation failed');
    throw error;
  }
}

export function printReport(result: AgentRunResult, options: RunOptions): void {
  process.stdout.write(`\n${result.report}\n\n`);

  if (result.loop.reason === 'step_limit') {
    log.warn(`Stopped after ${result.loop.steps} steps; the report may be incomplete.`);
  }

  if (options.verbose) {
    const files = Object.keys(result.state.files).sort();
    log.info(chalk.bold(`Files created (${files.length}):`));
    for (const name of files) {
      log.info(chalk.gray(`  - ${name}`));
    }
  }
}
