// Configuration management command

import chalk from 'chalk';
import {
  getConfigFile,
  getConfigValue,
  getCredentialStatus,
  loadConfig,
  redactConfig,
  setConfigValue,
  validateConfig,
} from '../../utils/config.js';
import { getProviderDisplayName } from '../../llm/provider-factory.js';
import { ErrorHandler } from '../../utils/error-handler.js';
import { ValidationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';

export interface ConfigOptions {
  set?: string;
  get?: string;
  list?: boolean;
}

export function parseAssignment(assignment: string): { key: string; value: string } {
  const eqIndex = assignment.indexOf('=');
  if (eqIndex <= 0) {
    throw new ValidationError(`Invalid assignment: '${assignment}'`, {
      reason: 'Expected key=value.',
      suggestion: 'Example: issue-scout config --set agent.maxConcurrentResearchUnits=2',
    });
  }
  return { key: assignment.slice(0, eqIndex).trim(), value: assignment.slice(eqIndex + 1) };
}

async function showStatus(): Promise<void> {
  const config = await loadConfig();

  log.info(chalk.bold('\nCredentials:'));
  for (const credential of getCredentialStatus(config)) {
    const mark = credential.set ? chalk.green('✓') : chalk.red('✗');
    log.info(`  ${mark} ${credential.name}: ${credential.display}`);
  }

  log.info(chalk.bold('\nLLM:'));
  log.info(`  Provider: ${chalk.cyan(getProviderDisplayName(config.llm.provider))}`);
  log.info(`  Model:    ${chalk.cyan(config.llm.model)}`);
  log.info(`  Endpoint: ${config.llm.endpoint}`);

  log.info(chalk.bold('\nLimits:'));
  log.info(`  Parallel sub-agents:   ${config.agent.maxConcurrentResearchUnits}`);
  log.info(`  Delegation rounds:     ${config.agent.maxResearcherIterations}`);
  log.info(`  Sub-agent step budget: ${config.agent.subAgentMaxSteps}`);
  log.info(`  Coordinator steps:     ${config.agent.coordinatorMaxSteps}`);
  log.info(`  Search results:        ${config.search.maxResults}`);

  log.info(chalk.gray(`\nConfig file: ${getConfigFile()}`));
  log.newline();

  const validation = validateConfig(config);
  if (validation.valid) {
    log.success('✓ Configuration is valid');
  } else {
    log.warn('✗ Configuration is incomplete');
    log.warn(`  Missing: ${validation.missing.join(', ')}`);
    log.info(chalk.gray('  Set them in your .env file (see .env.example).'));
  }
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    if (options.list) {
      const config = await loadConfig();
      log.info(chalk.bold('\nConfiguration:'));
      log.info(JSON.stringify(redactConfig(config), null, 2));
      log.newline();
      return;
    }

    if (options.get) {
      // Read through the redacted copy so secrets never print in full
      const value = await getConfigValue(options.get, redactConfig(await loadConfig()));
      if (value === undefined) {
        log.warn(`Key not found: ${options.get}`);
      } else {
        log.info(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
      }
      return;
    }

    if (options.set) {
      const { key, value } = parseAssignment(options.set);
      await setConfigValue(key, value);
      log.success(`✓ Set ${key} = ${value}`);
      return;
    }

    await showStatus();
  } catch (error) {
    ErrorHandler.handle(error, { context: 'config', exitProcess: true });
  }
}
