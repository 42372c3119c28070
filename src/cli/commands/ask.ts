// ask <repo> <question...>: one question about a repository

import { ErrorHandler } from '../../utils/error-handler.js';
import { ValidationError } from '../../utils/errors.js';
import { createAgentSession, loadValidatedConfig, printReport, runWithProgress } from './shared.js';
import type { RunOptions } from './shared.js';

export async function askCommand(repo: string, questionWords: string[], options: RunOptions): Promise<void> {
  try {
    const question = questionWords.join(' ').trim();
    if (!question) {
      throw new ValidationError('No question provided', {
        suggestion: 'Usage: issue-scout ask owner/repo "How does X work?"',
      });
    }

    const config = await loadValidatedConfig();
    const result = await runWithProgress(createAgentSession(config, options), (agent) => agent.askAboutRepository(repo, question));
    printReport(result, options);
  } catch (error) {
    ErrorHandler.handle(error, { context: 'ask', exitProcess: true });
  }
}
