// analyze <issue-url>: investigate one GitHub issue

import { ErrorHandler } from '../../utils/error-handler.js';
import { createAgentSession, loadValidatedConfig, printReport, runWithProgress } from './shared.js';
import type { RunOptions } from './shared.js';

export async function analyzeCommand(issueUrl: string, options: RunOptions): Promise<void> {
  try {
    const config = await loadValidatedConfig();
    const result = await runWithProgress(createAgentSession(config, options), (agent) => agent.analyzeIssue(issueUrl));
    printReport(result, options);
  } catch (error) {
    ErrorHandler.handle(error, { context: 'analyze', exitProcess: true });
  }
}
