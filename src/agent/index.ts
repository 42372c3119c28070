// Agent orchestrator

import { createLLMClient } from '../llm/provider-factory.js';
import type { LLMClient } from '../llm/types.js';
import { createBaseToolRegistry } from '../tools/index.js';
import type { ToolDependencies, ToolRegistry } from '../tools/index.js';
import { TaskTool } from '../tools/task-tool.js';
import { GitHubClient } from '../github/client.js';
import { parseIssueUrl, parseRepoName } from '../github/parse.js';
import { TavilyClient } from '../search/tavily-client.js';
import { createPageFetcher } from '../search/page-fetcher.js';
import { createSummarizer } from '../search/summarizer.js';
import type { AppConfig } from '../utils/config.js';
import { resolveLLMConfig } from '../utils/config.js';
import { AgenticLoop } from './loop.js';
import type { LoopResult } from './loop.js';
import { buildSystemPrompt } from './system-prompt.js';
import type { SharedState } from './state.js';
import { appendMessages, createInitialState, getLastAssistantMessage } from './state.js';
import type { AgentProgressListener } from './tool-runner.js';
import { logger } from '../utils/logger.js';

export const NO_RESPONSE_MESSAGE = 'No response from agent';

export interface AgentRunResult {
  report: string;
  state: SharedState;
  loop: LoopResult;
}

export interface IssueScoutAgentOptions {
  llmClient: LLMClient;
  tools: ToolDependencies;
  agent: AppConfig['agent'];
  listener?: AgentProgressListener;
}

export function issueSeedMessage(issueUrl: string): string {
  return `Analyze this GitHub issue and provide a comprehensive investigation report: ${issueUrl}`;
}

export function repositorySeedMessage(repo: string, question: string): string {
  return `Repository: ${repo}\n\nQuestion: ${question}`;
}

export class IssueScoutAgent {
  private readonly coordinatorRegistry: ToolRegistry;
  private readonly loop: AgenticLoop;
  private session: SharedState | null = null;

  constructor(private readonly options: IssueScoutAgentOptions) {
    // Sub-agents get their own registry without `task`, so delegation never nests
    const subAgentRegistry = createBaseToolRegistry(options.tools);

    this.coordinatorRegistry = createBaseToolRegistry(options.tools);
    this.coordinatorRegistry.register(
      new TaskTool({
        llmClient: options.llmClient,
        subAgentRegistry,
        subAgentMaxSteps: options.agent.subAgentMaxSteps,
        listener: options.listener,
      })
    );

    const limits = {
      maxConcurrentResearchUnits: options.agent.maxConcurrentResearchUnits,
      maxResearcherIterations: options.agent.maxResearcherIterations,
    };
    this.loop = new AgenticLoop(
      options.llmClient,
      this.coordinatorRegistry,
      (state) => buildSystemPrompt(state, limits),
      {
        ...limits,
        maxSteps: options.agent.coordinatorMaxSteps,
        listener: options.listener,
      }
    );
  }

  getToolNames(): string[] {
    return this.coordinatorRegistry.getNames();
  }

  async analyzeIssue(issueUrl: string): Promise<AgentRunResult> {
    const ref = parseIssueUrl(issueUrl);
    logger.info(`Analyzing ${ref.kind} #${ref.number} in ${ref.fullName}`);

    const state = createInitialState({ issueUrl, currentRepo: ref.fullName });
    return this.runTurn(state, issueSeedMessage(issueUrl));
  }

  async askAboutRepository(repo: string, question: string): Promise<AgentRunResult> {
    const ref = parseRepoName(repo);
    logger.info(`Answering a question about ${ref.fullName}`);

    const state = createInitialState({ currentRepo: ref.fullName });
    return this.runTurn(state, repositorySeedMessage(ref.fullName, question));
  }

  /**
   * One interactive turn. Successive calls share one state, so files and the
   * plan carry over between questions.
   */
  async chat(input: string): Promise<AgentRunResult> {
    if (!this.session) {
      this.session = createInitialState();
    }
    return this.runTurn(this.session, input);
  }

  resetSession(): void {
    this.session = null;
  }

  private async runTurn(state: SharedState, userMessage: string): Promise<AgentRunResult> {
    const before = state.messages.length;
    appendMessages(state, [{ role: 'user', content: userMessage }]);

    const loop = await this.loop.run(state);
    const report = getLastAssistantMessage(state.messages.slice(before)) ?? NO_RESPONSE_MESSAGE;
    return { report, state, loop };
  }
}

/**
 * Wire real clients from configuration.
 */
export function createIssueScoutAgent(config: AppConfig, listener?: AgentProgressListener): IssueScoutAgent {
  const llmClient = createLLMClient(resolveLLMConfig(config.llm));

  const tools: ToolDependencies = {
    github: new GitHubClient({ token: config.github.token, apiUrl: config.github.apiUrl }),
    research: {
      search: new TavilyClient({ apiKey: config.search.apiKey, endpoint: config.search.endpoint }),
      fetchPage: createPageFetcher(config.search.fetchTimeoutMs),
      summarize: createSummarizer(llmClient),
      defaultMaxResults: config.search.maxResults,
    },
  };

  return new IssueScoutAgent({ llmClient, tools, agent: config.agent, listener });
}
