// Coordinator loop: reason, call tools, repeat until the model answers

import type { Completion, LLMClient } from '../llm/types.js';
import type { ToolRegistry } from '../tools/index.js';
import type { ToolExecutionResult } from '../tools/types.js';
import type { SharedState } from './state.js';
import { appendMessages } from './state.js';
import { executeToolCalls } from './tool-runner.js';
import type { AgentProgressListener } from './tool-runner.js';
import { ConcurrencyLimiter } from '../utils/concurrency-limiter.js';
import { logger } from '../utils/logger.js';

export const COORDINATOR_AGENT_NAME = 'coordinator';
export const DEFAULT_COORDINATOR_MAX_STEPS = 25;

export interface AgenticLoopOptions {
  maxSteps?: number;
  /** Upper bound on task calls running at the same time */
  maxConcurrentResearchUnits: number;
  /** Steps that may delegate; later task calls are refused */
  maxResearcherIterations: number;
  listener?: AgentProgressListener;
}

export type LoopStopReason = 'completed' | 'step_limit';

export interface LoopResult {
  steps: number;
  reason: LoopStopReason;
  delegationRounds: number;
}

export function delegationLimitMessage(rounds: number): string {
  return `Delegation limit reached (${rounds} rounds). Work with the files you already have or call tools directly.`;
}

export class AgenticLoop {
  private readonly maxSteps: number;
  private readonly limiter: ConcurrencyLimiter;

  constructor(
    private llmClient: LLMClient,
    private toolRegistry: ToolRegistry,
    private buildSystemPrompt: (state: SharedState) => string,
    private options: AgenticLoopOptions
  ) {
    this.maxSteps = options.maxSteps ?? DEFAULT_COORDINATOR_MAX_STEPS;
    this.limiter = new ConcurrencyLimiter(options.maxConcurrentResearchUnits);
  }

  /**
   * Drive `state` until the model gives a final answer or the step budget
   * runs out. LLM failures propagate; tool failures become tool results.
   */
  async run(state: SharedState): Promise<LoopResult> {
    const tools = this.toolRegistry.getDefinitions();
    const nonDelegating = this.toolRegistry.getNames().filter((name) => name !== 'task');

    let steps = 0;
    let delegationRounds = 0;

    while (steps < this.maxSteps) {
      steps++;
      this.options.listener?.onStep?.(COORDINATOR_AGENT_NAME, steps, this.maxSteps);

      // The prompt is rebuilt each step: tools may set the current repository
      const completion: Completion = await this.llmClient.complete(
        [{ role: 'system', content: this.buildSystemPrompt(state) }, ...state.messages],
        tools
      );

      if (completion.type === 'final') {
        appendMessages(state, [{ role: 'assistant', content: completion.text }]);
        return { steps, reason: 'completed', delegationRounds };
      }

      appendMessages(state, [{ role: 'assistant', content: completion.text, toolCalls: completion.calls }]);

      const delegates = completion.calls.some((call) => call.name === 'task');
      const overBudget = delegates && delegationRounds >= this.options.maxResearcherIterations;
      if (delegates && !overBudget) delegationRounds++;
      if (overBudget) {
        logger.warn(`Delegation limit of ${this.options.maxResearcherIterations} rounds reached; refusing task calls`);
      }

      const results = await executeToolCalls(completion.calls, this.toolRegistry, { state }, {
        agent: COORDINATOR_AGENT_NAME,
        allowedTools: overBudget ? nonDelegating : undefined,
        refusalMessage: delegationLimitMessage(this.options.maxResearcherIterations),
        listener: this.options.listener,
        schedule: (toolName, run) => this.schedule(toolName, run),
      });
      appendMessages(state, results);
    }

    logger.warn(`Coordinator stopped after ${this.maxSteps} steps without a final answer`);
    return { steps, reason: 'step_limit', delegationRounds };
  }

  private schedule(toolName: string, run: () => Promise<ToolExecutionResult>): Promise<ToolExecutionResult> {
    return toolName === 'task' ? this.limiter.run(run) : run();
  }
}
