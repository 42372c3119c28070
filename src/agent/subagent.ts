// SubAgent - bounded, isolated reasoning loop spawned by the task tool

import type { ChatMessage, Completion, LLMClient } from '../llm/types.js';
import type { ToolRegistry } from '../tools/index.js';
import type { ToolName } from '../tools/types.js';
import type { FileTable, SharedState } from './state.js';
import { appendMessages, diffFiles, snapshotFiles } from './state.js';
import { ToolAllowlist } from './tool-allowlist.js';
import { executeToolCalls } from './tool-runner.js';
import type { AgentProgressListener } from './tool-runner.js';
import { logger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const DEFAULT_SUBAGENT_MAX_STEPS = 10;

export type SubAgentStopReason = 'completed' | 'step_limit' | 'error';

export interface SubAgentConfig {
  name: string;
  systemPrompt: string;
  allowedTools: readonly ToolName[];
  maxSteps?: number;
  listener?: AgentProgressListener;
}

export interface SubAgentResult {
  /** Full private transcript, seed message included */
  messages: ChatMessage[];
  /** Final private file table */
  files: FileTable;
  /** Only the keys this sub-agent created or changed */
  delta: FileTable;
  steps: number;
  reason: SubAgentStopReason;
  error?: string;
  toolsUsed: ToolName[];
}

export class SubAgent {
  private maxSteps: number;
  private toolsUsed: Set<ToolName> = new Set();
  private logger: Logger;

  constructor(
    private llmClient: LLMClient,
    private toolRegistry: ToolRegistry,
    private config: SubAgentConfig
  ) {
    this.maxSteps = config.maxSteps ?? DEFAULT_SUBAGENT_MAX_STEPS;
    this.logger = logger.child(config.name);
  }

  /**
   * Run to Done. `state` must be the sub-agent's own isolated state (see
   * createSubAgentState); it is mutated in place and never shared.
   */
  async execute(state: SharedState): Promise<SubAgentResult> {
    const spawnFiles = snapshotFiles(state.files);
    const allowlist = new ToolAllowlist(this.config.allowedTools);
    const tools = allowlist.filter(this.toolRegistry.getDefinitions());
    this.logger.debug(`starting with ${allowlist.describe()}`);

    let steps = 0;
    let reason: SubAgentStopReason = 'step_limit';
    let error: string | undefined;

    while (steps < this.maxSteps) {
      steps++;
      this.config.listener?.onStep?.(this.config.name, steps, this.maxSteps);

      let completion: Completion;
      try {
        completion = await this.llmClient.complete(
          [{ role: 'system', content: this.config.systemPrompt }, ...state.messages],
          tools
        );
      } catch (llmError) {
        error = getErrorMessage(llmError);
        this.logger.warn(`LLM call failed: ${error}`);
        reason = 'error';
        break;
      }

      if (completion.type === 'final') {
        appendMessages(state, [{ role: 'assistant', content: completion.text }]);
        reason = 'completed';
        break;
      }

      appendMessages(state, [{ role: 'assistant', content: completion.text, toolCalls: completion.calls }]);
      for (const call of completion.calls) {
        const allowed = this.config.allowedTools.find((name) => name === call.name);
        if (allowed) this.toolsUsed.add(allowed);
      }

      const results = await executeToolCalls(completion.calls, this.toolRegistry, { state }, {
        agent: this.config.name,
        allowedTools: this.config.allowedTools,
        listener: this.config.listener,
      });
      appendMessages(state, results);
    }

    if (reason === 'step_limit') {
      this.logger.debug(`step budget of ${this.maxSteps} exhausted`);
    }

    return {
      messages: state.messages,
      files: state.files,
      delta: diffFiles(spawnFiles, state.files),
      steps,
      reason,
      error,
      toolsUsed: Array.from(this.toolsUsed),
    };
  }
}
