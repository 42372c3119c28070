// Executes one batch of model-requested tool calls

import type { ChatMessage, ToolCall } from '../llm/types.js';
import type { ToolRegistry } from '../tools/index.js';
import type { ToolExecutionContext, ToolExecutionResult, ToolName } from '../tools/types.js';
import { ToolAllowlist } from './tool-allowlist.js';
import { logger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const TOOL_NOT_AVAILABLE_MESSAGE = 'Tool not available to this sub-agent';

/**
 * Progress hooks for a front end. Every callback is optional.
 */
export interface AgentProgressListener {
  onStep?(agent: string, step: number, maxSteps: number): void;
  onToolStart?(agent: string, tool: string): void;
  onToolEnd?(agent: string, tool: string, success: boolean): void;
}

export interface ToolBatchOptions {
  /** Name shown in logs and progress, e.g. "coordinator" or "repo-investigator" */
  agent: string;
  allowedTools?: readonly ToolName[];
  /** Message used when a call is outside the allow-list */
  refusalMessage?: string;
  listener?: AgentProgressListener;
  /** Wraps the execution of a single call, e.g. to bound concurrency */
  schedule?: (toolName: string, run: () => Promise<ToolExecutionResult>) => Promise<ToolExecutionResult>;
}

function parseArguments(raw: string): { ok: true; value: unknown } | { ok: false; error: string } {
  if (!raw.trim()) return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, error: `Invalid JSON arguments: ${getErrorMessage(error)}` };
  }
}

async function executeOne(
  call: ToolCall,
  registry: ToolRegistry,
  context: ToolExecutionContext,
  allowlist: ToolAllowlist,
  options: ToolBatchOptions
): Promise<ToolExecutionResult> {
  if (!allowlist.allows(call.name)) {
    return { success: false, error: options.refusalMessage ?? TOOL_NOT_AVAILABLE_MESSAGE };
  }

  const args = parseArguments(call.arguments);
  if (!args.ok) {
    return { success: false, error: args.error };
  }

  const run = (): Promise<ToolExecutionResult> => registry.execute(call.name, args.value, context);
  try {
    return options.schedule ? await options.schedule(call.name, run) : await run();
  } catch (error) {
    // Tools report their own failures; this only catches bugs
    return { success: false, error: getErrorMessage(error) };
  }
}

/**
 * Run every call concurrently and return the tool-result turns in call order.
 */
export async function executeToolCalls(
  calls: ToolCall[],
  registry: ToolRegistry,
  context: ToolExecutionContext,
  options: ToolBatchOptions
): Promise<ChatMessage[]> {
  const agentLogger = logger.child(options.agent);
  const allowlist = new ToolAllowlist(options.allowedTools);
  const results = await Promise.all(
    calls.map(async (call) => {
      options.listener?.onToolStart?.(options.agent, call.name);
      agentLogger.debug(`→ ${call.name} ${call.arguments}`);

      const result = await executeOne(call, registry, context, allowlist, options);

      options.listener?.onToolEnd?.(options.agent, call.name, result.success);
      agentLogger.debug(`${result.success ? '✓' : '✗'} ${call.name}`);
      return result;
    })
  );

  return calls.map((call, idx): ChatMessage => {
    const result = results[idx];
    return {
      role: 'tool',
      name: call.name,
      toolCallId: call.id,
      content: result.success ? result.output || 'Success' : `Error: ${result.error ?? 'unknown error'}`,
    };
  });
}
