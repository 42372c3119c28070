// Task delegation: run a sub-agent on an isolated copy of the files, merge its delta back

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition, ToolExecutionContext, ToolName } from './types.js';
import type { ToolRegistry } from './index.js';
import type { LLMClient } from '../llm/types.js';
import { SubAgent } from '../agent/subagent.js';
import type { SubAgentResult } from '../agent/subagent.js';
import type { AgentProgressListener } from '../agent/tool-runner.js';
import { SUBAGENT_TYPES, getRole, listRoles } from '../agent/subagent-roles.js';
import { createSubAgentState, getLastAssistantMessage, mergeFiles, snapshotFiles } from '../agent/state.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const NO_SUBAGENT_RESPONSE = 'Sub-agent completed but provided no response.';

export interface TaskToolOptions {
  llmClient: LLMClient;
  /** Registry sub-agents draw their tools from; it must not contain `task` */
  subAgentRegistry: ToolRegistry;
  subAgentMaxSteps: number;
  listener?: AgentProgressListener;
}

const taskSchema = z.object({
  description: z.string().min(1),
  // Checked against the role registry by hand so unknown types get a listing, not a schema error
  subagent_type: z.string().min(1),
});

function formatReport(type: string, description: string, result: SubAgentResult): string {
  const answer = getLastAssistantMessage(result.messages) ?? NO_SUBAGENT_RESPONSE;
  const updated = Object.keys(result.delta).sort();

  const lines = [
    `## Sub-agent report: ${type}`,
    '',
    `**Task:** ${description}`,
    '',
    answer,
    '',
    '---',
  ];

  if (result.reason === 'step_limit') {
    lines.push(`Stopped after ${result.steps} steps: step budget reached.`);
  } else if (result.reason === 'error') {
    lines.push(`Stopped after an error: ${result.error ?? 'unknown error'}`);
  }
  lines.push(`Files updated: ${updated.length}${updated.length > 0 ? ` (${updated.join(', ')})` : ''}`);

  return lines.join('\n');
}

export class TaskTool extends BaseTool<typeof taskSchema> {
  readonly definition: ToolDefinition;

  protected readonly schema = taskSchema;

  constructor(private readonly options: TaskToolOptions) {
    super();
    const roles = listRoles()
      .map((role) => `- ${role.id}: ${role.summary}`)
      .join('\n');
    this.definition = {
      name: 'task',
      description: `Delegate a focused research task to a specialized sub-agent. The sub-agent starts fresh: it sees only the task description and the current files, not this conversation, so make the description self-contained. Several task calls in one response run in parallel.

Available sub-agent types:
${roles}`,
      parameters: {
        type: 'object',
        properties: {
          description: { type: 'string', description: 'Self-contained task for the sub-agent' },
          subagent_type: { type: 'string', enum: [...SUBAGENT_TYPES], description: 'Which sub-agent to use' },
        },
        required: ['description', 'subagent_type'],
      },
    };
  }

  protected async executeInternal(args: z.infer<typeof taskSchema>, context: ToolExecutionContext): Promise<string> {
    const role = getRole(args.subagent_type);
    if (!role) {
      return `Unknown sub-agent type: ${args.subagent_type}. Available: ${SUBAGENT_TYPES.join(', ')}`;
    }

    const usable: ToolName[] = role.allowedTools.filter((name) => this.options.subAgentRegistry.has(name));
    if (usable.length === 0) {
      return `No tools available for ${role.id}`;
    }

    try {
      const snapshot = snapshotFiles(context.state.files);
      const subState = createSubAgentState(context.state, args.description, snapshot);
      const subAgent = new SubAgent(this.options.llmClient, this.options.subAgentRegistry, {
        name: role.id,
        systemPrompt: role.systemPrompt,
        allowedTools: usable,
        maxSteps: this.options.subAgentMaxSteps,
        listener: this.options.listener,
      });

      const result = await subAgent.execute(subState);
      mergeFiles(context.state.files, result.delta);

      logger.child('task').debug(
        `${role.id} finished (${result.reason}, ${result.steps} steps, ${Object.keys(result.delta).length} files)`
      );
      return formatReport(role.id, args.description, result);
    } catch (error) {
      return `Sub-agent execution failed: ${getErrorMessage(error)}`;
    }
  }
}
