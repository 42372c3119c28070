// Tool type definitions

import type { JsonSchemaObject } from '../llm/types.js';
import type { SharedState } from '../agent/state.js';

/**
 * Every tool the agents can call. Registration rejects anything else.
 */
export const TOOL_NAMES = [
  // virtual file system
  'ls',
  'read_file',
  'write_file',
  // planning
  'write_todos',
  'read_todos',
  'mark_todo_done',
  'update_todo_status',
  'think_tool',
  // local analysis
  'extract_stack_trace',
  'parse_error_from_issue',
  // GitHub
  'get_repository_info',
  'search_code_in_repo',
  'read_file_from_repo',
  'list_repository_structure',
  'get_issue_details',
  // web research
  'search_error_solution',
  'search_documentation',
  // delegation
  'task',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

export interface ToolDefinition {
  name: ToolName;
  description: string;
  parameters: JsonSchemaObject;
}

export interface ToolExecutionResult {
  success: boolean;
  output?: string;
  error?: string;
}

export interface ToolExecutionContext {
  /** State of the agent making the call: the coordinator's or a sub-agent's private one */
  state: SharedState;
}

export interface Tool {
  definition: ToolDefinition;
  execute(args: unknown, context: ToolExecutionContext): Promise<ToolExecutionResult>;
}
