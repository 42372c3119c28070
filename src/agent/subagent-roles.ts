// Subagent Roles - the closed registry of sub-agent types

import type { ToolName } from '../tools/types.js';

export const SUBAGENT_TYPES = ['repo-investigator', 'error-researcher'] as const;

export type SubagentType = (typeof SUBAGENT_TYPES)[number];

export interface SubagentRole {
  id: SubagentType;
  name: string;
  /** One line shown to the coordinator in the task tool description */
  summary: string;
  systemPrompt: string;
  allowedTools: ToolName[];
  bestFor: string[];
}

export const SUBAGENT_ROLES: Record<SubagentType, SubagentRole> = {
  'repo-investigator': {
    id: 'repo-investigator',
    name: 'Repository Investigator',
    summary: 'Explores a repository: finds where code lives, reads files, maps structure.',
    systemPrompt: `You are a Repository Investigator sub-agent. You explore one GitHub repository to answer a focused question.

RULES:
- You are READ-ONLY. Use only your tools: search_code_in_repo, read_file_from_repo, list_repository_structure, think_tool, read_file.
- Start broad (list_repository_structure), then narrow with search_code_in_repo, then read the specific files.
- Files you read that are long are saved to the shared file system; cite them by filename.
- Use think_tool after each discovery to decide whether you have enough.

When done, reply with a concise report: the relevant files and line ranges, what the code does, and how it relates to the question. No tool calls in the final reply.`,
    allowedTools: [
      'search_code_in_repo',
      'read_file_from_repo',
      'list_repository_structure',
      'think_tool',
      'read_file',
    ],
    bestFor: [
      'Locating the code behind an error or stack frame',
      'Understanding how a feature is implemented',
      'Mapping project structure before a deeper look',
    ],
  },

  'error-researcher': {
    id: 'error-researcher',
    name: 'Error Researcher',
    summary: 'Researches an error or API on the web: known issues, fixes, official docs.',
    systemPrompt: `You are an Error Researcher sub-agent. You research one error or library topic on the web.

RULES:
- Use only your tools: search_error_solution, search_documentation, think_tool, read_file.
- Search results are saved to the shared file system; read_file the promising ones for detail.
- Use think_tool after each search: what did I learn, what is missing?
- Stop after a few searches once you have a credible answer.

When done, reply with a concise report: likely causes, known fixes or workarounds with sources (URLs and saved filenames), and relevant version notes. No tool calls in the final reply.`,
    allowedTools: [
      'search_error_solution',
      'search_documentation',
      'think_tool',
      'read_file',
    ],
    bestFor: [
      'Finding known fixes for an exception message',
      'Checking official documentation for an API',
      'Finding related upstream issues or changelog notes',
    ],
  },
};

export function isSubagentType(value: string): value is SubagentType {
  return SUBAGENT_TYPES.some((type) => type === value);
}

export function getRole(type: string): SubagentRole | undefined {
  return isSubagentType(type) ? SUBAGENT_ROLES[type] : undefined;
}

export function listRoles(): SubagentRole[] {
  return SUBAGENT_TYPES.map((type) => SUBAGENT_ROLES[type]);
}
