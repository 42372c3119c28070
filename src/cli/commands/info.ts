// info: capabilities summary

import chalk from 'chalk';
import { listRoles } from '../../agent/subagent-roles.js';
import { TOOL_NAMES } from '../../tools/types.js';
import type { ToolName } from '../../tools/types.js';

export const TOOL_GROUPS: ReadonlyArray<{ label: string; tools: readonly ToolName[] }> = [
  {
    label: 'GitHub',
    tools: ['get_repository_info', 'search_code_in_repo', 'read_file_from_repo', 'list_repository_structure', 'get_issue_details'],
  },
  { label: 'Web research', tools: ['search_error_solution', 'search_documentation'] },
  { label: 'Files', tools: ['ls', 'read_file', 'write_file'] },
  { label: 'Analysis', tools: ['extract_stack_trace', 'parse_error_from_issue', 'think_tool'] },
  { label: 'Planning', tools: ['write_todos', 'read_todos', 'mark_todo_done', 'update_todo_status'] },
  { label: 'Delegation', tools: ['task'] },
];

export function buildInfoText(): string {
  const lines: string[] = [
    chalk.bold('issue-scout'),
    'Investigates GitHub issues and answers questions about repositories with a coordinator and specialized sub-agents.',
    '',
    chalk.bold('Sub-agents'),
  ];

  for (const role of listRoles()) {
    lines.push(`  ${chalk.cyan(role.id)}: ${role.summary}`);
    lines.push(chalk.gray(`    tools: ${role.allowedTools.join(', ')}`));
  }

  lines.push('', chalk.bold(`Tools (${TOOL_NAMES.length})`));
  for (const group of TOOL_GROUPS) {
    lines.push(`  ${group.label}: ${group.tools.join(', ')}`);
  }

  lines.push(
    '',
    chalk.bold('Examples'),
    '  issue-scout analyze https://github.com/owner/repo/issues/123',
    '  issue-scout ask owner/repo "How does request retrying work?"',
    '  issue-scout interactive',
    '  issue-scout config'
  );

  return lines.join('\n');
}

export function infoCommand(): void {
  process.stdout.write(`${buildInfoText()}\n`);
}
