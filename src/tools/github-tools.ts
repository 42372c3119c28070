// Repository tools backed by the GitHub REST API

import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition, ToolExecutionContext } from './types.js';
import type { DirectoryEntry, GitHubApi, RepoContent } from '../github/client.js';
import { parseIssueUrl, parseRepoName } from '../github/parse.js';
import type { RepoRef } from '../github/parse.js';
import { AgentError, NotFoundError, ValidationError } from '../utils/errors.js';
import { sanitizeForFilename, shortUid } from '../utils/ids.js';
import { logger } from '../utils/logger.js';

/** Files up to this many lines are returned inline */
export const INLINE_FILE_MAX_LINES = 200;
/** Lines shown inline when a longer file is offloaded to the file table */
export const PREVIEW_LINES = 40;
export const FALLBACK_REFS = ['main', 'master', 'develop'];
export const MAX_ISSUE_COMMENTS = 10;
const FRAGMENT_PREVIEW_CHARS = 200;

const repoNameField = z.string().min(1);

const repositoryInfoSchema = z.object({
  repo_name: repoNameField,
});

export class GetRepositoryInfoTool extends BaseTool<typeof repositoryInfoSchema> {
  readonly definition: ToolDefinition = {
    name: 'get_repository_info',
    description: 'Get repository metadata: description, stars, forks, open issues, default branch, dates, topics, license, language.',
    parameters: {
      type: 'object',
      properties: {
        repo_name: { type: 'string', description: 'Repository in owner/repo format' },
      },
      required: ['repo_name'],
    },
  };

  protected readonly schema = repositoryInfoSchema;

  constructor(private readonly github: GitHubApi) {
    super();
  }

  protected async executeInternal(args: z.infer<typeof repositoryInfoSchema>): Promise<string> {
    const repo = parseRepoName(args.repo_name);
    const info = await this.github.getRepository(repo);
    const topics = info.topics ?? [];

    return [
      `# Repository: ${info.full_name}`,
      '',
      `**Description:** ${info.description || 'No description provided'}`,
      `**Stars:** ${info.stargazers_count.toLocaleString('en-US')}`,
      `**Forks:** ${info.forks_count.toLocaleString('en-US')}`,
      `**Open Issues:** ${info.open_issues_count}`,
      `**Default Branch:** ${info.default_branch}`,
      `**Created:** ${info.created_at}`,
      `**Last Updated:** ${info.updated_at}`,
      `**Size:** ${info.size} KB`,
      `**Topics:** ${topics.length > 0 ? topics.slice(0, 10).join(', ') : 'None'}`,
      `**License:** ${info.license?.name ?? 'Not specified'}`,
      `**Language:** ${info.language || 'Not specified'}`,
      `**URL:** ${info.html_url}`,
    ].join('\n');
  }
}

const searchCodeSchema = z.object({
  repo_name: repoNameField,
  query: z.string().min(1),
  max_results: z.number().int().min(1).max(100).default(10),
});

export class SearchCodeInRepoTool extends BaseTool<typeof searchCodeSchema> {
  readonly definition: ToolDefinition = {
    name: 'search_code_in_repo',
    description: `Search code in one repository using GitHub code search syntax.
Examples: "ChatOpenAI", "def authenticate", "extension:py", "path:src/auth", "language:python".`,
    parameters: {
      type: 'object',
      properties: {
        repo_name: { type: 'string', description: 'Repository in owner/repo format' },
        query: { type: 'string', description: 'Code search query; the repo qualifier is added for you' },
        max_results: { type: 'number', description: 'Maximum results (default 10)', default: 10 },
      },
      required: ['repo_name', 'query'],
    },
  };

  protected readonly schema = searchCodeSchema;

  constructor(private readonly github: GitHubApi) {
    super();
  }

  protected async executeInternal(args: z.infer<typeof searchCodeSchema>): Promise<string> {
    const repo = parseRepoName(args.repo_name);
    const result = await this.github.searchCode(repo, args.query, args.max_results);

    if (result.totalCount === 0 || result.items.length === 0) {
      return `No results found for query: ${args.query}`;
    }

    const output = [`Found ${result.items.length} of ${result.totalCount} results for '${args.query}' in ${repo.fullName}:`];
    result.items.forEach((item, idx) => {
      output.push('', `${idx + 1}. **${item.path}**`, `   URL: ${item.htmlUrl}`);
      const fragment = item.fragments[0];
      if (fragment) {
        const preview = fragment.length > FRAGMENT_PREVIEW_CHARS
          ? `${fragment.slice(0, FRAGMENT_PREVIEW_CHARS)}...`
          : fragment;
        output.push(`   Snippet: ${preview.replace(/\s*\n\s*/g, ' ')}`);
      }
    });
    return output.join('\n');
  }
}

const readRepoFileSchema = z.object({
  repo_name: repoNameField,
  file_path: z.string().min(1),
  ref: z.string().min(1).optional(),
});

export class ReadFileFromRepoTool extends BaseTool<typeof readRepoFileSchema> {
  readonly definition: ToolDefinition = {
    name: 'read_file_from_repo',
    description: `Read one file from a GitHub repository. Files over ${INLINE_FILE_MAX_LINES} lines are saved to the virtual file system and only the first ${PREVIEW_LINES} lines are shown.`,
    parameters: {
      type: 'object',
      properties: {
        repo_name: { type: 'string', description: 'Repository in owner/repo format' },
        file_path: { type: 'string', description: 'Path in the repository, e.g. "src/main.py"' },
        ref: { type: 'string', description: 'Branch, tag or commit SHA (default: the default branch)' },
      },
      required: ['repo_name', 'file_path'],
    },
  };

  protected readonly schema = readRepoFileSchema;

  constructor(private readonly github: GitHubApi) {
    super();
  }

  private async fetchWithFallback(repo: RepoRef, path: string, ref?: string): Promise<{ content: RepoContent; ref: string }> {
    if (!ref) {
      return { content: await this.github.getContents(repo, path), ref: 'default branch' };
    }

    try {
      return { content: await this.github.getContents(repo, path, ref), ref };
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;

      const tried = [ref];
      for (const alternative of FALLBACK_REFS) {
        if (alternative === ref) continue;
        tried.push(alternative);
        try {
          logger.child('read_file_from_repo').debug(`${path} not found at ${ref}, trying ${alternative}`);
          return { content: await this.github.getContents(repo, path, alternative), ref: alternative };
        } catch (retryError) {
          if (!(retryError instanceof NotFoundError)) throw retryError;
        }
      }

      throw new NotFoundError(`File not found: ${path}`, {
        status: 404,
        reason: `Tried refs: ${tried.join(', ')}.`,
      });
    }
  }

  protected async executeInternal(args: z.infer<typeof readRepoFileSchema>, context: ToolExecutionContext): Promise<string> {
    const repo = parseRepoName(args.repo_name);
    const { content, ref } = await this.fetchWithFallback(repo, args.file_path, args.ref);

    if (content.type === 'dir') {
      throw new ValidationError(`${args.file_path} is a directory, not a file`, {
        suggestion: 'Use list_repository_structure to see its contents.',
      });
    }

    const header = [
      `# File: ${content.path}`,
      `Repository: ${repo.fullName}`,
      `Ref: ${ref}`,
      `Size: ${content.size} bytes`,
      '',
    ];

    const lines = content.content.split('\n');
    if (lines.length <= INLINE_FILE_MAX_LINES) {
      return [...header, content.content].join('\n');
    }

    const filename = `repo_${sanitizeForFilename(content.path)}_${shortUid()}.txt`;
    context.state.files[filename] = content.content;

    return [
      ...header,
      lines.slice(0, PREVIEW_LINES).join('\n'),
      '',
      `... (showing first ${PREVIEW_LINES} of ${lines.length} lines)`,
      `Full content saved to: ${filename}`,
      `Use read_file('${filename}') to view it.`,
    ].join('\n');
  }
}

const structureSchema = z.object({
  repo_name: repoNameField,
  path: z.string().default(''),
  max_depth: z.number().int().min(0).max(5).default(2),
});

function sortEntries(entries: DirectoryEntry[]): DirectoryEntry[] {
  const byName = (a: DirectoryEntry, b: DirectoryEntry): number => a.name.localeCompare(b.name);
  return [
    ...entries.filter((entry) => entry.type === 'dir').sort(byName),
    ...entries.filter((entry) => entry.type !== 'dir').sort(byName),
  ];
}

export class ListRepositoryStructureTool extends BaseTool<typeof structureSchema> {
  readonly definition: ToolDefinition = {
    name: 'list_repository_structure',
    description: 'Show the directory tree of a repository (directories first), optionally starting at a sub-path.',
    parameters: {
      type: 'object',
      properties: {
        repo_name: { type: 'string', description: 'Repository in owner/repo format' },
        path: { type: 'string', description: 'Starting path (empty for root)', default: '' },
        max_depth: { type: 'number', description: 'Maximum directory depth (default 2)', default: 2 },
      },
      required: ['repo_name'],
    },
  };

  protected readonly schema = structureSchema;

  constructor(private readonly github: GitHubApi) {
    super();
  }

  private async buildTree(repo: RepoRef, entries: DirectoryEntry[], depth: number, maxDepth: number, prefix: string): Promise<string[]> {
    const output: string[] = [];
    const sorted = sortEntries(entries);

    for (let idx = 0; idx < sorted.length; idx++) {
      const entry = sorted[idx];
      const isLast = idx === sorted.length - 1;
      const connector = isLast ? '└── ' : '├── ';

      if (entry.type !== 'dir') {
        output.push(`${prefix}${connector}${entry.name}${entry.size ? ` (${entry.size} bytes)` : ''}`);
        continue;
      }

      output.push(`${prefix}${connector}${entry.name}/`);
      if (depth >= maxDepth) continue;

      const childPrefix = prefix + (isLast ? '    ' : '│   ');
      try {
        const child = await this.github.getContents(repo, entry.path);
        if (child.type === 'dir') {
          output.push(...(await this.buildTree(repo, child.entries, depth + 1, maxDepth, childPrefix)));
        }
      } catch (error) {
        if (!(error instanceof AgentError)) throw error;
        output.push(`${childPrefix}└── (access denied or too large)`);
      }
    }

    return output;
  }

  protected async executeInternal(args: z.infer<typeof structureSchema>): Promise<string> {
    const repo = parseRepoName(args.repo_name);
    const root = await this.github.getContents(repo, args.path);

    const header = [
      `Repository Structure: ${repo.fullName}`,
      args.path ? `Path: /${args.path}` : 'Path: / (root)',
      `Max Depth: ${args.max_depth}`,
      '',
    ];

    if (root.type !== 'dir') {
      return [...header, `${root.path} is a file (${root.size} bytes)`].join('\n');
    }

    const tree = await this.buildTree(repo, root.entries, 0, args.max_depth, '');
    return [...header, ...(tree.length > 0 ? tree : ['(empty)'])].join('\n');
  }
}

const issueDetailsSchema = z.object({
  issue_url: z.string().min(1),
});

export class GetIssueDetailsTool extends BaseTool<typeof issueDetailsSchema> {
  readonly definition: ToolDefinition = {
    name: 'get_issue_details',
    description: 'Fetch a GitHub issue with its labels and comments. The full text is saved to the virtual file system; a short summary is returned.',
    parameters: {
      type: 'object',
      properties: {
        issue_url: { type: 'string', description: 'e.g. https://github.com/owner/repo/issues/123' },
      },
      required: ['issue_url'],
    },
  };

  protected readonly schema = issueDetailsSchema;

  constructor(private readonly github: GitHubApi) {
    super();
  }

  protected async executeInternal(args: z.infer<typeof issueDetailsSchema>, context: ToolExecutionContext): Promise<string> {
    const ref = parseIssueUrl(args.issue_url);
    const repo: RepoRef = { owner: ref.owner, repo: ref.repo, fullName: ref.fullName };

    const issue = await this.github.getIssue(repo, ref.number);
    const comments = issue.commentCount > 0
      ? await this.github.getIssueComments(repo, ref.number, MAX_ISSUE_COMMENTS)
      : [];
    const labels = issue.labels.length > 0 ? issue.labels.join(', ') : 'None';

    const document = [
      `# GitHub Issue #${issue.number}: ${issue.title}`,
      '',
      `**Repository:** ${repo.fullName}`,
      `**URL:** ${args.issue_url}`,
      `**State:** ${issue.state}`,
      `**Created:** ${issue.createdAt}`,
      `**Author:** ${issue.author}`,
      '',
      '## Labels',
      '',
      labels,
      '',
      '## Description',
      '',
      issue.body || '(No description provided)',
    ];

    if (comments.length > 0) {
      document.push('', `## Comments (${issue.commentCount})`);
      comments.forEach((comment, idx) => {
        document.push('', `### Comment ${idx + 1} by ${comment.author}`, `*${comment.createdAt}*`, '', comment.body || '(empty)');
      });
    }

    const filename = `issue_${issue.number}_${shortUid()}.md`;
    context.state.files[filename] = document.join('\n');
    context.state.currentRepo = repo.fullName;
    context.state.issueUrl = args.issue_url;

    return [
      `Issue #${issue.number}: ${issue.title}`,
      `   State: ${issue.state}`,
      `   Repository: ${repo.fullName}`,
      `   Labels: ${labels}`,
      `   Comments: ${issue.commentCount}`,
      '',
      `Full details saved to: ${filename}`,
      `Use read_file('${filename}') to view the complete issue.`,
    ].join('\n');
  }
}
