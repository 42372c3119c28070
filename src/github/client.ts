// GitHub REST v3 client over fetch

import { z } from 'zod';
import { errorForStatus, readJsonBody } from '../utils/http.js';
import { ValidationError, toNetworkError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { RepoRef } from './parse.js';

const API_VERSION = '2022-11-28';
const DEFAULT_TIMEOUT_MS = 30_000;

const logger = rootLogger.child('GitHub');

const repositorySchema = z.object({
  full_name: z.string(),
  description: z.string().nullable(),
  stargazers_count: z.number(),
  forks_count: z.number(),
  open_issues_count: z.number(),
  default_branch: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  size: z.number(),
  topics: z.array(z.string()).optional(),
  license: z.object({ name: z.string() }).nullable().optional(),
  language: z.string().nullable(),
  html_url: z.string(),
});

const codeSearchSchema = z.object({
  total_count: z.number(),
  items: z.array(
    z.object({
      path: z.string(),
      html_url: z.string(),
      repository: z.object({ full_name: z.string() }),
      text_matches: z.array(z.object({ fragment: z.string().optional() })).optional(),
    })
  ),
});

const contentEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  path: z.string(),
  size: z.number().optional(),
  content: z.string().optional(),
  encoding: z.string().optional(),
});

const contentsSchema = z.union([z.array(contentEntrySchema), contentEntrySchema]);

const userSchema = z.object({ login: z.string() }).nullable();

const issueSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.string(),
  body: z.string().nullable().optional(),
  created_at: z.string(),
  user: userSchema,
  labels: z.array(z.union([z.string(), z.object({ name: z.string().optional() })])),
  comments: z.number(),
  pull_request: z.unknown().optional(),
});

const commentSchema = z.object({
  body: z.string().nullable().optional(),
  created_at: z.string(),
  user: userSchema,
});

export type Repository = z.infer<typeof repositorySchema>;

export interface CodeSearchHit {
  path: string;
  htmlUrl: string;
  repository: string;
  fragments: string[];
}

export interface CodeSearchResult {
  totalCount: number;
  items: CodeSearchHit[];
}

export interface DirectoryEntry {
  type: 'file' | 'dir' | 'other';
  name: string;
  path: string;
  size: number;
}

export type RepoContent =
  | { type: 'file'; path: string; size: number; content: string }
  | { type: 'dir'; path: string; entries: DirectoryEntry[] };

export interface Issue {
  number: number;
  title: string;
  state: string;
  body: string;
  createdAt: string;
  author: string;
  labels: string[];
  commentCount: number;
  isPullRequest: boolean;
}

export interface IssueComment {
  author: string;
  createdAt: string;
  body: string;
}

/**
 * The GitHub operations the tools rely on. Tests substitute an in-memory fake.
 */
export interface GitHubApi {
  getRepository(repo: RepoRef): Promise<Repository>;
  searchCode(repo: RepoRef, query: string, maxResults: number): Promise<CodeSearchResult>;
  getContents(repo: RepoRef, path: string, ref?: string): Promise<RepoContent>;
  getIssue(repo: RepoRef, number: number): Promise<Issue>;
  getIssueComments(repo: RepoRef, number: number, limit: number): Promise<IssueComment[]>;
}

export interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
}

function encodePath(path: string): string {
  return path
    .split('/')
    .filter(Boolean)
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

export class GitHubClient implements GitHubApi {
  private token: string;
  private apiUrl: string;
  private timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl || 'https://api.github.com').replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    action: string,
    accept: string = 'application/vnd.github+json'
  ): Promise<T> {
    const url = `${this.apiUrl}${path}`;
    const headers: Record<string, string> = {
      Accept: accept,
      'X-GitHub-Api-Version': API_VERSION,
      'User-Agent': 'issue-scout',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    logger.debug(`GET ${path}`);

    let response: Response;
    try {
      response = await fetch(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw toNetworkError(error, 'GitHub');
    }

    if (!response.ok) {
      const body = await response.text();
      throw errorForStatus(response.status, body, {
        service: 'GitHub',
        action,
        credential: 'GITHUB_TOKEN',
        quotaExhausted:
          response.headers.get('x-ratelimit-remaining') === '0' || /rate limit/i.test(body),
      });
    }

    const parsed = schema.safeParse(await readJsonBody(response, 'GitHub', action));
    if (!parsed.success) {
      throw new ValidationError(`${action} returned an unexpected response`, {
        reason: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '),
      });
    }
    return parsed.data;
  }

  async getRepository(repo: RepoRef): Promise<Repository> {
    return this.request(
      `/repos/${repo.owner}/${repo.repo}`,
      repositorySchema,
      `Fetching info for repository '${repo.fullName}'`
    );
  }

  async searchCode(repo: RepoRef, query: string, maxResults: number): Promise<CodeSearchResult> {
    const q = encodeURIComponent(`${query} repo:${repo.fullName}`);
    const perPage = Math.min(Math.max(maxResults, 1), 100);
    const data = await this.request(
      `/search/code?q=${q}&per_page=${perPage}`,
      codeSearchSchema,
      `Searching code in '${repo.fullName}'`,
      'application/vnd.github.text-match+json'
    );

    return {
      totalCount: data.total_count,
      items: data.items.slice(0, maxResults).map((item) => ({
        path: item.path,
        htmlUrl: item.html_url,
        repository: item.repository.full_name,
        fragments: (item.text_matches ?? [])
          .map((match) => match.fragment ?? '')
          .filter((fragment) => fragment.length > 0),
      })),
    };
  }

  async getContents(repo: RepoRef, path: string, ref?: string): Promise<RepoContent> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : '';
    const data = await this.request(
      `/repos/${repo.owner}/${repo.repo}/contents/${encodePath(path)}${query}`,
      contentsSchema,
      `Reading '${path || '/'}' from '${repo.fullName}'${ref ? ` at ${ref}` : ''}`
    );

    if (Array.isArray(data)) {
      return {
        type: 'dir',
        path,
        entries: data.map((entry) => ({
          type: entry.type === 'file' || entry.type === 'dir' ? entry.type : 'other',
          name: entry.name,
          path: entry.path,
          size: entry.size ?? 0,
        })),
      };
    }

    if (data.type !== 'file' || data.content === undefined) {
      throw new ValidationError(`'${path}' is not a regular file`, {
        reason: `GitHub reports it as '${data.type}'.`,
      });
    }

    const content =
      data.encoding === 'base64' ? Buffer.from(data.content, 'base64').toString('utf-8') : data.content;
    return { type: 'file', path: data.path, size: data.size ?? Buffer.byteLength(content), content };
  }

  async getIssue(repo: RepoRef, number: number): Promise<Issue> {
    const data = await this.request(
      `/repos/${repo.owner}/${repo.repo}/issues/${number}`,
      issueSchema,
      `Fetching issue #${number} from '${repo.fullName}'`
    );

    return {
      number: data.number,
      title: data.title,
      state: data.state,
      body: data.body ?? '',
      createdAt: data.created_at,
      author: data.user?.login ?? 'ghost',
      labels: data.labels
        .map((label) => (typeof label === 'string' ? label : label.name ?? ''))
        .filter((name) => name.length > 0),
      commentCount: data.comments,
      isPullRequest: data.pull_request !== undefined,
    };
  }

  async getIssueComments(repo: RepoRef, number: number, limit: number): Promise<IssueComment[]> {
    const perPage = Math.min(Math.max(limit, 1), 100);
    const data = await this.request(
      `/repos/${repo.owner}/${repo.repo}/issues/${number}/comments?per_page=${perPage}`,
      z.array(commentSchema),
      `Fetching comments for issue #${number} from '${repo.fullName}'`
    );

    return data.slice(0, limit).map((comment) => ({
      author: comment.user?.login ?? 'ghost',
      createdAt: comment.created_at,
      body: comment.body ?? '',
    }));
  }
}
