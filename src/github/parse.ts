// Input validation for repository names and issue URLs

import { ValidationError } from '../utils/errors.js';

export interface RepoRef {
  owner: string;
  repo: string;
  /** "owner/repo" */
  fullName: string;
}

export interface IssueRef extends RepoRef {
  number: number;
  kind: 'issue' | 'pull';
}

const NAME_PART = /^[A-Za-z0-9_.-]+$/;

/**
 * Parse and validate an "owner/repo" name.
 */
export function parseRepoName(repoName: string): RepoRef {
  const trimmed = (repoName || '').trim();
  if (!trimmed) {
    throw new ValidationError('Repository name cannot be empty', {
      suggestion: 'Use the owner/repo format, e.g. facebook/react.',
    });
  }

  const parts = trimmed.split('/');
  if (parts.length !== 2) {
    throw new ValidationError(`Invalid repository format: '${trimmed}'`, {
      reason: "Expected exactly one '/' separating owner and repository (owner/repo).",
      suggestion: 'Use the owner/repo format, e.g. facebook/react.',
    });
  }

  const [owner, repo] = parts;
  if (!owner || !repo || !NAME_PART.test(owner) || !NAME_PART.test(repo)) {
    throw new ValidationError(`Invalid repository format: '${trimmed}'`, {
      reason: 'Both owner and repository name must be non-empty and contain only letters, digits, ".", "-" or "_".',
      suggestion: 'Use the owner/repo format, e.g. facebook/react.',
    });
  }

  return { owner, repo, fullName: `${owner}/${repo}` };
}

export function validateRepoName(repoName: string): { valid: true } | { valid: false; error: ValidationError } {
  try {
    parseRepoName(repoName);
    return { valid: true };
  } catch (error) {
    if (error instanceof ValidationError) return { valid: false, error };
    throw error;
  }
}

/**
 * Parse https://github.com/<owner>/<repo>/(issues|pull)/<n>.
 * Query strings, fragments and trailing segments are ignored.
 */
export function parseIssueUrl(issueUrl: string): IssueRef {
  const trimmed = (issueUrl || '').trim();
  const invalid = (reason: string): ValidationError =>
    new ValidationError(`Invalid GitHub issue URL: ${trimmed || '(empty)'}`, {
      reason,
      suggestion: 'Use a URL like https://github.com/owner/repo/issues/123.',
    });

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw invalid('Not a valid URL.');
  }

  if (url.hostname !== 'github.com' && url.hostname !== 'www.github.com') {
    throw invalid('The URL must point to github.com.');
  }

  const segments = url.pathname.split('/').filter(Boolean);
  if (segments.length < 4 || (segments[2] !== 'issues' && segments[2] !== 'pull')) {
    throw invalid('Expected /<owner>/<repo>/issues/<number> or /pull/<number>.');
  }

  const number = Number(segments[3]);
  if (!Number.isInteger(number) || number <= 0) {
    throw invalid(`'${segments[3]}' is not an issue number.`);
  }

  const { owner, repo, fullName } = parseRepoName(`${segments[0]}/${segments[1]}`);
  return { owner, repo, fullName, number, kind: segments[2] === 'pull' ? 'pull' : 'issue' };
}
