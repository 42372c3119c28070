// Error taxonomy shared by the tools, the collaborator clients and the CLI

export type AgentErrorKind =
  | 'not_found'
  | 'rate_limit'
  | 'auth'
  | 'network'
  | 'validation'
  | 'configuration'
  | 'internal';

export interface AgentErrorDetails {
  /** Why it failed, in plain terms */
  reason?: string;
  /** One actionable next step */
  suggestion?: string;
  /** HTTP status that triggered the error, when there was one */
  status?: number;
  cause?: unknown;
}

/**
 * Base class for every error the agent knows how to explain.
 * The message says what failed; `reason` and `suggestion` complete the picture.
 */
export class AgentError extends Error {
  readonly kind: AgentErrorKind = 'internal';
  readonly reason?: string;
  readonly suggestion?: string;
  readonly status?: number;

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'AgentError';
    this.reason = details.reason;
    this.suggestion = details.suggestion ?? this.defaultSuggestion();
    this.status = details.status;
  }

  protected defaultSuggestion(): string | undefined {
    return undefined;
  }
}

export class NotFoundError extends AgentError {
  readonly kind = 'not_found';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'NotFoundError';
  }

  protected defaultSuggestion(): string {
    return 'Check the owner/repo name, the path or issue number, and that the token can access the repository.';
  }
}

export class RateLimitError extends AgentError {
  readonly kind = 'rate_limit';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'RateLimitError';
  }

  protected defaultSuggestion(): string {
    return 'Wait a few minutes and retry, or use a credential with a higher quota.';
  }
}

export class AuthError extends AgentError {
  readonly kind = 'auth';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'AuthError';
  }

  protected defaultSuggestion(): string {
    return 'Check the credential in your .env file and run `issue-scout config` to verify it.';
  }
}

export class NetworkError extends AgentError {
  readonly kind = 'network';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'NetworkError';
  }

  protected defaultSuggestion(): string {
    return 'Check your internet connection and retry in a moment.';
  }
}

export class ValidationError extends AgentError {
  readonly kind = 'validation';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AgentError {
  readonly kind = 'configuration';

  constructor(message: string, details: AgentErrorDetails = {}) {
    super(message, details);
    this.name = 'ConfigurationError';
  }

  protected defaultSuggestion(): string {
    return 'Run `issue-scout config` to see which settings are missing.';
  }
}

/**
 * Common error patterns for errors that did not come from our own clients
 */
export const ErrorPatterns = {
  NETWORK: /network|timeout|timed out|econnrefused|econnreset|etimedout|enotfound|fetch failed/i,
  AUTH: /unauthorized|401|authentication|bad credentials/i,
  QUOTA: /quota|rate limit|429/i,
  NOT_FOUND: /not found|404/i,
};

function inferSuggestion(message: string): string | undefined {
  if (ErrorPatterns.QUOTA.test(message)) {
    return 'Wait a few minutes and retry, or use a credential with a higher quota.';
  }
  if (ErrorPatterns.AUTH.test(message)) {
    return 'Check the credential in your .env file and run `issue-scout config` to verify it.';
  }
  if (ErrorPatterns.NETWORK.test(message)) {
    return 'Check your internet connection and retry in a moment.';
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Render an error as plain text: what failed, why, and what to do next.
 * Used for tool results (the coordinator reads them) and by the CLI.
 */
export function formatUserError(error: unknown): string {
  const lines = [`✗ ${getErrorMessage(error)}`];

  if (error instanceof AgentError) {
    if (error.reason) lines.push(`  Why: ${error.reason}`);
    if (error.suggestion) lines.push(`  Next: ${error.suggestion}`);
    return lines.join('\n');
  }

  const suggestion = inferSuggestion(getErrorMessage(error));
  if (suggestion) lines.push(`  Next: ${suggestion}`);
  return lines.join('\n');
}

/**
 * Wrap a low-level failure (fetch rejection, abort) as a NetworkError.
 */
export function toNetworkError(error: unknown, target: string): NetworkError {
  const isTimeout =
    error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
  return new NetworkError(`Request to ${target} failed`, {
    reason: isTimeout ? 'The request timed out.' : getErrorMessage(error),
    cause: error,
  });
}
