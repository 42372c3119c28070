// HTTP status → error taxonomy, shared by the GitHub, search and LLM clients

import {
  AgentError,
  AuthError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  getErrorMessage,
  toNetworkError,
} from './errors.js';
import { log } from './logger.js';

export interface StatusErrorOptions {
  /** Human name of the service, e.g. "GitHub" */
  service: string;
  /** What was being attempted, e.g. "Reading src/index.ts from octo/demo" */
  action: string;
  /** Environment variable holding the credential for this service */
  credential?: string;
  /** Rate-limit signal beyond the status code (e.g. x-ratelimit-remaining: 0) */
  quotaExhausted?: boolean;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the most useful message out of an error body (JSON `message` or
 * `error.message` / `detail`, else the raw text).
 */
export function extractErrorMessage(body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  const parsed = parseJson(trimmed);
  if (isRecord(parsed)) {
    if (typeof parsed.message === 'string') return parsed.message;
    if (typeof parsed.detail === 'string') return parsed.detail;
    const nested = parsed.error;
    if (typeof nested === 'string') return nested;
    if (isRecord(nested) && typeof nested.message === 'string') return nested.message;
  }
  return trimmed.length > 300 ? `${trimmed.slice(0, 300)}...` : trimmed;
}

/**
 * Read and parse a JSON body. A failure while the body streams (timeout,
 * reset) becomes a NetworkError; a body that is not JSON a ValidationError.
 */
export async function readJsonBody(response: Response, service: string, action: string): Promise<unknown> {
  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw toNetworkError(error, service);
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ValidationError(`${action} returned an unreadable response`, {
      reason: `${service} sent a body that is not JSON: ${getErrorMessage(error)}`,
      suggestion: 'Retry in a moment; the service may be having trouble.',
      status: response.status,
    });
  }
}

export function errorForStatus(status: number, body: string, options: StatusErrorOptions): AgentError {
  const detail = extractErrorMessage(body);
  const reason = detail
    ? `${options.service} answered ${status}: ${detail}`
    : `${options.service} answered ${status}.`;
  const message = `${options.action} failed`;

  if (status === 401) {
    return new AuthError(message, {
      status,
      reason,
      suggestion: options.credential
        ? `Check ${options.credential} in your .env file; the ${options.service} credential was rejected.`
        : undefined,
    });
  }

  if (status === 429 || (status === 403 && options.quotaExhausted)) {
    return new RateLimitError(message, { status, reason });
  }

  if (status === 403) {
    return new AuthError(message, {
      status,
      reason,
      suggestion: options.credential
        ? `Check that ${options.credential} has access to this resource.`
        : undefined,
    });
  }

  if (status === 404) {
    return new NotFoundError(message, { status, reason });
  }

  if (status === 400 || status === 422) {
    return new ValidationError(message, {
      status,
      reason,
      suggestion: 'Simplify the query or check its syntax, then retry.',
    });
  }

  return new AgentError(message, {
    status,
    reason,
    suggestion: 'Retry in a moment; the service may be having trouble.',
  });
}

// Retry configuration
const MAX_RETRIES = 3;
const INITIAL_RETRY_DELAY_MS = 1000;
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * fetch with a per-attempt timeout and exponential backoff on
 * network failures and 429/5xx answers. Honors Retry-After.
 * The final non-ok response is returned for the caller to map.
 */
export async function fetchWithRetry(
  url: string,
  options: RequestInit,
  timeoutMs: number,
  maxRetries: number = MAX_RETRIES
): Promise<Response> {
  let delay = INITIAL_RETRY_DELAY_MS;

  for (let attempt = 0; ; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, { ...options, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (attempt < maxRetries) {
        log.warn(`Network error, retrying in ${delay}ms...`);
        await sleep(delay);
        delay *= 2;
        continue;
      }
      throw toNetworkError(error, url);
    }

    if (!response.ok && RETRYABLE_STATUS_CODES.includes(response.status) && attempt < maxRetries) {
      const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
      const waitTime = Number.isFinite(retryAfter) ? retryAfter * 1000 : delay;
      log.warn(`API returned ${response.status}, retrying in ${waitTime}ms...`);
      await sleep(waitTime);
      delay *= 2;
      continue;
    }

    return response;
  }
}
