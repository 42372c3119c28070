// Fetches result pages and reduces their HTML to readable text

import { logger as rootLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

const logger = rootLogger.child('PageFetcher');

export const PAGE_FETCH_TIMEOUT_MS = 30_000;

export type PageFetchResult =
  | { ok: true; text: string }
  | { ok: false; reason: 'http_error' | 'timeout' | 'connection_error'; detail: string };

export type PageFetcher = (url: string) => Promise<PageFetchResult>;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/** Unicode scalar value: in range and not a surrogate */
function isScalarValue(code: number): boolean {
  return Number.isInteger(code) && code >= 0 && code <= 0x10ffff && !(code >= 0xd800 && code <= 0xdfff);
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const code = entity[1] === 'x' || entity[1] === 'X'
        ? Number.parseInt(entity.slice(2), 16)
        : Number.parseInt(entity.slice(1), 10);
      return isScalarValue(code) ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

/**
 * Reduce an HTML document to markdown-ish text: scripts, styles and
 * navigation chrome are dropped; headings, list items, code blocks and
 * paragraphs keep their line structure.
 */
export function htmlToText(html: string): string {
  let text = html
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<(script|style|noscript|svg|head|nav|footer)\b[\s\S]*?<\/\1>/gi, '');

  text = text
    .replace(/<h([1-6])\b[^>]*>([\s\S]*?)<\/h\1>/gi, (_m, level: string, inner: string) =>
      `\n\n${'#'.repeat(Number(level))} ${inner.trim()}\n\n`)
    .replace(/<pre\b[^>]*>([\s\S]*?)<\/pre>/gi, (_m, inner: string) => `\n\n\`\`\`\n${inner}\n\`\`\`\n\n`)
    .replace(/<code\b[^>]*>([\s\S]*?)<\/code>/gi, '`$1`')
    .replace(/<li\b[^>]*>/gi, '\n- ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|section|article|tr|ul|ol|table|blockquote)>/gi, '\n\n')
    .replace(/<[^>]+>/g, '');

  return decodeEntities(text)
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function failureReason(error: unknown): 'timeout' | 'connection_error' {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
    ? 'timeout'
    : 'connection_error';
}

/**
 * Never rejects: every failure, including one while the body streams,
 * comes back as `ok: false`.
 */
export function createPageFetcher(timeoutMs: number = PAGE_FETCH_TIMEOUT_MS): PageFetcher {
  return async (url: string): Promise<PageFetchResult> => {
    try {
      const response = await fetch(url, {
        headers: { 'User-Agent': 'issue-scout', Accept: 'text/html,text/plain;q=0.9,*/*;q=0.5' },
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (response.status !== 200) {
        logger.debug(`${url}: HTTP ${response.status}`);
        return { ok: false, reason: 'http_error', detail: `HTTP ${response.status}` };
      }

      const body = await response.text();
      const contentType = response.headers.get('content-type') ?? '';
      const text = contentType.includes('html') || /^\s*</.test(body) ? htmlToText(body) : body.trim();
      return { ok: true, text };
    } catch (error) {
      logger.debug(`${url}: ${getErrorMessage(error)}`);
      return { ok: false, reason: failureReason(error), detail: getErrorMessage(error) };
    }
  };
}
