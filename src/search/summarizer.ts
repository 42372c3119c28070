// LLM page summarization with a filename suggestion

import { z } from 'zod';
import type { LLMClient } from '../llm/types.js';
import { parseJsonReply } from '../utils/json-extract.js';
import { logger as rootLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const FALLBACK_FILENAME = 'search_result.md';
export const FALLBACK_SUMMARY_CHARS = 500;
const MAX_CONTENT_CHARS = 4000;

const logger = rootLogger.child('Summarizer');

const summarySchema = z.object({
  filename: z.string().min(1),
  summary: z.string().min(1),
});

export type PageSummary = z.infer<typeof summarySchema>;

export type Summarizer = (content: string) => Promise<PageSummary>;

function buildPrompt(content: string, date: string): string {
  return `You are analyzing web search results about programming errors and solutions.

Create a concise summary of the key information from this webpage.

Content:
${content.slice(0, MAX_CONTENT_CHARS)}

Your summary should include:
1. Main topic or problem being addressed
2. Key takeaways or solutions mentioned
3. Any code examples or specific fixes
4. Relevant version information or library names

Choose a descriptive filename (lowercase, underscores, .md extension),
for example oauth_token_error_fix.md.

Date: ${date}

Respond with only a JSON object: {"filename": "...", "summary": "..."}`;
}

export function fallbackSummary(content: string): PageSummary {
  return {
    filename: FALLBACK_FILENAME,
    summary: content.length > FALLBACK_SUMMARY_CHARS
      ? `${content.slice(0, FALLBACK_SUMMARY_CHARS)}...`
      : content,
  };
}

/**
 * Any failure (LLM error, unparsable output) yields the fallback summary.
 */
export function createSummarizer(llm: LLMClient, now: () => Date = () => new Date()): Summarizer {
  return async (content: string): Promise<PageSummary> => {
    try {
      const completion = await llm.complete([
        { role: 'user', content: buildPrompt(content, now().toDateString()) },
      ]);
      const reply = parseJsonReply(completion.text, summarySchema);
      if (reply.ok) {
        return reply.value;
      }
      logger.debug(`unusable output: ${reply.error}`);
    } catch (error) {
      logger.debug(`${getErrorMessage(error)}`);
    }
    return fallbackSummary(content);
  };
}
