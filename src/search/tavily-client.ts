// Tavily web search client

import { z } from 'zod';
import { errorForStatus, readJsonBody } from '../utils/http.js';
import { RateLimitError, ValidationError, toNetworkError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const DEFAULT_ENDPOINT = 'https://api.tavily.com/search';
const DEFAULT_TIMEOUT_MS = 30_000;

const logger = rootLogger.child('Tavily');

const searchResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullable().optional(),
      url: z.string(),
      content: z.string().nullable().optional(),
    })
  ),
});

export interface SearchHit {
  title: string;
  url: string;
  /** Snippet chosen by the search engine */
  snippet: string;
}

export interface WebSearchApi {
  search(query: string, maxResults: number): Promise<SearchHit[]>;
}

export interface TavilyClientOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
}

export class TavilyClient implements WebSearchApi {
  private apiKey: string;
  private endpoint: string;
  private timeoutMs: number;

  constructor(options: TavilyClientOptions) {
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint || DEFAULT_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(query: string, maxResults: number): Promise<SearchHit[]> {
    logger.debug(`search "${query}" (max ${maxResults})`);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          query,
          max_results: maxResults,
          topic: 'general',
          search_depth: 'basic',
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw toNetworkError(error, 'Tavily');
    }

    if (!response.ok) {
      const body = await response.text();
      // 432 is Tavily's plan-limit status
      if (response.status === 432) {
        throw new RateLimitError('Web search failed', {
          status: 432,
          reason: 'The Tavily plan quota is used up.',
          suggestion: 'Wait for the quota to reset or upgrade the Tavily plan.',
        });
      }
      throw errorForStatus(response.status, body, {
        service: 'Tavily',
        action: 'Web search',
        credential: 'TAVILY_API_KEY',
      });
    }

    const parsed = searchResponseSchema.safeParse(await readJsonBody(response, 'Tavily', 'Web search'));
    if (!parsed.success) {
      throw new ValidationError('Web search returned an unexpected response', {
        reason: 'The response had no results array.',
      });
    }

    return parsed.data.results.slice(0, maxResults).map((result) => ({
      title: result.title || 'No title',
      url: result.url,
      snippet: result.content ?? '',
    }));
  }
}
