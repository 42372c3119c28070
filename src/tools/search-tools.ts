// Web research tools: search, fetch, summarize, offload to files

import path from 'path';
import { z } from 'zod';
import { BaseTool } from './base-tool.js';
import type { ToolDefinition, ToolExecutionContext } from './types.js';
import type { SearchHit, WebSearchApi } from '../search/tavily-client.js';
import type { PageFetcher } from '../search/page-fetcher.js';
import type { PageSummary, Summarizer } from '../search/summarizer.js';
import { sanitizeForFilename, shortUid } from '../utils/ids.js';
import { logger } from '../utils/logger.js';

const MANIFEST_SUMMARY_CHARS = 100;

export interface WebResearchDeps {
  search: WebSearchApi;
  fetchPage: PageFetcher;
  summarize: Summarizer;
  /** Used when the caller gives no max_results */
  defaultMaxResults: number;
  now?: () => Date;
}

export interface ProcessedResult {
  url: string;
  title: string;
  summary: string;
  filename: string;
  content: string;
}

export function buildErrorQuery(errorMessage: string, libraryName?: string): string {
  const base = libraryName ? `${libraryName} ${errorMessage}` : errorMessage;
  return `${base} programming error solution`;
}

export function buildDocumentationQuery(topic: string, libraryName?: string): string {
  const base = libraryName ? `${libraryName} ${topic}` : topic;
  return `${base} official documentation`;
}

/**
 * Append a short unique id before the extension: "fix.md" → "fix_1a2b3c4d.md".
 */
export function uniqueFilename(suggested: string): string {
  const ext = path.extname(suggested);
  const stem = sanitizeForFilename(ext ? suggested.slice(0, -ext.length) : suggested);
  return `${stem}_${shortUid()}${ext || '.md'}`;
}

async function processHit(hit: SearchHit, deps: WebResearchDeps): Promise<ProcessedResult> {
  const page = await deps.fetchPage(hit.url);

  let content: string;
  let summary: PageSummary;
  if (page.ok) {
    content = page.text;
    summary = await deps.summarize(page.text);
  } else {
    // The engine's snippet stands in for this result only
    logger.child('search').debug(`${hit.url}: ${page.reason} (${page.detail}); using snippet`);
    content = hit.snippet;
    summary = {
      filename: page.reason === 'http_error' ? 'url_error.md' : 'connection_error.md',
      summary: hit.snippet || 'Page could not be fetched',
    };
  }

  return {
    url: hit.url,
    title: hit.title,
    summary: summary.summary,
    filename: uniqueFilename(summary.filename),
    content,
  };
}

async function runWebResearch(
  query: string,
  label: string,
  maxResults: number,
  deps: WebResearchDeps,
  context: ToolExecutionContext
): Promise<string> {
  const hits = await deps.search.search(query, maxResults);
  if (hits.length === 0) {
    return `No results found for ${label}.`;
  }

  const processed = await Promise.all(hits.map((hit) => processHit(hit, deps)));
  const date = (deps.now ?? (() => new Date()))().toDateString();

  const manifest: string[] = [];
  for (const result of processed) {
    context.state.files[result.filename] = [
      `# Search Result: ${result.title}`,
      '',
      `**URL:** ${result.url}`,
      `**Query:** ${query}`,
      `**Date:** ${date}`,
      '',
      '## Summary',
      result.summary,
      '',
      '## Full Content',
      result.content || 'No content available',
    ].join('\n');

    const preview = result.summary.length > MANIFEST_SUMMARY_CHARS
      ? `${result.summary.slice(0, MANIFEST_SUMMARY_CHARS)}...`
      : result.summary;
    manifest.push(`- ${result.title} → ${result.filename}: ${preview}`);
  }

  return [
    `Found ${processed.length} results for ${label}:`,
    '',
    ...manifest,
    '',
    `Files saved: ${processed.map((result) => result.filename).join(', ')}`,
    "Use read_file('filename') to read the full details when needed.",
  ].join('\n');
}

const searchErrorSchema = z.object({
  error_message: z.string().min(1),
  library_name: z.string().optional(),
  max_results: z.number().int().min(1).max(10).optional(),
});

export class SearchErrorSolutionTool extends BaseTool<typeof searchErrorSchema> {
  readonly definition: ToolDefinition = {
    name: 'search_error_solution',
    description: 'Search the web for fixes to an error message or stack trace. Each result is summarized and saved to the virtual file system; a manifest is returned.',
    parameters: {
      type: 'object',
      properties: {
        error_message: { type: 'string', description: 'Error message, exception or stack trace excerpt' },
        library_name: { type: 'string', description: "Library or framework for context, e.g. 'requests'" },
        max_results: { type: 'number', description: 'Number of results (default 3)' },
      },
      required: ['error_message'],
    },
  };

  protected readonly schema = searchErrorSchema;

  constructor(private readonly deps: WebResearchDeps) {
    super();
  }

  protected async executeInternal(args: z.infer<typeof searchErrorSchema>, context: ToolExecutionContext): Promise<string> {
    const query = buildErrorQuery(args.error_message, args.library_name);
    const shown = args.error_message.length > 50 ? `${args.error_message.slice(0, 50)}...` : args.error_message;
    return runWebResearch(query, `error "${shown}"`, args.max_results ?? this.deps.defaultMaxResults, this.deps, context);
  }
}

const searchDocsSchema = z.object({
  topic: z.string().min(1),
  library_name: z.string().optional(),
  max_results: z.number().int().min(1).max(10).optional(),
});

export class SearchDocumentationTool extends BaseTool<typeof searchDocsSchema> {
  readonly definition: ToolDefinition = {
    name: 'search_documentation',
    description: 'Search official documentation for a library topic. Each result is summarized and saved to the virtual file system; a manifest is returned.',
    parameters: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'What to look up, e.g. "streaming responses"' },
        library_name: { type: 'string', description: 'Library or framework name' },
        max_results: { type: 'number', description: 'Number of results (default 3)' },
      },
      required: ['topic'],
    },
  };

  protected readonly schema = searchDocsSchema;

  constructor(private readonly deps: WebResearchDeps) {
    super();
  }

  protected async executeInternal(args: z.infer<typeof searchDocsSchema>, context: ToolExecutionContext): Promise<string> {
    const query = buildDocumentationQuery(args.topic, args.library_name);
    return runWebResearch(query, `documentation on "${args.topic}"`, args.max_results ?? this.deps.defaultMaxResults, this.deps, context);
  }
}
