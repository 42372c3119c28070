import {
  SearchDocumentationTool,
  SearchErrorSolutionTool,
  buildDocumentationQuery,
  buildErrorQuery,
  uniqueFilename,
} from './search-tools.js';
import { createInitialState } from '../agent/state.js';
import { FakeSearch, makeResearchDeps } from '../test/fakes.js';
import type { PageFetcher } from '../search/page-fetcher.js';
import { createPageFetcher } from '../search/page-fetcher.js';

describe('query building', () => {
  it('adds the library and intent', () => {
    expect(buildErrorQuery('KeyError: token', 'requests')).toBe('requests KeyError: token programming error solution');
    expect(buildErrorQuery('KeyError: token')).toBe('KeyError: token programming error solution');
    expect(buildDocumentationQuery('streaming', 'httpx')).toBe('httpx streaming official documentation');
  });

  it('uniqueFilename keeps the extension and sanitizes the stem', () => {
    expect(uniqueFilename('retry fix.md')).toMatch(/^retry_fix_[0-9a-f]{8}\.md$/);
    expect(uniqueFilename('notes')).toMatch(/^notes_[0-9a-f]{8}\.md$/);
  });
});

describe('SearchErrorSolutionTool', () => {
  it('saves each result and returns a manifest', async () => {
    const search = new FakeSearch([
      { title: 'Fix A', url: 'https://a.example/1', snippet: 'snippet a' },
      { title: 'Fix B', url: 'https://b.example/2', snippet: 'snippet b' },
    ]);
    const fetchPage: PageFetcher = async (url) =>
      url === 'https://b.example/2'
        ? { ok: false, reason: 'timeout', detail: 'timed out' }
        : { ok: true, text: 'Set retries=3.' };
    const deps = makeResearchDeps({
      search,
      fetchPage,
      summarize: async () => ({ filename: 'fix_a.md', summary: 'Use option X' }),
    });
    const state = createInitialState();

    const result = await new SearchErrorSolutionTool(deps).execute(
      { error_message: 'KeyError: token', library_name: 'requests' },
      { state }
    );

    expect(search.queries).toEqual([{ query: 'requests KeyError: token programming error solution', maxResults: 3 }]);

    const names = Object.keys(state.files);
    const fileA = names.find((name) => name.startsWith('fix_a_'));
    const fileB = names.find((name) => name.startsWith('connection_error_'));
    expect(names).toHaveLength(2);
    expect(fileA).toMatch(/^fix_a_[0-9a-f]{8}\.md$/);
    expect(fileB).toMatch(/^connection_error_[0-9a-f]{8}\.md$/);

    expect(state.files[fileA ?? '']).toBe(
      [
        '# Search Result: Fix A',
        '',
        '**URL:** https://a.example/1',
        '**Query:** requests KeyError: token programming error solution',
        '**Date:** Thu May 02 2024',
        '',
        '## Summary',
        'Use option X',
        '',
        '## Full Content',
        'Set retries=3.',
      ].join('\n')
    );
    expect(state.files[fileB ?? '']).toContain('## Summary\nsnippet b\n\n## Full Content\nsnippet b');

    expect(result.output).toBe(
      [
        'Found 2 results for error "KeyError: token":',
        '',
        `- Fix A → ${fileA}: Use option X`,
        `- Fix B → ${fileB}: snippet b`,
        '',
        `Files saved: ${fileA}, ${fileB}`,
        "Use read_file('filename') to read the full details when needed.",
      ].join('\n')
    );
  });

  it('names a failed HTTP fetch url_error', async () => {
    const deps = makeResearchDeps({
      search: new FakeSearch([{ title: 'Gone', url: 'https://gone.example', snippet: '' }]),
      fetchPage: async () => ({ ok: false, reason: 'http_error', detail: 'HTTP 404' }),
    });
    const state = createInitialState();

    await new SearchErrorSolutionTool(deps).execute({ error_message: 'boom', max_results: 1 }, { state });

    const [name] = Object.keys(state.files);
    expect(name).toMatch(/^url_error_[0-9a-f]{8}\.md$/);
    expect(state.files[name]).toContain('## Summary\nPage could not be fetched\n\n## Full Content\nNo content available');
  });
});

describe('SearchDocumentationTool', () => {
  it('reports when nothing was found', async () => {
    const state = createInitialState();
    const result = await new SearchDocumentationTool(makeResearchDeps()).execute({ topic: 'streaming' }, { state });
    expect(result.output).toBe('No results found for documentation on "streaming".');
    expect(state.files).toEqual({});
  });

  it('honours max_results', async () => {
    const search = new FakeSearch([
      { title: 'a', url: 'https://x.example/a', snippet: '' },
      { title: 'b', url: 'https://x.example/b', snippet: '' },
    ]);
    const state = createInitialState();

    await new SearchDocumentationTool(makeResearchDeps({ search })).execute(
      { topic: 'streaming', library_name: 'httpx', max_results: 1 },
      { state }
    );

    expect(search.queries).toEqual([{ query: 'httpx streaming official documentation', maxResults: 1 }]);
    expect(Object.keys(state.files)).toHaveLength(1);
  });
  it('keeps the other results when one page fails mid-body', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    jest.spyOn(global, 'fetch').mockImplementation(async (input) => {
      const response = new Response('<p>Good page</p>', { status: 200, headers: { 'content-type': 'text/html' } });
      if (String(input) === 'https://slow.example') {
        jest.spyOn(response, 'text').mockRejectedValue(timeout);
      }
      return response;
    });
    const deps = makeResearchDeps({
      search: new FakeSearch([
        { title: 'Good', url: 'https://good.example', snippet: 'good snippet' },
        { title: 'Slow', url: 'https://slow.example', snippet: 'slow snippet' },
      ]),
      fetchPage: createPageFetcher(1000),
    });
    const state = createInitialState();

    try {
      const result = await new SearchDocumentationTool(deps).execute({ topic: 'retries', max_results: 2 }, { state });

      expect(result.success).toBe(true);
      const names = Object.keys(state.files).sort();
      expect(names).toHaveLength(2);
      expect(names[0]).toMatch(/^connection_error_[0-9a-f]{8}\.md$/);
      expect(names[1]).toMatch(/^summary_[0-9a-f]{8}\.md$/);
      expect(state.files[names[0]]).toContain('## Summary\nslow snippet\n\n## Full Content\nslow snippet');
      expect(state.files[names[1]]).toContain('## Full Content\nGood page');
    } finally {
      jest.restoreAllMocks();
    }
  });
});
