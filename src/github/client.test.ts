import { GitHubClient } from './client.js';
import { parseRepoName } from './parse.js';
import { AuthError, NetworkError, NotFoundError, RateLimitError, ValidationError } from '../utils/errors.js';

const repo = parseRepoName('acme/widgets');

function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

describe('GitHubClient', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let client: GitHubClient;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    client = new GitHubClient({ token: 'test-secret', apiUrl: 'https://github.example.test/' });
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('decodes base64 file contents', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        type: 'file',
        name: 'index.ts',
        path: 'src/index.ts',
        size: 11,
        encoding: 'base64',
        content: Buffer.from('hello world').toString('base64'),
      })
    );

    const content = await client.getContents(repo, 'src/index.ts', 'v1.0');

    expect(content).toEqual({ type: 'file', path: 'src/index.ts', size: 11, content: 'hello world' });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://github.example.test/repos/acme/widgets/contents/src/index.ts?ref=v1.0');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('lists directories', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse([
        { type: 'dir', name: 'src', path: 'src' },
        { type: 'file', name: 'README.md', path: 'README.md', size: 120 },
        { type: 'symlink', name: 'link', path: 'link', size: 4 },
      ])
    );

    const content = await client.getContents(repo, '');

    expect(content).toEqual({
      type: 'dir',
      path: '',
      entries: [
        { type: 'dir', name: 'src', path: 'src', size: 0 },
        { type: 'file', name: 'README.md', path: 'README.md', size: 120 },
        { type: 'other', name: 'link', path: 'link', size: 4 },
      ],
    });
    expect(fetchSpy.mock.calls[0][0]).toBe('https://github.example.test/repos/acme/widgets/contents/');
  });

  it('refuses entries that are not files', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ type: 'submodule', name: 'vendor', path: 'vendor' }));

    await expect(client.getContents(repo, 'vendor')).rejects.toBeInstanceOf(ValidationError);
  });

  it('maps 404 to NotFoundError', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'Not Found' }, 404));

    await expect(client.getIssue(repo, 9)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('maps an exhausted quota to RateLimitError', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ message: 'API rate limit exceeded' }, 403, { 'x-ratelimit-remaining': '0' })
    );

    await expect(client.getRepository(repo)).rejects.toBeInstanceOf(RateLimitError);
  });

  it('maps other 403 answers to AuthError', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ message: 'Resource not accessible' }, 403));

    await expect(client.getRepository(repo)).rejects.toBeInstanceOf(AuthError);
  });

  it('wraps transport failures', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(client.getRepository(repo)).rejects.toBeInstanceOf(NetworkError);
  });

  it('normalizes issues', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        number: 42,
        title: 'Crash',
        state: 'open',
        body: null,
        created_at: '2024-05-02T10:00:00Z',
        user: null,
        labels: ['bug', { name: 'p1' }, {}],
        comments: 3,
        pull_request: { url: 'x' },
      })
    );

    const issue = await client.getIssue(repo, 42);

    expect(issue).toEqual({
      number: 42,
      title: 'Crash',
      state: 'open',
      body: '',
      createdAt: '2024-05-02T10:00:00Z',
      author: 'ghost',
      labels: ['bug', 'p1'],
      commentCount: 3,
      isPullRequest: true,
    });
  });

  it('caps comments at the limit', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse([
        { body: 'first', created_at: '2024-05-02T11:00:00Z', user: { login: 'a' } },
        { body: 'second', created_at: '2024-05-02T12:00:00Z', user: { login: 'b' } },
      ])
    );

    const comments = await client.getIssueComments(repo, 42, 1);

    expect(comments).toEqual([{ author: 'a', createdAt: '2024-05-02T11:00:00Z', body: 'first' }]);
    expect(fetchSpy.mock.calls[0][0]).toBe(
      'https://github.example.test/repos/acme/widgets/issues/42/comments?per_page=1'
    );
  });

  it('scopes code search to the repository', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        total_count: 1,
        items: [
          {
            path: 'src/config.ts',
            html_url: 'https://github.com/acme/widgets/blob/main/src/config.ts',
            repository: { full_name: 'acme/widgets' },
            text_matches: [{ fragment: 'loadConfig()' }, {}],
          },
        ],
      })
    );

    const result = await client.searchCode(repo, 'loadConfig', 5);

    expect(result).toEqual({
      totalCount: 1,
      items: [
        {
          path: 'src/config.ts',
          htmlUrl: 'https://github.com/acme/widgets/blob/main/src/config.ts',
          repository: 'acme/widgets',
          fragments: ['loadConfig()'],
        },
      ],
    });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://github.example.test/search/code?q=loadConfig%20repo%3Aacme%2Fwidgets&per_page=5');
    expect(new Headers(init?.headers).get('Accept')).toBe('application/vnd.github.text-match+json');
  });

  it('rejects a success body that is not JSON', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));

    const failure = client.getRepository(repo);

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toMatchObject({ status: 200 });
  });

  it('reports a timeout while the body streams as a network failure', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const response = jsonResponse({ full_name: 'acme/widgets' });
    jest.spyOn(response, 'text').mockRejectedValue(timeout);
    fetchSpy.mockResolvedValueOnce(response);

    const failure = client.getRepository(repo);

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toMatchObject({
      message: 'Request to GitHub failed',
      reason: 'The request timed out.',
    });
  });
});
