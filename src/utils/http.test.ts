import { errorForStatus, extractErrorMessage, fetchWithRetry, readJsonBody } from './http.js';
import {
  AgentError,
  AuthError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ValidationError,
} from './errors.js';

const options = { service: 'GitHub', action: 'Fetching issue #1', credential: 'GITHUB_TOKEN' };

describe('extractErrorMessage', () => {
  it('prefers a JSON message field', () => {
    expect(extractErrorMessage('{"message":"Bad credentials"}')).toBe('Bad credentials');
  });

  it('reads a nested error message', () => {
    expect(extractErrorMessage('{"error":{"message":"model not found"}}')).toBe('model not found');
  });

  it('falls back to the raw text', () => {
    expect(extractErrorMessage('  gateway exploded  ')).toBe('gateway exploded');
  });

  it('truncates long plain bodies', () => {
    const body = 'x'.repeat(400);
    expect(extractErrorMessage(body)).toBe(`${'x'.repeat(300)}...`);
  });

  it('returns an empty string for an empty body', () => {
    expect(extractErrorMessage('   ')).toBe('');
  });
});

describe('errorForStatus', () => {
  it('maps 401 to AuthError naming the credential', () => {
    const error = errorForStatus(401, '{"message":"Bad credentials"}', options);
    expect(error).toBeInstanceOf(AuthError);
    expect(error.message).toBe('Fetching issue #1 failed');
    expect(error.reason).toBe('GitHub answered 401: Bad credentials');
    expect(error.suggestion).toBe('Check GITHUB_TOKEN in your .env file; the GitHub credential was rejected.');
  });

  it('maps 429 to RateLimitError', () => {
    expect(errorForStatus(429, '', options)).toBeInstanceOf(RateLimitError);
  });

  it('treats 403 as rate limiting only when the quota is exhausted', () => {
    expect(errorForStatus(403, '', { ...options, quotaExhausted: true })).toBeInstanceOf(RateLimitError);
    expect(errorForStatus(403, '', options)).toBeInstanceOf(AuthError);
  });

  it('maps 404 to NotFoundError', () => {
    const error = errorForStatus(404, '', options);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.reason).toBe('GitHub answered 404.');
    expect(error.status).toBe(404);
  });

  it('maps 400 and 422 to ValidationError', () => {
    expect(errorForStatus(400, '', options)).toBeInstanceOf(ValidationError);
    expect(errorForStatus(422, '', options)).toBeInstanceOf(ValidationError);
  });

  it('maps anything else to a generic AgentError', () => {
    const error = errorForStatus(500, 'boom', options);
    expect(error.constructor).toBe(AgentError);
    expect(error.reason).toBe('GitHub answered 500: boom');
  });
});

describe('fetchWithRetry', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('returns the first ok response', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const response = await fetchWithRetry('https://example.test', { method: 'GET' }, 1000);

    expect(await response.text()).toBe('ok');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('retries a retryable status, honoring Retry-After', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response('busy', { status: 503, headers: { 'Retry-After': '0' } }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const response = await fetchWithRetry('https://example.test', { method: 'GET' }, 1000);

    expect(response.status).toBe(200);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('returns the last non-ok response once retries are spent', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('busy', { status: 503 }));

    const response = await fetchWithRetry('https://example.test', { method: 'GET' }, 1000, 0);

    expect(response.status).toBe(503);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('does not retry a client error', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('nope', { status: 404 }));

    const response = await fetchWithRetry('https://example.test', { method: 'GET' }, 1000);

    expect(response.status).toBe(404);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('wraps a network failure as NetworkError', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(fetchWithRetry('https://example.test', { method: 'GET' }, 1000, 0)).rejects.toBeInstanceOf(
      NetworkError
    );
  });
});

describe('readJsonBody', () => {
  it('parses a JSON body', async () => {
    await expect(readJsonBody(new Response('{"a":1}'), 'GitHub', 'Fetching issue #1')).resolves.toEqual({ a: 1 });
  });

  it('names the service when the body is not JSON', async () => {
    await expect(readJsonBody(new Response('oops', { status: 200 }), 'GitHub', 'Fetching issue #1')).rejects.toMatchObject({
      kind: 'validation',
      message: 'Fetching issue #1 returned an unreadable response',
      status: 200,
    });
  });
});
