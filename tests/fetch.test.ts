import assert from 'node:assert/strict';
import { describe, it, type TestContext } from 'node:test';

import { ExtractionError } from '../src/errors.js';
import { fetchRaw, normalizeUrl } from '../src/fetch.js';

interface RecordedCall {
  readonly url: string;
  readonly init: RequestInit | undefined;
}

function mockFetch(
  t: TestContext,
  respond: (callIndex: number) => Promise<Response>
): RecordedCall[] {
  const calls: RecordedCall[] = [];
  t.mock.method(
    globalThis,
    'fetch',
    (input: string | URL | Request, init?: RequestInit) => {
      calls.push({ url: String(input), init });
      return respond(calls.length - 1);
    }
  );
  return calls;
}

function redirectTo(location: string | undefined): Response {
  return new Response(null, {
    status: 302,
    headers: location === undefined ? {} : { location },
  });
}

function fetchError(message: string): (error: unknown) => boolean {
  return (error) =>
    error instanceof ExtractionError &&
    error.code === 'FETCH_HTTP' &&
    error.message === message;
}

describe('normalizeUrl', () => {
  it('adds https to bare hosts', () => {
    assert.equal(normalizeUrl('example.com/page'), 'https://example.com/page');
    assert.equal(normalizeUrl('localhost:8080/x'), 'https://localhost:8080/x');
    assert.equal(normalizeUrl('  HTTP://Example.com  '), 'http://example.com/');
  });

  it('rejects empty, malformed and non-http urls', () => {
    assert.throws(() => normalizeUrl('   '), fetchError('URL cannot be empty'));
    assert.throws(() => normalizeUrl('http://'), fetchError('Invalid URL format'));
    assert.throws(
      () => normalizeUrl('ftp://example.com'),
      fetchError('Invalid protocol: ftp:. Only http: and https: are allowed')
    );
  });
});

describe('fetchRaw', () => {
  it('returns the body, content type and final url', async (t) => {
    const calls = mockFetch(t, () =>
      Promise.resolve(
        new Response('hello', {
          status: 200,
          headers: { 'content-type': 'text/plain' },
        })
      )
    );

    const result = await fetchRaw('example.com');

    assert.equal(result.url, 'https://example.com/');
    assert.equal(result.contentType, 'text/plain');
    assert.equal(new TextDecoder().decode(result.bytes), 'hello');
    assert.equal(calls.length, 1);
    assert.equal(calls[0]?.init?.redirect, 'manual');
    assert.equal(calls[0]?.init?.method, 'GET');
  });

  it('reports http errors with status details', async (t) => {
    mockFetch(t, () => Promise.resolve(new Response('nope', { status: 404 })));

    await assert.rejects(
      fetchRaw('https://example.com/missing'),
      (error: unknown) =>
        error instanceof ExtractionError &&
        error.code === 'FETCH_HTTP' &&
        error.message === 'HTTP error 404: Not Found' &&
        error.details['httpStatus'] === 404 &&
        error.details['url'] === 'https://example.com/missing' &&
        error.details['hint'] === 'The resource was not found (404).'
    );
  });

  it('follows relative redirects', async (t) => {
    const calls = mockFetch(t, (index) =>
      Promise.resolve(
        index === 0 ? redirectTo('/next') : new Response('done', { status: 200 })
      )
    );

    const result = await fetchRaw('https://example.com/start');

    assert.equal(result.url, 'https://example.com/next');
    assert.deepEqual(
      calls.map((call) => call.url),
      ['https://example.com/start', 'https://example.com/next']
    );
  });

  it('stops after the redirect limit', async (t) => {
    const calls = mockFetch(t, () => Promise.resolve(redirectTo('/loop')));

    await assert.rejects(
      fetchRaw('https://example.com/loop'),
      fetchError('Too many redirects')
    );
    assert.equal(calls.length, 6);
  });

  it('rejects redirects without a location', async (t) => {
    mockFetch(t, () => Promise.resolve(redirectTo(undefined)));

    await assert.rejects(
      fetchRaw('https://example.com/'),
      fetchError('Redirect response missing Location header')
    );
  });

  it('rejects redirects to other protocols', async (t) => {
    mockFetch(t, () => Promise.resolve(redirectTo('file:///etc/hosts')));

    await assert.rejects(
      fetchRaw('https://example.com/'),
      fetchError('Redirect to unsupported protocol: file:')
    );
  });

  it('maps transport failures to network errors', async (t) => {
    mockFetch(t, () => Promise.reject(new TypeError('fetch failed')));

    await assert.rejects(
      fetchRaw('https://example.com/'),
      (error: unknown) =>
        error instanceof ExtractionError &&
        error.message === 'Network error during HTTP fetch' &&
        error.details['error'] === 'fetch failed'
    );
  });

  it('reports caller cancellation', async (t) => {
    mockFetch(t, () =>
      Promise.reject(new DOMException('This operation was aborted', 'AbortError'))
    );
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      fetchRaw('https://example.com/', { signal: controller.signal }),
      fetchError('Request was canceled')
    );
  });
});
