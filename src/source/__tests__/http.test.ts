import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpFetcher, HTML_ACCEPT } from '../http.js';

const originalFetch = globalThis.fetch;

function makeFetcher(): HttpFetcher {
  return new HttpFetcher({
    timeoutMs: 1000,
    userAgent: 'test-agent',
    maxAttempts: 3,
    baseDelayMs: 0,
    sleep: async () => undefined,
  });
}

function unreachable(code: string): TypeError {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(code), { code }) });
}

beforeEach(() => {
  vi.restoreAllMocks();
});

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe('HttpFetcher.get', () => {
  it('returns body, content type and cache validators', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('<rss/>', {
        status: 200,
        headers: {
          'Content-Type': 'application/rss+xml',
          ETag: '"v2"',
          'Last-Modified': 'Tue, 02 Jan 2024 00:00:00 GMT',
        },
      }),
    );

    const outcome = await makeFetcher().get('https://example.com/feed');

    expect(outcome).toEqual({
      kind: 'ok',
      status: 200,
      body: '<rss/>',
      contentType: 'application/rss+xml',
      validators: { etag: '"v2"', lastModified: 'Tue, 02 Jan 2024 00:00:00 GMT' },
    });
  });

  it('sends conditional headers and reports 304 as not modified', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(null, { status: 304 }));
    globalThis.fetch = fetchMock;

    const outcome = await makeFetcher().get('https://example.com/feed', {
      validators: { etag: '"v1"', lastModified: 'Mon, 01 Jan 2024 00:00:00 GMT' },
    });

    expect(outcome).toEqual({ kind: 'not_modified' });
    const headers = fetchMock.mock.calls[0][1].headers;
    expect(headers['If-None-Match']).toBe('"v1"');
    expect(headers['If-Modified-Since']).toBe('Mon, 01 Jan 2024 00:00:00 GMT');
    expect(headers['User-Agent']).toBe('test-agent');
  });

  it('omits conditional headers without validators', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    globalThis.fetch = fetchMock;

    await makeFetcher().get('https://example.com/page', { accept: HTML_ACCEPT });

    const headers = fetchMock.mock.calls[0][1].headers;
    expect(headers['If-None-Match']).toBeUndefined();
    expect(headers['Accept']).toBe(HTML_ACCEPT);
  });

  it('does not retry a 404', async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(new Response('nope', { status: 404 })));
    globalThis.fetch = fetchMock;

    const outcome = await makeFetcher().get('https://example.com/missing');

    expect(outcome).toEqual({
      kind: 'failed',
      error: 'HTTP 404 from example.com',
      retryable: false,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries 5xx up to the attempt limit', async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(new Response('down', { status: 503 })));
    globalThis.fetch = fetchMock;

    const outcome = await makeFetcher().get('https://example.com/feed');

    expect(outcome.kind).toBe('failed');
    if (outcome.kind === 'failed') expect(outcome.retryable).toBe(true);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('recovers when a retry succeeds', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(new Response('down', { status: 502 }))
      .mockResolvedValueOnce(new Response('<rss/>', { status: 200 }));

    const outcome = await makeFetcher().get('https://example.com/feed');
    expect(outcome.kind).toBe('ok');
  });

  it('stops contacting a host after DNS failure', async () => {
    const fetchMock = vi.fn().mockRejectedValue(unreachable('ENOTFOUND'));
    globalThis.fetch = fetchMock;
    const fetcher = makeFetcher();

    await fetcher.get('https://gone.example.com/feed');
    const second = await fetcher.get('https://gone.example.com/rss');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetcher.isHostBlocked('https://gone.example.com/anything')).toBe(true);
    expect(second).toEqual({
      kind: 'failed',
      error: 'Host gone.example.com unreachable earlier in this run',
      retryable: false,
    });
  });

  it('keeps a host that exhausted its retries marked as transiently failed', async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(new Response('down', { status: 503 })));
    globalThis.fetch = fetchMock;
    const fetcher = makeFetcher();

    await fetcher.get('https://busy.example.com/feed');
    const second = await fetcher.get('https://busy.example.com/rss');

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(second).toEqual({
      kind: 'failed',
      error: 'Host busy.example.com unreachable earlier in this run',
      retryable: true,
    });
  });

  it('rejects invalid URLs without a request', async () => {
    const fetchMock = vi.fn();
    globalThis.fetch = fetchMock;

    const outcome = await makeFetcher().get('not a url');
    expect(outcome.kind).toBe('failed');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
