import { describe, it, expect } from 'vitest';
import { PageFetcher, buildPageUrl, decodePayload } from '../src/pipeline/fetcher.js';
import { createCursor } from '../src/pipeline/cursor.js';
import type { Transport, TransportRequest } from '../src/core/http.js';
import type { SessionContext } from '../src/pipeline/types.js';

const GROUP = 'https://www.facebook.com/groups/g';
const session: SessionContext = { cookie: 'c_user=1; xs=test-secret', userAgent: 'test-agent' };

function fakeTransport(status: number, body: string, headers: Record<string, string> = {}) {
  const requests: Array<{ url: string; request: TransportRequest }> = [];
  const transport: Transport = async (url, request) => {
    requests.push({ url, request });
    return {
      status,
      headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
      text: async () => body,
    };
  };
  return { transport, requests };
}

async function fetchWith(status: number, body: string, headers: Record<string, string> = {}) {
  const { transport, requests } = fakeTransport(status, body, headers);
  const fetcher = new PageFetcher({ transport, timeoutMs: 1000 });
  const result = await fetcher.fetchPage(createCursor(GROUP), session);
  return { result, requests };
}

describe('buildPageUrl', () => {
  it('should request the bare group url for the first page', () => {
    expect(buildPageUrl(createCursor(GROUP))).toBe(GROUP);
  });

  it('should prefer the cursor token', () => {
    expect(buildPageUrl({ ...createCursor(GROUP), token: 'abc', pagesConsumed: 4 })).toBe(`${GROUP}?cursor=abc`);
  });

  it('should fall back to a computed page offset', () => {
    expect(buildPageUrl({ ...createCursor(GROUP), pagesConsumed: 2 })).toBe(`${GROUP}?page=3`);
  });
});

describe('decodePayload', () => {
  it('should strip the anti-hijacking prefix before parsing JSON', () => {
    expect(decodePayload('for (;;);{"feed":{"items":[]}}', 'application/json'))
      .toEqual({ format: 'json', data: { feed: { items: [] } } });
  });

  it('should sniff HTML documents', () => {
    expect(decodePayload('<div role="feed"></div>', 'text/html'))
      .toEqual({ format: 'html', html: '<div role="feed"></div>' });
  });

  it('should reject anything else', () => {
    expect(decodePayload('plain words', 'text/plain')).toBeNull();
    expect(decodePayload('   ', null)).toBeNull();
  });
});

describe('PageFetcher', () => {
  it('should send the session cookie and user agent', async () => {
    const { result, requests } = await fetchWith(200, '{"feed":{"items":[]}}');

    expect(result.ok).toBe(true);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe(GROUP);
    expect(requests[0].request.headers['Cookie']).toBe('c_user=1; xs=test-secret');
    expect(requests[0].request.headers['User-Agent']).toBe('test-agent');
  });

  it('should surface the next-cursor hint from headers', async () => {
    const explicit = await fetchWith(200, '{"feed":{"items":[]}}', { 'x-next-cursor': 'NEXT' });
    const linked = await fetchWith(200, '{"feed":{"items":[]}}', {
      link: `<${GROUP}?cursor=L2>; rel="next"`,
    });

    expect(explicit.result.ok && explicit.result.page.nextCursorHint).toBe('NEXT');
    expect(linked.result.ok && linked.result.page.nextCursorHint).toBe('L2');
  });

  it('should classify rate limiting with its Retry-After', async () => {
    const { result } = await fetchWith(429, '', { 'retry-after': '7' });
    expect(result).toEqual({
      ok: false,
      failure: { kind: 'RateLimited', message: 'Rate limited by the feed host', status: 429, retryAfterMs: 7000 },
    });
  });

  const statuses: Array<[number, string]> = [
    [401, 'AuthExpired'],
    [403, 'AuthExpired'],
    [404, 'NotFound'],
    [410, 'NotFound'],
    [500, 'Transient'],
    [503, 'Transient'],
  ];

  it.each(statuses)('should classify HTTP %i as %s', async (status, kind) => {
    const { result } = await fetchWith(status, '');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.kind).toBe(kind);
  });

  it('should treat a redirect to the login page as an expired session', async () => {
    const { result } = await fetchWith(302, '', { location: 'https://www.facebook.com/login.php?next=x' });
    expect(!result.ok && result.failure.kind).toBe('AuthExpired');
  });

  it('should treat other redirects as transient', async () => {
    const { result } = await fetchWith(302, '', { location: 'https://www.facebook.com/groups/g/' });
    expect(!result.ok && result.failure.kind).toBe('Transient');
  });

  it('should detect a login form served with HTTP 200', async () => {
    const { result } = await fetchWith(200, '<html><body><form id="login_form" action="/login/"></form></body></html>');
    expect(!result.ok && result.failure.kind).toBe('AuthExpired');
  });

  it('should mark undecodable bodies as malformed', async () => {
    const { result } = await fetchWith(200, 'this is not a feed');
    expect(!result.ok && result.failure.kind).toBe('Malformed');
  });

  it('should turn network errors into transient failures', async () => {
    const fetcher = new PageFetcher({
      transport: async () => { throw new Error('ECONNRESET'); },
    });
    const result = await fetcher.fetchPage(createCursor(GROUP), session);
    expect(result).toEqual({
      ok: false,
      failure: { kind: 'Transient', message: 'Request failed: ECONNRESET', status: undefined, retryAfterMs: undefined },
    });
  });
});
