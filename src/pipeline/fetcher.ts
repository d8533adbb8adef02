import { httpTransport, parseRetryAfter, type Transport, type TransportResponse } from '../core/http.js';
import { describeError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { DEFAULT_USER_AGENT, config } from '../config.js';
import type { Cursor, FeedPayload, FetchFailure, PageResult, ProxyDescriptor, SessionContext } from './types.js';

export interface FetcherOptions {
  timeoutMs?: number;
  transport?: Transport;
}

export interface PageSource {
  fetchPage(cursor: Cursor, session: SessionContext, proxy?: ProxyDescriptor): Promise<PageResult>;
}

const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8';
const LOGIN_PATH = /\/(login|checkpoint)(\/|\.php|\?|$)/i;
const LOGIN_FORM = /<form[^>]+(id=["']login_form["']|action=["'][^"']*\/login)/i;
const HTML_START = /^\s*<(!doctype|html|head|body|div|article|main|section)\b/i;
const JSON_GUARD = /^\s*for\s*\(\s*;\s*;\s*\)\s*;/;

export function buildPageUrl(cursor: Cursor): string {
  const url = new URL(cursor.groupUrl);
  if (cursor.token) {
    url.searchParams.set('cursor', cursor.token);
  } else if (cursor.pagesConsumed > 0) {
    url.searchParams.set('page', String(cursor.pagesConsumed + 1));
  }
  return url.toString();
}

// Cursor hint from `Link: <...>; rel="next"` or `X-Next-Cursor`
export function readCursorHint(response: TransportResponse): string | null {
  const explicit = response.headers.get('x-next-cursor');
  if (explicit) return explicit;

  const link = response.headers.get('link');
  if (!link) return null;
  const next = link.split(',').find(part => /rel="?next"?/i.test(part));
  const target = next?.match(/<([^>]+)>/)?.[1];
  if (!target) return null;
  try {
    return new URL(target, 'https://localhost').searchParams.get('cursor');
  } catch {
    return null;
  }
}

export function decodePayload(body: string, contentType: string | null): FeedPayload | null {
  const trimmed = body.replace(JSON_GUARD, '').trim();
  if (!trimmed) return null;

  const looksJson = (contentType ?? '').includes('json') || trimmed.startsWith('{') || trimmed.startsWith('[');
  if (looksJson) {
    try {
      return { format: 'json', data: JSON.parse(trimmed) };
    } catch {
      // fall through to the HTML sniff
    }
  }

  if (HTML_START.test(trimmed)) {
    return { format: 'html', html: trimmed };
  }
  return null;
}

function failure(kind: FetchFailure['kind'], message: string, status?: number, retryAfterMs?: number): PageResult {
  return { ok: false, failure: { kind, message, status, retryAfterMs } };
}

/**
 * Issues exactly one request per call and classifies the outcome.
 * Retrying is the caller's business.
 */
export class PageFetcher implements PageSource {
  private readonly timeoutMs: number;
  private readonly transport: Transport;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
    this.transport = options.transport ?? httpTransport;
  }

  async fetchPage(cursor: Cursor, session: SessionContext, proxy?: ProxyDescriptor): Promise<PageResult> {
    const url = buildPageUrl(cursor);
    const headers: Record<string, string> = {
      'User-Agent': session.userAgent || DEFAULT_USER_AGENT,
      'Accept': ACCEPT_HEADER,
      'Accept-Language': 'en-US,en;q=0.9',
    };
    if (session.cookie) {
      headers['Cookie'] = session.cookie;
    }

    logger.debug(`Requesting ${url}`, { page: cursor.pagesConsumed + 1 });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: TransportResponse;
    let body: string;
    try {
      response = await this.transport(url, { headers, signal: controller.signal, proxy });
      body = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : describeError(error);
      return failure('Transient', `Request failed: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }

    const { status } = response;

    if (status === 429) {
      return failure('RateLimited', 'Rate limited by the feed host', status, parseRetryAfter(response.headers.get('retry-after')));
    }
    if (status === 401 || status === 403) {
      return failure('AuthExpired', `Session rejected with HTTP ${status}`, status);
    }
    if (status === 404 || status === 410) {
      return failure('NotFound', `Group feed not found (HTTP ${status})`, status);
    }
    if (status >= 300 && status < 400) {
      const location = response.headers.get('location') ?? '';
      if (LOGIN_PATH.test(location)) {
        return failure('AuthExpired', `Redirected to ${location}`, status);
      }
      return failure('Transient', `Unexpected redirect to ${location || 'nowhere'}`, status);
    }
    if (status < 200 || status >= 300) {
      return failure('Transient', `HTTP ${status}`, status, parseRetryAfter(response.headers.get('retry-after')));
    }

    if (LOGIN_FORM.test(body)) {
      return failure('AuthExpired', 'Feed request served a login form', status);
    }

    const payload = decodePayload(body, response.headers.get('content-type'));
    if (!payload) {
      return failure('Malformed', `Payload is neither JSON nor HTML (${body.length} bytes)`, status);
    }

    return {
      ok: true,
      page: { url, status, payload, nextCursorHint: readCursorHint(response) },
    };
  }
}
