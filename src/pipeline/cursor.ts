import { feedContainers } from './json.js';
import { loadHtml } from './html.js';
import { asRecord, readPath, stringOf } from './fields.js';
import type { Cursor, FeedPayload, PageObservation, RawPage, Terminal, TerminalReason } from './types.js';

export interface Pagination {
  token: string | null;
  endOfFeed: boolean;
}

export interface CursorLimits {
  maxPages: number;
  emptyPageLimit: number;
  stalePageLimit: number;
}

export const DEFAULT_CURSOR_LIMITS: CursorLimits = {
  maxPages: 10,
  emptyPageLimit: 3,
  stalePageLimit: 3,
};

const TOKEN_PATHS = ['page_info.end_cursor', 'paging.cursors.after', 'next_cursor', 'cursor.next'];

export function createCursor(groupUrl: string): Cursor {
  return { groupUrl, token: null, pagesConsumed: 0, emptyStreak: 0, staleStreak: 0 };
}

export function isTerminal(value: Cursor | Terminal): value is Terminal {
  return 'terminal' in value;
}

function readJsonPagination(data: unknown): Pagination {
  let token: string | null = null;
  let endOfFeed = false;

  for (const container of feedContainers(data)) {
    const pageInfo = asRecord(readPath(container, 'page_info'));
    if (pageInfo?.has_next_page === false || container.end_of_feed === true) {
      endOfFeed = true;
    }
    if (!token) {
      token = stringOf(container, TOKEN_PATHS) || null;
    }
  }
  return { token, endOfFeed };
}

function readHtmlPagination(html: string): Pagination {
  const $ = loadHtml(html);
  const endOfFeed = $('[data-feed-end]').length > 0;

  const explicit = $('[data-next-cursor]').first().attr('data-next-cursor');
  if (explicit) return { token: explicit, endOfFeed };

  const href = $('a[href*="cursor="]').first().attr('href');
  if (href) {
    try {
      const token = new URL(href, 'https://localhost').searchParams.get('cursor');
      if (token) return { token, endOfFeed };
    } catch {
      return { token: null, endOfFeed };
    }
  }
  return { token: null, endOfFeed };
}

export function readPagination(payload: FeedPayload): Pagination {
  return payload.format === 'json'
    ? readJsonPagination(payload.data)
    : readHtmlPagination(payload.html);
}

/**
 * Small state machine over the cursor: Active until one of the terminal
 * checks fires. Checks run in a fixed order (end marker, stall, empty
 * streak, stale streak, page cap) and the first hit wins.
 *
 * A null page means the fetch or parse produced nothing usable. The token is
 * kept, so a token feed requests the same token again, while an offset feed
 * (null token) still moves to the next offset because `pagesConsumed` grows.
 *
 * `maxPages` counts pages advanced by this manager, starting from
 * `startPages`, so a resumed cursor gets a full page budget.
 */
export class CursorManager {
  private readonly limits: CursorLimits;
  private readonly startPages: number;

  constructor(limits: Partial<CursorLimits> = {}, startPages = 0) {
    this.limits = { ...DEFAULT_CURSOR_LIMITS, ...limits };
    this.startPages = startPages;
  }

  advance(cursor: Cursor, page: RawPage | null, observation: PageObservation): Cursor | Terminal {
    const pagination = page ? readPagination(page.payload) : null;
    const nextToken = page
      ? pagination?.token ?? page.nextCursorHint
      : cursor.token;

    const next: Cursor = {
      groupUrl: cursor.groupUrl,
      token: nextToken ?? null,
      pagesConsumed: cursor.pagesConsumed + 1,
      emptyStreak: observation.candidates === 0 ? cursor.emptyStreak + 1 : 0,
      staleStreak: observation.newIdentities === 0 ? cursor.staleStreak + 1 : 0,
    };

    const reason = this.terminalReason(cursor, next, page, pagination);
    return reason ? { terminal: true, reason, cursor: next } : next;
  }

  private terminalReason(
    current: Cursor,
    next: Cursor,
    page: RawPage | null,
    pagination: Pagination | null
  ): TerminalReason | null {
    if (pagination?.endOfFeed) return 'EndOfFeed';
    if (page && next.token !== null && next.token === current.token) return 'CursorStall';
    if (next.emptyStreak >= this.limits.emptyPageLimit) return 'EmptyStreak';
    if (next.staleStreak >= this.limits.stalePageLimit) return 'StaleStreak';
    if (next.pagesConsumed - this.startPages >= this.limits.maxPages) return 'MaxPages';
    return null;
  }
}
