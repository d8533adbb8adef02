import { ParseError } from '../core/errors.js';
import { parseHtmlFeed } from './html.js';
import { findFeedList, parseJsonFeed } from './json.js';
import type { FeedPayload, ParseResult } from './types.js';

export interface ParseOptions {
  now?: number;
}

/**
 * Turns one fetched payload into post records.
 *
 * Defective posts are skipped and listed in `defects`; a ParseError is thrown
 * only when the payload carries no recognizable feed container at all.
 */
export function parseFeed(payload: FeedPayload, options: ParseOptions = {}): ParseResult {
  const now = options.now ?? Date.now();

  if (payload.format === 'html') {
    return parseHtmlFeed(payload.html, now);
  }

  const items = findFeedList(payload.data);
  if (!items) {
    throw new ParseError('JSON payload has no edges, posts or items list');
  }
  return parseJsonFeed(items, now);
}
