import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { parseTimestamp } from '../core/datetime.js';
import { countBeforeLabel, parseCount } from '../core/counts.js';
import { ParseError, describeError } from '../core/errors.js';
import { PLATFORM_ORIGIN, unwrapRedirect } from '../core/normalize.js';
import { findFeedList, parseJsonFeed } from './json.js';
import { finalizePost, isDegraded, makeAuthor, makeComment } from './records.js';
import type { Attachment, Comment, ParseResult, Post } from './types.js';

// ============================================================================
// SELECTORS
// ============================================================================

// The markup drifts constantly; each selector lists every variant seen so far
export const HTML_SELECTORS = {
  FEED: '[role="feed"]',
  POST: '[role="article"], [aria-posinset], .story_body_container',
  COMMENT: '[role="article"][aria-label^="Comment"], [data-comment-id]',
  MESSAGE: '[data-ad-preview="message"], [data-testid="post_message"]',
  TEXT_BLOCK: 'div[dir="auto"], span[dir="auto"]',
  AUTHOR_LINK: 'h2 a[href], h3 a[href], h4 a[href], strong a[href], a[role="link"][href]',
  TIMESTAMP: 'abbr[data-utime], [data-utime], time[datetime], abbr[title]',
  EMBEDDED_JSON: 'script[type="application/json"]',
};

const PERMALINK = /\/(posts|permalink)\/|story_fbid=/;
const PLATFORM_HOST = /(^|\.)facebook\.com$/i;

export function loadHtml(payload: string): CheerioAPI {
  return cheerio.load(payload);
}

// Text nodes joined with spaces; .text() would glue "12" and "comments" together
function spacedText($: CheerioAPI, root: Cheerio<AnyNode>): string {
  return root
    .find('*')
    .addBack()
    .contents()
    .toArray()
    .filter(node => node.nodeType === 3)
    .map(node => $(node).text().trim())
    .filter(Boolean)
    .join(' ');
}

function ariaLabels($: CheerioAPI, root: Cheerio<AnyNode>): string {
  return root
    .find('[aria-label]')
    .toArray()
    .map(el => $(el).attr('aria-label') ?? '')
    .join(' | ');
}

// Innermost text blocks only, so nested dir="auto" wrappers do not repeat text
function leafTexts($: CheerioAPI, root: Cheerio<AnyNode>, selector: string): string[] {
  return root
    .find(selector)
    .filter((_, el) => $(el).find(selector).length === 0)
    .toArray()
    .map(el => $(el).text().trim())
    .filter(Boolean);
}

function readTimestamp($: CheerioAPI, root: Cheerio<AnyNode>, now: number): number {
  for (const el of root.find(HTML_SELECTORS.TIMESTAMP).toArray()) {
    const node = $(el);
    for (const raw of [node.attr('data-utime'), node.attr('datetime'), node.attr('title')]) {
      const ts = parseTimestamp(raw, now);
      if (ts !== null) return ts;
    }
  }
  return 0;
}

function readEngagement(text: string): { reactions: number; comments: number; shares: number } {
  const allReactions = text.match(/all reactions:?\s*([\d.,]+\s?[KkMm]?)/i);
  const reactions = (allReactions ? parseCount(allReactions[1]) : null)
    ?? countBeforeLabel(text, ['reactions?', 'likes?']);
  return {
    reactions: reactions ?? 0,
    comments: countBeforeLabel(text, ['comments?']) ?? 0,
    shares: countBeforeLabel(text, ['shares?']) ?? 0,
  };
}

function readAttachments($: CheerioAPI, body: Cheerio<AnyNode>, authorHref: string | undefined): Attachment[] {
  const attachments: Attachment[] = [];

  body.find('img[src]').each((_, el) => {
    const img = $(el);
    const src = img.attr('src') ?? '';
    if (!src || src.startsWith('data:') || src.includes('emoji')) return;
    if (authorHref && img.closest(`a[href="${authorHref}"]`).length > 0) return;
    const attachment: Attachment = { type: 'image', url: src };
    const alt = img.attr('alt')?.trim();
    if (alt) attachment.alt = alt;
    attachments.push(attachment);
  });

  body.find('video[src], video[poster]').each((_, el) => {
    const video = $(el);
    const url = video.attr('src') || video.attr('poster');
    if (url) attachments.push({ type: 'video', url });
  });

  body.find('a[href]').each((_, el) => {
    const link = $(el);
    const target = unwrapRedirect(link.attr('href') ?? '');
    let host = '';
    try {
      host = new URL(target).hostname;
    } catch {
      return;
    }
    if (PLATFORM_HOST.test(host)) return;
    const attachment: Attachment = { type: 'link', url: target };
    const text = link.text().trim();
    if (text) attachment.text = text;
    attachments.push(attachment);
  });

  return attachments;
}

function readComment($: CheerioAPI, node: Cheerio<AnyNode>, now: number): Comment {
  const authorLink = node.find('a[href]').filter((_, el) => $(el).text().trim().length > 0).first();
  const authorName = authorLink.text().trim();
  const author = makeAuthor({
    id: node.attr('data-author-id'),
    name: authorName,
    url: authorLink.attr('href'),
  });

  const bodyNode = node.find('[data-comment-body]').first();
  const text = bodyNode.length > 0
    ? bodyNode.text()
    : leafTexts($, node, HTML_SELECTORS.TEXT_BLOCK).filter(t => t !== authorName).join(' ');

  const signals = `${spacedText($, node)} | ${node.attr('aria-label') ?? ''} | ${ariaLabels($, node)}`;
  const explicitReactions = parseCount(node.attr('data-reactions') ?? '');

  return makeComment({
    text,
    createdAt: readTimestamp($, node, now),
    author,
    reactionCount: explicitReactions ?? countBeforeLabel(signals, ['reactions?', 'likes?']) ?? 0,
    commentCount: countBeforeLabel(signals, ['replies', 'reply']) ?? 0,
  });
}

export function readHtmlPost($: CheerioAPI, article: Cheerio<AnyNode>, now: number = Date.now()): Post | null {
  const body = article.clone();
  body.find(HTML_SELECTORS.COMMENT).remove();

  const hrefs = body.find('a[href]').toArray().map(el => $(el).attr('href') ?? '');
  const url = article.attr('data-post-url') || hrefs.find(href => PERMALINK.test(href));
  if (!url) return null;

  const authorLink = body
    .find(HTML_SELECTORS.AUTHOR_LINK)
    .filter((_, el) => {
      const link = $(el);
      const href = link.attr('href') ?? '';
      return link.text().trim().length > 0 && !PERMALINK.test(href) && !href.includes('/hashtag/');
    })
    .first();
  const authorHref = authorLink.attr('href');
  const user = makeAuthor({
    id: article.attr('data-author-id'),
    name: authorLink.text(),
    url: authorHref,
  });

  const message = body.find(HTML_SELECTORS.MESSAGE).first();
  const text = message.length > 0
    ? leafTexts($, message, HTML_SELECTORS.TEXT_BLOCK).join(' ') || message.text()
    : leafTexts($, body, HTML_SELECTORS.TEXT_BLOCK).filter(t => t !== user.name).join(' ');

  const engagement = readEngagement(`${spacedText($, body)} | ${ariaLabels($, body)}`);

  const comments = article
    .find(HTML_SELECTORS.COMMENT)
    .filter((_, el) => $(el).parents(HTML_SELECTORS.COMMENT).length === 0)
    .toArray()
    .map(el => readComment($, $(el), now));

  return finalizePost({
    url,
    createdAt: readTimestamp($, body, now),
    user,
    text,
    attachments: readAttachments($, body, authorHref),
    reactionCount: engagement.reactions,
    shareCount: engagement.shares,
    commentCount: engagement.comments,
    topComments: comments,
  });
}

function parseEmbeddedJson($: CheerioAPI, now: number): ParseResult | null {
  for (const el of $(HTML_SELECTORS.EMBEDDED_JSON).toArray()) {
    try {
      const items = findFeedList(JSON.parse($(el).text()));
      if (items) return parseJsonFeed(items, now);
    } catch {
      continue;
    }
  }
  return null;
}

export function parseHtmlFeed(html: string, now: number = Date.now()): ParseResult {
  const $ = loadHtml(html);

  const articles = $(HTML_SELECTORS.POST).filter((_, el) => {
    const node = $(el);
    if (node.is(HTML_SELECTORS.COMMENT)) return false;
    return node.parents(HTML_SELECTORS.POST).length === 0;
  });

  if (articles.length === 0) {
    const embedded = parseEmbeddedJson($, now);
    if (embedded) return embedded;
    if ($(HTML_SELECTORS.FEED).length > 0) {
      return { posts: [], partial: false, defects: [] };
    }
    throw new ParseError(`No feed container in HTML payload (origin ${PLATFORM_ORIGIN})`);
  }

  const posts: Post[] = [];
  const defects: string[] = [];
  let partial = false;

  articles.each((index, el) => {
    try {
      const post = readHtmlPost($, $(el), now);
      if (!post) {
        defects.push(`article ${index}: no permalink`);
        partial = true;
        return;
      }
      if (isDegraded(post)) partial = true;
      posts.push(post);
    } catch (error) {
      defects.push(`article ${index}: ${describeError(error)}`);
      partial = true;
    }
  });

  return { posts, partial, defects };
}
