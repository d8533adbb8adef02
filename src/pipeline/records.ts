import { authorIdFromUrl, canonicalUrl, collapseWhitespace } from '../core/normalize.js';
import { toCount } from '../core/counts.js';
import type { Attachment, Author, Comment, Post } from './types.js';

export function makeAuthor(raw: { id?: string; name?: string; url?: string }): Author {
  const url = raw.url ? canonicalUrl(raw.url) : '';
  const id = (raw.id ?? '').trim() || authorIdFromUrl(url);
  return {
    id,
    name: collapseWhitespace(raw.name ?? ''),
    url,
  };
}

export function makeComment(raw: Partial<Comment> & { author: Author }): Comment {
  return {
    text: collapseWhitespace(raw.text ?? ''),
    createdAt: toCount(raw.createdAt ?? 0),
    author: raw.author,
    reactionCount: toCount(raw.reactionCount ?? 0),
    commentCount: toCount(raw.commentCount ?? 0),
  };
}

export function dedupeAttachments(attachments: Attachment[]): Attachment[] {
  const seen = new Set<string>();
  return attachments.filter(attachment => {
    const key = `${attachment.type}|${attachment.url}`;
    if (!attachment.url || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export interface PostDraft {
  url: string;
  createdAt: number;
  user: Author;
  text: string;
  attachments: Attachment[];
  reactionCount: number;
  shareCount: number;
  commentCount: number;
  topComments: Comment[];
}

export function finalizePost(draft: PostDraft): Post {
  const topComments = draft.topComments;
  return {
    createdAt: toCount(draft.createdAt),
    url: canonicalUrl(draft.url),
    user: draft.user,
    text: collapseWhitespace(draft.text),
    attachments: dedupeAttachments(draft.attachments),
    reactionCount: toCount(draft.reactionCount),
    shareCount: toCount(draft.shareCount),
    commentCount: Math.max(toCount(draft.commentCount), topComments.length),
    topComments,
  };
}

// A post that parsed but lost fields the format normally carries
export function isDegraded(post: Post): boolean {
  return !post.user.id || post.createdAt === 0;
}
