import crypto from 'crypto';
import { contentHash, normalizeContent } from '../core/normalize.js';
import type { Author, Comment, EmissionKind, Post, PostEmission } from './types.js';

// Id first; url or the normalized name only when no id was observable
export function authorKey(author: Author): string {
  return author.id || author.url || normalizeContent(author.name);
}

export function commentKey(postUrl: string, comment: Comment): string {
  const parts = [postUrl, authorKey(comment.author), String(comment.createdAt), contentHash(comment.text)];
  return crypto.createHash('sha256').update(parts.join('\u0000')).digest('hex');
}

// Most engaged first, older first on ties; Array#sort is stable so first-seen order breaks the rest
function rankComments(comments: Comment[]): Comment[] {
  return comments.sort((a, b) => b.reactionCount - a.reactionCount || a.createdAt - b.createdAt);
}

export function mergeComments(postUrl: string, existing: Comment[], incoming: Comment[]): Comment[] {
  const byKey = new Map<string, Comment>();

  for (const comment of [...existing, ...incoming]) {
    const key = commentKey(postUrl, comment);
    const known = byKey.get(key);
    if (!known) {
      byKey.set(key, structuredClone(comment));
      continue;
    }
    known.reactionCount = Math.max(known.reactionCount, comment.reactionCount);
    known.commentCount = Math.max(known.commentCount, comment.commentCount);
    if (comment.author.name) known.author.name = comment.author.name;
    if (!known.author.url && comment.author.url) known.author.url = comment.author.url;
  }

  return rankComments(Array.from(byKey.values()));
}

function commentKeySet(postUrl: string, comments: Comment[]): string {
  return comments.map(c => commentKey(postUrl, c)).sort().join(',');
}

function sameAttachments(a: Post['attachments'], b: Post['attachments']): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function mergeAuthor(existing: Author, incoming: Author): Author {
  return {
    id: existing.id || incoming.id,
    name: incoming.name || existing.name,
    url: existing.url || incoming.url,
  };
}

// Casing and whitespace in a display name are not an identity change
function sameIdentity(a: Author, b: Author): boolean {
  return a.id === b.id && a.url === b.url && normalizeContent(a.name) === normalizeContent(b.name);
}

export interface MergeResult {
  post: Post;
  material: boolean;
}

/**
 * Field-by-field merge of two observations of one url. Counts only grow; a
 * change is material when anything besides counts (and comment ranking)
 * moved.
 */
export function mergePost(existing: Post, incoming: Post): MergeResult {
  const text = incoming.text.length > existing.text.length ? incoming.text : existing.text;
  const attachments = incoming.attachments.length > existing.attachments.length
    ? incoming.attachments
    : existing.attachments;
  const createdAt = existing.createdAt || incoming.createdAt;
  const user = mergeAuthor(existing.user, incoming.user);
  const topComments = mergeComments(existing.url, existing.topComments, incoming.topComments);

  const post: Post = {
    createdAt,
    url: existing.url,
    user,
    text,
    attachments: structuredClone(attachments),
    reactionCount: Math.max(existing.reactionCount, incoming.reactionCount),
    shareCount: Math.max(existing.shareCount, incoming.shareCount),
    commentCount: Math.max(existing.commentCount, incoming.commentCount, topComments.length),
    topComments,
  };

  const material =
    text !== existing.text ||
    createdAt !== existing.createdAt ||
    !sameAttachments(post.attachments, existing.attachments) ||
    !sameIdentity(user, existing.user) ||
    commentKeySet(post.url, topComments) !== commentKeySet(existing.url, existing.topComments);

  return { post, material };
}

/**
 * Owns the Seen-Set of one run: at most one canonical record per post url.
 */
export class MergeEngine {
  private readonly seen = new Map<string, Post>();
  private readonly authors = new Map<string, Author>();

  reconcile(candidates: Post[]): PostEmission[] {
    const pending = new Map<string, EmissionKind>();

    for (const candidate of candidates) {
      if (!candidate.url) continue;
      const incoming = this.registerAuthors(structuredClone(candidate));
      const existing = this.seen.get(incoming.url);

      if (!existing) {
        const topComments = mergeComments(incoming.url, [], incoming.topComments);
        this.seen.set(incoming.url, {
          ...incoming,
          topComments,
          commentCount: Math.max(incoming.commentCount, topComments.length),
        });
        pending.set(incoming.url, 'created');
        continue;
      }

      const { post, material } = mergePost(existing, incoming);
      this.seen.set(incoming.url, post);
      if (material && !pending.has(incoming.url)) {
        pending.set(incoming.url, 'updated');
      }
    }

    const emissions: PostEmission[] = [];
    for (const [url, kind] of pending) {
      const post = this.seen.get(url);
      if (post) emissions.push({ kind, post: structuredClone(post) });
    }
    return emissions;
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  get(url: string): Post | undefined {
    const post = this.seen.get(url);
    return post ? structuredClone(post) : undefined;
  }

  get size(): number {
    return this.seen.size;
  }

  // First-seen order
  snapshot(): Post[] {
    return Array.from(this.seen.values(), post => structuredClone(post));
  }

  // An id keeps its first profile url; the latest non-empty name wins
  private registerAuthor(author: Author): Author {
    if (!author.id) return author;
    const known = this.authors.get(author.id);
    const entry: Author = known
      ? { id: author.id, url: known.url || author.url, name: author.name || known.name }
      : { ...author };
    this.authors.set(author.id, entry);
    return { ...entry };
  }

  private registerAuthors(post: Post): Post {
    return {
      ...post,
      user: this.registerAuthor(post.user),
      topComments: post.topComments.map(comment => ({ ...comment, author: this.registerAuthor(comment.author) })),
    };
  }
}
