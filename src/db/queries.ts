import { z } from 'zod';
import { db } from './schema.js';
import type { Attachment, Comment, Cursor, Post, RunSummary } from '../pipeline/types.js';

// ============================================================================
// ROW TYPES
// ============================================================================

export interface PostRow {
  url: string;
  group_url: string;
  created_at: number;
  author_id: string | null;
  author_name: string | null;
  author_url: string | null;
  text: string | null;
  attachments: string;
  reaction_count: number;
  share_count: number;
  comment_count: number;
  top_comments: string;
  first_seen_at?: string;
  updated_at?: string;
}

export interface ScrapeLog {
  id?: number;
  group_url: string;
  status: 'running' | 'success' | 'failed';
  terminal_reason: string | null;
  pages_fetched: number;
  posts_emitted: number;
  updates_emitted: number;
  items_new: number;
  failures: string | null;
  error: string | null;
  started_at: string;
  completed_at: string | null;
}

interface CursorRow {
  group_url: string;
  token: string | null;
  page_index: number;
  updated_at: string;
}

const AttachmentListSchema: z.ZodType<Attachment[]> = z.array(z.object({
  type: z.enum(['image', 'video', 'link']),
  url: z.string(),
  alt: z.string().optional(),
  text: z.string().optional(),
}));

const CommentListSchema: z.ZodType<Comment[]> = z.array(z.object({
  text: z.string(),
  createdAt: z.number(),
  author: z.object({ id: z.string(), name: z.string(), url: z.string() }),
  reactionCount: z.number(),
  commentCount: z.number(),
}));

// JSON columns that fail to parse or validate read back as an empty list
function parseJsonList<T>(value: string | null, schema: z.ZodType<T[]>): T[] {
  if (!value) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return [];
  }
  const result = schema.safeParse(parsed);
  return result.success ? result.data : [];
}

export function rowToPost(row: PostRow): Post {
  return {
    createdAt: row.created_at,
    url: row.url,
    user: {
      id: row.author_id ?? '',
      name: row.author_name ?? '',
      url: row.author_url ?? '',
    },
    text: row.text ?? '',
    attachments: parseJsonList(row.attachments, AttachmentListSchema),
    reactionCount: row.reaction_count,
    shareCount: row.share_count,
    commentCount: row.comment_count,
    topComments: parseJsonList(row.top_comments, CommentListSchema),
  };
}

// ============================================================================
// POSTS
// ============================================================================

// Counts are merged with MAX so a later, thinner observation never regresses them
const upsertPostStmt = db.prepare(`
  INSERT INTO posts (url, group_url, created_at, author_id, author_name, author_url, text,
    attachments, reaction_count, share_count, comment_count, top_comments)
  VALUES (@url, @group_url, @created_at, @author_id, @author_name, @author_url, @text,
    @attachments, @reaction_count, @share_count, @comment_count, @top_comments)
  ON CONFLICT(url) DO UPDATE SET
    created_at = CASE WHEN posts.created_at = 0 THEN excluded.created_at ELSE posts.created_at END,
    author_id = COALESCE(NULLIF(excluded.author_id, ''), posts.author_id),
    author_name = COALESCE(NULLIF(excluded.author_name, ''), posts.author_name),
    author_url = COALESCE(NULLIF(posts.author_url, ''), excluded.author_url),
    text = CASE WHEN LENGTH(excluded.text) > LENGTH(COALESCE(posts.text, '')) THEN excluded.text ELSE posts.text END,
    attachments = excluded.attachments,
    reaction_count = MAX(posts.reaction_count, excluded.reaction_count),
    share_count = MAX(posts.share_count, excluded.share_count),
    comment_count = MAX(posts.comment_count, excluded.comment_count),
    top_comments = excluded.top_comments,
    updated_at = datetime('now')
`);

const postExistsStmt = db.prepare('SELECT 1 FROM posts WHERE url = ?');

function toRow(groupUrl: string, post: Post): PostRow {
  return {
    url: post.url,
    group_url: groupUrl,
    created_at: post.createdAt,
    author_id: post.user.id,
    author_name: post.user.name,
    author_url: post.user.url,
    text: post.text,
    attachments: JSON.stringify(post.attachments),
    reaction_count: post.reactionCount,
    share_count: post.shareCount,
    comment_count: post.commentCount,
    top_comments: JSON.stringify(post.topComments),
  };
}

// Batch upsert; returns how many urls were not stored before
export function upsertPosts(groupUrl: string, posts: Post[]): number {
  let newCount = 0;
  const transaction = db.transaction((items: Post[]) => {
    for (const post of items) {
      if (!postExistsStmt.get(post.url)) newCount++;
      upsertPostStmt.run(toRow(groupUrl, post));
    }
  });
  transaction(posts);
  return newCount;
}

export interface PostFilters {
  groupUrl?: string;
  search?: string;
  since?: number;
  limit?: number;
  offset?: number;
}

export function getPosts(filters: PostFilters = {}): Post[] {
  let query = 'SELECT * FROM posts WHERE 1=1';
  const params: Array<string | number> = [];

  if (filters.groupUrl) {
    query += ' AND group_url = ?';
    params.push(filters.groupUrl);
  }
  if (filters.search) {
    query += ' AND (text LIKE ? OR author_name LIKE ?)';
    params.push(`%${filters.search}%`, `%${filters.search}%`);
  }
  if (filters.since) {
    query += ' AND created_at >= ?';
    params.push(filters.since);
  }

  query += ' ORDER BY created_at DESC, url ASC';

  if (filters.limit) {
    query += ' LIMIT ?';
    params.push(filters.limit);
    if (filters.offset) {
      query += ' OFFSET ?';
      params.push(filters.offset);
    }
  }

  const rows = db.prepare<Array<string | number>, PostRow>(query).all(...params);
  return rows.map(rowToPost);
}

export function countPosts(groupUrl?: string): number {
  const row = groupUrl
    ? db.prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM posts WHERE group_url = ?').get(groupUrl)
    : db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM posts').get();
  return row?.count ?? 0;
}

// ============================================================================
// SCRAPE LOGS
// ============================================================================

export function logScrapeStart(groupUrl: string): number {
  const result = db.prepare(`
    INSERT INTO scrape_logs (group_url, status, started_at) VALUES (?, 'running', datetime('now'))
  `).run(groupUrl);
  return Number(result.lastInsertRowid);
}

export function logScrapeEnd(
  id: number,
  status: 'success' | 'failed',
  summary: RunSummary,
  itemsNew: number,
  error?: string
): void {
  db.prepare(`
    UPDATE scrape_logs SET status = ?, terminal_reason = ?, pages_fetched = ?, posts_emitted = ?,
      updates_emitted = ?, items_new = ?, failures = ?, error = ?, completed_at = datetime('now')
    WHERE id = ?
  `).run(
    status,
    summary.terminalReason,
    summary.pagesFetched,
    summary.postsEmitted,
    summary.updatesEmitted,
    itemsNew,
    summary.failures.length ? JSON.stringify(summary.failures) : null,
    error || null,
    id
  );
}

export function getRecentLogs(limit = 20): ScrapeLog[] {
  return db.prepare<[number], ScrapeLog>(`
    SELECT * FROM scrape_logs ORDER BY id DESC LIMIT ?
  `).all(limit);
}

// ============================================================================
// RESUMABLE CURSORS
// ============================================================================

const getCursorStmt = db.prepare<[string], CursorRow>('SELECT * FROM group_cursors WHERE group_url = ?');
const upsertCursorStmt = db.prepare(`
  INSERT INTO group_cursors (group_url, token, page_index, updated_at)
  VALUES (@group_url, @token, @page_index, datetime('now'))
  ON CONFLICT(group_url) DO UPDATE SET
    token = excluded.token,
    page_index = excluded.page_index,
    updated_at = datetime('now')
`);
const deleteCursorStmt = db.prepare('DELETE FROM group_cursors WHERE group_url = ?');

// Streaks restart at zero: they describe pages seen by one run, not the feed
export function getGroupCursor(groupUrl: string): Cursor | null {
  const row = getCursorStmt.get(groupUrl);
  if (!row) return null;
  return {
    groupUrl: row.group_url,
    token: row.token,
    pagesConsumed: row.page_index,
    emptyStreak: 0,
    staleStreak: 0,
  };
}

export function saveGroupCursor(cursor: Cursor): void {
  upsertCursorStmt.run({
    group_url: cursor.groupUrl,
    token: cursor.token,
    page_index: cursor.pagesConsumed,
  });
}

export function clearGroupCursor(groupUrl: string): void {
  deleteCursorStmt.run(groupUrl);
}
