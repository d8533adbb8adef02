import { describe, it, expect, beforeEach } from 'vitest';
import { db } from '../src/db/schema.js';
import {
  clearGroupCursor,
  countPosts,
  getGroupCursor,
  getPosts,
  getRecentLogs,
  logScrapeEnd,
  logScrapeStart,
  saveGroupCursor,
  upsertPosts,
} from '../src/db/queries.js';
import type { Post, RunSummary } from '../src/pipeline/types.js';

const GROUP = 'https://www.facebook.com/groups/g';
const OTHER = 'https://www.facebook.com/groups/h';

function makePost(n: number, overrides: Partial<Post> = {}): Post {
  return {
    createdAt: 1700000000 + n,
    url: `${GROUP}/posts/${n}/`,
    user: { id: `u${n}`, name: `User ${n}`, url: `https://www.facebook.com/user${n}` },
    text: `Post ${n}`,
    attachments: [],
    reactionCount: 0,
    shareCount: 0,
    commentCount: 0,
    topComments: [],
    ...overrides,
  };
}

function makeSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    groupUrl: GROUP,
    pagesFetched: 2,
    postsEmitted: 3,
    updatesEmitted: 1,
    partialPages: 0,
    terminalReason: 'EndOfFeed',
    failures: [],
    cursor: { groupUrl: GROUP, token: null, pagesConsumed: 2, emptyStreak: 0, staleStreak: 0 },
    startedAt: '2024-01-01T00:00:00.000Z',
    completedAt: '2024-01-01T00:01:00.000Z',
    ...overrides,
  };
}

beforeEach(() => {
  db.exec('DELETE FROM posts; DELETE FROM group_cursors; DELETE FROM scrape_logs;');
});

describe('Post storage', () => {
  it('should count only urls it has not stored before', () => {
    expect(upsertPosts(GROUP, [makePost(1), makePost(2)])).toBe(2);
    expect(upsertPosts(GROUP, [makePost(2, { reactionCount: 4 }), makePost(3)])).toBe(1);
    expect(countPosts(GROUP)).toBe(3);
    expect(countPosts(OTHER)).toBe(0);
  });

  it('should merge repeat observations without losing information', () => {
    upsertPosts(GROUP, [makePost(1, {
      createdAt: 0,
      reactionCount: 5,
      text: 'Hello there',
      user: { id: 'u1', name: 'Ana', url: 'https://www.facebook.com/ana' },
    })]);
    upsertPosts(GROUP, [makePost(1, {
      createdAt: 1700000000,
      reactionCount: 3,
      shareCount: 2,
      text: 'Hi',
      user: { id: '', name: 'Ana Lee', url: 'https://www.facebook.com/other' },
    })]);

    const [post] = getPosts();
    expect(post).toMatchObject({
      createdAt: 1700000000,
      reactionCount: 5,
      shareCount: 2,
      text: 'Hello there',
      user: { id: 'u1', name: 'Ana Lee', url: 'https://www.facebook.com/ana' },
    });
  });

  it('should round-trip attachments and comments', () => {
    const post = makePost(1, {
      attachments: [{ type: 'image', url: 'https://cdn.example.com/a.jpg', alt: 'a dog' }],
      topComments: [{
        text: 'Nice',
        createdAt: 1700000100,
        author: { id: 'c1', name: 'Cee', url: '' },
        reactionCount: 2,
        commentCount: 0,
      }],
      commentCount: 1,
    });
    upsertPosts(GROUP, [post]);

    expect(getPosts({ groupUrl: GROUP })).toEqual([post]);
  });

  it('should read malformed JSON columns back as empty lists', () => {
    db.prepare('INSERT INTO posts (url, group_url, attachments, top_comments) VALUES (?, ?, ?, ?)').run(
      `${GROUP}/posts/9/`,
      GROUP,
      '[{"type":"sticker","url":7}]',
      '{not json',
    );

    const [post] = getPosts({ groupUrl: GROUP });
    expect(post.attachments).toEqual([]);
    expect(post.topComments).toEqual([]);
  });

  it('should filter, order and page stored posts', () => {
    upsertPosts(GROUP, [makePost(100), makePost(300, { text: 'banana bread' })]);
    upsertPosts(OTHER, [makePost(200)]);

    const offsets = (posts: Post[]) => posts.map(post => post.createdAt - 1700000000);
    expect(offsets(getPosts())).toEqual([300, 200, 100]);
    expect(offsets(getPosts({ groupUrl: GROUP }))).toEqual([300, 100]);
    expect(offsets(getPosts({ search: 'banana' }))).toEqual([300]);
    expect(offsets(getPosts({ since: 1700000200 }))).toEqual([300, 200]);
    expect(offsets(getPosts({ limit: 1, offset: 1 }))).toEqual([200]);
  });
});

describe('Group cursors', () => {
  it('should save, replace and clear a checkpoint', () => {
    saveGroupCursor({ groupUrl: GROUP, token: 'c5', pagesConsumed: 4, emptyStreak: 2, staleStreak: 1 });
    expect(getGroupCursor(GROUP)).toEqual({
      groupUrl: GROUP,
      token: 'c5',
      pagesConsumed: 4,
      emptyStreak: 0,
      staleStreak: 0,
    });

    saveGroupCursor({ groupUrl: GROUP, token: null, pagesConsumed: 5, emptyStreak: 0, staleStreak: 0 });
    expect(getGroupCursor(GROUP)).toMatchObject({ token: null, pagesConsumed: 5 });
    expect(getGroupCursor(OTHER)).toBeNull();

    clearGroupCursor(GROUP);
    expect(getGroupCursor(GROUP)).toBeNull();
  });
});

describe('Scrape logs', () => {
  it('should record how a run ended', () => {
    const id = logScrapeStart(GROUP);
    expect(getRecentLogs(1)[0]).toMatchObject({ id, status: 'running', completed_at: null });

    logScrapeEnd(id, 'success', makeSummary(), 2);

    expect(getRecentLogs(1)[0]).toMatchObject({
      id,
      group_url: GROUP,
      status: 'success',
      terminal_reason: 'EndOfFeed',
      pages_fetched: 2,
      posts_emitted: 3,
      updates_emitted: 1,
      items_new: 2,
      failures: null,
      error: null,
    });
  });

  it('should keep failures and the error message of failed runs', () => {
    const failures = [{ kind: 'AuthExpired' as const, page: 1, message: 'Session expired' }];
    const id = logScrapeStart(GROUP);
    logScrapeEnd(id, 'failed', makeSummary({ terminalReason: 'AuthExpired', failures }), 0, 'Run ended with AuthExpired');

    const [log] = getRecentLogs();
    expect(log.status).toBe('failed');
    expect(log.error).toBe('Run ended with AuthExpired');
    expect(JSON.parse(log.failures ?? '[]')).toEqual(failures);
  });
});
