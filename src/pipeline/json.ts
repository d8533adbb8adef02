import { parseTimestamp } from '../core/datetime.js';
import { describeError } from '../core/errors.js';
import { asArray, asRecord, countOf, firstOf, readPath, stringOf, type JsonRecord } from './fields.js';
import { finalizePost, isDegraded, makeAuthor, makeComment } from './records.js';
import type { Attachment, AttachmentType, Author, Comment, ParseResult, Post } from './types.js';

// Where the feed container has been observed across payload revisions
const FEED_CONTAINER_PATHS = [
  'data.group.group_feed',
  'data.node.group_feed',
  'data.group.feed',
  'data.feed',
  'feed',
  'data',
];
const FEED_LIST_KEYS = ['edges', 'posts', 'items'];

const POST_PATHS = {
  url: ['url', 'permalink_url', 'permalink', 'story.url', 'wwwURL'],
  createdAt: ['creation_time', 'created_time', 'createdAt', 'publish_time', 'timestamp'],
  author: ['actors.0', 'author', 'user', 'from', 'owner'],
  text: ['message.text', 'message', 'text', 'body.text', 'body'],
  attachments: ['attachments', 'media'],
  reactionCount: ['reaction_count', 'reactions', 'reactionCount', 'feedback.reaction_count', 'feedback.reactors', 'likes'],
  shareCount: ['share_count', 'shares', 'shareCount', 'feedback.share_count', 'reshares'],
  commentCount: ['comment_count', 'comments', 'commentCount', 'feedback.comment_count', 'feedback.comments'],
  comments: ['top_comments', 'topComments', 'comments.edges', 'comments.nodes', 'comments', 'feedback.comments.edges'],
};

const COMMENT_PATHS = {
  text: ['body.text', 'body', 'text', 'message.text', 'message'],
  createdAt: ['created_time', 'creation_time', 'createdAt', 'timestamp'],
  author: ['author', 'from', 'user'],
  reactionCount: ['reaction_count', 'reactions', 'reactionCount', 'feedback.reaction_count', 'likes'],
  commentCount: ['reply_count', 'replies', 'comment_count', 'commentCount', 'feedback.comment_count'],
};

const AUTHOR_PATHS = {
  id: ['id', 'userID', 'user_id', 'profile_id'],
  name: ['name', 'short_name', 'display_name'],
  url: ['url', 'profile_url', 'uri', 'link'],
};

// Every object that may hold the feed list or its paging block, most specific first
export function feedContainers(data: unknown): JsonRecord[] {
  const containers: JsonRecord[] = [];
  for (const path of [...FEED_CONTAINER_PATHS, '']) {
    const container = asRecord(path ? readPath(data, path) : data);
    if (container && !containers.includes(container)) containers.push(container);
  }
  return containers;
}

export function findFeedList(data: unknown): unknown[] | null {
  if (Array.isArray(data)) return data;

  for (const container of feedContainers(data)) {
    for (const key of FEED_LIST_KEYS) {
      const list = container[key];
      if (Array.isArray(list)) return list;
    }
  }
  return null;
}

// Edges wrap their payload in `node`; plain lists do not
function unwrapNode(item: unknown): unknown {
  const record = asRecord(item);
  if (record && asRecord(record.node)) return record.node;
  return item;
}

function readAuthor(value: unknown): Author {
  if (typeof value === 'string') {
    return makeAuthor({ name: value });
  }
  return makeAuthor({
    id: stringOf(value, AUTHOR_PATHS.id),
    name: stringOf(value, AUTHOR_PATHS.name),
    url: stringOf(value, AUTHOR_PATHS.url),
  });
}

function readAttachmentType(record: unknown): AttachmentType | null {
  const raw = stringOf(record, ['type', 'media.__typename', '__typename', 'media_type']).toLowerCase();
  if (raw.includes('video')) return 'video';
  if (raw.includes('photo') || raw.includes('image')) return 'image';
  if (raw.includes('link') || raw.includes('share')) return 'link';
  return null;
}

function readAttachments(value: unknown): Attachment[] {
  const attachments: Attachment[] = [];
  for (const item of asArray(value)) {
    const record = unwrapNode(item);
    const url = stringOf(record, ['url', 'media.image.uri', 'image.uri', 'media.url', 'uri', 'src', 'href']);
    if (!url) continue;

    const type = readAttachmentType(record)
      ?? (readPath(record, 'media.image.uri') || readPath(record, 'image.uri') ? 'image' : 'link');
    const attachment: Attachment = { type, url };
    const alt = stringOf(record, ['alt', 'accessibility_caption', 'media.accessibility_caption']);
    const text = stringOf(record, ['title', 'text', 'description']);
    if (alt) attachment.alt = alt;
    if (text) attachment.text = text;
    attachments.push(attachment);
  }
  return attachments;
}

function readComments(value: unknown, now: number): Comment[] {
  const comments: Comment[] = [];
  for (const item of asArray(value)) {
    const node = unwrapNode(item);
    if (!asRecord(node)) continue;
    comments.push(makeComment({
      text: stringOf(node, COMMENT_PATHS.text),
      createdAt: parseTimestamp(firstOf(node, COMMENT_PATHS.createdAt), now) ?? 0,
      author: readAuthor(firstOf(node, COMMENT_PATHS.author)),
      reactionCount: countOf(node, COMMENT_PATHS.reactionCount),
      commentCount: countOf(node, COMMENT_PATHS.commentCount),
    }));
  }
  return comments;
}

export function readJsonPost(item: unknown, now: number = Date.now()): Post | null {
  const node = unwrapNode(item);
  if (!asRecord(node)) return null;

  const url = stringOf(node, POST_PATHS.url);
  if (!url) return null;

  return finalizePost({
    url,
    createdAt: parseTimestamp(firstOf(node, POST_PATHS.createdAt), now) ?? 0,
    user: readAuthor(firstOf(node, POST_PATHS.author)),
    text: stringOf(node, POST_PATHS.text),
    attachments: readAttachments(firstOf(node, POST_PATHS.attachments)),
    reactionCount: countOf(node, POST_PATHS.reactionCount),
    shareCount: countOf(node, POST_PATHS.shareCount),
    commentCount: countOf(node, POST_PATHS.commentCount),
    topComments: readComments(firstOf(node, POST_PATHS.comments), now),
  });
}

export function parseJsonFeed(items: unknown[], now: number = Date.now()): ParseResult {
  const posts: Post[] = [];
  const defects: string[] = [];
  let partial = false;

  items.forEach((item, index) => {
    try {
      const post = readJsonPost(item, now);
      if (!post) {
        defects.push(`item ${index}: no post url`);
        partial = true;
        return;
      }
      if (isDegraded(post)) partial = true;
      posts.push(post);
    } catch (error) {
      defects.push(`item ${index}: ${describeError(error)}`);
      partial = true;
    }
  });

  return { posts, partial, defects };
}
