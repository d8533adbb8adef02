import { describe, it, expect } from 'vitest';
import { MergeEngine, commentKey, mergePost } from '../src/pipeline/merge.js';
import type { Comment, Post } from '../src/pipeline/types.js';

const URL_A = 'https://www.facebook.com/groups/g/posts/1/';
const URL_B = 'https://www.facebook.com/groups/g/posts/2/';

function makePost(url: string, overrides: Partial<Post> = {}): Post {
  return {
    createdAt: 1700000000,
    url,
    user: { id: 'u1', name: 'Ana Lee', url: 'https://www.facebook.com/ana' },
    text: 'Hello group',
    attachments: [],
    reactionCount: 1,
    shareCount: 0,
    commentCount: 0,
    topComments: [],
    ...overrides,
  };
}

function makeComment(id: string, reactionCount: number, createdAt: number, text = `from ${id}`): Comment {
  return {
    text,
    createdAt,
    author: { id, name: id.toUpperCase(), url: '' },
    reactionCount,
    commentCount: 0,
  };
}

describe('MergeEngine', () => {
  it('should emit a post once and ignore exact repeats', () => {
    const engine = new MergeEngine();
    const post = makePost(URL_A);

    expect(engine.reconcile([post])).toEqual([{ kind: 'created', post }]);
    expect(engine.reconcile([post])).toEqual([]);
    expect(engine.size).toBe(1);
  });

  it('should absorb count-only changes without emitting and never lower counts', () => {
    const engine = new MergeEngine();
    engine.reconcile([makePost(URL_A)]);

    expect(engine.reconcile([makePost(URL_A, { reactionCount: 9, shareCount: 2 })])).toEqual([]);
    expect(engine.reconcile([makePost(URL_A, { reactionCount: 4 })])).toEqual([]);
    expect(engine.get(URL_A)).toMatchObject({ reactionCount: 9, shareCount: 2 });
  });

  it('should emit an update when the text grows', () => {
    const engine = new MergeEngine();
    engine.reconcile([makePost(URL_A, { text: 'Hello' })]);

    const emissions = engine.reconcile([makePost(URL_A, { text: 'Hello group, welcome' })]);

    expect(emissions).toHaveLength(1);
    expect(emissions[0].kind).toBe('updated');
    expect(emissions[0].post.text).toBe('Hello group, welcome');
  });

  it('should union comments and rank them by engagement then age', () => {
    const engine = new MergeEngine();
    const a = makeComment('a', 2, 100);
    const b = makeComment('b', 7, 10);
    const c = makeComment('c', 2, 50);
    engine.reconcile([makePost(URL_A, { topComments: [a, b] })]);

    const emissions = engine.reconcile([makePost(URL_A, { topComments: [c] })]);

    expect(emissions.map(e => e.kind)).toEqual(['updated']);
    expect(emissions[0].post.topComments.map(comment => comment.author.id)).toEqual(['b', 'c', 'a']);
    expect(emissions[0].post.commentCount).toBe(3);
  });

  it('should coalesce repeated observations within one batch', () => {
    const engine = new MergeEngine();

    const emissions = engine.reconcile([
      makePost(URL_A, { text: 'Hi' }),
      makePost(URL_A, { text: 'Hi everyone' }),
      makePost(URL_B),
    ]);

    expect(emissions.map(e => [e.kind, e.post.url])).toEqual([
      ['created', URL_A],
      ['created', URL_B],
    ]);
    expect(emissions[0].post.text).toBe('Hi everyone');
  });

  it('should not treat a display-name casing change as material', () => {
    const engine = new MergeEngine();
    engine.reconcile([makePost(URL_A)]);

    const renamed = makePost(URL_A, { user: { id: 'u1', name: 'ANA  LEE', url: 'https://www.facebook.com/ana' } });

    expect(engine.reconcile([renamed])).toEqual([]);
    expect(engine.get(URL_A)?.user.name).toBe('ANA  LEE');
  });

  it('should keep the first profile url seen for an author id', () => {
    const engine = new MergeEngine();
    engine.reconcile([makePost(URL_A)]);

    const [emission] = engine.reconcile([
      makePost(URL_B, { user: { id: 'u1', name: 'Ana B', url: 'https://www.facebook.com/profile.php?id=u1' } }),
    ]);

    expect(emission.post.user).toEqual({ id: 'u1', name: 'Ana B', url: 'https://www.facebook.com/ana' });
  });

  it('should hand out copies that cannot change its state', () => {
    const engine = new MergeEngine();
    const [emission] = engine.reconcile([makePost(URL_A)]);

    emission.post.text = 'tampered';
    emission.post.user.name = 'tampered';

    expect(engine.get(URL_A)).toMatchObject({ text: 'Hello group', user: { name: 'Ana Lee' } });
  });

  it('should collapse duplicate comments inside one post', () => {
    const engine = new MergeEngine();
    const first = makeComment('a', 1, 100, 'Same words');
    const again = makeComment('a', 5, 100, 'same   WORDS');

    const [emission] = engine.reconcile([makePost(URL_A, { topComments: [first, again] })]);

    expect(emission.post.topComments).toHaveLength(1);
    expect(emission.post.topComments[0]).toMatchObject({ text: 'Same words', reactionCount: 5 });
    expect(emission.post.commentCount).toBe(1);
  });

  it('should snapshot posts in first-seen order', () => {
    const engine = new MergeEngine();
    engine.reconcile([makePost(URL_B)]);
    engine.reconcile([makePost(URL_A), makePost(URL_B, { text: 'Hello group again' })]);

    expect(engine.snapshot().map(post => post.url)).toEqual([URL_B, URL_A]);
    expect(engine.has(URL_A)).toBe(true);
    expect(engine.has('https://www.facebook.com/groups/g/posts/3/')).toBe(false);
  });
});

describe('mergePost', () => {
  it('should keep the first known timestamp and identity fields', () => {
    const existing = makePost(URL_A, { createdAt: 0, user: { id: '', name: 'Ana', url: '' } });
    const incoming = makePost(URL_A, { createdAt: 1700000500 });

    const { post, material } = mergePost(existing, incoming);

    expect(material).toBe(true);
    expect(post.createdAt).toBe(1700000500);
    expect(post.user).toEqual({ id: 'u1', name: 'Ana Lee', url: 'https://www.facebook.com/ana' });
  });
});

describe('commentKey', () => {
  it('should ignore casing and spacing differences in the text', () => {
    expect(commentKey(URL_A, makeComment('a', 0, 100, 'Hello  World')))
      .toBe(commentKey(URL_A, makeComment('a', 3, 100, 'hello world')));
  });

  it('should separate comments by author, time and post', () => {
    const base = makeComment('a', 0, 100, 'hi');
    expect(commentKey(URL_A, base)).not.toBe(commentKey(URL_A, { ...base, createdAt: 101 }));
    expect(commentKey(URL_A, base)).not.toBe(commentKey(URL_B, base));
    expect(commentKey(URL_A, base)).not.toBe(commentKey(URL_A, { ...base, author: { id: 'b', name: 'B', url: '' } }));
  });
});
