import { describe, it, expect } from 'vitest';
import {
  compareByDate,
  createPartition,
  deriveAggregates,
  listPinned,
  mergePosts,
  postsByDates,
} from '../index/partition.js';
import type { Post } from '../types.js';
import { makePost } from './helpers.js';

const byName = (posts: Post[]): Map<string, Post> => new Map(posts.map((post) => [post.name, post]));
const names = (posts: readonly Post[]): string[] => posts.map((post) => post.name);

describe('mergePosts', () => {
  const a = makePost('a');
  const b = makePost('b');
  const c = makePost('c');
  const b2 = makePost('b', { title: 'B, revised' });

  it('should apply removals and rebuilt posts, keeping untouched ones by reference', () => {
    const next = mergePosts(byName([a, b, c]), new Set(['b']), new Set(['c']), byName([b2]));

    expect([...next.keys()].sort()).toEqual(['a', 'b']);
    expect(next.get('a')).toBe(a);
    expect(next.get('b')).toBe(b2);
  });

  it('should drop changed posts that failed to rebuild', () => {
    const next = mergePosts(byName([a, b]), new Set(['b']), new Set(), new Map());
    expect([...next.keys()]).toEqual(['a']);
  });

  it('should return the previous posts when nothing changed', () => {
    const previous = byName([a, b, c]);
    expect(mergePosts(previous, new Set(), new Set(), new Map())).toEqual(previous);
  });

  it('should be idempotent', () => {
    const changed = new Set(['b', 'd']);
    const removed = new Set(['c']);
    const rebuilt = byName([b2]);

    const once = mergePosts(byName([a, b, c]), changed, removed, rebuilt);
    const twice = mergePosts(once, changed, removed, rebuilt);

    expect(twice).toEqual(once);
  });

  it('should not modify the previous map', () => {
    const previous = byName([a, b]);
    mergePosts(previous, new Set(), new Set(['a']), new Map());
    expect(previous.has('a')).toBe(true);
  });
});

describe('aggregates', () => {
  const march = makePost('x', { created_at: '2024-03-05T00:00:00.000Z', category: 'tech', tags: ['ts', 'node'] });
  const marchTie = makePost('w', { created_at: '2024-03-05T00:00:00.000Z', category: 'tech' });
  const january = makePost('y', { created_at: '2024-01-20T00:00:00.000Z', tags: ['ts'] });
  const december = makePost('z', { created_at: '2023-12-24T00:00:00.000Z', category: 'life', published: false });

  it('should order posts newest first, ties by name', () => {
    const sorted = [january, march, december, marchTie].sort(compareByDate);
    expect(names(sorted)).toEqual(['w', 'x', 'y', 'z']);
  });

  it('should order equal timestamps by name for any input order', () => {
    const tied = ['d', 'b', 'a', 'c'].map((name) => makePost(name, { created_at: '2024-05-05T00:00:00.000Z' }));
    const orders = [tied, [...tied].reverse(), [tied[2], tied[0], tied[3], tied[1]]];

    for (const order of orders) {
      expect(names(deriveAggregates(byName(order)).byDate)).toEqual(['a', 'b', 'c', 'd']);
    }
  });

  it('should group by category, tag and month in byDate order', () => {
    const aggregates = deriveAggregates(byName([march, marchTie, january, december]));

    expect(names(aggregates.byDate)).toEqual(['w', 'x', 'y', 'z']);
    expect(names(aggregates.byCategory.get('tech') ?? [])).toEqual(['w', 'x']);
    expect(names(aggregates.byCategory.get('life') ?? [])).toEqual(['z']);
    expect(names(aggregates.byTag.get('ts') ?? [])).toEqual(['x', 'y']);
    expect(names(aggregates.byTag.get('node') ?? [])).toEqual(['x']);
    expect([...aggregates.byDateBucket.keys()]).toEqual(['2024-03', '2024-01', '2023-12']);
  });

  it('should leave uncategorized posts out of byCategory', () => {
    const aggregates = deriveAggregates(byName([january]));
    expect(aggregates.byCategory.size).toBe(0);
  });

  it('should freeze the partition and its lists', () => {
    const partition = createPartition('en', byName([march]));

    expect(Object.isFrozen(partition)).toBe(true);
    expect(Object.isFrozen(partition.aggregates.byDate)).toBe(true);
    expect(Object.isFrozen(partition.aggregates.byTag.get('ts'))).toBe(true);
  });

  it('should count published posts per month, newest first', () => {
    const unpublishedMarch = makePost('v', { created_at: '2024-03-01T00:00:00.000Z', published: false });
    const partition = createPartition('en', byName([march, marchTie, unpublishedMarch, january, december]));

    expect(postsByDates(partition)).toEqual([
      { year: '2024', month: '03', count: 2 },
      { year: '2024', month: '01', count: 1 },
    ]);
  });

  it('should list published pinned posts', () => {
    const pinned = makePost('p', { created_at: '2024-02-01T00:00:00.000Z', pinned: true });
    const hiddenPinned = makePost('q', { pinned: true, published: false });
    const partition = createPartition('en', byName([march, pinned, hiddenPinned]));

    expect(names(listPinned(partition))).toEqual(['p']);
  });
});
