/**
 * Language partitions: the per-language post map plus derived aggregates.
 *
 * Aggregates are recomputed from the post map on every publish rather than
 * patched, so they can never reference a post that is not in the map.
 */

import type { Aggregates, Partition, Post } from '../types.js';

/**
 * Produce the next post map: `previous` minus `removed`, plus `rebuilt`.
 *
 * Names in `changed` that are missing from `rebuilt` failed to build and are
 * dropped, so a stale version never survives a change. Untouched entries
 * are carried over by reference.
 */
export function mergePosts(
  previous: ReadonlyMap<string, Post>,
  changed: ReadonlySet<string>,
  removed: ReadonlySet<string>,
  rebuilt: ReadonlyMap<string, Post>,
): Map<string, Post> {
  const next = new Map(previous);

  for (const name of removed) next.delete(name);
  for (const name of changed) {
    if (!rebuilt.has(name)) next.delete(name);
  }
  for (const [name, post] of rebuilt) next.set(name, post);

  return next;
}

/** Newest first; equal timestamps ordered by name. */
export function compareByDate(a: Post, b: Post): number {
  if (a.meta.created_at !== b.meta.created_at) {
    return a.meta.created_at < b.meta.created_at ? 1 : -1;
  }
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function groupBy(posts: readonly Post[], keysOf: (post: Post) => readonly string[]): Map<string, readonly Post[]> {
  const groups = new Map<string, Post[]>();
  for (const post of posts) {
    for (const key of keysOf(post)) {
      const group = groups.get(key);
      if (group) {
        group.push(post);
      } else {
        groups.set(key, [post]);
      }
    }
  }

  const frozen = new Map<string, readonly Post[]>();
  for (const [key, group] of groups) frozen.set(key, Object.freeze(group));
  return frozen;
}

/** Derive every aggregate view from a post map. Group lists keep byDate order. */
export function deriveAggregates(posts: ReadonlyMap<string, Post>): Aggregates {
  const byDate = Object.freeze([...posts.values()].sort(compareByDate));

  return {
    byDate,
    byCategory: groupBy(byDate, (post) => (post.meta.category === null ? [] : [post.meta.category])),
    byTag: groupBy(byDate, (post) => post.meta.tags),
    byDateBucket: groupBy(byDate, (post) => [`${post.meta.year}-${post.meta.month}`]),
  };
}

export function createPartition(language: string, posts: ReadonlyMap<string, Post>): Partition {
  return Object.freeze({
    language,
    posts,
    aggregates: Object.freeze(deriveAggregates(posts)),
  });
}

export function emptyPartition(language: string): Partition {
  return createPartition(language, new Map());
}

/** Restrict a list to published posts when requested. */
export function publishedOnly(posts: readonly Post[], onlyPublished: boolean): readonly Post[] {
  return onlyPublished ? posts.filter((post) => post.meta.published) : posts;
}

export interface DateCount {
  year: string;
  month: string;
  count: number;
}

/** Published post counts per year/month, newest first. */
export function postsByDates(partition: Partition): DateCount[] {
  const counts: DateCount[] = [];
  for (const [bucket, posts] of partition.aggregates.byDateBucket) {
    const count = posts.filter((post) => post.meta.published).length;
    if (count === 0) continue;
    const [year, month] = bucket.split('-');
    counts.push({ year, month, count });
  }
  return counts.sort((a, b) => (a.year === b.year ? b.month.localeCompare(a.month) : b.year.localeCompare(a.year)));
}

/** Published pinned posts in byDate order. */
export function listPinned(partition: Partition): Post[] {
  return partition.aggregates.byDate.filter((post) => post.meta.published && post.meta.pinned);
}
