/**
 * Read-side queries over one snapshot.
 *
 * Every function takes the snapshot explicitly: callers grab
 * `store.current()` once and run the whole query against it.
 */

import type { Post, Snapshot } from '../types.js';
import { listPinned, postsByDates, publishedOnly, type DateCount } from './partition.js';

export interface ListOptions {
  /** Exclude unpublished posts (default: true). */
  publishedOnly?: boolean;
  category?: string;
  tag?: string;
  /** YYYY-MM bucket of created_at. */
  yearMonth?: string;
  author?: string;
  /** Case-insensitive substring of the title or raw content. */
  query?: string;
  limit?: number;
  offset?: number;
}

export interface TaxonomyCount {
  name: string;
  count: number;
}

/** Look up one post by name. Unpublished posts are returned too. */
export function getPost(snapshot: Snapshot, language: string, name: string): Post | null {
  return snapshot.partitions.get(language)?.posts.get(name) ?? null;
}

/** List posts newest first, filtered and paginated. Unknown languages list as []. */
export function listPosts(snapshot: Snapshot, language: string, options: ListOptions = {}): Post[] {
  const partition = snapshot.partitions.get(language);
  if (!partition) return [];

  const { byDate, byCategory, byTag, byDateBucket } = partition.aggregates;

  // Start from the narrowest precomputed view
  let posts: readonly Post[] = byDate;
  if (options.category !== undefined) {
    posts = byCategory.get(options.category) ?? [];
  } else if (options.tag !== undefined) {
    posts = byTag.get(options.tag) ?? [];
  } else if (options.yearMonth !== undefined) {
    posts = byDateBucket.get(options.yearMonth) ?? [];
  }

  const needle = options.query?.trim().toLowerCase();
  const filtered = publishedOnly(posts, options.publishedOnly ?? true).filter((post) => {
    if (options.tag !== undefined && !post.meta.tags.includes(options.tag)) return false;
    if (options.yearMonth !== undefined && `${post.meta.year}-${post.meta.month}` !== options.yearMonth) return false;
    if (options.author !== undefined && post.meta.author !== options.author) return false;
    if (needle) {
      return post.meta.title.toLowerCase().includes(needle) || post.raw.toLowerCase().includes(needle);
    }
    return true;
  });

  const offset = Math.max(0, options.offset ?? 0);
  const end = options.limit === undefined ? undefined : offset + Math.max(0, options.limit);
  return filtered.slice(offset, end);
}

function countGroups(groups: ReadonlyMap<string, readonly Post[]>): TaxonomyCount[] {
  const counts: TaxonomyCount[] = [];
  for (const [name, posts] of groups) {
    const count = posts.filter((post) => post.meta.published).length;
    if (count > 0) counts.push({ name, count });
  }
  return counts.sort((a, b) => b.count - a.count || a.name.localeCompare(b.name));
}

/** Categories with published post counts, most used first. */
export function listCategories(snapshot: Snapshot, language: string): TaxonomyCount[] {
  const partition = snapshot.partitions.get(language);
  return partition ? countGroups(partition.aggregates.byCategory) : [];
}

/** Tags with published post counts, most used first. */
export function listTags(snapshot: Snapshot, language: string): TaxonomyCount[] {
  const partition = snapshot.partitions.get(language);
  return partition ? countGroups(partition.aggregates.byTag) : [];
}

export function listArchive(snapshot: Snapshot, language: string): DateCount[] {
  const partition = snapshot.partitions.get(language);
  return partition ? postsByDates(partition) : [];
}

export function listPinnedPosts(snapshot: Snapshot, language: string): Post[] {
  const partition = snapshot.partitions.get(language);
  return partition ? listPinned(partition) : [];
}
