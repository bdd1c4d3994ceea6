import { vi } from 'vitest';
import { createPartition } from '../index/partition.js';
import { createSnapshot } from '../index/store.js';
import type { Post, PostMeta, Snapshot } from '../types.js';

/**
 * Build a post directly, without parsing. `created_at` drives year/month
 * unless those are given explicitly.
 */
export function makePost(name: string, meta: Partial<PostMeta> = {}, body = ''): Post {
  const created_at = meta.created_at ?? '2024-01-01T00:00:00.000Z';
  return {
    name,
    path: `posts/${name}.md`,
    raw: body,
    html: body === '' ? '' : `<p>${body}</p>\n`,
    meta: {
      title: name,
      category: null,
      tags: [],
      published: true,
      pinned: false,
      author: '',
      created_at,
      updated_at: created_at,
      title_image_path: null,
      year: created_at.slice(0, 4),
      month: created_at.slice(5, 7),
      language: 'en',
      ...meta,
    },
  };
}

/** Snapshot holding one partition per language built from the given posts. */
export function snapshotOf(version: number, byLanguage: Record<string, Post[]>): Snapshot {
  const partitions = new Map(
    Object.entries(byLanguage).map(([language, posts]) => [
      language,
      createPartition(language, new Map(posts.map((post) => [post.name, post]))),
    ]),
  );
  return createSnapshot(version, `marker-${version}`, partitions, '2024-06-01T00:00:00.000Z');
}

/**
 * Silence stderr logging for a test.
 * Call in beforeEach() and restore the returned spy in afterEach().
 */
export function silenceLogs() {
  return vi.spyOn(console, 'error').mockImplementation(() => {});
}

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
