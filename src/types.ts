// === Post Types ===

export interface PostMeta {
  title: string;
  category: string | null;
  tags: readonly string[];
  published: boolean;
  pinned: boolean;
  author: string;
  created_at: string;
  updated_at: string;
  title_image_path: string | null;
  year: string;
  month: string;
  language: string;
}

export interface Post {
  /** File path relative to the language folder, without the .md extension. */
  name: string;
  /** Repository-relative path the raw content was read from. */
  path: string;
  raw: string;
  html: string;
  meta: Readonly<PostMeta>;
}

/** Commit metadata for one file, as reported by the source of truth. */
export interface CommitInfo {
  created_at: string;
  updated_at: string;
  author: string;
}

// === Failures ===

/** A post left out of the index: undecodable content, or gone by the time it was read. */
export interface ParseFailure {
  kind: 'malformed_document' | 'not_found';
  file: string;
  message: string;
}

export type ParseResult =
  | { ok: true; post: Post; warnings: string[] }
  | { ok: false; error: ParseFailure };

// === Index ===

export interface Aggregates {
  byDate: readonly Post[];
  byCategory: ReadonlyMap<string, readonly Post[]>;
  byTag: ReadonlyMap<string, readonly Post[]>;
  /** Keyed by YYYY-MM of created_at. */
  byDateBucket: ReadonlyMap<string, readonly Post[]>;
}

export interface Partition {
  language: string;
  posts: ReadonlyMap<string, Post>;
  aggregates: Aggregates;
}

export interface Snapshot {
  version: number;
  created_at: string;
  /** Source marker (git commit) the snapshot reflects, null before the first build. */
  marker: string | null;
  partitions: ReadonlyMap<string, Partition>;
}

// === Constants ===

export const POST_EXTENSION = '.md';

/** Folder (inside a language folder) holding sibling metadata files. */
export const META_FOLDER = 'meta';

export const META_EXTENSION = '.yml';
