/**
 * Collection building: parse a set of post files into a name → Post map.
 *
 * Each file is read and parsed independently. A file that cannot be read
 * or parsed is left out and reported in `failures`; it never blocks the
 * rest of the collection.
 */

import { posix } from 'node:path';
import { META_EXTENSION, META_FOLDER, POST_EXTENSION, type CommitInfo, type ParseFailure, type Post } from '../types.js';
import type { ReadResult } from '../source/types.js';
import { parsePost, postName } from './parse.js';

export interface BuildOptions {
  language: string;
  /** Repository-relative folder the language's posts live in ('' for the root). */
  folder: string;
  fetch: (path: string) => Promise<ReadResult>;
  commitInfo: (path: string) => Promise<CommitInfo | null>;
  now: () => string;
}

export interface BuildResult {
  posts: Map<string, Post>;
  failures: ParseFailure[];
  warnings: string[];
}

/** Check whether a path names a post file. */
export function isPostFile(path: string): boolean {
  return path.endsWith(POST_EXTENSION);
}

/** Path of a file relative to a language folder. */
export function relativeToFolder(folder: string, path: string): string {
  return folder === '' ? path : posix.relative(folder, path);
}

/** Repository-relative path of the sibling metadata file for a post. */
export function metaPathFor(folder: string, fileName: string): string {
  return posix.join(folder, META_FOLDER, postName(fileName) + META_EXTENSION);
}

type FileOutcome =
  | { ok: true; post: Post; warnings: string[] }
  | { ok: false; error: ParseFailure };

async function buildOne(path: string, options: BuildOptions): Promise<FileOutcome> {
  const fileName = relativeToFolder(options.folder, path);

  const [content, meta, commit] = await Promise.all([
    options.fetch(path),
    options.fetch(metaPathFor(options.folder, fileName)),
    options.commitInfo(path),
  ]);

  if (!content.ok) {
    return { ok: false, error: { kind: 'not_found', file: path, message: 'File not found' } };
  }

  return parsePost({
    fileName,
    path,
    language: options.language,
    raw: content.data,
    meta: meta.ok ? meta.data : null,
    commit,
    now: options.now(),
  });
}

/**
 * Build posts for the given repository-relative paths. Non-post files are
 * ignored. Reads run concurrently.
 */
export async function buildPosts(paths: readonly string[], options: BuildOptions): Promise<BuildResult> {
  const postPaths = paths.filter(isPostFile);
  const outcomes = await Promise.all(postPaths.map((path) => buildOne(path, options)));

  const result: BuildResult = { posts: new Map(), failures: [], warnings: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) {
      result.posts.set(outcome.post.name, outcome.post);
      result.warnings.push(...outcome.warnings);
    } else {
      result.failures.push(outcome.error);
    }
  }
  return result;
}
