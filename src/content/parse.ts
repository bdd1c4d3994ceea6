/**
 * Post parsing: raw bytes + optional metadata bytes + commit info → Post.
 *
 * Title resolution, first match wins:
 *   1. `title` from metadata (sibling meta file, then inline front matter)
 *   2. a leading `# Heading` line
 *   3. the humanized file name ("my-post.md" → "My Post")
 *
 * Metadata fields override commit-derived values, including created_at,
 * updated_at and author. Pure: no I/O, `now` is supplied by the caller.
 */

import { posix } from 'node:path';
import { POST_EXTENSION, type CommitInfo, type ParseResult, type Post, type PostMeta } from '../types.js';
import { parseMetadataFile, splitFrontMatter, type MetadataResult } from './metadata.js';
import { renderMarkdown } from './render.js';

export interface ParseInput {
  /** File path relative to the language folder, e.g. "nested/my-post.md". */
  fileName: string;
  /** Repository-relative path. */
  path: string;
  language: string;
  raw: Uint8Array;
  /** Bytes of the sibling metadata file, if one exists. */
  meta: Uint8Array | null;
  commit: CommitInfo | null;
  /** ISO timestamp used when the file has no commit history. */
  now: string;
}

// `#Title` counts as a heading; `## Title` does not
const HEADING_RE = /^\s*#[ \t]*([^#\s][^\r\n]*?)[ \t]*(?:\r?\n|$)/;

/** Strip the extension and return the identity of a post file. */
export function postName(fileName: string): string {
  return fileName.endsWith(POST_EXTENSION) ? fileName.slice(0, -POST_EXTENSION.length) : fileName;
}

/**
 * Derive a title from a file name.
 *
 * Examples:
 *   "my-post.md" → "My Post"
 *   "nested/test_with_no_title.md" → "Test With No Title"
 */
export function humanizeFileName(fileName: string): string {
  return posix
    .basename(postName(fileName))
    .split(/[-_.\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return null;
  }
}

function toIso(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const date = new Date(value.trim());
    return Number.isNaN(date.getTime()) ? null : date.toISOString();
  }
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number') return String(value);
  return null;
}

function toTags(value: unknown): string[] {
  let candidates: unknown[] = [];
  if (Array.isArray(value)) {
    candidates = value;
  } else if (typeof value === 'string') {
    candidates = value.split(',');
  }

  const tags: string[] = [];
  for (const candidate of candidates) {
    const tag = toText(candidate);
    if (tag !== null && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

function collectMetadata(
  fileName: string,
  results: Array<[string, MetadataResult]>,
  warnings: string[],
): Record<string, unknown> {
  let data: Record<string, unknown> = {};
  for (const [origin, result] of results) {
    if (result.kind === 'invalid') {
      warnings.push(`Ignoring invalid ${origin} metadata in ${fileName}: ${result.message}`);
    } else if (result.kind === 'ok') {
      data = { ...data, ...result.data };
    }
  }
  return data;
}

/** Parse one post. Never throws; undecodable content yields a `malformed_document` failure. */
export function parsePost(input: ParseInput): ParseResult {
  const raw = decodeUtf8(input.raw);
  if (raw === null) {
    return {
      ok: false,
      error: { kind: 'malformed_document', file: input.path, message: 'Content is not valid UTF-8 text' },
    };
  }

  const warnings: string[] = [];
  const { metadata: inline, body: afterFrontMatter } = splitFrontMatter(raw);

  let sibling: MetadataResult = { kind: 'absent' };
  if (input.meta !== null) {
    const metaText = decodeUtf8(input.meta);
    sibling = metaText === null
      ? { kind: 'invalid', message: 'Metadata file is not valid UTF-8 text' }
      : parseMetadataFile(metaText);
  }

  // Sibling file wins over the inline block
  const data = collectMetadata(input.fileName, [['inline', inline], ['file', sibling]], warnings);

  const heading = HEADING_RE.exec(afterFrontMatter);
  const body = heading ? afterFrontMatter.slice(heading[0].length) : afterFrontMatter;
  const title = toText(data.title) ?? heading?.[1] ?? humanizeFileName(input.fileName);

  const created_at = toIso(data.created_at) ?? toIso(input.commit?.created_at) ?? input.now;
  const updated_at = toIso(data.updated_at) ?? toIso(input.commit?.updated_at) ?? created_at;

  const meta: PostMeta = {
    title,
    category: toText(data.category),
    tags: Object.freeze(toTags(data.tags)),
    published: typeof data.published === 'boolean' ? data.published : true,
    pinned: typeof data.pinned === 'boolean' ? data.pinned : false,
    author: toText(data.author) ?? input.commit?.author ?? '',
    created_at,
    updated_at,
    title_image_path: toText(data.title_image_path),
    year: created_at.slice(0, 4),
    month: created_at.slice(5, 7),
    language: input.language,
  };

  const post: Post = {
    name: postName(input.fileName),
    path: input.path,
    raw,
    html: renderMarkdown(body),
    meta: Object.freeze(meta),
  };

  return { ok: true, post: Object.freeze(post), warnings };
}
