/**
 * Structured metadata for posts.
 *
 * Metadata comes either from an inline YAML front-matter block at the top of
 * the post or from a sibling `meta/<name>.yml` file. Both are parsed with
 * gray-matter. Invalid YAML is reported as `invalid` and the caller treats
 * it as absent; it never aborts the post.
 */

import matter from 'gray-matter';

export type MetadataResult =
  | { kind: 'ok'; data: Record<string, unknown> }
  | { kind: 'absent' }
  | { kind: 'invalid'; message: string };

export interface FrontMatterSplit {
  metadata: MetadataResult;
  /** Post body with the front-matter block removed. */
  body: string;
}

const FRONT_MATTER_RE = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function toResult(data: unknown): MetadataResult {
  if (data === null || data === undefined) return { kind: 'absent' };
  if (!isRecord(data)) {
    return { kind: 'invalid', message: 'Metadata must be a mapping of keys to values' };
  }
  if (Object.keys(data).length === 0) return { kind: 'absent' };
  return { kind: 'ok', data };
}

/**
 * Split a post into its inline front-matter metadata and body.
 * A post without a leading `---` block has `absent` metadata and an unchanged body.
 */
export function splitFrontMatter(text: string): FrontMatterSplit {
  if (!FRONT_MATTER_RE.test(text)) {
    return { metadata: { kind: 'absent' }, body: text };
  }

  try {
    // Passing options bypasses gray-matter's per-input cache, which would
    // hide a parse error on the second read of the same text
    const { data, content } = matter(text, {});
    return { metadata: toResult(data), body: content };
  } catch (error) {
    // Block is still stripped so the YAML never reaches the rendered body
    return {
      metadata: { kind: 'invalid', message: error instanceof Error ? error.message : String(error) },
      body: text.replace(FRONT_MATTER_RE, ''),
    };
  }
}

/** Parse the contents of a sibling `.yml` metadata file. */
export function parseMetadataFile(text: string): MetadataResult {
  if (text.trim().length === 0) return { kind: 'absent' };

  try {
    const { data } = matter(`---\n${text.replace(/\s+$/, '')}\n---\n`, {});
    return toResult(data);
  } catch (error) {
    return { kind: 'invalid', message: error instanceof Error ? error.message : String(error) };
  }
}
