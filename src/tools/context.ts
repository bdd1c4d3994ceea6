import type { IndexStore } from '../index/store.js';
import type { SyncStatus } from '../sync/synchronizer.js';
import type { Post } from '../types.js';

/** What the tools need from the running process. */
export interface ToolContext {
  store: IndexStore;
  /** Configured languages; the first is the default. */
  languages: readonly string[];
  syncStatus: () => SyncStatus;
}

export const SUMMARY_LENGTH = 300;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }] };
}

export function errorResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }], isError: true };
}

/**
 * Resolve the language argument of a tool call.
 * Returns an error result for languages that are not configured.
 */
export function resolveLanguage(context: ToolContext, language: string | undefined): string | ToolResult {
  const resolved = language ?? context.languages[0];
  if (!context.languages.includes(resolved)) {
    return errorResult(`Unknown language: ${resolved}. Configured languages: ${context.languages.join(', ')}`);
  }
  return resolved;
}

/** Plain-text summary of a post body, cut at a word boundary. */
export function summarize(post: Post): string {
  const text = post.html.replace(/<[^>]+>/g, ' ').replace(/\s+/g, ' ').trim();
  if (text.length <= SUMMARY_LENGTH) return text;
  const truncated = text.slice(0, SUMMARY_LENGTH);
  const lastSpace = truncated.lastIndexOf(' ');
  const cutPoint = lastSpace > SUMMARY_LENGTH * 0.5 ? lastSpace : SUMMARY_LENGTH;
  return text.slice(0, cutPoint) + '…';
}

export function postSummary(post: Post): Record<string, unknown> {
  return {
    name: post.name,
    title: post.meta.title,
    category: post.meta.category,
    tags: post.meta.tags,
    author: post.meta.author,
    published: post.meta.published,
    pinned: post.meta.pinned,
    created_at: post.meta.created_at,
    updated_at: post.meta.updated_at,
    summary: summarize(post),
  };
}
