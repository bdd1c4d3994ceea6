import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { listPosts, type ListOptions } from '../index/query.js';
import { errorResult, postSummary, resolveLanguage, textResult, type ToolContext } from './context.js';

export function registerListTool(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'list_posts',
    {
      description:
        'List blog posts newest first, optionally filtered by category, tag, month, author or a text query. ' +
        'Only published posts are listed unless include_unpublished is true. ' +
        'Results carry a short summary; use `get_post` to read a full post.',
      inputSchema: {
        language: z.string().optional().describe('Language partition (default: the first configured language)'),
        category: z.string().optional().describe('Only posts in this category'),
        tag: z.string().optional().describe('Only posts with this tag'),
        year_month: z
          .string()
          .regex(/^\d{4}-\d{2}$/, 'must be YYYY-MM')
          .optional()
          .describe('Only posts created in this month (YYYY-MM)'),
        author: z.string().optional().describe('Only posts by this author'),
        query: z.string().optional().describe('Case-insensitive text to find in the title or content'),
        include_unpublished: z.boolean().optional().describe('Include unpublished posts (default: false)'),
        limit: z.number().int().min(1).max(100).optional().describe('Max results (default: 20, max: 100)'),
        offset: z.number().int().min(0).optional().describe('Offset for pagination (default: 0)'),
      },
    },
    async ({ language, category, tag, year_month, author, query, include_unpublished, limit, offset }) => {
      try {
        const resolved = resolveLanguage(context, language);
        if (typeof resolved !== 'string') return resolved;

        const effectiveLimit = limit ?? 20;
        const effectiveOffset = offset ?? 0;
        const filter: ListOptions = {
          publishedOnly: !(include_unpublished ?? false),
          category,
          tag,
          yearMonth: year_month,
          author,
          query,
        };

        // One snapshot for both the total and the page
        const snapshot = context.store.current();
        const total = listPosts(snapshot, resolved, filter).length;
        const posts = listPosts(snapshot, resolved, { ...filter, limit: effectiveLimit, offset: effectiveOffset });

        if (posts.length === 0) {
          return textResult('No posts found matching the specified filters.');
        }

        return textResult(
          JSON.stringify({
            count: posts.length,
            total,
            offset: effectiveOffset,
            has_more: effectiveOffset + posts.length < total,
            filter: { language: resolved, category, tag, year_month, author, query },
            snapshot_version: snapshot.version,
            results: posts.map(postSummary),
          }),
        );
      } catch (error) {
        return errorResult(`Error listing posts: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
  );
}
