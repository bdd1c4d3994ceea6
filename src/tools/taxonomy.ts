import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { listArchive, listCategories, listPinnedPosts, listTags } from '../index/query.js';
import { errorResult, postSummary, resolveLanguage, textResult, type ToolContext } from './context.js';

export function registerTaxonomyTool(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'list_taxonomy',
    {
      description:
        'Browse how published posts are organised. ' +
        '"categories" and "tags" return names with post counts (most used first), ' +
        '"archive" returns post counts per year and month (newest first), ' +
        '"pinned" returns the pinned posts.',
      inputSchema: {
        kind: z.enum(['categories', 'tags', 'archive', 'pinned']).describe('What to list'),
        language: z.string().optional().describe('Language partition (default: the first configured language)'),
      },
    },
    async ({ kind, language }) => {
      try {
        const resolved = resolveLanguage(context, language);
        if (typeof resolved !== 'string') return resolved;

        const snapshot = context.store.current();
        let results: unknown[];
        switch (kind) {
          case 'categories':
            results = listCategories(snapshot, resolved);
            break;
          case 'tags':
            results = listTags(snapshot, resolved);
            break;
          case 'archive':
            results = listArchive(snapshot, resolved);
            break;
          case 'pinned':
            results = listPinnedPosts(snapshot, resolved).map(postSummary);
            break;
        }

        return textResult(JSON.stringify({ kind, language: resolved, count: results.length, results }));
      } catch (error) {
        return errorResult(`Error listing ${kind}: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
  );
}
