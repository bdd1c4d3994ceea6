import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getPost } from '../index/query.js';
import { errorResult, resolveLanguage, textResult, type ToolContext } from './context.js';

export function registerGetTool(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'get_post',
    {
      description:
        'Retrieve one blog post by name, including its rendered HTML. ' +
        'The name is the post file path inside the language folder without the .md extension ' +
        '(e.g. "my-post" or "guides/setup"). ' +
        'Unpublished posts are returned too, with published=false.',
      inputSchema: {
        name: z.string().min(1).describe('Post name (file path without .md)'),
        language: z.string().optional().describe('Language partition (default: the first configured language)'),
      },
    },
    async ({ name, language }) => {
      try {
        const resolved = resolveLanguage(context, language);
        if (typeof resolved !== 'string') return resolved;

        const snapshot = context.store.current();
        const post = getPost(snapshot, resolved, name);
        if (!post) {
          return errorResult(`Post not found: ${name} (${resolved})`);
        }

        return textResult(
          JSON.stringify({
            name: post.name,
            path: post.path,
            language: post.meta.language,
            title: post.meta.title,
            category: post.meta.category,
            tags: post.meta.tags,
            author: post.meta.author,
            published: post.meta.published,
            pinned: post.meta.pinned,
            created_at: post.meta.created_at,
            updated_at: post.meta.updated_at,
            title_image_path: post.meta.title_image_path,
            html: post.html,
            snapshot_version: snapshot.version,
          }),
        );
      } catch (error) {
        return errorResult(`Error retrieving post: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
  );
}
