import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { errorResult, textResult, type ToolContext } from './context.js';

export function registerStatusTool(server: McpServer, context: ToolContext): void {
  server.registerTool(
    'index_status',
    {
      description:
        'Show the state of the post index: the published snapshot version, the source commit it reflects, ' +
        'post counts per language, and the synchronizer state (polling, last check, consecutive failures). ' +
        'Use it to tell whether recent repository changes are already visible.',
      inputSchema: {},
    },
    async () => {
      try {
        const snapshot = context.store.current();
        const languages: Record<string, { posts: number; published: number }> = {};
        for (const [language, partition] of snapshot.partitions) {
          languages[language] = {
            posts: partition.posts.size,
            published: partition.aggregates.byDate.filter((post) => post.meta.published).length,
          };
        }

        return textResult(
          JSON.stringify({
            snapshot: {
              version: snapshot.version,
              marker: snapshot.marker,
              created_at: snapshot.created_at,
            },
            languages,
            sync: context.syncStatus(),
          }),
        );
      } catch (error) {
        return errorResult(`Error reading index status: ${error instanceof Error ? error.message : String(error)}`);
      }
    },
  );
}
