#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { USAGE, parseArgs } from './args.js';
import { loadConfig } from './config.js';
import { IndexStore, emptySnapshot } from './index/store.js';
import { createSource } from './source/index.js';
import { Synchronizer } from './sync/synchronizer.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.error(USAGE);
    process.exit(0);
  }

  const config = loadConfig(args.configPath, args.overrides);
  console.error(
    `Source: ${config.source}${config.source === 'git' ? ` (${config.sourceLocation} → ${config.checkoutDir})` : ''}, ` +
    `languages: ${config.languages.join(', ')}`,
  );

  const store = new IndexStore(emptySnapshot(config.languages));
  store.subscribe((snapshot, previous) => {
    console.error(`Index snapshot v${previous.version} → v${snapshot.version}`);
  });

  const synchronizer = new Synchronizer({
    source: createSource(config),
    store,
    contentFolder: config.contentFolder,
    languages: config.languages,
    pollingEnabled: config.pollingEnabled,
    pollIntervalMs: config.pollIntervalSeconds * 1000,
    sourceTimeoutMs: config.sourceTimeoutSeconds * 1000,
    maxConsecutiveFailures: config.maxConsecutiveFailures,
  });

  // Initial full build: the server only starts once there is something to serve
  await synchronizer.start();

  const server = createServer({
    store,
    languages: config.languages,
    syncStatus: () => synchronizer.status(),
  });

  // Clean shutdown
  const shutdown = async () => {
    await synchronizer.stop();
    await server.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown error:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('postsync server running on stdio');
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
