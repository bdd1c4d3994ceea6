import type { PostsyncConfig } from '../config.js';
import type { Source } from './types.js';
import { GitSource } from './git-source.js';
import { MemorySource } from './memory.js';

/** Create the source variant named by the configuration. */
export function createSource(config: PostsyncConfig): Source {
  switch (config.source) {
    case 'git':
      return new GitSource({
        remote: config.sourceLocation,
        checkoutDir: config.checkoutDir,
        branch: config.branch,
        timeoutMs: config.sourceTimeoutSeconds * 1000,
      });
    case 'memory':
      return new MemorySource();
  }
}
