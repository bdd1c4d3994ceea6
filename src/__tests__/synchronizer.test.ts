/**
 * Tests for the synchronizer: initial build, incremental cycles, failure
 * handling and tick coalescing. Driven by the in-memory source.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IndexStore, emptySnapshot } from '../index/store.js';
import { MemorySource, type MemoryFileInput } from '../source/memory.js';
import { Synchronizer, withTimeout, type SynchronizerOptions } from '../sync/synchronizer.js';
import { getPost, listPosts } from '../index/query.js';
import type { DiffResult } from '../source/types.js';
import type { CommitInfo, Snapshot } from '../types.js';
import { silenceLogs } from './helpers.js';

const NOW = '2024-06-01T00:00:00.000Z';

function committed(content: string, created_at: string): MemoryFileInput {
  return { content, commit: { created_at, updated_at: created_at, author: 'Ada' } };
}

const INITIAL_FILES: Record<string, MemoryFileInput> = {
  'posts/a.md': committed('# Alpha\nFirst post', '2024-01-01T00:00:00Z'),
  'posts/b.md': committed('# Beta\nSecond post', '2024-02-01T00:00:00Z'),
  'posts/my-post.md': 'No heading here',
  'posts/fr/bonjour.md': '# Bonjour\nSalut',
  'README.md': 'Not a post',
};

/** Source whose change checks never settle. */
class HangingSource extends MemorySource {
  diffSince(): Promise<DiffResult> {
    return new Promise(() => {});
  }
}

/** Source whose change checks take `delayMs` to settle. */
class SlowSource extends MemorySource {
  delayMs = 60;
  started = 0;
  inFlight = 0;
  maxInFlight = 0;

  async diffSince(marker: string): Promise<DiffResult> {
    this.started++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      return await super.diffSince(marker);
    } finally {
      this.inFlight--;
    }
  }
}

/** Source whose commit lookups can be made to fail. */
class FlakySource extends MemorySource {
  failCommitInfo = false;

  async commitInfo(path: string): Promise<CommitInfo | null> {
    if (this.failCommitInfo) throw new Error('log failed');
    return super.commitInfo(path);
  }
}

function setup(source: MemorySource, overrides: Partial<SynchronizerOptions> = {}) {
  const store = new IndexStore(emptySnapshot(['en', 'fr']));
  const synchronizer = new Synchronizer({
    source,
    store,
    contentFolder: 'posts',
    languages: ['en', 'fr'],
    pollingEnabled: false,
    pollIntervalMs: 60_000,
    sourceTimeoutMs: 1_000,
    maxConsecutiveFailures: 0,
    now: () => NOW,
    ...overrides,
  });
  return { store, synchronizer };
}

function postNames(snapshot: Snapshot, language: string): string[] {
  return snapshot.partitions.get(language)?.aggregates.byDate.map((post) => post.name) ?? [];
}

describe('synchronizer', () => {
  let logs: ReturnType<typeof silenceLogs>;
  let source: MemorySource;

  beforeEach(() => {
    logs = silenceLogs();
    source = new MemorySource(INITIAL_FILES);
  });

  afterEach(() => {
    logs.mockRestore();
  });

  describe('initial build', () => {
    it('should publish every language at the source marker', async () => {
      const { store, synchronizer } = setup(source);

      const snapshot = await synchronizer.start();

      expect(store.current()).toBe(snapshot);
      expect(snapshot.version).toBe(1);
      expect(snapshot.marker).toBe('mem-0');
      expect(postNames(snapshot, 'en')).toEqual(['my-post', 'b', 'a']);
      expect(postNames(snapshot, 'fr')).toEqual(['bonjour']);
    });

    it('should resolve titles and dates for each post', async () => {
      const { synchronizer } = setup(source);
      const snapshot = await synchronizer.start();
      const posts = snapshot.partitions.get('en')?.posts;

      expect(posts?.get('a')?.meta.title).toBe('Alpha');
      expect(posts?.get('a')?.meta.created_at).toBe('2024-01-01T00:00:00.000Z');
      expect(posts?.get('a')?.meta.author).toBe('Ada');
      expect(posts?.get('my-post')?.meta.title).toBe('My Post');
      expect(posts?.get('my-post')?.meta.created_at).toBe(NOW);
      expect(snapshot.partitions.get('fr')?.posts.get('bonjour')?.meta.language).toBe('fr');
    });

    it('should leave the synchronizer idle and not polling', async () => {
      const { synchronizer } = setup(source);
      await synchronizer.start();

      expect(synchronizer.status()).toEqual({
        state: 'idle',
        polling: false,
        marker: 'mem-0',
        last_checked_at: null,
        last_published_at: NOW,
        consecutive_failures: 0,
        last_error: null,
      });
    });
  });

  describe('end to end', () => {
    it('should serve published posts and rebuild only what changed', async () => {
      const blog = new MemorySource({
        'posts/a.md': committed('# Plain Heading\nA body', '2024-03-01T00:00:00Z'),
        'posts/b.md': committed('---\ntitle: Overridden Title\npublished: false\n---\nB body', '2024-02-15T00:00:00Z'),
        'posts/my-post.md': committed('No heading, just text', '2024-01-10T00:00:00Z'),
      });
      const { store, synchronizer } = setup(blog);
      await synchronizer.start();

      const first = store.current();
      expect(listPosts(first, 'en', { publishedOnly: true }).map((post) => post.name)).toEqual(['a', 'my-post']);
      expect(getPost(first, 'en', 'a')?.meta.title).toBe('Plain Heading');
      expect(getPost(first, 'en', 'my-post')?.meta.title).toBe('My Post');
      expect(getPost(first, 'en', 'b')?.meta).toMatchObject({ title: 'Overridden Title', published: false });

      blog.write(
        'posts/b.md',
        committed('---\ntitle: Overridden Again\npublished: false\n---\nB body, revised', '2024-02-15T00:00:00Z'),
      );
      const outcome = await synchronizer.tick();
      const second = store.current();

      expect(outcome).toEqual({ kind: 'published', version: 2, changed: 1, removed: 0, failures: 0 });
      expect(getPost(second, 'en', 'a')).toBe(getPost(first, 'en', 'a'));
      expect(getPost(second, 'en', 'my-post')).toBe(getPost(first, 'en', 'my-post'));
      expect(getPost(second, 'en', 'b')?.meta.title).toBe('Overridden Again');
      expect(getPost(second, 'en', 'b')?.html).toBe('<p>B body, revised</p>\n');
    });
  });

  describe('incremental cycles', () => {
    it('should report no changes without publishing', async () => {
      const { store, synchronizer } = setup(source);
      const initial = await synchronizer.start();

      expect(await synchronizer.tick()).toEqual({ kind: 'no_changes' });
      expect(store.current()).toBe(initial);
    });

    it('should rebuild only changed posts and carry the rest by reference', async () => {
      const { store, synchronizer } = setup(source);
      const before = await synchronizer.start();
      const readsBefore = source.calls.readFile;

      source.write('posts/b.md', committed('# Beta, revised\nSecond post', '2024-02-01T00:00:00Z'));
      const outcome = await synchronizer.tick();
      const after = store.current();

      expect(outcome).toEqual({ kind: 'published', version: 2, changed: 1, removed: 0, failures: 0 });
      // The post itself plus its metadata file
      expect(source.calls.readFile - readsBefore).toBe(2);

      const beforeEn = before.partitions.get('en')?.posts;
      const afterEn = after.partitions.get('en')?.posts;
      expect(afterEn?.get('a')).toBe(beforeEn?.get('a'));
      expect(afterEn?.get('my-post')).toBe(beforeEn?.get('my-post'));
      expect(afterEn?.get('b')?.meta.title).toBe('Beta, revised');
      expect(after.partitions.get('fr')).toBe(before.partitions.get('fr'));
      expect(after.marker).toBe('mem-1');
    });

    it('should drop removed posts', async () => {
      const { store, synchronizer } = setup(source);
      await synchronizer.start();

      source.remove('posts/a.md');
      const outcome = await synchronizer.tick();

      expect(outcome).toEqual({ kind: 'published', version: 2, changed: 0, removed: 1, failures: 0 });
      expect(postNames(store.current(), 'en')).toEqual(['my-post', 'b']);
    });

    it('should rebuild a post when its metadata file changes', async () => {
      const { store, synchronizer } = setup(source);
      await synchronizer.start();

      source.write('posts/meta/a.yml', 'category: tech\npublished: false\n');
      await synchronizer.tick();
      const post = store.current().partitions.get('en')?.posts.get('a');

      expect(post?.meta.category).toBe('tech');
      expect(post?.meta.published).toBe(false);
    });

    it('should route posts of other languages to their own partition', async () => {
      const { store, synchronizer } = setup(source);
      const before = await synchronizer.start();

      source.write('posts/fr/merci.md', 'Merci');
      await synchronizer.tick();

      expect(postNames(store.current(), 'fr').sort()).toEqual(['bonjour', 'merci']);
      expect(store.current().partitions.get('en')).toBe(before.partitions.get('en'));
    });

    it('should drop a changed post that no longer parses', async () => {
      const { store, synchronizer } = setup(source);
      await synchronizer.start();

      source.write('posts/a.md', new Uint8Array([0xff, 0xfe]));
      const outcome = await synchronizer.tick();

      expect(outcome).toEqual({ kind: 'published', version: 2, changed: 0, removed: 0, failures: 1 });
      expect(store.current().partitions.get('en')?.posts.has('a')).toBe(false);
    });

    it('should advance the marker without publishing for changes outside the content folder', async () => {
      const { store, synchronizer } = setup(source);
      const initial = await synchronizer.start();

      source.write('README.md', 'Updated readme');

      expect(await synchronizer.tick()).toEqual({ kind: 'no_changes' });
      expect(store.current()).toBe(initial);
      expect(synchronizer.status().marker).toBe('mem-1');
    });
  });

  describe('failures', () => {
    it('should keep the snapshot while the source is unreachable', async () => {
      const { store, synchronizer } = setup(source);
      const initial = await synchronizer.start();

      source.setUnreachable(true);
      source.write('posts/c.md', 'Gamma');

      expect(await synchronizer.tick()).toEqual({
        kind: 'unreachable',
        reason: 'memory source marked unreachable',
      });
      expect(store.current()).toBe(initial);
      expect(synchronizer.status().consecutive_failures).toBe(1);
      expect(synchronizer.status().last_error).toBe('memory source marked unreachable');

      source.setUnreachable(false);
      const outcome = await synchronizer.tick();

      expect(outcome.kind).toBe('published');
      expect(store.current().partitions.get('en')?.posts.has('c')).toBe(true);
      expect(synchronizer.status().consecutive_failures).toBe(0);
    });

    it('should leave the snapshot unchanged across repeated unreachable ticks', async () => {
      const { store, synchronizer } = setup(source);
      const initial = await synchronizer.start();
      source.setUnreachable(true);

      for (let i = 1; i <= 3; i++) {
        expect((await synchronizer.tick()).kind).toBe('unreachable');
        expect(store.current()).toBe(initial);
        expect(synchronizer.status().consecutive_failures).toBe(i);
      }
    });

    it('should treat a check that times out as unreachable', async () => {
      const { synchronizer } = setup(new HangingSource(INITIAL_FILES), { sourceTimeoutMs: 20 });
      await synchronizer.start();

      expect(await synchronizer.tick()).toEqual({
        kind: 'unreachable',
        reason: 'Source check timed out after 20ms',
      });
    });

    it('should not start a new check while a timed-out one is still running', async () => {
      const slow = new SlowSource(INITIAL_FILES);
      const { synchronizer } = setup(slow, { sourceTimeoutMs: 20 });
      await synchronizer.start();

      expect(await synchronizer.tick()).toEqual({ kind: 'unreachable', reason: 'Source check timed out after 20ms' });
      expect(await synchronizer.tick()).toEqual({
        kind: 'unreachable',
        reason: 'Previous source check is still running',
      });
      expect(slow.started).toBe(1);
      expect(slow.maxInFlight).toBe(1);

      await new Promise((resolve) => setTimeout(resolve, 100));
      slow.delayMs = 0;

      expect(await synchronizer.tick()).toEqual({ kind: 'no_changes' });
      expect(slow.started).toBe(2);
      expect(slow.maxInFlight).toBe(1);
    });

    it('should stop polling after the configured number of unreachable checks', async () => {
      const { synchronizer } = setup(source, { pollingEnabled: true, maxConsecutiveFailures: 2 });
      await synchronizer.start();
      expect(synchronizer.status().polling).toBe(true);

      source.setUnreachable(true);
      await synchronizer.tick();
      expect(synchronizer.status().polling).toBe(true);
      await synchronizer.tick();
      expect(synchronizer.status().polling).toBe(false);

      await synchronizer.stop();
    });

    it('should keep the marker when a cycle fails so the next one retries', async () => {
      const flaky = new FlakySource(INITIAL_FILES);
      const { store, synchronizer } = setup(flaky);
      await synchronizer.start();

      flaky.write('posts/c.md', 'Gamma');
      flaky.failCommitInfo = true;

      expect(await synchronizer.tick()).toEqual({ kind: 'failed', error: 'log failed' });
      expect(store.current().version).toBe(1);
      expect(synchronizer.status().marker).toBe('mem-0');
      expect(synchronizer.status().last_error).toBe('log failed');

      flaky.failCommitInfo = false;
      const outcome = await synchronizer.tick();

      expect(outcome.kind).toBe('published');
      expect(store.current().partitions.get('en')?.posts.has('c')).toBe(true);
      expect(synchronizer.status().marker).toBe('mem-1');
      expect(synchronizer.status().last_error).toBeNull();
    });

    it('should refuse to run a cycle before start', async () => {
      const { synchronizer } = setup(source);
      expect(await synchronizer.tick()).toEqual({ kind: 'failed', error: 'Synchronizer has not been started' });
    });
  });

  describe('tick coalescing', () => {
    it('should join a running cycle instead of starting another', async () => {
      const { synchronizer } = setup(source);
      await synchronizer.start();
      const checksBefore = source.calls.diffSince;

      source.write('posts/c.md', 'Gamma');
      const first = synchronizer.tick();
      const second = synchronizer.tick();

      expect(second).toBe(first);
      await first;
      expect(source.calls.diffSince - checksBefore).toBe(1);
    });
  });
});

describe('withTimeout', () => {
  it('should pass through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000, 'Work')).resolves.toBe(42);
  });

  it('should reject once the limit passes', async () => {
    await expect(withTimeout(new Promise(() => {}), 10, 'Work')).rejects.toThrow('Work timed out after 10ms');
  });
});
