/**
 * Repository synchronizer, the single writer of the index.
 *
 * Each cycle walks an explicit state machine:
 *
 *   idle → checking → idle                               (no changes / unreachable)
 *   idle → checking → rebuilding → publishing → idle     (changes)
 *
 * Only the posts named in the diff are re-read and re-parsed; untouched
 * posts and unaffected languages are carried into the next snapshot by
 * reference. The whole snapshot is built before a single `store.publish()`,
 * so readers never see a half-applied cycle. A cycle that fails is
 * discarded and the marker is not advanced, so the next tick retries it.
 *
 * Ticks are coalesced: a tick that fires while a cycle runs joins that
 * cycle instead of starting another one.
 */

import type { ParseFailure, Partition, Snapshot } from '../types.js';
import type { DiffResult, Source } from '../source/types.js';
import { buildPosts, relativeToFolder, type BuildResult } from '../content/build.js';
import { postName } from '../content/parse.js';
import { createPartition, mergePosts } from '../index/partition.js';
import { createSnapshot, type IndexStore } from '../index/store.js';
import { languageLayouts, postsOfLanguage, routeChanges, type LanguageLayout } from './languages.js';

export type SyncState = 'idle' | 'checking' | 'rebuilding' | 'publishing';

export interface SynchronizerOptions {
  source: Source;
  store: IndexStore;
  contentFolder: string;
  languages: readonly string[];
  pollingEnabled: boolean;
  pollIntervalMs: number;
  /** Limit for one `diffSince` call; exceeding it counts as unreachable. */
  sourceTimeoutMs: number;
  /** Stop polling after this many unreachable checks in a row (0 = never). */
  maxConsecutiveFailures: number;
  now?: () => string;
}

export type CycleOutcome =
  | { kind: 'published'; version: number; changed: number; removed: number; failures: number }
  | { kind: 'no_changes' }
  | { kind: 'unreachable'; reason: string }
  | { kind: 'failed'; error: string };

export interface SyncStatus {
  state: SyncState;
  polling: boolean;
  marker: string | null;
  last_checked_at: string | null;
  last_published_at: string | null;
  consecutive_failures: number;
  last_error: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Reject with a timeout error if `promise` has not settled after `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export class Synchronizer {
  private readonly layouts: LanguageLayout[];
  private readonly now: () => string;
  private state: SyncState = 'idle';
  private marker: string | null = null;
  private running: Promise<CycleOutcome> | null = null;
  /** A `diffSince` call that outlived its timeout and is still running. */
  private pendingCheck: Promise<DiffResult> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastCheckedAt: string | null = null;
  private lastPublishedAt: string | null = null;
  private consecutiveFailures = 0;
  private lastError: string | null = null;

  constructor(private readonly options: SynchronizerOptions) {
    this.layouts = languageLayouts(options.contentFolder, options.languages);
    this.now = options.now ?? (() => new Date().toISOString());
  }

  /**
   * Prepare the source, build every language from scratch and publish the
   * first snapshot, then start polling (when enabled). Errors here are fatal.
   */
  async start(): Promise<Snapshot> {
    this.marker = await this.options.source.init();
    const snapshot = await this.fullBuild(this.marker);

    if (this.options.pollingEnabled) {
      this.timer = setInterval(() => {
        this.tick().catch((error: unknown) => {
          console.error(`Sync tick error: ${errorMessage(error)}`);
        });
      }, this.options.pollIntervalMs);
      console.error(`Polling for changes every ${this.options.pollIntervalMs / 1000}s`);
    } else {
      console.error('Polling disabled: index built once');
    }

    return snapshot;
  }

  /** Stop polling and wait for a running cycle to finish. */
  async stop(): Promise<void> {
    this.clearTimer();
    if (this.running) await this.running;
  }

  /** Run one cycle now, or join the cycle that is already running. Never rejects. */
  tick(): Promise<CycleOutcome> {
    if (this.running) return this.running;

    this.running = this.runCycle().finally(() => {
      this.running = null;
      this.state = 'idle';
    });
    return this.running;
  }

  status(): SyncStatus {
    return {
      state: this.state,
      polling: this.timer !== null,
      marker: this.marker,
      last_checked_at: this.lastCheckedAt,
      last_published_at: this.lastPublishedAt,
      consecutive_failures: this.consecutiveFailures,
      last_error: this.lastError,
    };
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async fullBuild(marker: string): Promise<Snapshot> {
    const previous = this.options.store.current();
    const partitions = new Map<string, Partition>();

    for (const layout of this.layouts) {
      const files = await this.options.source.listFiles(layout.folder);
      const built = await this.build(postsOfLanguage(files, layout, this.layouts), layout);
      partitions.set(layout.language, createPartition(layout.language, built.posts));
      console.error(`Indexed ${built.posts.size} post(s) for ${layout.language}`);
    }

    const snapshot = createSnapshot(previous.version + 1, marker, partitions, this.now());
    this.options.store.publish(snapshot);
    this.lastPublishedAt = snapshot.created_at;
    return snapshot;
  }

  private async build(paths: readonly string[], layout: LanguageLayout): Promise<BuildResult> {
    const { source } = this.options;
    const result = await buildPosts(paths, {
      language: layout.language,
      folder: layout.folder,
      fetch: (path) => source.readFile(path),
      commitInfo: (path) => source.commitInfo(path),
      now: this.now,
    });

    for (const warning of result.warnings) console.error(`Warning: ${warning}`);
    for (const failure of result.failures) logFailure(failure);
    return result;
  }

  private async check(marker: string): Promise<DiffResult> {
    // A timed-out check keeps running; never start a second one beside it
    if (this.pendingCheck) {
      return { kind: 'unreachable', reason: 'Previous source check is still running' };
    }

    const pending = this.options.source.diffSince(marker).finally(() => {
      this.pendingCheck = null;
    });
    this.pendingCheck = pending;

    try {
      return await withTimeout(pending, this.options.sourceTimeoutMs, 'Source check');
    } catch (error) {
      return { kind: 'unreachable', reason: errorMessage(error) };
    }
  }

  private async runCycle(): Promise<CycleOutcome> {
    const marker = this.marker;
    if (marker === null) {
      return { kind: 'failed', error: 'Synchronizer has not been started' };
    }

    this.state = 'checking';
    const diff = await this.check(marker);
    this.lastCheckedAt = this.now();

    if (diff.kind === 'unreachable') {
      this.consecutiveFailures++;
      this.lastError = diff.reason;
      console.error(`Warning: source unreachable, keeping snapshot v${this.options.store.current().version}: ${diff.reason}`);

      const limit = this.options.maxConsecutiveFailures;
      if (limit > 0 && this.consecutiveFailures >= limit && this.timer !== null) {
        this.clearTimer();
        console.error(`Source unreachable ${this.consecutiveFailures} times in a row, polling stopped`);
      }
      return { kind: 'unreachable', reason: diff.reason };
    }

    this.consecutiveFailures = 0;

    if (diff.kind === 'none') {
      this.marker = diff.marker;
      return { kind: 'no_changes' };
    }

    try {
      const outcome = await this.apply(diff.changed, diff.removed, diff.marker);
      this.marker = diff.marker;
      this.lastError = null;
      return outcome;
    } catch (error) {
      this.lastError = errorMessage(error);
      console.error(`Sync cycle failed, keeping snapshot v${this.options.store.current().version}: ${this.lastError}`);
      return { kind: 'failed', error: this.lastError };
    }
  }

  private async apply(changedPaths: string[], removedPaths: string[], marker: string): Promise<CycleOutcome> {
    this.state = 'rebuilding';

    const previous = this.options.store.current();
    const routed = routeChanges(changedPaths, removedPaths, this.layouts);
    // Only files outside the language folders changed
    if (routed.size === 0) return { kind: 'no_changes' };
    const rebuilt = new Map<string, Partition>();
    let changedCount = 0;
    let removedCount = 0;
    let failureCount = 0;

    for (const layout of this.layouts) {
      const changes = routed.get(layout.language);
      if (!changes) continue;

      const nameOf = (path: string): string => postName(relativeToFolder(layout.folder, path));
      const paths = [...changes.changed].filter((path) => !changes.removed.has(nameOf(path)));
      const built = await this.build(paths, layout);

      const posts = mergePosts(
        previous.partitions.get(layout.language)?.posts ?? new Map(),
        new Set(paths.map(nameOf)),
        changes.removed,
        built.posts,
      );
      rebuilt.set(layout.language, createPartition(layout.language, posts));

      changedCount += built.posts.size;
      removedCount += changes.removed.size;
      failureCount += built.failures.length;
      console.error(`Sync: ${built.posts.size} rebuilt, ${changes.removed.size} removed (${layout.language})`);
    }

    this.state = 'publishing';

    // Unaffected languages keep their partition objects
    const partitions = new Map(previous.partitions);
    for (const [language, partition] of rebuilt) partitions.set(language, partition);

    const snapshot = createSnapshot(previous.version + 1, marker, partitions, this.now());
    this.options.store.publish(snapshot);
    this.lastPublishedAt = snapshot.created_at;
    console.error(`Published snapshot v${snapshot.version} at ${marker}`);

    return { kind: 'published', version: snapshot.version, changed: changedCount, removed: removedCount, failures: failureCount };
  }
}

function logFailure(failure: ParseFailure): void {
  console.error(`Warning: skipping ${failure.file} (${failure.kind}): ${failure.message}`);
}
