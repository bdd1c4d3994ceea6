/**
 * Index store: owns the published snapshot.
 *
 * A single writer (the synchronizer) builds each snapshot off to the side and
 * hands it to `publish`, which swaps one reference. Readers call `current()`
 * and keep using the snapshot they got for the whole query; snapshots are
 * never mutated after publish.
 */

import type { Partition, Snapshot } from '../types.js';
import { emptyPartition } from './partition.js';

export type PublishListener = (snapshot: Snapshot, previous: Snapshot) => void;

export function createSnapshot(
  version: number,
  marker: string | null,
  partitions: ReadonlyMap<string, Partition>,
  now = new Date().toISOString(),
): Snapshot {
  return Object.freeze({ version, created_at: now, marker, partitions });
}

/** Version-0 snapshot with an empty partition per language, served until the first build. */
export function emptySnapshot(languages: readonly string[]): Snapshot {
  return createSnapshot(0, null, new Map(languages.map((language) => [language, emptyPartition(language)])));
}

export class IndexStore {
  private snapshot: Snapshot;
  private readonly listeners = new Set<PublishListener>();

  constructor(initial: Snapshot) {
    this.snapshot = initial;
  }

  current(): Snapshot {
    return this.snapshot;
  }

  publish(next: Snapshot): void {
    if (next.version <= this.snapshot.version) {
      throw new Error(
        `Snapshot version must increase: current v${this.snapshot.version}, got v${next.version}`,
      );
    }

    const previous = this.snapshot;
    this.snapshot = next;

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        console.error(`Publish listener error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /** Register a listener called after every publish. Returns an unsubscribe function. */
  subscribe(listener: PublishListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
