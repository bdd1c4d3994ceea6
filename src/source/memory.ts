/**
 * In-memory source: files held in a Map, changes recorded as they are made.
 *
 * Selected with `source: "memory"` (an empty blog until something writes
 * to it) and used by the tests to drive the synchronizer without git.
 * Every write/remove bumps the revision; the marker is `mem-<revision>` and
 * `diffSince(marker)` reports the paths touched after that revision, so a
 * caller that does not advance its marker sees the same changes again.
 * `setUnreachable(true)` makes it report `unreachable`.
 */

import type { CommitInfo } from '../types.js';
import type { DiffResult, ReadResult, Source } from './types.js';

export interface MemoryFile {
  data: Uint8Array;
  commit: CommitInfo | null;
}

export type MemoryFileInput = string | Uint8Array | { content: string | Uint8Array; commit?: CommitInfo | null };

function toFile(input: MemoryFileInput): MemoryFile {
  if (typeof input === 'string') return { data: Buffer.from(input, 'utf-8'), commit: null };
  if (input instanceof Uint8Array) return { data: input, commit: null };
  const data = typeof input.content === 'string' ? Buffer.from(input.content, 'utf-8') : input.content;
  return { data, commit: input.commit ?? null };
}

export class MemorySource implements Source {
  readonly kind = 'memory';
  private readonly files = new Map<string, MemoryFile>();
  /** Last revision that touched each path, and whether it removed the file. */
  private readonly touched = new Map<string, { revision: number; removed: boolean }>();
  private revision = 0;
  private unreachable = false;

  /** Calls made to each operation, for tests. */
  readonly calls = { readFile: 0, diffSince: 0, commitInfo: 0, listFiles: 0 };

  constructor(initial: Record<string, MemoryFileInput> = {}) {
    for (const [path, input] of Object.entries(initial)) {
      this.files.set(path, toFile(input));
    }
  }

  /** Create or replace a file. */
  write(path: string, input: MemoryFileInput): void {
    this.files.set(path, toFile(input));
    this.touched.set(path, { revision: ++this.revision, removed: false });
  }

  remove(path: string): void {
    if (!this.files.delete(path)) return;
    this.touched.set(path, { revision: ++this.revision, removed: true });
  }

  setUnreachable(value: boolean): void {
    this.unreachable = value;
  }

  get marker(): string {
    return `mem-${this.revision}`;
  }

  async init(): Promise<string> {
    return this.marker;
  }

  async listFiles(folder: string): Promise<string[]> {
    this.calls.listFiles++;
    const prefix = folder === '' ? '' : folder + '/';
    return [...this.files.keys()].filter((path) => path.startsWith(prefix)).sort();
  }

  async readFile(path: string): Promise<ReadResult> {
    this.calls.readFile++;
    const file = this.files.get(path);
    return file ? { ok: true, data: file.data } : { ok: false, kind: 'not_found' };
  }

  async diffSince(marker: string): Promise<DiffResult> {
    this.calls.diffSince++;
    if (this.unreachable) {
      return { kind: 'unreachable', reason: 'memory source marked unreachable' };
    }

    const since = Number(/^mem-(\d+)$/.exec(marker)?.[1] ?? 0);
    const changed: string[] = [];
    const removed: string[] = [];
    for (const [path, change] of this.touched) {
      if (change.revision <= since) continue;
      (change.removed ? removed : changed).push(path);
    }

    if (changed.length === 0 && removed.length === 0) {
      return { kind: 'none', marker: this.marker };
    }
    return { kind: 'changed', changed: changed.sort(), removed: removed.sort(), marker: this.marker };
  }

  async commitInfo(path: string): Promise<CommitInfo | null> {
    this.calls.commitInfo++;
    return this.files.get(path)?.commit ?? null;
  }
}
