/**
 * Source of truth: where posts live.
 *
 * Two variants implement this interface and are selected by configuration:
 * `git` (a working copy of a remote repository) and `memory` (an in-process
 * file map). All paths are repository-relative and use forward slashes.
 */

import type { CommitInfo } from '../types.js';

export type ReadResult =
  | { ok: true; data: Uint8Array }
  | { ok: false; kind: 'not_found' };

export type DiffResult =
  | { kind: 'unreachable'; reason: string }
  | { kind: 'none'; marker: string }
  | { kind: 'changed'; changed: string[]; removed: string[]; marker: string };

export interface Source {
  readonly kind: 'git' | 'memory';

  /** Prepare the source (clone or pull) and return the current marker. */
  init(): Promise<string>;

  /** Recursively list files below `folder`. Missing folders list as []. */
  listFiles(folder: string): Promise<string[]>;

  readFile(path: string): Promise<ReadResult>;

  /** Bring the source up to date and report what changed since `marker`. */
  diffSince(marker: string): Promise<DiffResult>;

  /** First/last commit times and first author of a file, or null if it has no history. */
  commitInfo(path: string): Promise<CommitInfo | null>;
}
