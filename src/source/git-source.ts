/**
 * Git-backed source: a local working copy of the posts repository.
 *
 * `init()` clones the repository, or reuses an existing checkout and tries to
 * bring it up to date; when the remote is not reachable at that moment the
 * local checkout is used as-is. `diffSince()` fetches, diffs the marker
 * against the upstream branch and fast-forwards the checkout.
 */

import { readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, posix, relative, resolve, sep } from 'node:path';
import type { CommitInfo } from '../types.js';
import type { DiffResult, ReadResult, Source } from './types.js';
import {
  gitClone,
  gitDiffNames,
  gitFastForward,
  gitFetch,
  gitFileCommitInfo,
  gitRevParse,
  gitUpstream,
  isGitRepo,
} from './git.js';

export interface GitSourceOptions {
  /** Git URL or local path to clone from. */
  remote: string;
  checkoutDir: string;
  branch: string | null;
  /** Limit for network-bound git calls (fetch, clone). */
  timeoutMs: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFileError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'EISDIR' || error.code === 'ENOTDIR';
}

export class GitSource implements Source {
  readonly kind = 'git';
  private readonly root: string;

  constructor(private readonly options: GitSourceOptions) {
    this.root = resolve(options.checkoutDir);
  }

  async init(): Promise<string> {
    if (await isGitRepo(this.root)) {
      console.error(`Using existing checkout at ${this.root}`);
      await this.pull();
    } else {
      console.error(`Cloning ${this.options.remote} into ${this.root}...`);
      await gitClone(this.options.remote, this.root, this.options.branch, { timeoutMs: this.options.timeoutMs });
    }
    return gitRevParse(this.root, 'HEAD');
  }

  /** Best-effort update of an existing checkout. */
  private async pull(): Promise<void> {
    try {
      await gitFetch(this.root, 'origin', { timeoutMs: this.options.timeoutMs });
      await gitFastForward(this.root, await gitUpstream(this.root, this.options.branch));
    } catch (error) {
      console.error(`Warning: could not update checkout, using local state: ${errorMessage(error)}`);
    }
  }

  /**
   * Resolve a repository-relative path inside the checkout.
   * Throws if the path escapes the checkout (path traversal attempt).
   */
  private absolute(path: string): string {
    const absolutePath = resolve(this.root, path);
    if (absolutePath !== this.root && !absolutePath.startsWith(this.root + sep)) {
      throw new Error(`Path traversal detected: "${path}" escapes checkout "${this.root}"`);
    }
    return absolutePath;
  }

  async listFiles(folder: string): Promise<string[]> {
    const dir = this.absolute(folder);
    if (!existsSync(dir)) return [];

    const files: string[] = [];
    const walk = async (current: string): Promise<void> => {
      for (const entry of await readdir(current, { withFileTypes: true })) {
        if (entry.name === '.git') continue;
        const full = join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          files.push(relative(this.root, full).split(sep).join(posix.sep));
        }
      }
    };
    await walk(dir);

    return files.sort();
  }

  async readFile(path: string): Promise<ReadResult> {
    try {
      return { ok: true, data: await readFile(this.absolute(path)) };
    } catch (error) {
      if (isMissingFileError(error)) return { ok: false, kind: 'not_found' };
      throw error;
    }
  }

  async diffSince(marker: string): Promise<DiffResult> {
    let target: string;
    try {
      await gitFetch(this.root, 'origin', { timeoutMs: this.options.timeoutMs });
      target = await gitRevParse(this.root, await gitUpstream(this.root, this.options.branch));
    } catch (error) {
      return { kind: 'unreachable', reason: errorMessage(error) };
    }

    if (target === marker) return { kind: 'none', marker };

    const { changed, removed } = await gitDiffNames(this.root, marker, target);

    const head = await gitRevParse(this.root, 'HEAD');
    if (head !== target) {
      await gitFastForward(this.root, target);
    }

    if (changed.length === 0 && removed.length === 0) {
      return { kind: 'none', marker: target };
    }
    return { kind: 'changed', changed, removed, marker: target };
  }

  commitInfo(path: string): Promise<CommitInfo | null> {
    return gitFileCommitInfo(this.root, path);
  }
}
