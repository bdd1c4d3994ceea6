/**
 * Git operations for the posts checkout.
 *
 * Wrappers around git CLI commands. Everything is async: fetches are
 * network-bound and log queries run once per post during a rebuild.
 *
 * SECURITY: All commands use execFile (not exec) to avoid shell
 * interpretation of arguments. Remote URLs and file paths from the
 * repository are passed as plain arguments.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommitInfo } from '../types.js';

const execFileAsync = promisify(execFile);

export interface GitOptions {
  /** Kill the git process after this many milliseconds (0 = no limit). */
  timeoutMs?: number;
}

/** Run git in `cwd` and return trimmed stdout. Rejects on non-zero exit or timeout. */
export async function git(cwd: string, args: string[], options: GitOptions = {}): Promise<string> {
  const { stdout } = await execFileAsync('git', args, {
    cwd,
    encoding: 'utf-8',
    timeout: options.timeoutMs ?? 0,
    maxBuffer: 64 * 1024 * 1024,
  });
  return stdout.trim();
}

/** Check if a directory is the top of a git working copy. */
export async function isGitRepo(path: string): Promise<boolean> {
  if (!existsSync(join(path, '.git'))) return false;
  try {
    return (await git(path, ['rev-parse', '--is-inside-work-tree'])) === 'true';
  } catch {
    return false;
  }
}

/** Clone a repository into `path`, optionally checking out `branch`. */
export async function gitClone(remote: string, path: string, branch: string | null, options: GitOptions = {}): Promise<void> {
  const args = ['clone'];
  if (branch) args.push('--branch', branch);
  args.push('--', remote, path);
  await git(process.cwd(), args, options);
}

export async function gitFetch(path: string, remote = 'origin', options: GitOptions = {}): Promise<void> {
  await git(path, ['fetch', '--quiet', remote], options);
}

/** Resolve a revision (branch, ref, `HEAD`) to a commit hash. */
export async function gitRevParse(path: string, rev: string): Promise<string> {
  return git(path, ['rev-parse', '--verify', '--quiet', `${rev}^{commit}`]);
}

/**
 * The upstream ref to follow: `origin/<branch>` when a branch is configured,
 * otherwise the checkout's tracking branch.
 */
export async function gitUpstream(path: string, branch: string | null): Promise<string> {
  if (branch) return `origin/${branch}`;
  return git(path, ['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{upstream}']);
}

/** Fast-forward the current branch to `rev`. Rejects if the histories diverged. */
export async function gitFastForward(path: string, rev: string): Promise<void> {
  await git(path, ['merge', '--ff-only', '--quiet', rev]);
}

export interface NameStatus {
  changed: string[];
  removed: string[];
}

/**
 * Parse `git diff --name-status -z --no-renames` output.
 * Added, modified and type-changed files count as changed; deleted as removed.
 */
export function parseNameStatus(output: string): NameStatus {
  const result: NameStatus = { changed: [], removed: [] };
  const fields = output.split('\0').filter((field) => field.length > 0);

  for (let i = 0; i + 1 < fields.length; i += 2) {
    const status = fields[i].trim();
    const file = fields[i + 1];
    if (status.startsWith('D')) {
      result.removed.push(file);
    } else {
      result.changed.push(file);
    }
  }
  return result;
}

/** Files that differ between two commits. */
export async function gitDiffNames(path: string, from: string, to: string): Promise<NameStatus> {
  const { stdout } = await execFileAsync('git', ['diff', '--name-status', '-z', '--no-renames', from, to], {
    cwd: path,
    encoding: 'utf-8',
    maxBuffer: 64 * 1024 * 1024,
  });
  return parseNameStatus(stdout);
}

/**
 * Commit info for one file: author and date of the oldest commit touching it,
 * date of the newest. Returns null when the file has no history (new or
 * uncommitted) or on any error.
 */
export async function gitFileCommitInfo(repoPath: string, filePath: string): Promise<CommitInfo | null> {
  try {
    const output = await git(repoPath, ['log', '--format=%an%x09%aI', '--', filePath]);
    if (!output) return null;

    const lines = output.split('\n');
    const [, updated_at] = lines[0].split('\t');
    const [author, created_at] = lines[lines.length - 1].split('\t');
    if (!created_at || !updated_at) return null;

    return { author, created_at, updated_at };
  } catch {
    return null;
  }
}
