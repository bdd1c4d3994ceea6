/**
 * Configuration: a JSON file validated with zod, overridable from the CLI.
 *
 * The first language is the default one: its posts live directly in the
 * content folder, every other language in `<contentFolder>/<language>/`.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { posix, resolve } from 'node:path';

export const SOURCE_KINDS = ['git', 'memory'] as const;

export type SourceKind = (typeof SOURCE_KINDS)[number];

export interface PostsyncConfig {
  source: SourceKind;
  /** Git URL or local path of the repository holding the posts. */
  sourceLocation: string;
  /** Local working copy the repository is cloned into. */
  checkoutDir: string;
  /** Upstream branch to follow; null follows the checkout's tracking branch. */
  branch: string | null;
  contentFolder: string;
  languages: string[];
  pollingEnabled: boolean;
  pollIntervalSeconds: number;
  sourceTimeoutSeconds: number;
  /** Stop polling after this many unreachable checks in a row (0 = never). */
  maxConsecutiveFailures: number;
}

/** Largest delay, in seconds, that a Node.js timer accepts. */
const MAX_TIMER_SECONDS = 2_147_483;
const LANGUAGE_RE = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{2,8})*$/;

const ConfigSchema = z
  .object({
    source: z.enum(SOURCE_KINDS).default('git'),
    sourceLocation: z.string().default(''),
    checkoutDir: z.string().optional(),
    branch: z.string().min(1).nullable().default(null),
    contentFolder: z.string().default('posts'),
    languages: z
      .array(z.string().regex(LANGUAGE_RE, 'must be a language tag such as "en" or "pt-BR"'))
      .min(1)
      .default(['en']),
    pollingEnabled: z.boolean().default(true),
    pollIntervalSeconds: z.number().positive().max(MAX_TIMER_SECONDS).default(60),
    sourceTimeoutSeconds: z.number().positive().max(MAX_TIMER_SECONDS).default(30),
    maxConsecutiveFailures: z.number().int().min(0).default(0),
  })
  .superRefine((value, ctx) => {
    if (value.source === 'git' && value.sourceLocation.trim() === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sourceLocation'],
        message: 'sourceLocation is required for the git source',
      });
    }
    if (new Set(value.languages).size !== value.languages.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['languages'], message: 'languages must be unique' });
    }
  });

/**
 * Default checkout directory: the last segment of the source location with
 * any `.git` suffix trimmed ("git@host:me/blog.git" → "blog").
 */
export function defaultCheckoutDir(sourceLocation: string): string {
  const trimmed = sourceLocation.trim().replace(/\/+$/, '');
  const last = trimmed.split(/[/:]/).pop() ?? '';
  const name = last.replace(/\.git$/, '');
  return name.length > 0 ? name : 'posts-checkout';
}

function normalizeFolder(folder: string): string {
  const normalized = posix.normalize(folder.trim().replace(/\\/g, '/')).replace(/^\.?\/+|\/+$/g, '');
  return normalized === '.' ? '' : normalized;
}

/** Validate raw configuration data and fill in defaults. Throws with every issue listed. */
export function parseConfig(data: unknown): PostsyncConfig {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config: ${issues}`);
  }

  const value = result.data;
  return {
    source: value.source,
    sourceLocation: value.sourceLocation,
    checkoutDir: resolve(value.checkoutDir ?? defaultCheckoutDir(value.sourceLocation)),
    branch: value.branch,
    contentFolder: normalizeFolder(value.contentFolder),
    languages: value.languages,
    pollingEnabled: value.pollingEnabled,
    pollIntervalSeconds: value.pollIntervalSeconds,
    sourceTimeoutSeconds: value.sourceTimeoutSeconds,
    maxConsecutiveFailures: value.maxConsecutiveFailures,
  };
}

/** Drop unset keys so they do not blank out values from the file. */
function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Resolve the configuration: the JSON file at `path` (when given) with
 * `overrides` (typically CLI flags) applied on top.
 */
export function loadConfig(path: string | undefined, overrides: Record<string, unknown> = {}): PostsyncConfig {
  if (path === undefined) return parseConfig(definedOnly(overrides));

  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Invalid config: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error('Invalid config: expected a JSON object');
  }

  return parseConfig({ ...data, ...definedOnly(overrides) });
}
