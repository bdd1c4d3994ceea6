/**
 * Routing of repository paths to language partitions.
 *
 * The default (first) language owns the content folder itself; every other
 * language owns `<contentFolder>/<language>/`. A path belongs to the
 * language with the most specific folder containing it, so the default
 * language never picks up another language's posts.
 *
 * Sibling metadata (`<folder>/meta/<name>.yml`) is routed to its post: a
 * changed or removed meta file marks `<folder>/<name>.md` for rebuild.
 */

import { posix } from 'node:path';
import { META_EXTENSION, META_FOLDER, POST_EXTENSION } from '../types.js';
import { isPostFile, relativeToFolder } from '../content/build.js';
import { postName } from '../content/parse.js';

export interface LanguageLayout {
  language: string;
  /** Repository-relative folder, '' for the repository root. */
  folder: string;
}

export interface LanguageChanges {
  /** Repository paths of posts to re-read and re-parse. */
  changed: Set<string>;
  /** Names of posts whose files are gone. */
  removed: Set<string>;
}

/** Layouts for the configured languages, in configuration order. */
export function languageLayouts(contentFolder: string, languages: readonly string[]): LanguageLayout[] {
  return languages.map((language, index) => ({
    language,
    folder: index === 0 ? contentFolder : posix.join(contentFolder, language),
  }));
}

function isInside(folder: string, path: string): boolean {
  return folder === '' || path.startsWith(folder + '/');
}

/** The layout owning a path, or null when the path is outside every language folder. */
export function layoutOf(path: string, layouts: readonly LanguageLayout[]): LanguageLayout | null {
  let best: LanguageLayout | null = null;
  for (const layout of layouts) {
    if (!isInside(layout.folder, path)) continue;
    if (best === null || layout.folder.length > best.folder.length) best = layout;
  }
  return best;
}

function isMetaPath(relative: string): boolean {
  return relative.startsWith(META_FOLDER + '/');
}

/** Post files of one language among a recursive listing of its folder. */
export function postsOfLanguage(paths: readonly string[], layout: LanguageLayout, layouts: readonly LanguageLayout[]): string[] {
  return paths.filter(
    (path) =>
      isPostFile(path) &&
      layoutOf(path, layouts) === layout &&
      !isMetaPath(relativeToFolder(layout.folder, path)),
  );
}

/** Resolve a changed path to the post it affects, if any. */
function affectedPost(path: string, layout: LanguageLayout): { path: string; viaMeta: boolean } | null {
  const relative = relativeToFolder(layout.folder, path);

  if (isMetaPath(relative)) {
    if (!relative.endsWith(META_EXTENSION)) return null;
    const name = relative.slice(META_FOLDER.length + 1, -META_EXTENSION.length);
    return { path: posix.join(layout.folder, name + POST_EXTENSION), viaMeta: true };
  }

  return isPostFile(path) ? { path, viaMeta: false } : null;
}

/**
 * Group a diff by language. Only languages with at least one affected post
 * appear in the result.
 */
export function routeChanges(
  changed: readonly string[],
  removed: readonly string[],
  layouts: readonly LanguageLayout[],
): Map<string, LanguageChanges> {
  const routed = new Map<string, LanguageChanges>();

  const entryFor = (language: string): LanguageChanges => {
    let entry = routed.get(language);
    if (!entry) {
      entry = { changed: new Set(), removed: new Set() };
      routed.set(language, entry);
    }
    return entry;
  };

  for (const path of changed) {
    const layout = layoutOf(path, layouts);
    const post = layout ? affectedPost(path, layout) : null;
    if (layout && post) entryFor(layout.language).changed.add(post.path);
  }

  for (const path of removed) {
    const layout = layoutOf(path, layouts);
    const post = layout ? affectedPost(path, layout) : null;
    if (!layout || !post) continue;

    if (post.viaMeta) {
      // Metadata gone: the post itself stays and is re-parsed without it
      entryFor(layout.language).changed.add(post.path);
    } else {
      entryFor(layout.language).removed.add(postName(relativeToFolder(layout.folder, path)));
    }
  }

  return routed;
}
