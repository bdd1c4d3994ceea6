import { describe, it, expect } from 'vitest';
import { buildPosts, metaPathFor, relativeToFolder, type BuildOptions } from '../content/build.js';
import { MemorySource } from '../source/memory.js';

const NOW = '2024-05-01T00:00:00.000Z';

function optionsFor(source: MemorySource, folder = 'posts'): BuildOptions {
  return {
    language: 'en',
    folder,
    fetch: (path) => source.readFile(path),
    commitInfo: (path) => source.commitInfo(path),
    now: () => NOW,
  };
}

describe('collection building', () => {
  it('should map paths relative to the language folder', () => {
    expect(relativeToFolder('posts', 'posts/nested/a.md')).toBe('nested/a.md');
    expect(relativeToFolder('', 'a.md')).toBe('a.md');
    expect(metaPathFor('posts', 'nested/a.md')).toBe('posts/meta/nested/a.yml');
    expect(metaPathFor('', 'a.md')).toBe('meta/a.yml');
  });

  it('should build posts keyed by name and join sibling metadata', async () => {
    const source = new MemorySource({
      'posts/a.md': '# Alpha\nText',
      'posts/nested/b.md': 'Beta',
      'posts/meta/a.yml': 'category: tech\n',
    });

    const result = await buildPosts(['posts/a.md', 'posts/nested/b.md'], optionsFor(source));

    expect([...result.posts.keys()]).toEqual(['a', 'nested/b']);
    expect(result.posts.get('a')?.meta.title).toBe('Alpha');
    expect(result.posts.get('a')?.meta.category).toBe('tech');
    expect(result.posts.get('nested/b')?.meta.title).toBe('B');
    expect(result.failures).toEqual([]);
  });

  it('should ignore files that are not posts', async () => {
    const source = new MemorySource({ 'posts/notes.txt': 'x', 'posts/a.md': 'A' });

    const result = await buildPosts(['posts/notes.txt', 'posts/a.md'], optionsFor(source));

    expect([...result.posts.keys()]).toEqual(['a']);
    expect(source.calls.readFile).toBe(2);
  });

  it('should leave out failed files without blocking the rest', async () => {
    const source = new MemorySource({
      'posts/a.md': 'A',
      'posts/bad.md': new Uint8Array([0xff]),
    });

    const result = await buildPosts(['posts/a.md', 'posts/bad.md', 'posts/gone.md'], optionsFor(source));

    expect([...result.posts.keys()]).toEqual(['a']);
    expect(result.failures.map((failure) => [failure.kind, failure.file])).toEqual([
      ['malformed_document', 'posts/bad.md'],
      ['not_found', 'posts/gone.md'],
    ]);
  });

  it('should take dates from commit info', async () => {
    const source = new MemorySource({
      'a.md': {
        content: 'A',
        commit: { created_at: '2023-01-01T00:00:00Z', updated_at: '2023-06-01T00:00:00Z', author: 'Ada' },
      },
    });

    const result = await buildPosts(['a.md'], optionsFor(source, ''));
    const post = result.posts.get('a');

    expect(post?.meta.created_at).toBe('2023-01-01T00:00:00.000Z');
    expect(post?.meta.updated_at).toBe('2023-06-01T00:00:00.000Z');
    expect(post?.meta.author).toBe('Ada');
  });
});
