import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildHierarchy, isHierarchyKind, UNKNOWN_LABEL } from '../hierarchy.js';
import type { TagTreeNode } from '../types.js';
import { makeTempDir, removeDir, touch, fakeExtractor, category, track } from './helpers.js';

function labels(forest: TagTreeNode[]): string[] {
  return forest.map((node) => node.label);
}

function siblingsSorted(forest: TagTreeNode[]): boolean {
  const own = labels(forest);
  const sorted = [...own].sort();
  return own.every((label, i) => label === sorted[i]) && forest.every((node) => siblingsSorted(node.children));
}

describe('buildHierarchy', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('hierarchy');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('groups tagged and untagged files by genre', async () => {
    const x = await touch(root, 'x.mp3');
    const y = await touch(root, 'y.mp3');
    const extractor = fakeExtractor({
      [x]: { genre: 'Rock', creator: 'Alice', album: 'Hits', title: 'Song1' },
    });

    const forest = await buildHierarchy([root], ['mp3'], 'genre', { extractor });

    expect(forest).toEqual([
      category('Rock', [category('Alice', [category('Hits', [track('Song1', x)])])]),
      category('Unknown', [category('Unknown', [category('Unknown', [track('y.mp3', y)])])]),
    ]);
  });

  it('groups by creator without a genre level', async () => {
    const a = await touch(root, 'a.flac');
    const b = await touch(root, 'b.flac');
    const extractor = fakeExtractor({
      [a]: { genre: 'Jazz', creator: 'Zed', album: 'Blue', title: 'Night' },
      [b]: { genre: 'Pop', creator: 'Zed', album: 'Blue', title: 'Day' },
    });

    const forest = await buildHierarchy([root], ['flac'], 'creator', { extractor });

    expect(forest).toEqual([category('Zed', [category('Blue', [track('Day', b), track('Night', a)])])]);
  });

  it('falls back to placeholders for missing tags', async () => {
    const file = await touch(root, 'untitled.ogg');
    const extractor = fakeExtractor({ [file]: { album: 'Only Album' } });

    const [genre] = await buildHierarchy([root], ['ogg'], 'genre', { extractor });

    expect(genre.label).toBe(UNKNOWN_LABEL);
    expect(genre.children[0].label).toBe(UNKNOWN_LABEL);
    expect(genre.children[0].children[0].label).toBe('Only Album');
    expect(genre.children[0].children[0].children).toEqual([track('untitled.ogg', file)]);
  });

  it('treats a failing extractor as untagged and keeps going', async () => {
    const bad = await touch(root, 'bad.mp3');
    const good = await touch(root, 'good.mp3');
    const extractor = async (path: string) => {
      if (path === bad) {
        throw new Error('unreadable');
      }

      return { genre: 'Rock', creator: 'Band', album: 'LP', title: 'Good' };
    };

    const forest = await buildHierarchy([root], ['mp3'], 'genre', { extractor });

    expect(labels(forest)).toEqual(['Rock', 'Unknown']);
    expect(forest[1].children[0].children[0].children).toEqual([track('bad.mp3', bad)]);
    expect(forest[0].children[0].children[0].children).toEqual([track('Good', good)]);
  });

  it('keeps one track node per file when titles repeat', async () => {
    const first = await touch(root, 'disc1/intro.mp3');
    const second = await touch(root, 'disc2/intro.mp3');
    const tags = { genre: 'Rock', creator: 'Band', album: 'Live', title: 'Intro' };
    const extractor = fakeExtractor({ [first]: tags, [second]: tags });

    const forest = await buildHierarchy([root], ['mp3'], 'genre', { extractor });
    const album = forest[0].children[0].children[0];

    expect(album.children).toEqual([track('Intro', first), track('Intro', second)]);
  });

  it('sorts siblings at every level by label', async () => {
    const tags: Record<string, { genre: string; creator: string; album: string; title: string }> = {};
    const entries: Array<[string, string, string, string]> = [
      ['Pop', 'Zoe', 'B-Sides', 'c'],
      ['Pop', 'Zoe', 'B-Sides', 'a'],
      ['Pop', 'mia', 'Debut', 'x'],
      ['Pop', 'Mia', 'Debut', 'y'],
      ['Electronic', 'Moby', 'Play', 'Porcelain'],
      ['Ambient', 'Eno', 'Airports', '1/1'],
    ];

    for (const [i, [genre, creator, album, title]] of entries.entries()) {
      const path = await touch(root, `f${i}.mp3`);
      tags[path] = { genre, creator, album, title };
    }

    const forest = await buildHierarchy([root], ['mp3'], 'genre', { extractor: fakeExtractor(tags) });

    expect(labels(forest)).toEqual(['Ambient', 'Electronic', 'Pop']);
    expect(labels(forest[2].children)).toEqual(['Mia', 'Zoe', 'mia']);
    expect(labels(forest[2].children[1].children[0].children)).toEqual(['a', 'c']);
    expect(siblingsSorted(forest)).toBe(true);
  });

  it('produces identical forests on repeated builds', async () => {
    const tags: Record<string, { genre: string; creator: string }> = {};

    for (const name of ['m.mp3', 'k.mp3', 'sub/z.mp3', 'sub/a.mp3', 'other/q.mp3']) {
      const path = await touch(root, name);
      tags[path] = { genre: name.includes('sub') ? 'Folk' : 'Blues', creator: name[0] };
    }

    const first = await buildHierarchy([root], ['mp3'], 'genre', { extractor: fakeExtractor(tags) });
    const second = await buildHierarchy([root], ['mp3'], 'genre', { extractor: fakeExtractor(tags) });

    expect(second).toEqual(first);
  });

  it('calls the extractor once per matching file and reports progress', async () => {
    await touch(root, 'a.mp3');
    await touch(root, 'nested/b.mp3');
    await touch(root, 'notes.txt');
    const extractor = fakeExtractor({});
    const discovered: number[] = [];
    const progress: Array<[number, number]> = [];

    await buildHierarchy([root], ['mp3'], 'creator', {
      extractor,
      onFileDiscovered: (count) => discovered.push(count),
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(extractor.calls).toEqual([join(root, 'a.mp3'), join(root, 'nested', 'b.mp3')]);
    expect(discovered).toEqual([1, 2]);
    expect(progress).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('returns an empty forest when nothing matches', async () => {
    await touch(root, 'readme.md');

    expect(await buildHierarchy([root, join(root, 'missing')], ['mp3'], 'genre')).toEqual([]);
  });
});

describe('isHierarchyKind', () => {
  it('accepts only known kinds', () => {
    expect(isHierarchyKind('genre')).toBe(true);
    expect(isHierarchyKind('creator')).toBe(true);
    expect(isHierarchyKind('album')).toBe(false);
    expect(isHierarchyKind(undefined)).toBe(false);
  });
});
