import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';
import { renderFileTree, renderTagForest, renderQueue } from '../render.js';
import { createQueue, shuffleQueue } from '../queue.js';
import type { FileSystemNode } from '../types.js';
import { category, track } from './helpers.js';

const colors = new Chalk({ level: 0 });

const tree: FileSystemNode = {
  name: 'music',
  path: '/music',
  kind: 'directory',
  expanded: true,
  children: [
    {
      name: 'live',
      path: '/music/live',
      kind: 'directory',
      expanded: false,
      children: [{ name: 'b.mp3', path: '/music/live/b.mp3', kind: 'file', children: [], expanded: false }],
    },
    { name: 'a.mp3', path: '/music/a.mp3', kind: 'file', children: [], expanded: false },
  ],
};

describe('renderFileTree', () => {
  it('shows the children of expanded directories only', () => {
    expect(renderFileTree(tree, { colors })).toEqual(['▾ music/', '  ▸ live/', '  • a.mp3']);
  });

  it('shows everything with all', () => {
    expect(renderFileTree(tree, { colors, all: true })).toEqual([
      '▾ music/',
      '  ▾ live/',
      '    • b.mp3',
      '  • a.mp3',
    ]);
  });
});

describe('renderTagForest', () => {
  const forest = [
    { ...category('Rock', [category('Alice', [track('One', '/m/1.mp3'), track('Two', '/m/2.mp3')])]), expanded: true },
    category('Pop', [category('Bob', [track('Three', '/m/3.mp3')])]),
  ];

  it('prints file counts beside categories', () => {
    expect(renderTagForest(forest, { colors })).toEqual(['▾ Rock (2)', '  ▸ Alice (2)', '▸ Pop (1)']);
  });

  it('prints tracks as leaves with all', () => {
    expect(renderTagForest(forest, { colors, all: true })).toEqual([
      '▾ Rock (2)',
      '  ▾ Alice (2)',
      '    ♪ One',
      '    ♪ Two',
      '▾ Pop (1)',
      '  ▾ Bob (1)',
      '    ♪ Three',
    ]);
  });

  it('prints nothing for an empty forest', () => {
    expect(renderTagForest([], { colors })).toEqual([]);
  });
});

describe('renderQueue', () => {
  it('lists tracks in display order with durations', () => {
    const queue = {
      ...createQueue(),
      entries: [
        { path: '/m/b/untagged.mp3' },
        { path: '/m/a/hello.mp3', creator: 'Ana', title: 'Hello', durationMs: 61_000 },
      ],
    };

    expect(renderQueue(queue, { colors })).toEqual([
      '2 tracks, by directory, asc',
      '1. Ana - Hello [1:01]',
      '   /m/a/hello.mp3',
      '2. untagged.mp3',
      '   /m/b/untagged.mp3',
    ]);
  });

  it('says when the order is shuffled', () => {
    const queue = createQueue();
    shuffleQueue(queue);

    expect(renderQueue(queue, { colors })).toEqual(['0 tracks, shuffled']);
  });
});
