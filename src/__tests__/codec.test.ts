import { serialize } from 'node:v8';
import { describe, it, expect } from 'vitest';
import {
  CODEC_VERSION,
  encodeTagForest,
  decodeTagForest,
  encodeQueue,
  decodeQueue,
} from '../codec.js';
import type { Queue } from '../types.js';
import { category, track } from './helpers.js';

describe('tag forest codec', () => {
  const forest = [
    category('Rock', [
      category('Alice', [category('Hits', [track('Song1', '/lib/x.mp3'), track('Song2', '/lib/é ü.mp3')])]),
    ]),
    category('Unknown', [category('Unknown', [category('Unknown', [track('y.mp3', '/lib/y.mp3')])])]),
  ];

  it('round-trips a forest', () => {
    expect(decodeTagForest(encodeTagForest(forest))).toEqual(forest);
  });

  it('round-trips an empty forest', () => {
    expect(decodeTagForest(encodeTagForest([]))).toEqual([]);
  });

  it('starts every snapshot with the codec version', () => {
    expect(encodeTagForest([])[0]).toBe(CODEC_VERSION);
  });

  it('stores nodes collapsed', () => {
    const expanded = [{ ...category('Jazz', [track('Tune', '/a.mp3')]), expanded: true }];

    const decoded = decodeTagForest(encodeTagForest(expanded));

    expect(decoded?.[0].expanded).toBe(false);
    expect(expanded[0].expanded).toBe(true);
  });

  it('rejects an unknown version', () => {
    const data = encodeTagForest(forest);
    data[0] = CODEC_VERSION + 1;

    expect(decodeTagForest(data)).toBeNull();
  });

  it('rejects bytes that are not a snapshot', () => {
    expect(decodeTagForest(Buffer.from('garbage'))).toBeNull();
    expect(decodeTagForest(Buffer.concat([Buffer.from([CODEC_VERSION]), Buffer.from('not a snapshot')]))).toBeNull();
    expect(decodeTagForest(Buffer.alloc(0))).toBeNull();
  });

  it('rejects a payload with the wrong shape', () => {
    const wrongShape = Buffer.concat([Buffer.from([CODEC_VERSION]), serialize([{ label: 7, children: [] }])]);

    expect(decodeTagForest(wrongShape)).toBeNull();
  });

  it('rejects a queue stored where a forest is expected', () => {
    const queue: Queue = { entries: [], sortColumn: 'directory', sortOrder: 'asc', shuffled: false };

    expect(decodeTagForest(encodeQueue(queue))).toBeNull();
  });
});

describe('queue codec', () => {
  it('round-trips a queue', () => {
    const queue: Queue = {
      entries: [
        { path: '/lib/a.mp3', creator: 'Alice', title: 'One', durationMs: 61_000 },
        { path: '/lib/b.mp3' },
      ],
      sortColumn: 'duration',
      sortOrder: 'desc',
      shuffled: true,
    };

    expect(decodeQueue(encodeQueue(queue))).toEqual(queue);
  });

  it('rejects an unknown sort column', () => {
    const bad = Buffer.concat([
      Buffer.from([CODEC_VERSION]),
      serialize({ entries: [], sortColumn: 'bitrate', sortOrder: 'asc', shuffled: false }),
    ]);

    expect(decodeQueue(bad)).toBeNull();
  });

  it('rejects a forest stored where a queue is expected', () => {
    expect(decodeQueue(encodeTagForest([category('Rock', [])]))).toBeNull();
  });
});
