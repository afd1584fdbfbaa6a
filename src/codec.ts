import { serialize, deserialize } from 'node:v8';
import { Ajv } from 'ajv';
import type { Queue, TagTreeNode } from './types.js';

export const CODEC_VERSION = 1;

const ajv = new Ajv({ allErrors: false, strict: true });

const TagForestSchema = {
  $id: 'TagForest',
  type: 'array',
  items: { $ref: '#/definitions/node' },
  definitions: {
    node: {
      type: 'object',
      additionalProperties: false,
      required: ['label', 'children', 'filePaths', 'expanded'],
      properties: {
        label: { type: 'string' },
        children: { type: 'array', items: { $ref: '#/definitions/node' } },
        filePaths: { type: 'array', items: { type: 'string' } },
        expanded: { type: 'boolean' },
      },
    },
  },
};

const QueueSchema = {
  $id: 'Queue',
  type: 'object',
  additionalProperties: false,
  required: ['entries', 'sortColumn', 'sortOrder', 'shuffled'],
  properties: {
    entries: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['path'],
        properties: {
          path: { type: 'string' },
          creator: { type: 'string' },
          album: { type: 'string' },
          title: { type: 'string' },
          genre: { type: 'string' },
          durationMs: { type: 'number' },
        },
      },
    },
    sortColumn: { type: 'string', enum: ['directory', 'file', 'creator', 'album', 'title', 'genre', 'duration'] },
    sortOrder: { type: 'string', enum: ['asc', 'desc'] },
    shuffled: { type: 'boolean' },
  },
};

const isTagForest = ajv.compile<TagTreeNode[]>(TagForestSchema);
const isQueue = ajv.compile<Queue>(QueueSchema);

// Expansion is view state; snapshots always store collapsed trees.
function collapseTag(node: TagTreeNode): TagTreeNode {
  return {
    label: node.label,
    children: node.children.map(collapseTag),
    filePaths: [...node.filePaths],
    expanded: false,
  };
}

function encode(value: unknown): Buffer {
  return Buffer.concat([Buffer.from([CODEC_VERSION]), serialize(value)]);
}

function decode(buffer: Uint8Array): unknown {
  if (buffer.length < 2 || buffer[0] !== CODEC_VERSION) {
    return undefined;
  }

  try {
    return deserialize(buffer.subarray(1));
  } catch {
    return undefined;
  }
}

export function encodeTagForest(forest: readonly TagTreeNode[]): Buffer {
  return encode(forest.map(collapseTag));
}

export function decodeTagForest(buffer: Uint8Array): TagTreeNode[] | null {
  const value = decode(buffer);
  return isTagForest(value) ? value : null;
}

export function encodeQueue(queue: Queue): Buffer {
  return encode(queue);
}

export function decodeQueue(buffer: Uint8Array): Queue | null {
  const value = decode(buffer);
  return isQueue(value) ? value : null;
}
