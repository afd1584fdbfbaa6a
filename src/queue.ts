import { basename, dirname, sep } from 'node:path';
import { encodeQueue, decodeQueue } from './codec.js';
import { StoreError, describeError } from './errors.js';
import { compareNames } from './scanner.js';
import { findNodeByPath, collectFiles } from './tree.js';
import type {
  FileSystemNode,
  KeyValueStore,
  MetadataExtractor,
  Queue,
  QueueColumn,
  QueueEntry,
  TrackMetadata,
} from './types.js';

export const QUEUE_KEY = 'queue';

export const QUEUE_COLUMNS: readonly QueueColumn[] = [
  'directory',
  'file',
  'creator',
  'album',
  'title',
  'genre',
  'duration',
];

export function isQueueColumn(value: string | undefined): value is QueueColumn {
  return QUEUE_COLUMNS.some((column) => column === value);
}

export function createQueue(): Queue {
  return { entries: [], sortColumn: 'directory', sortOrder: 'asc', shuffled: false };
}

const TEXT_FIELDS = ['creator', 'album', 'title', 'genre'] as const;

function toQueueEntry(path: string, metadata: TrackMetadata): QueueEntry {
  const entry: QueueEntry = { path };

  for (const field of TEXT_FIELDS) {
    const value = metadata[field];

    if (value !== undefined) {
      entry[field] = value;
    }
  }

  if (metadata.durationMs !== undefined) {
    entry.durationMs = metadata.durationMs;
  }

  return entry;
}

async function readEntry(extractor: MetadataExtractor, path: string): Promise<QueueEntry> {
  try {
    return toQueueEntry(path, await extractor(path));
  } catch {
    return { path };
  }
}

function isQueued(queue: Queue, path: string): boolean {
  return queue.entries.some((entry) => entry.path === path);
}

/** Appends one file with its tags. Returns false when it is already listed. */
export async function addFile(queue: Queue, path: string, extractor: MetadataExtractor): Promise<boolean> {
  if (isQueued(queue, path)) {
    return false;
  }

  const entry = await readEntry(extractor, path);

  // The extractor awaits, so check again before pushing.
  if (isQueued(queue, path)) {
    return false;
  }

  queue.entries.push(entry);
  return true;
}

/**
 * Appends every file under `dirPath` as it appears in the browse trees.
 * Returns how many were added.
 */
export async function addDirectory(
  queue: Queue,
  trees: ReadonlyArray<FileSystemNode | null>,
  dirPath: string,
  extractor: MetadataExtractor
): Promise<number> {
  let added = 0;

  for (const tree of trees) {
    const node = tree ? findNodeByPath(tree, dirPath) : null;

    if (!node) {
      continue;
    }

    for (const file of collectFiles(node)) {
      if (await addFile(queue, file, extractor)) {
        added++;
      }
    }
  }

  return added;
}

export function removeFile(queue: Queue, path: string): number {
  const before = queue.entries.length;
  queue.entries = queue.entries.filter((entry) => entry.path !== path);
  return before - queue.entries.length;
}

function isInside(path: string, dir: string): boolean {
  const prefix = dir.endsWith(sep) ? dir : `${dir}${sep}`;
  return path === dir || path.startsWith(prefix);
}

export function removeDirectory(queue: Queue, dirPath: string): number {
  const before = queue.entries.length;
  queue.entries = queue.entries.filter((entry) => !isInside(entry.path, dirPath));
  return before - queue.entries.length;
}

/** Picking the current column again flips the order; a new column starts ascending. */
export function sortQueue(queue: Queue, column: QueueColumn): void {
  if (queue.sortColumn === column) {
    queue.sortOrder = queue.sortOrder === 'asc' ? 'desc' : 'asc';
  } else {
    queue.sortColumn = column;
    queue.sortOrder = 'asc';
  }

  queue.shuffled = false;
}

export function shuffleQueue(queue: Queue, random: () => number = Math.random): void {
  const entries = [...queue.entries];

  for (let i = entries.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [entries[i], entries[j]] = [entries[j], entries[i]];
  }

  queue.entries = entries;
  queue.shuffled = true;
}

function asciiLower(value: string): string {
  return value.replace(/[A-Z]/g, (char) => char.toLowerCase());
}

function sortKey(entry: QueueEntry, column: QueueColumn): string | number {
  switch (column) {
    case 'directory':
      return asciiLower(basename(dirname(entry.path)));
    case 'file':
      return asciiLower(basename(entry.path));
    case 'duration':
      return entry.durationMs ?? 0;
    default:
      return asciiLower(entry[column] ?? '');
  }
}

function compareKeys(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }

  return compareNames(String(a), String(b));
}

/** Display order: stored order after a shuffle, otherwise a stable column sort. */
export function orderedEntries(queue: Queue): QueueEntry[] {
  const entries = [...queue.entries];

  if (queue.shuffled) {
    return entries;
  }

  const direction = queue.sortOrder === 'asc' ? 1 : -1;

  return entries.sort(
    (a, b) => direction * compareKeys(sortKey(a, queue.sortColumn), sortKey(b, queue.sortColumn))
  );
}

export function loadQueue(store: KeyValueStore): Queue {
  let data: Buffer | undefined;

  try {
    data = store.get(QUEUE_KEY);
  } catch {
    return createQueue();
  }

  return (data && decodeQueue(data)) ?? createQueue();
}

export function saveQueue(store: KeyValueStore, queue: Queue): void {
  const data = encodeQueue(queue);

  try {
    store.set(QUEUE_KEY, data);
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }

    throw new StoreError('write', `Failed to save queue: ${describeError(error)}`, { cause: error });
  }
}
