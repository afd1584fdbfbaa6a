import { basename } from 'node:path';
import { findMediaFiles, compareNames } from './scanner.js';
import { extractMetadata } from './metadata.js';
import type {
  BuildOptions,
  CategoryField,
  HierarchyKind,
  MetadataExtractor,
  TagTreeNode,
  TrackMetadata,
} from './types.js';

export const UNKNOWN_LABEL = 'Unknown';

export const HIERARCHY_LEVELS: Record<HierarchyKind, readonly CategoryField[]> = {
  genre: ['genre', 'creator', 'album'],
  creator: ['creator', 'album'],
};

export const HIERARCHY_KINDS: readonly HierarchyKind[] = ['genre', 'creator'];

export function isHierarchyKind(value: string | undefined): value is HierarchyKind {
  return value === 'genre' || value === 'creator';
}

interface TrackEntry {
  categories: string[];
  title: string;
  path: string;
}

function toTrackEntry(
  filePath: string,
  metadata: TrackMetadata,
  levels: readonly CategoryField[]
): TrackEntry {
  return {
    categories: levels.map((field) => metadata[field] ?? UNKNOWN_LABEL),
    title: metadata.title ?? basename(filePath),
    path: filePath,
  };
}

async function readTrack(extractor: MetadataExtractor, filePath: string): Promise<TrackMetadata> {
  try {
    return await extractor(filePath);
  } catch {
    return {};
  }
}

function trackNodes(entries: TrackEntry[]): TagTreeNode[] {
  const sorted = [...entries].sort(
    (a, b) => compareNames(a.title, b.title) || compareNames(a.path, b.path)
  );

  return sorted.map((entry) => ({
    label: entry.title,
    children: [],
    filePaths: [entry.path],
    expanded: false,
  }));
}

/**
 * Groups entries by the category at `depth`, recursing until the categories
 * run out. Keys are emitted in ascending order so two builds over the same
 * files give identical forests.
 */
function groupTracks(entries: TrackEntry[], depth = 0): TagTreeNode[] {
  if (entries.length > 0 && depth >= entries[0].categories.length) {
    return trackNodes(entries);
  }

  const groups = new Map<string, TrackEntry[]>();

  for (const entry of entries) {
    const key = entry.categories[depth];
    const bucket = groups.get(key);

    if (bucket) {
      bucket.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  return [...groups.keys()]
    .sort(compareNames)
    .map((label) => ({
      label,
      children: groupTracks(groups.get(label) ?? [], depth + 1),
      filePaths: [],
      expanded: false,
    }));
}

export async function buildHierarchy(
  topDirs: readonly string[],
  allowedExtensions: Iterable<string>,
  kind: HierarchyKind,
  options: BuildOptions = {}
): Promise<TagTreeNode[]> {
  const extractor = options.extractor ?? extractMetadata;
  const levels = HIERARCHY_LEVELS[kind];

  let discovered = 0;
  const files = await findMediaFiles(topDirs, allowedExtensions, () => {
    discovered++;
    options.onFileDiscovered?.(discovered);
  });

  const entries: TrackEntry[] = [];

  for (const filePath of files) {
    const metadata = await readTrack(extractor, filePath);
    entries.push(toTrackEntry(filePath, metadata, levels));
    options.onProgress?.(entries.length, files.length);
  }

  return groupTracks(entries);
}
