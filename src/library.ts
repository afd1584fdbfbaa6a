import { resolve } from 'node:path';
import { scanDirectory } from './scanner.js';
import { buildHierarchy } from './hierarchy.js';
import { loadTree, saveTree, clearTree } from './cache.js';
import { StoreError } from './errors.js';
import type {
  BuildOptions,
  Config,
  FileSystemNode,
  HierarchyKind,
  HierarchyResult,
  KeyValueStore,
} from './types.js';

export interface LibrarySource {
  topDirs: readonly string[];
  extensions: readonly string[];
}

/** What scans read from the config: the top-level directories and the extensions switched on. */
export function librarySource(config: Config): LibrarySource {
  return { topDirs: config.topDirs, extensions: config.selectedExtensions };
}

/**
 * Scans every top-level directory for the browse view. A lone top-level
 * directory starts expanded; with several, all start collapsed.
 */
export async function browseTrees(source: LibrarySource): Promise<Array<FileSystemNode | null>> {
  const expandRoot = source.topDirs.length === 1;
  const trees: Array<FileSystemNode | null> = [];

  for (const dir of source.topDirs) {
    trees.push(await scanDirectory(resolve(dir), source.extensions, { expanded: expandRoot }));
  }

  return trees;
}

async function rebuild(
  store: KeyValueStore,
  kind: HierarchyKind,
  source: LibrarySource,
  options: BuildOptions
): Promise<HierarchyResult> {
  const topDirs = source.topDirs.map((dir) => resolve(dir));
  const forest = await buildHierarchy(topDirs, source.extensions, kind, options);

  try {
    saveTree(store, kind, forest);
  } catch (error) {
    if (error instanceof StoreError) {
      return { forest, fromCache: false, saveError: error };
    }

    throw error;
  }

  return { forest, fromCache: false };
}

/**
 * Returns the cached forest for `kind`, building and saving it on a miss.
 * A failed save still returns the freshly built forest, with `saveError` set.
 */
export async function getHierarchy(
  store: KeyValueStore,
  kind: HierarchyKind,
  source: LibrarySource,
  options: BuildOptions = {}
): Promise<HierarchyResult> {
  const cached = loadTree(store, kind);

  if (cached) {
    return { forest: cached, fromCache: true };
  }

  return rebuild(store, kind, source, options);
}

export async function refreshHierarchy(
  store: KeyValueStore,
  kind: HierarchyKind,
  source: LibrarySource,
  options: BuildOptions = {}
): Promise<HierarchyResult> {
  clearTree(store, kind);
  return rebuild(store, kind, source, options);
}
