import { encodeTagForest, decodeTagForest } from './codec.js';
import { StoreError, describeError } from './errors.js';
import type { HierarchyKind, KeyValueStore, TagTreeNode } from './types.js';

export const CACHE_KEYS: Record<HierarchyKind, string> = {
  genre: 'tag_tree',
  creator: 'creator_tag_tree',
};

export function saveTree(
  store: KeyValueStore,
  kind: HierarchyKind,
  forest: readonly TagTreeNode[]
): void {
  const data = encodeTagForest(forest);

  try {
    store.set(CACHE_KEYS[kind], data);
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }

    throw new StoreError('write', `Failed to save ${kind} tree: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Returns the last saved forest for `kind`, or `null` when nothing usable is
 * stored. A record that cannot be read or decoded counts as a miss.
 */
export function loadTree(store: KeyValueStore, kind: HierarchyKind): TagTreeNode[] | null {
  let data: Buffer | undefined;

  try {
    data = store.get(CACHE_KEYS[kind]);
  } catch {
    return null;
  }

  return data ? decodeTagForest(data) : null;
}

export function clearTree(store: KeyValueStore, kind: HierarchyKind): void {
  try {
    store.delete(CACHE_KEYS[kind]);
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }

    throw new StoreError('delete', `Failed to clear ${kind} tree: ${describeError(error)}`, { cause: error });
  }
}
