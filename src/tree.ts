import { stat } from 'node:fs/promises';
import { compareNames } from './scanner.js';
import type { FileSystemNode, SortMode, TagTreeNode } from './types.js';

export function restoreExpansion(node: FileSystemNode, expandedPaths: ReadonlySet<string>): void {
  node.expanded = expandedPaths.has(node.path);

  for (const child of node.children) {
    restoreExpansion(child, expandedPaths);
  }
}

export function toggleExpanded(expandedPaths: ReadonlySet<string>, path: string): Set<string> {
  const next = new Set(expandedPaths);

  if (next.has(path)) {
    next.delete(path);
  } else {
    next.add(path);
  }

  return next;
}

export function findNodeByPath(node: FileSystemNode, path: string): FileSystemNode | null {
  if (node.path === path) {
    return node;
  }

  for (const child of node.children) {
    const found = findNodeByPath(child, path);

    if (found) {
      return found;
    }
  }

  return null;
}

/** Directories currently on screen: the node, then those under expanded directories. */
export function visibleDirectories(node: FileSystemNode): FileSystemNode[] {
  if (node.kind !== 'directory') {
    return [];
  }

  if (!node.expanded) {
    return [node];
  }

  return [node, ...node.children.flatMap(visibleDirectories)];
}

export function collectFiles(node: FileSystemNode): string[] {
  if (node.kind === 'file') {
    return [node.path];
  }

  return node.children.flatMap(collectFiles);
}

/** Follows `labels` down from the top level, one label per level. */
export function findTagNode(forest: readonly TagTreeNode[], labels: readonly string[]): TagTreeNode | null {
  let level = forest;
  let found: TagTreeNode | null = null;

  for (const label of labels) {
    found = level.find((node) => node.label === label) ?? null;

    if (!found) {
      return null;
    }

    level = found.children;
  }

  return found;
}

export function collectTagFiles(node: TagTreeNode): string[] {
  return [...node.filePaths, ...node.children.flatMap(collectTagFiles)];
}

async function modifiedTime(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch {
    return null;
  }
}

function compareModified(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

/**
 * Returns a copy of `node` in display order: directories first, then by
 * lower-cased name or by newest modification time.
 */
export async function sortFileTree(node: FileSystemNode, mode: SortMode): Promise<FileSystemNode> {
  const children = await Promise.all(node.children.map((child) => sortFileTree(child, mode)));
  const times = new Map<string, number | null>();

  if (mode === 'modified') {
    for (const child of children) {
      times.set(child.path, await modifiedTime(child.path));
    }
  }

  children.sort((a, b) => {
    if (a.kind !== b.kind) {
      return a.kind === 'directory' ? -1 : 1;
    }

    if (mode === 'modified') {
      return compareModified(times.get(a.path) ?? null, times.get(b.path) ?? null);
    }

    return compareNames(a.name.toLowerCase(), b.name.toLowerCase());
  });

  return { ...node, children };
}
