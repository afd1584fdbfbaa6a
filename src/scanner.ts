import { readdir, realpath, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, basename } from 'node:path';
import type { FileSystemNode, NodeKind } from './types.js';

export interface ScanOptions {
  expanded?: boolean;
}

// Case-sensitive on purpose: `A.RS` does not match `rs`. Callers that want
// case-insensitive matching normalize both sides before calling.
export function fileExtension(name: string): string | null {
  const dot = name.lastIndexOf('.');

  if (dot <= 0 || dot === name.length - 1) {
    return null;
  }

  return name.slice(dot + 1);
}

export function hasAllowedExtension(name: string, allowed: ReadonlySet<string>): boolean {
  const ext = fileExtension(name);
  return ext !== null && allowed.has(ext);
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => compareNames(a.name, b.name));
  } catch {
    return [];
  }
}

interface EntryKind {
  kind: NodeKind;
  linked: boolean;
}

// Links are classified by their target; dangling links and special files
// give null.
async function entryKind(entry: Dirent, fullPath: string): Promise<EntryKind | null> {
  if (entry.isSymbolicLink()) {
    try {
      const target = await stat(fullPath);

      if (target.isDirectory()) return { kind: 'directory', linked: true };
      if (target.isFile()) return { kind: 'file', linked: true };
      return null;
    } catch {
      return null;
    }
  }

  if (entry.isDirectory()) return { kind: 'directory', linked: false };
  if (entry.isFile()) return { kind: 'file', linked: false };
  return null;
}

async function resolveReal(path: string): Promise<string | null> {
  try {
    return await realpath(path);
  } catch {
    return null;
  }
}

async function scanLevel(
  dir: string,
  allowed: ReadonlySet<string>,
  expanded: boolean,
  ancestors: ReadonlySet<string>
): Promise<FileSystemNode | null> {
  const real = await resolveReal(dir);

  // A linked directory pointing back up the branch would recurse forever.
  if (real === null || ancestors.has(real)) {
    return null;
  }

  const branch = new Set(ancestors).add(real);
  const children: FileSystemNode[] = [];

  for (const entry of await listEntries(dir)) {
    const fullPath = join(dir, entry.name);
    const type = await entryKind(entry, fullPath);

    if (type?.kind === 'directory') {
      const child = await scanLevel(fullPath, allowed, false, branch);

      if (child) {
        children.push(child);
      }

      continue;
    }

    if (type?.kind === 'file' && hasAllowedExtension(entry.name, allowed)) {
      children.push({
        name: entry.name,
        path: fullPath,
        kind: 'file',
        children: [],
        expanded: false,
      });
    }
  }

  if (children.length === 0) {
    return null;
  }

  return {
    name: basename(dir) || dir,
    path: dir,
    kind: 'directory',
    children,
    expanded,
  };
}

/**
 * Builds the browse tree for one top-level directory. Directories without a
 * matching file anywhere beneath them are pruned, so the result is `null`
 * when nothing matched, including when `rootDir` is missing or unreadable.
 * Symbolic links to files and to directories are followed.
 */
export async function scanDirectory(
  rootDir: string,
  allowedExtensions: Iterable<string>,
  options: ScanOptions = {}
): Promise<FileSystemNode | null> {
  return scanLevel(rootDir, new Set(allowedExtensions), options.expanded ?? false, new Set());
}

async function collectMediaFiles(
  dir: string,
  allowed: ReadonlySet<string>,
  found: string[],
  onFile?: (path: string) => void
): Promise<void> {
  for (const entry of await listEntries(dir)) {
    const fullPath = join(dir, entry.name);
    const type = await entryKind(entry, fullPath);

    if (type?.kind === 'directory') {
      if (!type.linked) {
        await collectMediaFiles(fullPath, allowed, found, onFile);
      }

      continue;
    }

    if (type?.kind === 'file' && hasAllowedExtension(entry.name, allowed)) {
      found.push(fullPath);
      onFile?.(fullPath);
    }
  }
}

export async function findMediaFiles(
  topDirs: readonly string[],
  allowedExtensions: Iterable<string>,
  onFile?: (path: string) => void
): Promise<string[]> {
  const allowed = new Set(allowedExtensions);
  const found: string[] = [];

  for (const dir of topDirs) {
    await collectMediaFiles(dir, allowed, found, onFile);
  }

  return found;
}
