import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, dirname } from 'node:path';
import type { MetadataExtractor, TagTreeNode, TrackMetadata } from '../types.js';

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `media-shelf-${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function touch(root: string, relativePath: string, contents = ''): Promise<string> {
  const fullPath = join(root, relativePath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, contents);
  return fullPath;
}

export function fakeExtractor(tags: Record<string, TrackMetadata>): MetadataExtractor & { calls: string[] } {
  const calls: string[] = [];

  const extractor = async (filePath: string): Promise<TrackMetadata> => {
    calls.push(filePath);
    return tags[filePath] ?? {};
  };

  return Object.assign(extractor, { calls });
}

export function category(label: string, children: TagTreeNode[]): TagTreeNode {
  return { label, children, filePaths: [], expanded: false };
}

export function track(label: string, path: string): TagTreeNode {
  return { label, children: [], filePaths: [path], expanded: false };
}
