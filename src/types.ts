import type { StoreError } from './errors.js';

export type NodeKind = 'file' | 'directory';

export interface FileSystemNode {
  name: string;
  path: string;
  kind: NodeKind;
  children: FileSystemNode[];
  expanded: boolean;
}

export interface TrackMetadata {
  creator?: string;
  album?: string;
  title?: string;
  genre?: string;
  trackNum?: number;
  durationMs?: number;
  imageUri?: string;
  identifier?: string;
  annotation?: string;
}

export type MetadataExtractor = (filePath: string) => Promise<TrackMetadata>;

export interface TagTreeNode {
  label: string;
  children: TagTreeNode[];
  filePaths: string[];
  expanded: boolean;
}

export type HierarchyKind = 'genre' | 'creator';

export type CategoryField = 'genre' | 'creator' | 'album';

export type SortMode = 'name' | 'modified';

export interface Config {
  topDirs: string[];
  extensions: string[];
  storePath: string;
  sortMode: SortMode;
  selectedExtensions: string[];
}

export interface KeyValueStore {
  get(key: string): Buffer | undefined;
  set(key: string, value: Buffer): void;
  delete(key: string): void;
  close(): void;
}

export interface BuildOptions {
  extractor?: MetadataExtractor;
  onFileDiscovered?: (count: number) => void;
  onProgress?: (processed: number, total: number) => void;
}

export interface HierarchyResult {
  forest: TagTreeNode[];
  fromCache: boolean;
  saveError?: StoreError;
}

export type QueueColumn = 'directory' | 'file' | 'creator' | 'album' | 'title' | 'genre' | 'duration';

export type SortOrder = 'asc' | 'desc';

export interface QueueEntry {
  path: string;
  creator?: string;
  album?: string;
  title?: string;
  genre?: string;
  durationMs?: number;
}

export interface Queue {
  entries: QueueEntry[];
  sortColumn: QueueColumn;
  sortOrder: SortOrder;
  shuffled: boolean;
}
