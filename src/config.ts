import { readFile, writeFile, stat } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { Config, SortMode } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

const MEDIA_EXTENSIONS = ['mp3', 'flac', 'ogg', 'opus', 'm4a', 'aac', 'wav', 'wma', 'aiff'];

export const DEFAULT_CONFIG: Config = {
  topDirs: [],
  extensions: [...MEDIA_EXTENSIONS],
  storePath: join(homedir(), '.media-shelf', 'cache.db'),
  sortMode: 'name',
  selectedExtensions: [...MEDIA_EXTENSIONS],
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isSortMode(value: unknown): value is SortMode {
  return value === 'name' || value === 'modified';
}

/**
 * Reads `config.json` over the defaults. A missing or malformed file gives
 * the defaults; top-level directories that no longer exist are dropped.
 */
export async function loadConfig(file: string = CONFIG_FILE): Promise<Config> {
  let raw: Record<string, unknown> = {};

  try {
    const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));

    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      raw = { ...parsed };
    }
  } catch {
    // No config yet
  }

  const topDirs = isStringArray(raw.topDirs) ? raw.topDirs.map((dir) => resolve(expandPath(dir))) : [];
  const existing: string[] = [];

  for (const dir of topDirs) {
    if (await isDirectory(dir)) {
      existing.push(dir);
    }
  }

  const extensions = isStringArray(raw.extensions) ? raw.extensions : [...DEFAULT_CONFIG.extensions];
  const selectedExtensions = isStringArray(raw.selectedExtensions)
    ? raw.selectedExtensions.filter((ext) => extensions.includes(ext))
    : [...extensions];

  return {
    topDirs: existing,
    extensions,
    storePath: typeof raw.storePath === 'string' ? expandPath(raw.storePath) : DEFAULT_CONFIG.storePath,
    sortMode: isSortMode(raw.sortMode) ? raw.sortMode : DEFAULT_CONFIG.sortMode,
    selectedExtensions,
  };
}

export async function saveConfig(config: Config, file: string = CONFIG_FILE): Promise<void> {
  await writeFile(file, JSON.stringify(config, null, 2));
}

/**
 * Adds a top-level directory. A file path stands for its parent directory.
 * Returns false when the path is not an existing directory or is already
 * listed.
 */
export async function addTopDir(config: Config, path: string): Promise<boolean> {
  let dir = resolve(expandPath(path));

  try {
    if ((await stat(dir)).isFile()) {
      dir = dirname(dir);
    }
  } catch {
    return false;
  }

  if (config.topDirs.includes(dir) || !(await isDirectory(dir))) {
    return false;
  }

  config.topDirs.push(dir);
  return true;
}

/**
 * Switches one known extension on or off for scanning. Returns false for an
 * extension that is not in `config.extensions`.
 */
export function toggleExtension(config: Config, ext: string): boolean {
  if (!config.extensions.includes(ext)) {
    return false;
  }

  const index = config.selectedExtensions.indexOf(ext);

  if (index === -1) {
    config.selectedExtensions.push(ext);
  } else {
    config.selectedExtensions.splice(index, 1);
  }

  return true;
}

export function removeTopDir(config: Config, path: string): boolean {
  const dir = resolve(expandPath(path));
  const index = config.topDirs.indexOf(dir);

  if (index === -1) {
    return false;
  }

  config.topDirs.splice(index, 1);
  return true;
}
