#!/usr/bin/env node
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import cliProgress, { type SingleBar } from 'cli-progress';
import {
  loadConfig,
  saveConfig,
  addTopDir,
  removeTopDir,
  toggleExtension,
  expandPath,
  CONFIG_FILE,
} from './config.js';
import { openStore } from './store.js';
import { clearTree } from './cache.js';
import { browseTrees, getHierarchy, refreshHierarchy, librarySource } from './library.js';
import { HIERARCHY_KINDS, isHierarchyKind } from './hierarchy.js';
import { extractMetadata, formatDuration } from './metadata.js';
import {
  findTagNode,
  collectTagFiles,
  sortFileTree,
  restoreExpansion,
  toggleExpanded,
  visibleDirectories,
} from './tree.js';
import {
  addFile,
  addDirectory,
  removeFile,
  removeDirectory,
  sortQueue,
  shuffleQueue,
  loadQueue,
  saveQueue,
  isQueueColumn,
  QUEUE_COLUMNS,
} from './queue.js';
import { renderFileTree, renderTagForest, renderQueue } from './render.js';
import { StoreError, describeError } from './errors.js';
import {
  promptMenuAction,
  promptKinds,
  promptDirectory,
  promptTopDirToRemove,
  confirmClear,
  promptVisibleDirectory,
  promptFolderAction,
  promptQueueAction,
  promptQueueColumn,
  promptExtensionToggle,
} from './prompts.js';
import type {
  BuildOptions,
  Config,
  FileSystemNode,
  HierarchyKind,
  HierarchyResult,
  KeyValueStore,
  MetadataExtractor,
  Queue,
  QueueColumn,
} from './types.js';

// Listing and queueing only read tags; they never rewrite cover files.
const readTags: MetadataExtractor = (path) => extractMetadata(path, { saveCover: false });

interface BuildProgress {
  options: BuildOptions;
  stop: () => void;
}

function trackBuildProgress(): BuildProgress {
  let spinner: Ora | null = null;
  let bar: SingleBar | null = null;

  return {
    options: {
      onFileDiscovered: (count) => {
        spinner ??= ora('Discovering media files...').start();
        spinner.text = `Discovering media files... (${count} found)`;
      },
      onProgress: (processed, total) => {
        if (!bar) {
          spinner?.succeed(`Found ${total} media files`);
          bar = new cliProgress.SingleBar({
            format: 'Reading tags |{bar}| {percentage}% | {value}/{total} files | {eta}s remaining',
            barCompleteChar: '█',
            barIncompleteChar: '░',
          });
          bar.start(total, 0);
        }

        bar.update(processed);
      },
    },
    stop: () => {
      if (bar) {
        bar.stop();
      } else {
        spinner?.stop();
      }
    },
  };
}

function reportStoreError(error: unknown): void {
  if (error instanceof StoreError) {
    console.error(chalk.red(`Cache ${error.operation} failed: ${error.message}`));
    process.exitCode = 1;
    return;
  }

  throw error;
}

async function withStore(config: Config, action: (store: KeyValueStore) => Promise<void>): Promise<void> {
  let store: KeyValueStore;

  try {
    store = openStore(config.storePath);
  } catch (error) {
    reportStoreError(error);
    return;
  }

  try {
    await action(store);
  } catch (error) {
    reportStoreError(error);
  } finally {
    store.close();
  }
}

function requireTopDirs(config: Config): boolean {
  if (config.topDirs.length > 0) {
    return true;
  }

  console.log(chalk.yellow('No library folders configured.'));
  console.log(chalk.gray('Run "media-shelf add-dir <path>" to add one.'));
  return false;
}

function reportBuild(kind: HierarchyKind, result: HierarchyResult): void {
  if (result.fromCache) {
    console.log(chalk.gray(`Loaded ${kind} tree from cache`));
  } else {
    console.log(chalk.green(`✓ Built ${kind} tree (${result.forest.length} top-level entries)`));
  }

  if (result.saveError) {
    console.error(chalk.red(`Could not save ${kind} tree: ${result.saveError.message}`));
    process.exitCode = 1;
  }
}

async function loadHierarchy(store: KeyValueStore, kind: HierarchyKind, config: Config): Promise<HierarchyResult> {
  const progress = trackBuildProgress();

  try {
    return await getHierarchy(store, kind, librarySource(config), progress.options);
  } finally {
    progress.stop();
  }
}

async function runBrowse(all: boolean): Promise<void> {
  const config = await loadConfig();

  if (!requireTopDirs(config)) {
    return;
  }

  console.log(chalk.cyan('\n📁 Library folders\n'));
  console.log(chalk.gray(`Extensions: ${config.selectedExtensions.join(', ')}\n`));

  const trees = await browseTrees(librarySource(config));

  for (const [index, tree] of trees.entries()) {
    if (!tree) {
      console.log(`${chalk.cyan(config.topDirs[index])} ${chalk.gray('(no matching files)')}`);
      continue;
    }

    const sorted = await sortFileTree(tree, config.sortMode);

    for (const line of renderFileTree(sorted, { all })) {
      console.log(line);
    }
  }
}

async function runTagView(kind: HierarchyKind): Promise<void> {
  const config = await loadConfig();

  if (!requireTopDirs(config)) {
    return;
  }

  console.log(chalk.cyan(`\n🎵 Library by ${kind}\n`));

  await withStore(config, async (store) => {
    const result = await loadHierarchy(store, kind, config);
    reportBuild(kind, result);
    console.log('');

    for (const line of renderTagForest(result.forest, { all: true })) {
      console.log(line);
    }
  });
}

async function runRefresh(kinds: readonly HierarchyKind[]): Promise<void> {
  const config = await loadConfig();

  if (!requireTopDirs(config)) {
    return;
  }

  console.log(chalk.cyan('\n🔄 Rebuilding tag trees\n'));

  await withStore(config, async (store) => {
    for (const kind of kinds) {
      const progress = trackBuildProgress();

      try {
        reportBuild(kind, await refreshHierarchy(store, kind, librarySource(config), progress.options));
      } finally {
        progress.stop();
      }
    }
  });
}

async function runClear(): Promise<void> {
  const config = await loadConfig();
  const confirmed = await confirmClear();

  if (!confirmed) {
    console.log(chalk.yellow('Nothing cleared.'));
    return;
  }

  await withStore(config, async (store) => {
    for (const kind of HIERARCHY_KINDS) {
      clearTree(store, kind);
    }

    console.log(chalk.green('✓ Cleared cached trees'));
  });
}

async function runFiles(kind: HierarchyKind, labels: string[]): Promise<void> {
  const config = await loadConfig();

  if (!requireTopDirs(config)) {
    return;
  }

  await withStore(config, async (store) => {
    const { forest } = await loadHierarchy(store, kind, config);
    const node = findTagNode(forest, labels);

    if (!node) {
      console.log(chalk.yellow(`No ${kind} entry at: ${labels.join(' › ')}`));
      return;
    }

    const paths = collectTagFiles(node);
    console.log(chalk.cyan(`\n${labels.join(' › ')} (${paths.length} files)\n`));

    for (const path of paths) {
      const meta = await readTags(path);
      const duration = formatDuration(meta.durationMs);
      const heading = [meta.creator, meta.title].filter(Boolean).join(' - ') || path;

      console.log(`${heading}${duration ? chalk.gray(` [${duration}]`) : ''}`);
      console.log(chalk.gray(`  ${path}`));
    }
  });
}

async function runAddDir(path: string): Promise<void> {
  const config = await loadConfig();

  if (!(await addTopDir(config, path))) {
    console.log(chalk.yellow(`Not added: ${path} is not a folder or is already in the library`));
    return;
  }

  await saveConfig(config);
  console.log(chalk.green(`✓ Added ${config.topDirs[config.topDirs.length - 1]}`));
  console.log(chalk.gray('Cached tag trees are not updated automatically; run "media-shelf refresh" to rebuild them.'));
}

async function runRemoveDir(path: string): Promise<void> {
  const config = await loadConfig();

  if (!removeTopDir(config, path)) {
    console.log(chalk.yellow(`Not in the library: ${path}`));
    return;
  }

  await saveConfig(config);
  console.log(chalk.green(`✓ Removed ${path}`));
}

async function withQueue(config: Config, action: (queue: Queue) => Promise<void>): Promise<void> {
  await withStore(config, async (store) => {
    const queue = loadQueue(store);
    await action(queue);
    saveQueue(store, queue);
  });
}

async function pathKind(path: string): Promise<'file' | 'directory' | null> {
  try {
    const stats = await stat(path);
    return stats.isDirectory() ? 'directory' : stats.isFile() ? 'file' : null;
  } catch {
    return null;
  }
}

async function queueDirectory(queue: Queue, trees: ReadonlyArray<FileSystemNode | null>, path: string): Promise<void> {
  const added = await addDirectory(queue, trees, path, readTags);

  if (added > 0) {
    console.log(chalk.green(`✓ Queued ${added} files from ${path}`));
  } else {
    console.log(chalk.yellow(`Nothing new to queue under ${path} (folders must be inside a library folder)`));
  }
}

async function runQueueShow(): Promise<void> {
  const config = await loadConfig();

  await withStore(config, async (store) => {
    console.log('');

    for (const line of renderQueue(loadQueue(store))) {
      console.log(line);
    }
  });
}

async function runQueueAdd(rawPaths: string[]): Promise<void> {
  const config = await loadConfig();
  let trees: Array<FileSystemNode | null> | null = null;

  await withQueue(config, async (queue) => {
    for (const raw of rawPaths) {
      const path = resolve(expandPath(raw));
      const kind = await pathKind(path);

      if (kind === 'directory') {
        const scanned = trees ?? (await browseTrees(librarySource(config)));
        trees = scanned;
        await queueDirectory(queue, scanned, path);
      } else if (kind === 'file') {
        const added = await addFile(queue, path, readTags);
        console.log(added ? chalk.green(`✓ Queued ${path}`) : chalk.gray(`Already queued: ${path}`));
      } else {
        console.log(chalk.yellow(`Not found: ${path}`));
      }
    }
  });
}

async function runQueueRemove(raw: string): Promise<void> {
  const config = await loadConfig();
  const path = resolve(expandPath(raw));

  await withQueue(config, async (queue) => {
    const removed = removeFile(queue, path) || removeDirectory(queue, path);
    console.log(removed > 0 ? chalk.green(`✓ Removed ${removed} from the queue`) : chalk.yellow(`Not queued: ${path}`));
  });
}

async function runQueueSort(column: QueueColumn): Promise<void> {
  const config = await loadConfig();

  await withQueue(config, async (queue) => {
    sortQueue(queue, column);
    console.log(chalk.green(`✓ Sorted by ${queue.sortColumn}, ${queue.sortOrder}`));
  });
}

async function runQueueShuffle(): Promise<void> {
  const config = await loadConfig();

  await withQueue(config, async (queue) => {
    shuffleQueue(queue);
    console.log(chalk.green('✓ Shuffled'));
  });
}

async function runQueueMenu(): Promise<void> {
  const config = await loadConfig();

  await withQueue(config, async (queue) => {
    for (;;) {
      console.log('');

      for (const line of renderQueue(queue)) {
        console.log(line);
      }

      const action = await promptQueueAction();

      if (action === 'back') {
        return;
      }

      if (action === 'sort') {
        sortQueue(queue, await promptQueueColumn(queue));
      } else {
        shuffleQueue(queue);
      }
    }
  });
}

function printExtensions(config: Config): void {
  for (const ext of config.extensions) {
    const on = config.selectedExtensions.includes(ext);
    console.log(`${on ? chalk.green('✓') : chalk.gray('·')} ${ext}`);
  }
}

async function runExtensions(ext: string | undefined): Promise<void> {
  const config = await loadConfig();

  if (ext !== undefined) {
    if (!toggleExtension(config, ext)) {
      fail(`Unknown extension: ${ext}`);
      return;
    }

    await saveConfig(config);
    console.log(chalk.gray('Cached tag trees are not updated automatically; run "media-shelf refresh" to rebuild them.'));
  }

  printExtensions(config);
}

async function runExtensionsMenu(): Promise<void> {
  const config = await loadConfig();

  for (;;) {
    const ext = await promptExtensionToggle(config);

    if (ext === null) {
      return;
    }

    toggleExtension(config, ext);
    await saveConfig(config);
  }
}

async function runBrowseMenu(): Promise<void> {
  const config = await loadConfig();

  if (!requireTopDirs(config)) {
    return;
  }

  const trees: FileSystemNode[] = [];

  for (const tree of await browseTrees(librarySource(config))) {
    if (tree) {
      trees.push(await sortFileTree(tree, config.sortMode));
    }
  }

  if (trees.length === 0) {
    console.log(chalk.yellow('No matching files in the library folders.'));
    return;
  }

  let expanded = new Set(trees.filter((tree) => tree.expanded).map((tree) => tree.path));

  for (;;) {
    console.log('');

    for (const tree of trees) {
      restoreExpansion(tree, expanded);

      for (const line of renderFileTree(tree)) {
        console.log(line);
      }
    }

    const dir = await promptVisibleDirectory(trees.flatMap(visibleDirectories));

    if (!dir) {
      return;
    }

    if ((await promptFolderAction(dir)) === 'toggle') {
      expanded = toggleExpanded(expanded, dir.path);
    } else {
      await withQueue(config, (queue) => queueDirectory(queue, trees, dir.path));
    }
  }
}

async function runMenu(): Promise<void> {
  console.log(chalk.cyan('\n🎵 Media Shelf\n'));
  console.log(chalk.gray(`Config: ${CONFIG_FILE}\n`));

  for (;;) {
    const action = await promptMenuAction();

    switch (action) {
      case 'browse':
        await runBrowseMenu();
        break;

      case 'genre':
      case 'creator':
        await runTagView(action);
        break;

      case 'queue':
        await runQueueMenu();
        break;

      case 'extensions':
        await runExtensionsMenu();
        break;

      case 'refresh':
        await runRefresh(await promptKinds());
        break;

      case 'add-dir':
        await runAddDir(await promptDirectory());
        break;

      case 'remove-dir': {
        const config = await loadConfig();

        if (requireTopDirs(config)) {
          await runRemoveDir(await promptTopDirToRemove(config.topDirs));
        }

        break;
      }

      case 'clear':
        await runClear();
        break;

      case 'quit':
        return;
    }
  }
}

function printUsage(): void {
  console.log('Usage: media-shelf <command>');
  console.log('');
  console.log('  browse [--all]                    Show library folders');
  console.log('  genre | creator                   Show the tag tree');
  console.log('  refresh [genre|creator]           Rebuild cached tag trees');
  console.log('  clear                             Clear cached tag trees');
  console.log('  files <genre|creator> <label...>  List files under a tag path');
  console.log('  add-dir <path> | remove-dir <path>');
  console.log('  extensions [toggle <ext>]         List or switch file types');
  console.log('  queue [show]                      Show the queue');
  console.log('  queue add <path...>               Queue files or library folders');
  console.log('  queue remove <path>               Remove a file or folder from the queue');
  console.log(`  queue sort <${QUEUE_COLUMNS.join('|')}>`);
  console.log('  queue shuffle');
}

function runQueueCommand(args: string[]): Promise<void> | null {
  const [sub, ...rest] = args;

  switch (sub) {
    case undefined:
    case 'show':
      return runQueueShow();

    case 'add':
      return rest.length > 0 ? runQueueAdd(rest) : null;

    case 'remove':
      return rest[0] ? runQueueRemove(rest[0]) : null;

    case 'sort': {
      const column = rest[0];
      return isQueueColumn(column) ? runQueueSort(column) : null;
    }

    case 'shuffle':
      return runQueueShuffle();

    default:
      return null;
  }
}

function fail(message: string): void {
  console.error(chalk.red(message));
  process.exitCode = 1;
}

function handleError(error: unknown): void {
  fail(describeError(error));
}

const [command, ...args] = process.argv.slice(2);

switch (command) {
  case 'browse':
    runBrowse(args.includes('--all')).catch(handleError);
    break;

  case 'genre':
  case 'creator':
    runTagView(command).catch(handleError);
    break;

  case 'refresh': {
    const kind = args[0];

    if (kind !== undefined && !isHierarchyKind(kind)) {
      fail(`Unknown tree: ${kind}`);
      break;
    }

    runRefresh(kind ? [kind] : HIERARCHY_KINDS).catch(handleError);
    break;
  }

  case 'clear':
    runClear().catch(handleError);
    break;

  case 'files': {
    const [kind, ...labels] = args;

    if (!isHierarchyKind(kind) || labels.length === 0) {
      printUsage();
      process.exitCode = 1;
      break;
    }

    runFiles(kind, labels).catch(handleError);
    break;
  }

  case 'add-dir':
  case 'remove-dir': {
    const path = args[0];

    if (!path) {
      printUsage();
      process.exitCode = 1;
      break;
    }

    (command === 'add-dir' ? runAddDir(path) : runRemoveDir(path)).catch(handleError);
    break;
  }

  case 'queue': {
    const run = runQueueCommand(args);

    if (!run) {
      printUsage();
      process.exitCode = 1;
      break;
    }

    run.catch(handleError);
    break;
  }

  case 'extensions': {
    if (args.length > 0 && (args[0] !== 'toggle' || !args[1])) {
      printUsage();
      process.exitCode = 1;
      break;
    }

    runExtensions(args[1]).catch(handleError);
    break;
  }

  case 'help':
  case '--help':
    printUsage();
    break;

  case undefined:
    runMenu().catch(handleError);
    break;

  default:
    fail(`Unknown command: ${command}`);
    printUsage();
}
