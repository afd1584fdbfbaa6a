import { input, select, confirm } from '@inquirer/prompts';
import { QUEUE_COLUMNS } from './queue.js';
import type { Config, FileSystemNode, HierarchyKind, Queue, QueueColumn } from './types.js';

export type MenuAction =
  | 'browse'
  | 'genre'
  | 'creator'
  | 'refresh'
  | 'add-dir'
  | 'remove-dir'
  | 'queue'
  | 'extensions'
  | 'clear'
  | 'quit';

export async function promptMenuAction(): Promise<MenuAction> {
  return select<MenuAction>({
    message: 'What would you like to do?',
    choices: [
      { name: '📁 Browse folders', value: 'browse' },
      { name: '🎸 Browse by genre', value: 'genre' },
      { name: '🎤 Browse by creator', value: 'creator' },
      { name: '🎶 Queue', value: 'queue' },
      { name: '🔄 Rebuild tag trees', value: 'refresh' },
      { name: '➕ Add a library folder', value: 'add-dir' },
      { name: '➖ Remove a library folder', value: 'remove-dir' },
      { name: '🧩 Choose file types', value: 'extensions' },
      { name: '🧹 Clear cached trees', value: 'clear' },
      { name: 'Quit', value: 'quit' },
    ],
  });
}

export async function promptKinds(): Promise<HierarchyKind[]> {
  const choice = await select<HierarchyKind | 'both'>({
    message: 'Which tree?',
    choices: [
      { name: 'Both', value: 'both' },
      { name: 'Genre', value: 'genre' },
      { name: 'Creator', value: 'creator' },
    ],
  });

  return choice === 'both' ? ['genre', 'creator'] : [choice];
}

export async function promptDirectory(): Promise<string> {
  const value = await input({
    message: 'Folder path:',
    validate: (text) => text.trim().length > 0 || 'Please enter a path',
  });

  return value.trim();
}

export async function promptTopDirToRemove(topDirs: readonly string[]): Promise<string> {
  return select<string>({
    message: 'Remove which folder?',
    choices: topDirs.map((dir) => ({ name: dir, value: dir })),
  });
}

export async function confirmClear(): Promise<boolean> {
  return confirm({
    message: 'Clear the cached genre and creator trees? The next view rebuilds them from every file.',
    default: false,
  });
}

export async function promptVisibleDirectory(dirs: readonly FileSystemNode[]): Promise<FileSystemNode | null> {
  return select<FileSystemNode | null>({
    message: 'Pick a folder:',
    choices: [
      ...dirs.map((dir) => ({ name: `${dir.expanded ? '▾' : '▸'} ${dir.path}`, value: dir })),
      { name: 'Done', value: null },
    ],
  });
}

export async function promptFolderAction(dir: FileSystemNode): Promise<'toggle' | 'queue'> {
  return select<'toggle' | 'queue'>({
    message: dir.path,
    choices: [
      { name: dir.expanded ? 'Collapse' : 'Expand', value: 'toggle' },
      { name: '➕ Add to queue', value: 'queue' },
    ],
  });
}

export async function promptQueueAction(): Promise<'sort' | 'shuffle' | 'back'> {
  return select<'sort' | 'shuffle' | 'back'>({
    message: 'Queue:',
    choices: [
      { name: '↕️  Sort', value: 'sort' },
      { name: '🔀 Shuffle', value: 'shuffle' },
      { name: 'Back', value: 'back' },
    ],
  });
}

export async function promptQueueColumn(queue: Queue): Promise<QueueColumn> {
  return select<QueueColumn>({
    message: 'Sort by:',
    choices: QUEUE_COLUMNS.map((column) => ({
      name: column === queue.sortColumn && !queue.shuffled ? `${column} (${queue.sortOrder})` : column,
      value: column,
    })),
  });
}

export async function promptExtensionToggle(config: Config): Promise<string | null> {
  return select<string | null>({
    message: 'Switch a file type on or off:',
    choices: [
      ...config.extensions.map((ext) => ({
        name: `${config.selectedExtensions.includes(ext) ? '[x]' : '[ ]'} ${ext}`,
        value: ext,
      })),
      { name: 'Done', value: null },
    ],
  });
}
