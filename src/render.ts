import { basename } from 'node:path';
import chalk, { type ChalkInstance } from 'chalk';
import { formatDuration } from './metadata.js';
import { orderedEntries } from './queue.js';
import { collectTagFiles } from './tree.js';
import type { FileSystemNode, Queue, TagTreeNode } from './types.js';

export interface RenderOptions {
  /** Render collapsed nodes' children too. */
  all?: boolean;
  colors?: ChalkInstance;
}

const INDENT = '  ';

function marker(open: boolean): string {
  return open ? '▾' : '▸';
}

export function renderFileTree(node: FileSystemNode, options: RenderOptions = {}, depth = 0): string[] {
  const c = options.colors ?? chalk;
  const indent = INDENT.repeat(depth);

  if (node.kind === 'file') {
    return [`${indent}${c.gray('•')} ${node.name}`];
  }

  const open = node.expanded || options.all === true;
  const lines = [`${indent}${marker(open)} ${c.cyan(`${node.name}/`)}`];

  if (open) {
    for (const child of node.children) {
      lines.push(...renderFileTree(child, options, depth + 1));
    }
  }

  return lines;
}

export function renderTagForest(forest: readonly TagTreeNode[], options: RenderOptions = {}, depth = 0): string[] {
  const c = options.colors ?? chalk;
  const indent = INDENT.repeat(depth);
  const lines: string[] = [];

  for (const node of forest) {
    if (node.children.length === 0) {
      lines.push(`${indent}${c.gray('♪')} ${node.label}`);
      continue;
    }

    const open = node.expanded || options.all === true;
    const count = collectTagFiles(node).length;
    lines.push(`${indent}${marker(open)} ${c.cyan(node.label)} ${c.gray(`(${count})`)}`);

    if (open) {
      lines.push(...renderTagForest(node.children, options, depth + 1));
    }
  }

  return lines;
}

/** Numbered queue listing in display order, each track followed by its path. */
export function renderQueue(queue: Queue, options: RenderOptions = {}): string[] {
  const c = options.colors ?? chalk;
  const entries = orderedEntries(queue);
  const order = queue.shuffled ? 'shuffled' : `by ${queue.sortColumn}, ${queue.sortOrder}`;
  const lines = [c.cyan(`${entries.length} tracks, ${order}`)];

  for (const [index, entry] of entries.entries()) {
    const heading = [entry.creator, entry.title].filter(Boolean).join(' - ') || basename(entry.path);
    const duration = formatDuration(entry.durationMs);

    lines.push(`${c.gray(`${index + 1}.`)} ${heading}${duration ? c.gray(` [${duration}]`) : ''}`);
    lines.push(c.gray(`   ${entry.path}`));
  }

  return lines;
}
