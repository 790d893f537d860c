/**
 * otl show - print the outline as indented text
 */

import fs from 'node:fs';
import { loadConfig, resolveFile } from '../config/loader.js';
import type { Outline } from '../model/outline.js';
import { readOutlineFile } from '../model/store.js';
import { flattenTree } from '../tree/flatten.js';
import { CliUsageError, FileNotFoundError } from './errors.js';
import { extractFlags, pickFlag, takePositionals } from './flag-utils.js';
import { dimText } from './terminal.js';

const USAGE = 'Usage: otl show [--filter <pattern>] [file]';

interface ShowOptions {
  file: string;
  pattern: string;
}

export function handleShowCommand(args: string[]): void {
  const options = parseShowFlags(args);
  if (!fs.existsSync(options.file)) {
    throw new FileNotFoundError(options.file);
  }
  const lines = formatOutline(readOutlineFile(options.file), options.pattern);
  console.log(lines.length > 0 ? lines.join('\n') : dimText('(empty)'));
}

export function printShowHelp(): void {
  console.log(`${USAGE}

Print every workspace and todo. With --filter, only todos whose text matches
the regular expression are printed, under the workspace that holds them.

Options:
  --filter, -F <pattern>  Regular expression matched against todo text
  --file, -f <path>       Outline file
  --config, -c <path>     Path to config file
  -h, --help              Show help
`);
}

function parseShowFlags(args: string[]): ShowOptions {
  const valueFlags = extractFlags(args, ['--config', '-c', '--file', '-f', '--filter', '-F']);
  const [positional] = takePositionals(args, 1, USAGE);

  const config = loadConfig(pickFlag(valueFlags, ['--config', '-c']));
  return {
    file: resolveFile(config, pickFlag(valueFlags, ['--file', '-f']) ?? positional),
    pattern: pickFlag(valueFlags, ['--filter', '-F']) ?? '',
  };
}

/** Workspaces as headings, todos as `- ` items with their due date. */
export function formatOutline(outline: Outline, pattern = ''): string[] {
  const workspaces = flattenTree({ roots: outline.children(), childrenOf: (node) => node.children(), expandAll: true });
  const lines: string[] = [];

  for (const row of workspaces.rows) {
    const workspace = outline.workspace(row.name);
    if (!workspace) continue;

    const todos = flattenTree({
      roots: workspace.todoRoot.children(),
      childrenOf: (node) => node.children(),
      pattern,
      expandAll: true,
    });
    if (todos.error) throw new CliUsageError(todos.error.message);
    if (pattern && todos.rows.length === 0) continue;

    const indent = pattern ? '' : '  '.repeat(row.depth);
    lines.push(`${indent}${workspace.getField('about') || workspace.name}`);
    for (const todo of todos.rows) {
      const due = todo.node.getField('due');
      const depth = pattern ? 1 : row.depth + 1 + todo.depth;
      lines.push(`${'  '.repeat(depth)}- ${todo.node.getField('about')}${due ? ` @${due}` : ''}`);
    }
  }
  return lines;
}
