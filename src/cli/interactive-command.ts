/**
 * otl interactive - two-pane outline editor
 */

import { loadConfig, resolveFile, type Config } from '../config/loader.js';
import { readOutlineFile, writeOutlineFile } from '../model/store.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { extractFlags, pickFlag, takePositionals } from './flag-utils.js';

interface InteractiveOptions {
  file: string;
  config: Config;
}

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  const options = parseInteractiveFlags(args);
  await runInteractive(options);
}

export function printInteractiveHelp(): void {
  console.log(`Usage: otl interactive [options] [file]

Open the outline in the full-screen editor. A missing file starts an empty
outline; the file is written back on quit.

Options:
  --file, -f <path>      Outline file
  --config, -c <path>    Path to config file
  -h, --help             Show help
`);
}

function parseInteractiveFlags(args: string[]): InteractiveOptions {
  const valueFlags = extractFlags(args, ['--config', '-c', '--file', '-f']);
  const [positional] = takePositionals(args, 1, 'Usage: otl interactive [options] [file]');

  const config = loadConfig(pickFlag(valueFlags, ['--config', '-c']));
  const file = resolveFile(config, pickFlag(valueFlags, ['--file', '-f']) ?? positional);
  return { file, config };
}

async function runInteractive(options: InteractiveOptions): Promise<void> {
  const { file, config } = options;

  console.log(`Loading ${file}…`);
  const outline = readOutlineFile(file);

  await runInteractiveTui({ outline, config });

  writeOutlineFile(outline, file);
  console.log(`Saved ${file}.`);
}
