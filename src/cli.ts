#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleInteractiveCommand, printInteractiveHelp } from './cli/interactive-command.js';
import { handleShowCommand, printShowHelp } from './cli/show-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';
const COMMANDS = new Set(['interactive', 'i', 'show', 'help']);

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  // No command, or a bare file name, opens the editor.
  const command = firstArg !== undefined && COMMANDS.has(firstArg) ? (args.shift() ?? 'interactive') : 'interactive';

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  const showHelp = helpFlags.size > 0;

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'show':
        if (showHelp) {
          printShowHelp();
        } else {
          handleShowCommand(args);
        }
        break;

      default:
        if (showHelp) {
          printInteractiveHelp();
        } else {
          await handleInteractiveCommand(args);
        }
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
