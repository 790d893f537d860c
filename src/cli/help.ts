import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor ? `${boldText('otl')} ${dimText('- outline of workspaces and todos')}` : 'otl - outline of workspaces and todos';

  const lines = [
    title,
    '',
    'Usage: otl [command] [options] [file]',
    '',
    formatSection('Commands', [
      ['interactive (i) [file]', 'Open the two-pane editor (default)'],
      ['show [file]', 'Print the outline with every level expanded'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--file, -f <path>', 'Outline file (default from config, else outline.json)'],
      ['--config, -c <path>', 'Path to config file'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Keys', [
      ['j / k', 'Move down / up'],
      ['J / K', 'Move the item down / up among its siblings'],
      ['g / G', 'First / last row'],
      ['z / Z', 'Toggle expand here / on the parent'],
      ['a / A', 'Add a sibling / a child'],
      ['i / d', 'Edit the text / the due date'],
      ['x', 'Remove the item and everything under it'],
      ['s', 'Sort the sibling group'],
      ['/ / ESC', 'Filter by regular expression / clear it'],
      ['TAB', 'Switch pane'],
      ['q / CTRL_C', 'Save and quit'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .otl.json (walks up from cwd)'],
      ['Global config', '~/.config/otl/config.json'],
    ]),
    '',
    dimText('Run `otl <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
