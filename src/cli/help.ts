import { stderrText, supportsStderrColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsStderrColor
    ? `${stderrText.bold('pytodo')} ${stderrText.dim('— TODO blocks for Python projects')}`
    : 'pytodo — TODO blocks for Python projects';

  const lines = [
    title,
    '',
    'Usage: pytodo <command> [options]',
    '',
    formatSection('Commands', [
      ['help', 'Show this help'],
      ['init', 'Insert a template TODO block into files without one'],
      ['scan', 'Same as init; use list to see existing blocks'],
      ['add <file>', 'Add a TODO block to a file'],
      ['update <file:line>', 'Change priority, due date, assignee, description or status'],
      ['done <file:line>', 'Mark a TODO block as done (alias: complete)'],
      ['list (status)', 'List and filter TODO blocks'],
      ['clean', 'Remove done TODO blocks (--all: every block)'],
    ]),
    '',
    formatSection('Global flags', [
      ['--path, -p <dir>', 'Project root'],
      ['--config, -c <path>', 'Path to config file'],
      ['--dry-run', "Show changes, don't write"],
      ['--json', 'Output as JSON'],
      ['--help, -h', 'Show help'],
      ['--version', 'Show version'],
    ]),
    '',
    formatSection('Block format', [
      ['# <---TODO START--->', 'Start marker'],
      ['# key: value', 'description, priority (LOW/MEDIUM/HIGH), due (YYYY-MM-DD), assignee, done'],
      ['# <---TODO END--->', 'End marker'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .pytodo.json (walks up from cwd)'],
      ['Global config', '~/.config/pytodo/config.json'],
      ['Key fields', 'root, extensions, ignore, template'],
    ]),
    '',
    stderrText.dim('Run `pytodo <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsStderrColor ? stderrText.bold(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsStderrColor ? stderrText.bold(paddedName) : paddedName;
    const summary = supportsStderrColor ? stderrText.dim(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
