/**
 * pytodo init - Insert a template TODO block into every file that has none
 */

import { entryId } from '../schema/index.js';
import { initProject, type InitProjectResult } from '../sync/project-init.js';
import { extractBooleanFlags, extractFlags, rejectLeftoverArgs } from './flag-utils.js';
import { PROJECT_VALUE_FLAGS, projectOptions, resolveProjectContext, templateFields, type ProjectContext } from './project-context.js';
import { printSkippedFiles, printWarnings, serializeSkipped } from './report.js';
import { dimText, greenText } from './terminal.js';

interface InitOptions {
  context: ProjectContext;
  dryRun: boolean;
  json: boolean;
}

export function handleInitCommand(args: string[]): void {
  const options = parseInitFlags(args);
  runInit(options);
}

export function printInitHelp(): void {
  console.log(`Usage: pytodo init [options]

Scan the project and insert a template TODO block into every Python file
that has none. Files that already have a block are left untouched, so
running init again changes nothing. \`pytodo scan\` is the same command;
use \`pytodo list\` to see the blocks.

The block goes after the shebang, the encoding line and the module docstring.

Options:
  --path, -p <dir>       Project root (default: config root or .)
  --dry-run              Show what would change, don't write
  --json                 Output as JSON
  -c, --config <path>    Path to config file
  -h, --help             Show this help
`);
}

function parseInitFlags(args: string[]): InitOptions {
  const boolFlags = extractBooleanFlags(args, ['--dry-run', '--json']);
  const valueFlags = extractFlags(args, PROJECT_VALUE_FLAGS);
  rejectLeftoverArgs(args);

  return {
    context: resolveProjectContext(valueFlags),
    dryRun: boolFlags.has('--dry-run'),
    json: boolFlags.has('--json'),
  };
}

function runInit(options: InitOptions): void {
  const { context, dryRun, json } = options;

  const result = initProject(context.root, {
    ...projectOptions(context.config),
    template: templateFields(context.config),
    dryRun,
  });

  if (json) {
    console.log(JSON.stringify(toJson(result, dryRun), null, 2));
    return;
  }

  printWarnings(result.warnings);

  for (const entry of result.initialized) {
    const line = dryRun
      ? `→ Would initialize TODO block: ${entryId(entry)}`
      : `${greenText('✓')} Initialized TODO block: ${entryId(entry)}`;
    console.log(line);
  }

  console.log(
    `${dryRun ? 'Would initialize' : 'Initialized'} ${result.initialized.length} file(s); ${result.unchanged.length} already had TODO blocks.`
  );
  printSkippedFiles(result.failed);

  if (dryRun) {
    console.log(dimText('No files modified (dry run).'));
  }
}

function toJson(result: InitProjectResult, dryRun: boolean): object {
  return {
    success: true,
    dryRun,
    root: result.root,
    initialized: result.initialized.map((entry) => ({ file: entry.filePath, line: entry.startLine })),
    unchanged: result.unchanged,
    warnings: result.warnings,
    failed: serializeSkipped(result.failed),
  };
}
