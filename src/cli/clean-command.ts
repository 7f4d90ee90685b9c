/**
 * pytodo clean - Remove resolved TODO blocks before a release
 */

import { cleanProject, isCleanupAll, isDone, type CleanupResult } from '../cleanup/cleaner.js';
import { extractBooleanFlags, extractFlags, rejectLeftoverArgs } from './flag-utils.js';
import { PROJECT_VALUE_FLAGS, projectOptions, resolveProjectContext, type ProjectContext } from './project-context.js';
import { printSkippedFiles, printWarnings, serializeSkipped } from './report.js';
import { dimText, greenText } from './terminal.js';

interface CleanOptions {
  context: ProjectContext;
  all: boolean;
  dryRun: boolean;
  json: boolean;
}

export function handleCleanCommand(args: string[]): void {
  const options = parseCleanFlags(args);
  runClean(options);
}

export function printCleanHelp(): void {
  console.log(`Usage: pytodo clean [options]

Remove TODO blocks marked \`done: true\` from every Python file of the
project. Each file is rewritten once; everything outside the removed
blocks stays byte for byte.

Options:
  --path, -p <dir>       Project root (default: config root or .)
  --all                  Remove every TODO block, done or not (production build)
  --dry-run              Show what would be removed, don't write
  --json                 Output as JSON
  -c, --config <path>    Path to config file
  -h, --help             Show this help
`);
}

function parseCleanFlags(args: string[]): CleanOptions {
  const boolFlags = extractBooleanFlags(args, ['--all', '--dry-run', '--json']);
  const valueFlags = extractFlags(args, PROJECT_VALUE_FLAGS);
  rejectLeftoverArgs(args);

  return {
    context: resolveProjectContext(valueFlags),
    all: boolFlags.has('--all'),
    dryRun: boolFlags.has('--dry-run'),
    json: boolFlags.has('--json'),
  };
}

function runClean(options: CleanOptions): void {
  const { context, all, dryRun, json } = options;

  const result = cleanProject(context.root, {
    ...projectOptions(context.config),
    predicate: all ? isCleanupAll : isDone,
    dryRun,
  });

  if (json) {
    console.log(JSON.stringify(toJson(result, dryRun), null, 2));
    return;
  }

  printWarnings(result.warnings);

  for (const file of result.files) {
    const prefix = dryRun ? '→' : greenText('✓');
    const action = dryRun ? 'would remove' : 'removed';
    console.log(`${prefix} ${file.filePath}: ${action} ${file.removed.length} TODO block(s)`);
  }

  console.log(`${dryRun ? 'Would remove' : 'Removed'} ${result.removedCount} TODO block(s) from ${result.files.length} file(s).`);
  printSkippedFiles(result.failed, 'Could not edit');

  if (dryRun) {
    console.log(dimText('No files modified (dry run).'));
  }
}

function toJson(result: CleanupResult, dryRun: boolean): object {
  return {
    success: true,
    dryRun,
    root: result.root,
    removed: result.removedCount,
    files: result.files.map((file) => ({
      file: file.filePath,
      lines: file.removed.map((entry) => entry.startLine),
    })),
    warnings: result.warnings,
    failed: serializeSkipped(result.failed),
  };
}
