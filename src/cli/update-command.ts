/**
 * pytodo update - Change the fields of one TODO block
 */

import { entryId, type TodoPatch } from '../schema/index.js';
import { syncFile } from '../sync/synchronizer.js';
import { CliUsageError } from './errors.js';
import { FIELD_VALUE_FLAGS, parseEntryRef, readFieldFlags, type EntryRef } from './field-flags.js';
import { extractBooleanFlags, extractFlags, rejectLeftoverArgs } from './flag-utils.js';
import { printWarnings } from './report.js';
import { dimText, greenText } from './terminal.js';

const USAGE = 'pytodo update <file>:<line> [options]';

interface UpdateOptions {
  ref: EntryRef;
  patch: TodoPatch;
  dryRun: boolean;
  json: boolean;
}

export function handleUpdateCommand(args: string[]): void {
  const options = parseUpdateFlags(args);
  runUpdate(options);
}

export function printUpdateHelp(): void {
  console.log(`Usage: ${USAGE}

Update the TODO block that starts at <line> of <file>. Only the block's
lines are rewritten; the rest of the file is left as is.

Options:
  --description, -d <text>  New description
  --priority <level>        LOW, MEDIUM or HIGH
  --due <date>              YYYY-MM-DD, today, tomorrow, +3d, +2w
  --assignee <name>         New assignee
  --clear-due               Remove the due date
  --clear-assignee          Remove the assignee
  --done                    Mark as done
  --undone                  Mark as not done
  --dry-run                 Show what would change, don't write
  --json                    Output as JSON
  -h, --help                Show this help

Examples:
  pytodo update app/main.py:3 --priority HIGH --assignee bob
  pytodo update app/main.py:3 --clear-due --undone
`);
}

function parseUpdateFlags(args: string[]): UpdateOptions {
  const boolFlags = extractBooleanFlags(args, ['--clear-due', '--clear-assignee', '--done', '--undone', '--dry-run', '--json']);
  const valueFlags = extractFlags(args, FIELD_VALUE_FLAGS);
  const [refArg] = rejectLeftoverArgs(args, 1);
  const ref = parseEntryRef(refArg, USAGE);

  const values = readFieldFlags(valueFlags);
  const patch: TodoPatch = { ...values };

  if (boolFlags.has('--clear-due')) {
    if (values.due) {
      throw new CliUsageError('Use either --due or --clear-due, not both.');
    }
    patch.due = null;
  }
  if (boolFlags.has('--clear-assignee')) {
    if (values.assignee) {
      throw new CliUsageError('Use either --assignee or --clear-assignee, not both.');
    }
    patch.assignee = null;
  }
  if (boolFlags.has('--done') && boolFlags.has('--undone')) {
    throw new CliUsageError('Use either --done or --undone, not both.');
  }
  if (boolFlags.has('--done')) patch.done = true;
  if (boolFlags.has('--undone')) patch.done = false;

  if (Object.keys(patch).length === 0) {
    throw new CliUsageError(`Nothing to update. Usage: ${USAGE}`);
  }

  return {
    ref,
    patch,
    dryRun: boolFlags.has('--dry-run'),
    json: boolFlags.has('--json'),
  };
}

function runUpdate(options: UpdateOptions): void {
  const { ref, patch, dryRun, json } = options;

  const result = syncFile(ref.filePath, { type: 'update', startLine: ref.line, patch }, { dryRun });
  const id = `${ref.filePath}:${ref.line}`;

  if (json) {
    const entry = result.entry ? { id: entryId(result.entry), ...result.entry } : null;
    console.log(JSON.stringify({ success: true, dryRun, changed: result.changed, entry, warnings: result.warnings }, null, 2));
    return;
  }

  printWarnings(result.warnings);
  if (!result.changed) {
    console.log(`No changes: ${id}`);
    return;
  }
  console.log(`${dryRun ? 'Would update' : greenText('Updated')}: ${id}`);
  if (dryRun) {
    console.log(dimText('No files modified (dry run).'));
  }
}
