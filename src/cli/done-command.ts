import { syncFile } from '../sync/synchronizer.js';
import { parseEntryRef, type EntryRef } from './field-flags.js';
import { extractBooleanFlags, rejectLeftoverArgs } from './flag-utils.js';
import { printWarnings } from './report.js';
import { dimText, greenText } from './terminal.js';

const USAGE = 'pytodo done <file>:<line>';

interface DoneOptions {
  ref: EntryRef;
  dryRun: boolean;
  json: boolean;
}

export function handleDoneCommand(args: string[]): void {
  const options = parseDoneFlags(args);
  runDone(options);
}

export function printDoneHelp(): void {
  console.log(`Usage: ${USAGE} [options]

Mark a TODO block as done. Done blocks are removed by \`pytodo clean\`.
\`pytodo complete\` is the same command.

Arguments:
  <file>:<line>     File and start line of the block (as shown by \`pytodo list\`)

Options:
  --dry-run         Show what would change, don't write
  --json            Output as JSON
  -h, --help        Show this help

Examples:
  pytodo done app/main.py:3
`);
}

function parseDoneFlags(args: string[]): DoneOptions {
  const boolFlags = extractBooleanFlags(args, ['--dry-run', '--json']);
  const [refArg] = rejectLeftoverArgs(args, 1);

  return {
    ref: parseEntryRef(refArg, USAGE),
    dryRun: boolFlags.has('--dry-run'),
    json: boolFlags.has('--json'),
  };
}

function runDone(options: DoneOptions): void {
  const { ref, dryRun, json } = options;
  const id = `${ref.filePath}:${ref.line}`;

  const result = syncFile(ref.filePath, { type: 'update', startLine: ref.line, patch: { done: true } }, { dryRun });
  const description = result.entry?.description ?? '';
  const wasDone = result.previous?.done ?? false;

  if (json) {
    console.log(
      JSON.stringify(
        {
          success: true,
          id,
          description,
          previousStatus: wasDone ? 'done' : 'open',
          newStatus: 'done',
          dryRun,
        },
        null,
        2
      )
    );
    return;
  }

  printWarnings(result.warnings);
  if (wasDone) {
    console.log(`Already done: ${id} (${description})`);
    return;
  }
  console.log(`${dryRun ? 'Would mark as done:' : greenText('Marked as done:')} ${id} (${description})`);
  if (dryRun) {
    console.log(dimText('No files modified (dry run).'));
  }
}
