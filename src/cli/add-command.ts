/**
 * pytodo add - Add a TODO block to one file
 */

import { loadConfig } from '../config/loader.js';
import { entryId, type TodoFields } from '../schema/index.js';
import { syncFile } from '../sync/synchronizer.js';
import { CliUsageError } from './errors.js';
import { FIELD_VALUE_FLAGS, readFieldFlags } from './field-flags.js';
import { extractBooleanFlags, extractFlags, pickFlag, rejectLeftoverArgs } from './flag-utils.js';
import { printWarnings } from './report.js';
import { dimText, greenText } from './terminal.js';

interface AddOptions {
  filePath: string;
  fields: TodoFields;
  dryRun: boolean;
  json: boolean;
}

export function handleAddCommand(args: string[]): void {
  const options = parseAddFlags(args);
  runAdd(options);
}

export function printAddHelp(): void {
  console.log(`Usage: pytodo add <file> --description <text> [options]

Add a TODO block to a Python file. The new block goes after the file's
last TODO block, or after the module docstring when it has none.

Options:
  --description, -d <text>  Task description (required; --task also works)
  --priority <level>        LOW, MEDIUM or HIGH (default: config template, MEDIUM)
  --due <date>              YYYY-MM-DD, today, tomorrow, +3d, +2w
  --assignee <name>         Person responsible
  --dry-run                 Show what would change, don't write
  --json                    Output as JSON
  -c, --config <path>       Path to config file
  -h, --help                Show this help

Examples:
  pytodo add app/main.py -d "Handle timeouts" --priority HIGH --due 2024-06-01
  pytodo add app/db.py --task "Add index" --assignee alice
`);
}

function parseAddFlags(args: string[]): AddOptions {
  const boolFlags = extractBooleanFlags(args, ['--dry-run', '--json']);
  const valueFlags = extractFlags(args, [...FIELD_VALUE_FLAGS, '--file', '--config', '-c']);
  const positionals = rejectLeftoverArgs(args, 1);

  const filePath = positionals[0] ?? pickFlag(valueFlags, '--file');
  if (!filePath) {
    throw new CliUsageError('Missing file. Usage: pytodo add <file> --description <text>');
  }

  const values = readFieldFlags(valueFlags);
  if (!values.description) {
    throw new CliUsageError('Missing --description. Usage: pytodo add <file> --description <text>');
  }

  const config = loadConfig(pickFlag(valueFlags, '--config', '-c'));
  const fields: TodoFields = {
    description: values.description,
    priority: values.priority ?? config.template.priority,
    done: false,
  };
  if (values.due) fields.due = values.due;
  if (values.assignee) fields.assignee = values.assignee;

  return {
    filePath,
    fields,
    dryRun: boolFlags.has('--dry-run'),
    json: boolFlags.has('--json'),
  };
}

function runAdd(options: AddOptions): void {
  const { filePath, fields, dryRun, json } = options;

  const result = syncFile(filePath, { type: 'add', fields }, { dryRun });
  const entry = result.entry;
  if (!entry) {
    throw new Error(`${filePath}: the new TODO block could not be located after insertion`);
  }

  if (json) {
    console.log(JSON.stringify({ success: true, dryRun, entry: { id: entryId(entry), ...entry }, warnings: result.warnings }, null, 2));
    return;
  }

  printWarnings(result.warnings);
  const verb = dryRun ? 'Would add' : greenText('Added');
  console.log(`${verb} TODO block: ${entryId(entry)}`);
  console.log(`  ${entry.priority} ${entry.description}`);
  if (dryRun) {
    console.log(dimText('No files modified (dry run).'));
  }
}
