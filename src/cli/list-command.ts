/**
 * pytodo list - Report TODO blocks across the project
 */

import { filterEntries, isSortField, isStatusFilter, sortEntries, SORT_FIELDS, type FilterOptions, type SortField } from '../query/filters.js';
import { scanProject } from '../scanner/project-scanner.js';
import { CliUsageError } from './errors.js';
import { parsePriorityFlag } from './field-flags.js';
import { extractBooleanFlags, extractFlags, pickFlag, rejectLeftoverArgs } from './flag-utils.js';
import { formatFlat, formatGrouped, formatJson, formatSummary } from './list-formatters.js';
import { PROJECT_VALUE_FLAGS, projectOptions, resolveProjectContext, type ProjectContext } from './project-context.js';
import { printSkippedFiles, printWarnings } from './report.js';
import { dimText } from './terminal.js';

interface ListOptions {
  context: ProjectContext;
  filters: FilterOptions;
  sortBy: SortField;
  reverse: boolean;
  json: boolean;
}

export function handleListCommand(args: string[]): void {
  const options = parseListFlags(args);
  runList(options);
}

export function printListHelp(): void {
  console.log(`Usage: pytodo list [options]

List TODO blocks across all Python files of the project.

Options:
  --path, -p <dir>       Project root (default: config root or .)
  --priority <level>     Only LOW, MEDIUM or HIGH
  --assignee <name>      Only blocks assigned to <name> (case-insensitive)
  --overdue              Only open blocks whose due date has passed
  --status <status>      open, done or all (default: all)
  --sort <field>         ${SORT_FIELDS.join(', ')} (default: location)
  --reverse              Reverse the sort order
  --json                 Output as JSON
  -c, --config <path>    Path to config file
  -h, --help             Show this help

Examples:
  pytodo list --path src
  pytodo list --assignee alice --status open
  pytodo list --overdue --sort due
`);
}

function parseListFlags(args: string[]): ListOptions {
  const boolFlags = extractBooleanFlags(args, ['--overdue', '--reverse', '--json']);
  const valueFlags = extractFlags(args, [...PROJECT_VALUE_FLAGS, '--priority', '--assignee', '--status', '--sort']);
  rejectLeftoverArgs(args);

  const filters: FilterOptions = { overdue: boolFlags.has('--overdue') };

  const priority = pickFlag(valueFlags, '--priority');
  if (priority !== undefined) {
    filters.priority = parsePriorityFlag(priority);
  }

  const assignee = pickFlag(valueFlags, '--assignee');
  if (assignee !== undefined) {
    filters.assignee = assignee.trim();
  }

  const status = pickFlag(valueFlags, '--status') ?? 'all';
  if (!isStatusFilter(status)) {
    throw new CliUsageError(`Invalid status: '${status}'. Use open, done or all.`);
  }
  filters.status = status;

  const sortBy = pickFlag(valueFlags, '--sort') ?? 'location';
  if (!isSortField(sortBy)) {
    throw new CliUsageError(`Invalid sort: '${sortBy}'. Use ${SORT_FIELDS.join(', ')}.`);
  }

  return {
    context: resolveProjectContext(valueFlags),
    filters,
    sortBy,
    reverse: boolFlags.has('--reverse'),
    json: boolFlags.has('--json'),
  };
}

function runList(options: ListOptions): void {
  const { context, filters, sortBy, reverse, json } = options;
  const today = filters.today ?? new Date();

  const scan = scanProject(context.root, projectOptions(context.config));
  const entries = sortEntries(filterEntries(scan.entries, { ...filters, today }), sortBy, reverse);

  if (json) {
    console.log(formatJson({ root: scan.root, entries, warnings: scan.warnings, skipped: scan.skipped }));
    return;
  }

  printWarnings(scan.warnings);
  printSkippedFiles(scan.skipped);

  if (entries.length === 0) {
    console.log(dimText('No TODO blocks found.'));
    return;
  }

  const grouped = sortBy === 'location' && !reverse;
  const lines = grouped ? formatGrouped(entries, today) : formatFlat(entries, today);
  console.log(lines.join('\n'));
  console.log('');
  console.log(formatSummary(entries));
}
