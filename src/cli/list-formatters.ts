/**
 * Output formatters for the list command
 */

import type { ScanWarning } from '../parser/types.js';
import { countByPriority } from '../query/filters.js';
import type { SkippedFile } from '../scanner/types.js';
import { entryId, type TodoEntry } from '../schema/index.js';
import { isOverdue } from './date-utils.js';
import { serializeSkipped } from './report.js';
import { boldText, cyanText, dimText, redText } from './terminal.js';

function formatMetadata(entry: TodoEntry): string {
  const parts: string[] = [];
  if (entry.due) {
    parts.push(`due:${entry.due}`);
  }
  if (entry.assignee) {
    parts.push(`assignee:${entry.assignee}`);
  }
  return parts.length > 0 ? ` ${dimText(`[${parts.join(' ')}]`)}` : '';
}

/**
 * One line per entry: `[ ] app/main.py:3 HIGH Wire up retries [due:2024-01-01 assignee:alice]`
 */
export function formatEntryLine(entry: TodoEntry, today: Date): string {
  const checkbox = entry.done ? dimText('[x]') : '[ ]';
  const description = entry.done ? dimText(entry.description) : entry.description;
  const overdue = !entry.done && entry.due && isOverdue(entry.due, today) ? ` ${redText('(overdue)')}` : '';
  return `${checkbox} ${cyanText(entryId(entry))} ${entry.priority} ${description}${formatMetadata(entry)}${overdue}`;
}

/**
 * Entries grouped under their file, in walk order.
 */
export function formatGrouped(entries: readonly TodoEntry[], today: Date): string[] {
  const lines: string[] = [];
  let currentFile: string | null = null;

  for (const entry of entries) {
    if (entry.filePath !== currentFile) {
      if (currentFile !== null) {
        lines.push('');
      }
      lines.push(boldText(entry.filePath));
      currentFile = entry.filePath;
    }
    lines.push(`  ${formatEntryLine(entry, today)}`);
  }

  return lines;
}

export function formatFlat(entries: readonly TodoEntry[], today: Date): string[] {
  return entries.map((entry) => formatEntryLine(entry, today));
}

export function formatSummary(entries: readonly TodoEntry[]): string {
  const done = entries.filter((entry) => entry.done).length;
  const open = entries.length - done;
  const byPriority = countByPriority(entries.filter((entry) => !entry.done));
  return `${entries.length} TODO(s): ${open} open, ${done} done (open by priority: HIGH ${byPriority.HIGH}, MEDIUM ${byPriority.MEDIUM}, LOW ${byPriority.LOW})`;
}

export function formatJson(payload: {
  root: string;
  entries: readonly TodoEntry[];
  warnings: readonly ScanWarning[];
  skipped: readonly SkippedFile[];
}): string {
  return JSON.stringify(
    {
      root: payload.root,
      count: payload.entries.length,
      entries: payload.entries.map((entry) => ({ id: entryId(entry), ...entry })),
      warnings: payload.warnings,
      skipped: serializeSkipped(payload.skipped),
    },
    null,
    2
  );
}
