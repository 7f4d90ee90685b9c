import { DueDateSchema, PriorityInputSchema, type Priority } from '../schema/index.js';
import { parseRelativeDate } from './date-utils.js';
import { CliUsageError } from './errors.js';
import { pickFlag, type FlagMap } from './flag-utils.js';

/** Value flags that set block fields. `--task` and `--assigned` are the older spellings. */
export const FIELD_VALUE_FLAGS = ['--description', '-d', '--task', '--priority', '--due', '--assignee', '--assigned'] as const;

export interface FieldFlagValues {
  description?: string;
  priority?: Priority;
  due?: string;
  assignee?: string;
}

export function parsePriorityFlag(raw: string): Priority {
  const parsed = PriorityInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliUsageError(`Invalid priority: '${raw}'. Use LOW, MEDIUM, HIGH (or 1-3).`);
  }
  return parsed.data;
}

/**
 * Accepts YYYY-MM-DD, 'today', 'tomorrow', '+3d' and '+2w'.
 */
export function parseDueFlag(raw: string, now: Date = new Date()): string {
  const resolved = parseRelativeDate(raw.trim(), now);
  const parsed = DueDateSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new CliUsageError(`Invalid due date: '${raw}'. Use YYYY-MM-DD, today, tomorrow or +Nd/+Nw.`);
  }
  return parsed.data;
}

export function readFieldFlags(valueFlags: FlagMap): FieldFlagValues {
  const values: FieldFlagValues = {};

  const description = pickFlag(valueFlags, '--description', '-d', '--task');
  if (description !== undefined) {
    values.description = description.replace(/\s+/g, ' ').trim();
  }

  const priority = pickFlag(valueFlags, '--priority');
  if (priority !== undefined) {
    values.priority = parsePriorityFlag(priority);
  }

  const due = pickFlag(valueFlags, '--due');
  if (due !== undefined) {
    values.due = parseDueFlag(due);
  }

  const assignee = pickFlag(valueFlags, '--assignee', '--assigned');
  if (assignee !== undefined) {
    const trimmed = assignee.replace(/\s+/g, ' ').trim();
    if (!trimmed) {
      throw new CliUsageError('Assignee must not be empty. Use --clear-assignee to remove it.');
    }
    values.assignee = trimmed;
  }

  return values;
}

export interface EntryRef {
  filePath: string;
  line: number;
}

/**
 * Parse `path/to/file.py:12`, the identity of a TODO block.
 */
export function parseEntryRef(ref: string | undefined, usage: string): EntryRef {
  if (!ref) {
    throw new CliUsageError(`Missing TODO reference. Usage: ${usage}`);
  }
  const colonIndex = ref.lastIndexOf(':');
  const filePath = colonIndex > 0 ? ref.slice(0, colonIndex) : '';
  const lineRaw = colonIndex > 0 ? ref.slice(colonIndex + 1) : '';

  if (!filePath || !/^\d+$/.test(lineRaw) || Number(lineRaw) < 1) {
    throw new CliUsageError(`Invalid TODO reference: '${ref}'. Expected '<file>:<line>' (e.g., 'app/main.py:3').`);
  }
  return { filePath, line: Number(lineRaw) };
}
