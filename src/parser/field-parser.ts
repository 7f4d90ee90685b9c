import { PriorityInputSchema, DueDateSchema, type TodoFields } from '../schema/index.js';
import type { FieldLine } from './types.js';

const FIELD_REGEX = /^([A-Za-z][\w-]*)\s*:(.*)$/;

const KEY_ALIASES: Record<string, keyof TodoFields> = {
  description: 'description',
  priority: 'priority',
  due: 'due',
  assignee: 'assignee',
  assigned: 'assignee',
  done: 'done',
};

const TRUE_VALUES = new Set(['true', 'yes', 'y', 'x']);
const FALSE_VALUES = new Set(['false', 'no', 'n', '']);

/**
 * Split the body of a comment line (text after `#`) into a key and a value.
 */
export function parseFieldLine(commentBody: string): FieldLine {
  const text = commentBody.trim();
  if (text === '') {
    return { kind: 'blank' };
  }
  const match = text.match(FIELD_REGEX);
  if (!match) {
    return { kind: 'malformed', text };
  }
  return {
    kind: 'field',
    key: (match[1] ?? '').toLowerCase(),
    value: (match[2] ?? '').trim(),
  };
}

export function resolveFieldKey(key: string): keyof TodoFields | null {
  return KEY_ALIASES[key.toLowerCase()] ?? null;
}

export function parseDone(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return null;
}

/**
 * Apply one field to `target`. Returns a warning message when the value is rejected.
 * Empty `due` and `assignee` values leave the field unset.
 */
export function applyFieldValue(target: Partial<TodoFields>, key: keyof TodoFields, value: string): string | null {
  switch (key) {
    case 'description':
      target.description = value;
      return null;

    case 'priority': {
      const parsed = PriorityInputSchema.safeParse(value);
      if (!parsed.success) {
        return `Invalid priority '${value}'. Use LOW, MEDIUM or HIGH.`;
      }
      target.priority = parsed.data;
      return null;
    }

    case 'due': {
      if (value === '') {
        delete target.due;
        return null;
      }
      const parsed = DueDateSchema.safeParse(value);
      if (!parsed.success) {
        return `Invalid due date '${value}'. Use YYYY-MM-DD.`;
      }
      target.due = parsed.data;
      return null;
    }

    case 'assignee':
      if (value === '') {
        delete target.assignee;
      } else {
        target.assignee = value;
      }
      return null;

    case 'done': {
      const done = parseDone(value);
      if (done === null) {
        return `Invalid done flag '${value}'. Use true or false.`;
      }
      target.done = done;
      return null;
    }
  }
}
