import { z } from 'zod';
import { parseDate } from '../cli/date-utils.js';

export const PRIORITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;

export const PrioritySchema = z.enum(PRIORITIES);
export type Priority = z.infer<typeof PrioritySchema>;

export const DEFAULT_PRIORITY: Priority = 'MEDIUM';

const NUMERIC_PRIORITIES: Record<string, Priority> = {
  '1': 'LOW',
  '2': 'MEDIUM',
  '3': 'HIGH',
};

/**
 * Accepts `low`, `Medium`, `HIGH` and the numeric levels 1-3.
 */
export const PriorityInputSchema = z
  .string()
  .trim()
  .transform((value) => NUMERIC_PRIORITIES[value] ?? value.toUpperCase())
  .pipe(PrioritySchema);

export const DueDateSchema = z
  .string()
  .trim()
  .refine((value) => parseDate(value) !== null, {
    message: 'Due date must be a real date in YYYY-MM-DD format',
  });

export const TodoFieldsSchema = z.object({
  description: z.string(),
  priority: PrioritySchema,
  due: DueDateSchema.optional(),
  assignee: z.string().min(1).optional(),
  done: z.boolean(),
});
export type TodoFields = z.infer<typeof TodoFieldsSchema>;

export const TodoEntrySchema = TodoFieldsSchema.extend({
  filePath: z.string(),
  startLine: z.number().int().positive(), // 1-indexed, start marker
  endLine: z.number().int().positive(), // 1-indexed, end marker
  indent: z.string(),
});
export type TodoEntry = z.infer<typeof TodoEntrySchema>;

/**
 * Field changes for an existing block. `null` clears an optional field.
 */
export interface TodoPatch {
  description?: string;
  priority?: Priority;
  due?: string | null;
  assignee?: string | null;
  done?: boolean;
}

export function entryFields(entry: TodoEntry): TodoFields {
  const fields: TodoFields = {
    description: entry.description,
    priority: entry.priority,
    done: entry.done,
  };
  if (entry.due !== undefined) fields.due = entry.due;
  if (entry.assignee !== undefined) fields.assignee = entry.assignee;
  return fields;
}

export function entryId(entry: Pick<TodoEntry, 'filePath' | 'startLine'>): string {
  return `${entry.filePath}:${entry.startLine}`;
}
