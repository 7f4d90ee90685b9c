/**
 * Filtering and sorting of TODO entries for reports.
 */

import { isOverdue } from '../cli/date-utils.js';
import type { Priority, TodoEntry } from '../schema/index.js';

export type EntryFilter = (entry: TodoEntry) => boolean;

export type StatusFilter = 'open' | 'done' | 'all';

export const SORT_FIELDS = ['location', 'due', 'priority', 'assignee', 'description'] as const;
export type SortField = (typeof SORT_FIELDS)[number];

export interface FilterOptions {
  priority?: Priority;
  assignee?: string;
  overdue?: boolean;
  status?: StatusFilter;
  /** Reference day for `overdue`. */
  today?: Date;
}

export function buildFilters(options: FilterOptions): EntryFilter[] {
  const filters: EntryFilter[] = [];

  if (options.priority) {
    const priority = options.priority;
    filters.push((entry) => entry.priority === priority);
  }

  if (options.assignee !== undefined) {
    const assignee = options.assignee.toLowerCase();
    filters.push((entry) => entry.assignee?.toLowerCase() === assignee);
  }

  if (options.overdue) {
    const today = options.today ?? new Date();
    filters.push((entry) => !entry.done && entry.due !== undefined && isOverdue(entry.due, today));
  }

  if (options.status === 'open') {
    filters.push((entry) => !entry.done);
  } else if (options.status === 'done') {
    filters.push((entry) => entry.done);
  }

  return filters;
}

export function filterEntries(entries: readonly TodoEntry[], options: FilterOptions): TodoEntry[] {
  const filters = buildFilters(options);
  return entries.filter((entry) => filters.every((filter) => filter(entry)));
}

function compareOptional(a: string | undefined, b: string | undefined): number {
  if (a === undefined && b === undefined) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return a.localeCompare(b);
}

const PRIORITY_RANK: Record<Priority, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };

function compareBy(field: SortField): (a: TodoEntry, b: TodoEntry) => number {
  switch (field) {
    case 'location':
      return () => 0;
    case 'due':
      return (a, b) => compareOptional(a.due, b.due);
    case 'priority':
      return (a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
    case 'assignee':
      return (a, b) => compareOptional(a.assignee?.toLowerCase(), b.assignee?.toLowerCase());
    case 'description':
      return (a, b) => a.description.toLowerCase().localeCompare(b.description.toLowerCase());
  }
}

/**
 * Stable sort; ties keep walk order. `reverse` flips the whole order,
 * so entries without a due date or assignee come first.
 */
export function sortEntries(entries: readonly TodoEntry[], field: SortField = 'location', reverse = false): TodoEntry[] {
  const compare = compareBy(field);
  const sorted = [...entries].sort(compare);
  return reverse ? sorted.reverse() : sorted;
}

export function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some((field) => field === value);
}

export function isStatusFilter(value: string): value is StatusFilter {
  return value === 'open' || value === 'done' || value === 'all';
}

export function countByPriority(entries: readonly TodoEntry[]): Record<Priority, number> {
  const counts: Record<Priority, number> = { LOW: 0, MEDIUM: 0, HIGH: 0 };
  for (const entry of entries) {
    counts[entry.priority]++;
  }
  return counts;
}
