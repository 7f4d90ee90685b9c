/**
 * Plan and apply TODO block changes for a single file.
 *
 * Planning is pure (text in, edit out); `syncFile` reads, plans, applies and
 * writes through `writeFileAtomic`.
 */

import { TodoNotFoundError } from '../errors.js';
import { parseTodoBlocks, readSourceFile } from '../parser/block-parser.js';
import type { ScanWarning } from '../parser/types.js';
import { entryFields, type TodoEntry, type TodoFields, type TodoPatch } from '../schema/index.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import { splitBom } from '../utils/bom.js';
import { applyBlockEdits, type BlockEdit } from './block-edits.js';
import { detectEol, renderTodoBlock } from './block-renderer.js';
import { findInsertionLine } from './placement.js';

export type SyncOperation =
  | { type: 'init'; template: TodoFields }
  | { type: 'add'; fields: TodoFields }
  | { type: 'update'; startLine: number; patch: TodoPatch }
  | { type: 'remove'; startLine: number };

export interface SyncOptions {
  dryRun?: boolean;
}

export interface FileSyncResult {
  filePath: string;
  changed: boolean;
  /** The block created, updated or removed; absent when `init` found an existing block. */
  entry?: TodoEntry;
  /** The block as it was before an update. */
  previous?: TodoEntry;
  /** Field warnings from parsing the file before the change. */
  warnings: ScanWarning[];
  content: string;
}

export function mergePatch(fields: TodoFields, patch: TodoPatch): TodoFields {
  const merged: TodoFields = { ...fields };
  if (patch.description !== undefined) merged.description = patch.description;
  if (patch.priority !== undefined) merged.priority = patch.priority;
  if (patch.done !== undefined) merged.done = patch.done;

  if (patch.due === null) delete merged.due;
  else if (patch.due !== undefined) merged.due = patch.due;

  if (patch.assignee === null) delete merged.assignee;
  else if (patch.assignee !== undefined) merged.assignee = patch.assignee;

  return merged;
}

/**
 * Insert the template block when the file has none. Returns null otherwise.
 */
export function planInit(content: string, entries: readonly TodoEntry[], template: TodoFields): BlockEdit | null {
  if (entries.length > 0) {
    return null;
  }
  return {
    kind: 'insert',
    beforeLine: findInsertionLine(content),
    lines: renderTodoBlock(template, { eol: detectEol(content) }),
  };
}

/**
 * Insert a new block right after the last existing one, or at the insertion line.
 */
export function planAdd(content: string, entries: readonly TodoEntry[], fields: TodoFields): Extract<BlockEdit, { kind: 'insert' }> {
  const last = entries[entries.length - 1];
  const beforeLine = last ? last.endLine + 1 : findInsertionLine(content);
  return {
    kind: 'insert',
    beforeLine,
    lines: renderTodoBlock(fields, { indent: last?.indent ?? '', eol: detectEol(content) }),
  };
}

/**
 * Re-render a block with the patch applied. Returns null when nothing would change.
 */
export function planUpdate(content: string, entry: TodoEntry, patch: TodoPatch): BlockEdit | null {
  const rendered = renderTodoBlock(mergePatch(entryFields(entry), patch), {
    indent: entry.indent,
    eol: detectEol(content),
  });
  const current = splitBom(content).body.split('\n').slice(entry.startLine - 1, entry.endLine);

  if (rendered.length === current.length && rendered.every((line, i) => line === current[i])) {
    return null;
  }
  return { kind: 'replace', startLine: entry.startLine, endLine: entry.endLine, lines: rendered };
}

export function planRemove(entry: TodoEntry): BlockEdit {
  return { kind: 'remove', startLine: entry.startLine, endLine: entry.endLine };
}

export function findEntryAt(entries: readonly TodoEntry[], filePath: string, startLine: number): TodoEntry {
  const entry = entries.find((candidate) => candidate.startLine === startLine);
  if (!entry) {
    throw new TodoNotFoundError(filePath, startLine);
  }
  return entry;
}

/**
 * Apply one operation to a file. Throws AccessError, ParseError, WriteError or TodoNotFoundError.
 */
export function syncFile(filePath: string, operation: SyncOperation, options: SyncOptions = {}): FileSyncResult {
  const original = readSourceFile(filePath);
  const parsed = parseTodoBlocks(original, filePath);

  let edit: BlockEdit | null = null;
  let targetLine: number | null = null;
  let removed: TodoEntry | undefined;
  let previous: TodoEntry | undefined;

  switch (operation.type) {
    case 'init':
      edit = planInit(original, parsed.entries, operation.template);
      targetLine = edit?.kind === 'insert' ? edit.beforeLine : null;
      break;

    case 'add': {
      const insert = planAdd(original, parsed.entries, operation.fields);
      edit = insert;
      targetLine = insert.beforeLine;
      break;
    }

    case 'update': {
      const entry = findEntryAt(parsed.entries, filePath, operation.startLine);
      edit = planUpdate(original, entry, operation.patch);
      targetLine = entry.startLine;
      previous = entry;
      break;
    }

    case 'remove':
      removed = findEntryAt(parsed.entries, filePath, operation.startLine);
      edit = planRemove(removed);
      targetLine = null;
      break;
  }

  const content = edit ? applyBlockEdits(original, [edit]) : original;
  const changed = content !== original;

  if (changed && !options.dryRun) {
    writeFileAtomic(filePath, content);
  }

  const result: FileSyncResult = { filePath, changed, warnings: parsed.warnings, content };
  if (previous) {
    result.previous = previous;
  }
  if (removed) {
    result.entry = removed;
  } else if (targetLine !== null) {
    result.entry = parseTodoBlocks(content, filePath).entries.find((entry) => entry.startLine === targetLine);
  }
  return result;
}
