/**
 * Find and read TODO blocks in Python source text.
 *
 *   # <---TODO START--->
 *   # description: Wire up the retry logic
 *   # priority: HIGH
 *   # done: false
 *   # <---TODO END--->
 */

import fs from 'node:fs';
import { AccessError, ParseError } from '../errors.js';
import { DEFAULT_PRIORITY, type TodoEntry, type TodoFields } from '../schema/index.js';
import { splitBom } from '../utils/bom.js';
import { applyFieldValue, parseFieldLine, resolveFieldKey } from './field-parser.js';
import type { ParsedTodoFile, ScanWarning } from './types.js';

export const START_MARKER = '<---TODO START--->';
export const END_MARKER = '<---TODO END--->';

const START_MARKER_REGEX = /^([ \t]*)#\s*<---TODO START--->\s*$/;
const END_MARKER_REGEX = /^[ \t]*#\s*<---TODO END--->\s*$/;
const COMMENT_LINE_REGEX = /^[ \t]*#([^\n]*)$/;

interface OpenBlock {
  startLine: number;
  indent: string;
  fields: Partial<TodoFields>;
  seenKeys: Set<keyof TodoFields>;
}

/**
 * Parse every TODO block in `content`.
 *
 * Bad field lines become warnings. Broken delimiters throw ParseError:
 * a start without an end, a nested start, a stray end, or a line inside
 * a block that is not a comment.
 */
export function parseTodoBlocks(content: string, filePath: string): ParsedTodoFile {
  const lines = splitBom(content).body.split('\n');
  const entries: TodoEntry[] = [];
  const warnings: ScanWarning[] = [];
  let open: OpenBlock | null = null;
  // The empty string after a final newline is not a line
  const lineCount = lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;

  for (let i = 0; i < lineCount; i++) {
    const line = lines[i] ?? '';
    const lineNumber = i + 1;

    const startMatch = line.match(START_MARKER_REGEX);
    if (startMatch) {
      if (open) {
        throw new ParseError(`TODO block opened at line ${open.startLine} has no end marker before the next start marker`, filePath, lineNumber);
      }
      open = { startLine: lineNumber, indent: startMatch[1] ?? '', fields: {}, seenKeys: new Set() };
      continue;
    }

    if (END_MARKER_REGEX.test(line)) {
      if (!open) {
        throw new ParseError('TODO end marker without a start marker', filePath, lineNumber);
      }
      entries.push(closeBlock(open, filePath, lineNumber));
      open = null;
      continue;
    }

    if (!open) {
      continue;
    }

    const commentMatch = line.match(COMMENT_LINE_REGEX);
    if (!commentMatch) {
      throw new ParseError(`Non-comment line inside the TODO block opened at line ${open.startLine}`, filePath, lineNumber);
    }

    const field = parseFieldLine(commentMatch[1] ?? '');
    if (field.kind === 'blank') {
      continue;
    }
    if (field.kind === 'malformed') {
      warnings.push({ file: filePath, line: lineNumber, message: `Ignoring malformed field line '${field.text}'` });
      continue;
    }

    const key = resolveFieldKey(field.key);
    if (!key) {
      warnings.push({ file: filePath, line: lineNumber, message: `Ignoring unknown field '${field.key}'` });
      continue;
    }
    if (open.seenKeys.has(key)) {
      warnings.push({ file: filePath, line: lineNumber, message: `Duplicate field '${key}'; the last value wins` });
    }
    open.seenKeys.add(key);

    const problem = applyFieldValue(open.fields, key, field.value);
    if (problem) {
      warnings.push({ file: filePath, line: lineNumber, message: problem });
    }
  }

  if (open) {
    throw new ParseError('TODO block has no end marker', filePath, open.startLine);
  }

  return { filePath, entries, warnings };
}

function closeBlock(open: OpenBlock, filePath: string, endLine: number): TodoEntry {
  const { fields } = open;
  const entry: TodoEntry = {
    filePath,
    startLine: open.startLine,
    endLine,
    indent: open.indent,
    description: fields.description ?? '',
    priority: fields.priority ?? DEFAULT_PRIORITY,
    done: fields.done ?? false,
  };
  if (fields.due !== undefined) entry.due = fields.due;
  if (fields.assignee !== undefined) entry.assignee = fields.assignee;
  return entry;
}

export function readSourceFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new AccessError(filePath, error);
  }
}

/**
 * Read a file and parse its TODO blocks. Throws AccessError or ParseError.
 */
export function parseTodoFile(filePath: string): ParsedTodoFile {
  return parseTodoBlocks(readSourceFile(filePath), filePath);
}
