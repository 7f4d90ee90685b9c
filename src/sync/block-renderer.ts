import { END_MARKER, START_MARKER } from '../parser/block-parser.js';
import type { TodoFields } from '../schema/index.js';

export interface RenderOptions {
  indent?: string;
  /** Line terminator of the target file; only the `\r` of CRLF is kept on each line. */
  eol?: '\n' | '\r\n';
}

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Render a TODO block as lines without terminators.
 */
export function renderTodoBlock(fields: TodoFields, options: RenderOptions = {}): string[] {
  const indent = options.indent ?? '';
  const suffix = options.eol === '\r\n' ? '\r' : '';

  const body: string[] = [
    `description: ${singleLine(fields.description)}`.trimEnd(),
    `priority: ${fields.priority}`,
  ];
  if (fields.due) {
    body.push(`due: ${fields.due}`);
  }
  const assignee = fields.assignee ? singleLine(fields.assignee) : '';
  if (assignee) {
    body.push(`assignee: ${assignee}`);
  }
  body.push(`done: ${fields.done}`);

  return [START_MARKER, ...body, END_MARKER].map((text) => `${indent}# ${text}${suffix}`);
}

export function detectEol(content: string): '\n' | '\r\n' {
  return content.includes('\r\n') ? '\r\n' : '\n';
}
