import { splitBom } from '../utils/bom.js';

export type BlockEdit =
  | { kind: 'insert'; beforeLine: number; lines: string[] }
  | { kind: 'replace'; startLine: number; endLine: number; lines: string[] }
  | { kind: 'remove'; startLine: number; endLine: number };

function anchorLine(edit: BlockEdit): number {
  return edit.kind === 'insert' ? edit.beforeLine : edit.startLine;
}

/**
 * Apply line edits (1-indexed, ranges inclusive) to `content`.
 * Edits run bottom-up so earlier line numbers stay valid; lines outside the edits are kept byte for byte.
 * A leading byte-order mark stays at offset 0.
 */
export function applyBlockEdits(content: string, edits: readonly BlockEdit[]): string {
  const { bom, body } = splitBom(content);
  const lines = body.split('\n');
  const ordered = [...edits].sort((a, b) => anchorLine(b) - anchorLine(a));

  for (const edit of ordered) {
    switch (edit.kind) {
      case 'insert':
        lines.splice(edit.beforeLine - 1, 0, ...edit.lines);
        break;
      case 'replace':
        lines.splice(edit.startLine - 1, edit.endLine - edit.startLine + 1, ...edit.lines);
        break;
      case 'remove': {
        // A block ending the file without a final newline: keep the newline of the line above it
        const endsFile = edit.endLine === lines.length && edit.startLine > 1;
        lines.splice(edit.startLine - 1, edit.endLine - edit.startLine + 1, ...(endsFile ? [''] : []));
        break;
      }
    }
  }

  return bom + lines.join('\n');
}
