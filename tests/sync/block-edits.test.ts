import { describe, expect, it } from 'vitest';
import { applyBlockEdits } from '../../src/sync/block-edits.js';

describe('applyBlockEdits', () => {
  const content = ['one', 'two', 'three', 'four', ''].join('\n');

  it('applies edits bottom-up against the original line numbers', () => {
    const result = applyBlockEdits(content, [
      { kind: 'insert', beforeLine: 1, lines: ['zero'] },
      { kind: 'remove', startLine: 2, endLine: 3 },
      { kind: 'replace', startLine: 4, endLine: 4, lines: ['FOUR', 'FIVE'] },
    ]);

    expect(result).toBe(['zero', 'one', 'FOUR', 'FIVE', ''].join('\n'));
  });

  it('appends at the end of a file without a trailing newline', () => {
    expect(applyBlockEdits('x = 1', [{ kind: 'insert', beforeLine: 2, lines: ['# tail'] }])).toBe('x = 1\n# tail');
  });

  it('keeps the newline above a block that ends the file without one', () => {
    expect(applyBlockEdits('x = 1\n# a\n# b', [{ kind: 'remove', startLine: 2, endLine: 3 }])).toBe('x = 1\n');
    expect(applyBlockEdits('# a\n# b', [{ kind: 'remove', startLine: 1, endLine: 2 }])).toBe('');
  });

  it('keeps a byte-order mark at the start of the file', () => {
    expect(applyBlockEdits('\uFEFFimport os\n', [{ kind: 'insert', beforeLine: 1, lines: ['# t'] }])).toBe(
      '\uFEFF# t\nimport os\n'
    );
  });

  it('returns the content unchanged without edits', () => {
    expect(applyBlockEdits(content, [])).toBe(content);
  });
});
