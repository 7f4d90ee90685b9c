import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { handleCleanCommand } from '../../src/cli/clean-command.js';
import { block, enterCliProject, readFile, writeFiles, type CliHarness } from '../helpers.js';

let cli: CliHarness;

const DONE_BLOCK = block({ description: 'Ship it', due: '2024-01-01', done: 'true' });
const OPEN_BLOCK = block({ description: 'Keep me', priority: 'HIGH' });

beforeEach(() => {
  cli = enterCliProject('cli-clean');
  writeFiles(cli.dir, {
    'a.py': `import os\n${DONE_BLOCK}\nx = 1\n`,
    'b.py': `${OPEN_BLOCK}\n${DONE_BLOCK}\n`,
    'c.py': 'print("untouched")\n',
  });
});

afterEach(() => {
  cli.restore();
});

describe('pytodo clean', () => {
  it('removes done blocks', () => {
    handleCleanCommand([]);

    expect(cli.stdout()).toEqual([
      '✓ a.py: removed 1 TODO block(s)',
      '✓ b.py: removed 1 TODO block(s)',
      'Removed 2 TODO block(s) from 2 file(s).',
    ]);
    expect(readFile(cli.dir, 'a.py')).toBe('import os\nx = 1\n');
    expect(readFile(cli.dir, 'b.py')).toBe(`${OPEN_BLOCK}\n`);
    expect(readFile(cli.dir, 'c.py')).toBe('print("untouched")\n');
  });

  it('removes every block with --all', () => {
    handleCleanCommand(['--all']);

    expect(cli.stdout().at(-1)).toBe('Removed 3 TODO block(s) from 2 file(s).');
    expect(readFile(cli.dir, 'b.py')).toBe('');
  });

  it('only reports on a dry run', () => {
    handleCleanCommand(['--dry-run']);

    expect(cli.stdout()).toEqual([
      '→ a.py: would remove 1 TODO block(s)',
      '→ b.py: would remove 1 TODO block(s)',
      'Would remove 2 TODO block(s) from 2 file(s).',
      'No files modified (dry run).',
    ]);
    expect(readFile(cli.dir, 'a.py')).toBe(`import os\n${DONE_BLOCK}\nx = 1\n`);
  });

  it('skips broken files and carries on', () => {
    writeFiles(cli.dir, { 'broken.py': '# <---TODO END--->\n' });

    handleCleanCommand([]);

    expect(cli.stderr()).toEqual(['Could not edit 1 file(s):', '  broken.py:1: TODO end marker without a start marker']);
    expect(readFile(cli.dir, 'a.py')).toBe('import os\nx = 1\n');
  });

  it('prints JSON', () => {
    handleCleanCommand(['--json']);

    expect(JSON.parse(cli.stdout().join('\n'))).toEqual({
      success: true,
      dryRun: false,
      root: '.',
      removed: 2,
      files: [
        { file: 'a.py', lines: [2] },
        { file: 'b.py', lines: [5] },
      ],
      warnings: [],
      failed: [],
    });
  });
});
