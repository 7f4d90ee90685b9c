import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { handleInitCommand } from '../../src/cli/init-command.js';
import { BLOCK_LINES, enterCliProject, readFile, writeFiles, type CliHarness } from '../helpers.js';

let cli: CliHarness;

beforeEach(() => {
  cli = enterCliProject('cli-init');
  writeFiles(cli.dir, {
    'done.py': `${BLOCK_LINES.join('\n')}\n`,
    'mod.py': '"""Doc."""\nimport os\n',
    'pkg/util.py': 'x = 1\n',
    'notes.txt': 'not python\n',
  });
});

afterEach(() => {
  cli.restore();
});

describe('pytodo init', () => {
  it('inserts the template into files without a block', () => {
    handleInitCommand([]);

    expect(cli.stdout()).toEqual([
      '✓ Initialized TODO block: mod.py:2',
      '✓ Initialized TODO block: pkg/util.py:1',
      'Initialized 2 file(s); 1 already had TODO blocks.',
    ]);
    expect(readFile(cli.dir, 'mod.py')).toBe(
      [
        '"""Doc."""',
        '# <---TODO START--->',
        '# description: Describe the task',
        '# priority: MEDIUM',
        '# done: false',
        '# <---TODO END--->',
        'import os',
        '',
      ].join('\n')
    );
    expect(readFile(cli.dir, 'done.py')).toBe(`${BLOCK_LINES.join('\n')}\n`);
    expect(readFile(cli.dir, 'notes.txt')).toBe('not python\n');
  });

  it('changes nothing on a second run', () => {
    handleInitCommand([]);
    const afterFirst = readFile(cli.dir, 'pkg/util.py');

    handleInitCommand([]);

    expect(cli.stdout().at(-1)).toBe('Initialized 0 file(s); 3 already had TODO blocks.');
    expect(readFile(cli.dir, 'pkg/util.py')).toBe(afterFirst);
  });

  it('reports without writing on a dry run', () => {
    handleInitCommand(['--dry-run']);

    expect(cli.stdout()).toEqual([
      '→ Would initialize TODO block: mod.py:2',
      '→ Would initialize TODO block: pkg/util.py:1',
      'Would initialize 2 file(s); 1 already had TODO blocks.',
      'No files modified (dry run).',
    ]);
    expect(readFile(cli.dir, 'pkg/util.py')).toBe('x = 1\n');
  });

  it('uses the template from the project config', () => {
    writeFiles(cli.dir, { '.pytodo.json': JSON.stringify({ template: { priority: 'HIGH', assignee: 'alice' } }) });

    handleInitCommand(['--path', 'pkg']);

    expect(readFile(cli.dir, 'pkg/util.py')).toBe(
      [
        '# <---TODO START--->',
        '# description: Describe the task',
        '# priority: HIGH',
        '# assignee: alice',
        '# done: false',
        '# <---TODO END--->',
        'x = 1',
        '',
      ].join('\n')
    );
    expect(readFile(cli.dir, 'mod.py')).toBe('"""Doc."""\nimport os\n');
  });

  it('prints JSON', () => {
    handleInitCommand(['--json', '--dry-run']);

    const output: unknown = JSON.parse(cli.stdout().join('\n'));
    expect(output).toMatchObject({
      success: true,
      dryRun: true,
      root: '.',
      initialized: [
        { file: 'mod.py', line: 2 },
        { file: 'pkg/util.py', line: 1 },
      ],
      unchanged: ['done.py'],
      failed: [],
    });
  });
});
