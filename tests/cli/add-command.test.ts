import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { handleAddCommand } from '../../src/cli/add-command.js';
import { AccessError } from '../../src/errors.js';
import { BLOCK_LINES, enterCliProject, readFile, writeFiles, type CliHarness } from '../helpers.js';

let cli: CliHarness;

beforeEach(() => {
  cli = enterCliProject('cli-add');
  writeFiles(cli.dir, {
    'app.py': '#!/usr/bin/env python\nimport os\n',
    'busy.py': `${BLOCK_LINES.join('\n')}\nimport sys\n`,
  });
});

afterEach(() => {
  cli.restore();
});

describe('pytodo add', () => {
  it('adds a block with every field', () => {
    handleAddCommand(['app.py', '-d', 'Handle timeouts', '--priority', 'high', '--due', '2030-06-01', '--assignee', 'carol']);

    expect(cli.stdout()).toEqual(['Added TODO block: app.py:2', '  HIGH Handle timeouts']);
    expect(readFile(cli.dir, 'app.py')).toBe(
      [
        '#!/usr/bin/env python',
        '# <---TODO START--->',
        '# description: Handle timeouts',
        '# priority: HIGH',
        '# due: 2030-06-01',
        '# assignee: carol',
        '# done: false',
        '# <---TODO END--->',
        'import os',
        '',
      ].join('\n')
    );
  });

  it('appends after the existing blocks', () => {
    handleAddCommand(['--file', 'busy.py', '--task', 'Second']);

    expect(cli.stdout()[0]).toBe('Added TODO block: busy.py:8');
    expect(readFile(cli.dir, 'busy.py').split('\n').slice(7, 13)).toEqual([
      '# <---TODO START--->',
      '# description: Second',
      '# priority: MEDIUM',
      '# done: false',
      '# <---TODO END--->',
      'import sys',
    ]);
  });

  it('takes the default priority from the config template', () => {
    writeFiles(cli.dir, { '.pytodo.json': JSON.stringify({ template: { priority: 'LOW' } }) });

    handleAddCommand(['app.py', '-d', 'Low key']);

    expect(cli.stdout()[1]).toBe('  LOW Low key');
  });

  it('leaves the file alone on a dry run', () => {
    handleAddCommand(['app.py', '-d', 'Maybe', '--dry-run']);

    expect(cli.stdout()).toEqual(['Would add TODO block: app.py:2', '  MEDIUM Maybe', 'No files modified (dry run).']);
    expect(readFile(cli.dir, 'app.py')).toBe('#!/usr/bin/env python\nimport os\n');
  });

  it('requires a description', () => {
    expect(() => handleAddCommand(['app.py'])).toThrow('Missing --description. Usage: pytodo add <file> --description <text>');
  });

  it('rejects a bad due date', () => {
    expect(() => handleAddCommand(['app.py', '-d', 'x', '--due', 'someday'])).toThrow(
      "Invalid due date: 'someday'. Use YYYY-MM-DD, today, tomorrow or +Nd/+Nw."
    );
  });

  it('fails for a missing file', () => {
    expect(() => handleAddCommand(['nope.py', '-d', 'x'])).toThrow(AccessError);
  });
});
