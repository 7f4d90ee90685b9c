import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_IGNORE } from '../../src/config/loader.js';
import { AccessError } from '../../src/errors.js';
import { createIgnoreMatcher, walkSourceFiles, type WalkOptions } from '../../src/walker/file-walker.js';
import { makeTempDir, writeFiles } from '../helpers.js';

let tempDir: string;

const OPTIONS: WalkOptions = { extensions: ['.py'], ignore: DEFAULT_IGNORE };

function relative(files: Iterable<string>): string[] {
  return [...files].map((file) => path.relative(tempDir, file).split(path.sep).join('/'));
}

beforeEach(() => {
  tempDir = makeTempDir('walker');
  writeFiles(tempDir, {
    'a.py': '',
    'b.txt': '',
    'pkg/__init__.py': '',
    'pkg/mod.py': '',
    'venv/lib.py': '',
    '.git/x.py': '',
    'zeta/z.py': '',
  });
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('walkSourceFiles', () => {
  it('yields matching files in path order and skips ignored directories', () => {
    expect(relative(walkSourceFiles(tempDir, OPTIONS))).toEqual(['a.py', 'pkg/__init__.py', 'pkg/mod.py', 'zeta/z.py']);
  });

  it('walks again on every iteration', () => {
    const files = walkSourceFiles(tempDir, OPTIONS);
    expect(relative(files)).toHaveLength(4);

    writeFiles(tempDir, { 'new.py': '' });

    expect(relative(files)).toEqual(['a.py', 'new.py', 'pkg/__init__.py', 'pkg/mod.py', 'zeta/z.py']);
  });

  it('honours extra extensions', () => {
    expect(relative(walkSourceFiles(tempDir, { ...OPTIONS, extensions: ['.py', '.txt'] }))).toEqual([
      'a.py',
      'b.txt',
      'pkg/__init__.py',
      'pkg/mod.py',
      'zeta/z.py',
    ]);
  });

  it('matches ignore patterns containing a slash against the relative path', () => {
    const files = walkSourceFiles(tempDir, { ...OPTIONS, ignore: [...DEFAULT_IGNORE, 'pkg/mod.py'] });
    expect(relative(files)).toEqual(['a.py', 'pkg/__init__.py', 'zeta/z.py']);
  });

  it('fails lazily when the root does not exist', () => {
    const files = walkSourceFiles(path.join(tempDir, 'missing'), OPTIONS);
    expect(() => [...files]).toThrow(AccessError);
  });

  it('rejects a root that is a file', () => {
    expect(() => [...walkSourceFiles(path.join(tempDir, 'a.py'), OPTIONS)]).toThrow(
      `${path.join(tempDir, 'a.py')}: cannot access (not a directory)`
    );
  });

  it('reports unreadable subdirectories and carries on', () => {
    const denied: AccessError[] = [];
    const files = walkSourceFiles(tempDir, {
      ...OPTIONS,
      onAccessError: (error) => denied.push(error),
      readDirectory: (dir) => {
        if (path.basename(dir) === 'pkg') {
          throw new Error('EACCES: permission denied');
        }
        return fs.readdirSync(dir, { withFileTypes: true });
      },
    });

    expect(relative(files)).toEqual(['a.py', 'zeta/z.py']);
    expect(denied).toHaveLength(1);
    expect(denied[0]?.filePath).toBe(path.join(tempDir, 'pkg'));
    expect(denied[0]?.reason).toBe('EACCES: permission denied');
  });

  it('throws when the root listing fails', () => {
    const files = walkSourceFiles(tempDir, {
      ...OPTIONS,
      readDirectory: () => {
        throw new Error('EACCES: permission denied');
      },
    });
    expect(() => [...files]).toThrow(`${tempDir}: cannot access (EACCES: permission denied)`);
  });
});

describe('createIgnoreMatcher', () => {
  const isIgnored = createIgnoreMatcher(DEFAULT_IGNORE);

  it('matches directory names at any depth', () => {
    expect(isIgnored('venv')).toBe(true);
    expect(isIgnored('src/__pycache__')).toBe(true);
    expect(isIgnored('build/mypkg.egg-info')).toBe(true);
  });

  it('leaves ordinary paths alone', () => {
    expect(isIgnored('src/venv_tools.py')).toBe(false);
    expect(isIgnored('app.py')).toBe(false);
  });
});
