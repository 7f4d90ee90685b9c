import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';

export const BLOCK_LINES = [
  '# <---TODO START--->',
  '# description: Wire up the retry logic',
  '# priority: HIGH',
  '# due: 2024-01-01',
  '# assignee: alice',
  '# done: false',
  '# <---TODO END--->',
];

export function block(fields: Record<string, string>): string {
  const body = Object.entries(fields).map(([key, value]) => `# ${key}: ${value}`);
  return ['# <---TODO START--->', ...body, '# <---TODO END--->'].join('\n');
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `pytodo-${prefix}-`));
}

export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, 'utf-8');
  }
}

export function readFile(root: string, relativePath: string): string {
  return fs.readFileSync(path.join(root, relativePath), 'utf-8');
}

export interface CliHarness {
  dir: string;
  stdout: () => string[];
  stderr: () => string[];
  restore: () => void;
}

/**
 * chdir into a fresh temp project with HOME pointed at it and console output captured.
 */
export function enterCliProject(prefix: string): CliHarness {
  const originalCwd = process.cwd();
  const dir = makeTempDir(prefix);
  process.chdir(dir);
  vi.stubEnv('HOME', dir);

  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});

  return {
    dir,
    stdout: () => log.mock.calls.map((call: unknown[]) => call.map((part) => String(part)).join(' ')),
    stderr: () => error.mock.calls.map((call: unknown[]) => call.map((part) => String(part)).join(' ')),
    restore: () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      process.chdir(originalCwd);
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
