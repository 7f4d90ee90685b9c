import fs from 'node:fs';
import path from 'node:path';
import { Minimatch } from 'minimatch';
import { AccessError } from '../errors.js';

export interface WalkOptions {
  /** File extensions to keep, with the leading dot. */
  extensions: readonly string[];
  /** Glob patterns; slash-free patterns match a basename anywhere in the tree. */
  ignore: readonly string[];
  /** Called for every subdirectory that cannot be read. The walk carries on. */
  onAccessError?: (error: AccessError) => void;
  /** Directory listing, replaceable in tests. */
  readDirectory?: (dir: string) => fs.Dirent[];
}

function defaultReadDirectory(dir: string): fs.Dirent[] {
  return fs.readdirSync(dir, { withFileTypes: true });
}

export function createIgnoreMatcher(patterns: readonly string[]): (relativePath: string) => boolean {
  const matchers = patterns.map((pattern) => new Minimatch(pattern, { dot: true, matchBase: true }));
  return (relativePath) => {
    const posixPath = relativePath.split(path.sep).join('/');
    return matchers.some((matcher) => matcher.match(posixPath));
  };
}

/**
 * Ensure the project root exists and is a directory.
 */
export function assertProjectRoot(root: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(root);
  } catch (error) {
    throw new AccessError(root, error);
  }
  if (!stat.isDirectory()) {
    throw new AccessError(root, new Error('not a directory'));
  }
}

/**
 * Enumerate source files under `root` in path order.
 *
 * The result is lazy and restartable: every iteration walks the tree again.
 * The root itself must be readable (AccessError otherwise); unreadable
 * subdirectories are reported through `onAccessError` and skipped.
 */
export function walkSourceFiles(root: string, options: WalkOptions): Iterable<string> {
  const readDirectory = options.readDirectory ?? defaultReadDirectory;
  const isIgnored = createIgnoreMatcher(options.ignore);
  const extensions = new Set(options.extensions);

  function* walk(dir: string, isRoot: boolean): Generator<string> {
    let entries: fs.Dirent[];
    try {
      entries = readDirectory(dir);
    } catch (error) {
      const accessError = new AccessError(dir, error);
      if (isRoot) {
        throw accessError;
      }
      options.onAccessError?.(accessError);
      return;
    }

    const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of sorted) {
      const fullPath = path.join(dir, entry.name);
      if (isIgnored(path.relative(root, fullPath))) {
        continue;
      }
      // Symlinks are neither files nor directories here, so they are not followed.
      if (entry.isDirectory()) {
        yield* walk(fullPath, false);
      } else if (entry.isFile() && extensions.has(path.extname(entry.name))) {
        yield fullPath;
      }
    }
  }

  return {
    [Symbol.iterator]() {
      assertProjectRoot(root);
      return walk(root, true);
    },
  };
}
