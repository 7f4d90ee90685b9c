/**
 * Strip resolved TODO blocks before a release.
 */

import { parseTodoBlocks, readSourceFile } from '../parser/block-parser.js';
import type { ScanWarning } from '../parser/types.js';
import { visitProjectFiles } from '../scanner/project-scanner.js';
import type { ProjectOptions, SkippedFile } from '../scanner/types.js';
import type { TodoEntry } from '../schema/index.js';
import { applyBlockEdits } from '../sync/block-edits.js';
import { planRemove } from '../sync/synchronizer.js';
import { writeFileAtomic } from '../utils/atomic-write.js';

export type CompletionPredicate = (entry: TodoEntry) => boolean;

export const isDone: CompletionPredicate = (entry) => entry.done;

/** Production cleanup: every block goes. */
export const isCleanupAll: CompletionPredicate = () => true;

export interface CleanupOptions extends ProjectOptions {
  predicate?: CompletionPredicate;
  dryRun?: boolean;
}

export interface CleanedFile {
  filePath: string;
  removed: TodoEntry[];
}

export interface CleanupResult {
  root: string;
  removedCount: number;
  /** Files that lost at least one block, in path order. */
  files: CleanedFile[];
  warnings: ScanWarning[];
  /** Files that could not be read, parsed or written. */
  failed: SkippedFile[];
}

/**
 * Remove the matching blocks of one file in a single rewrite. Returns the removed entries.
 */
export function cleanFile(filePath: string, predicate: CompletionPredicate = isDone, dryRun = false): {
  removed: TodoEntry[];
  warnings: ScanWarning[];
} {
  const content = readSourceFile(filePath);
  const parsed = parseTodoBlocks(content, filePath);
  const removed = parsed.entries.filter(predicate);

  if (removed.length > 0 && !dryRun) {
    writeFileAtomic(filePath, applyBlockEdits(content, removed.map(planRemove)));
  }

  return { removed, warnings: parsed.warnings };
}

export function cleanProject(root: string, options: CleanupOptions): CleanupResult {
  const { predicate = isDone, dryRun = false, ...walkOptions } = options;

  const { results, warnings, failed } = visitProjectFiles(root, walkOptions, (filePath) => ({
    filePath,
    ...cleanFile(filePath, predicate, dryRun),
  }));

  const files: CleanedFile[] = [];
  for (const result of results) {
    warnings.push(...result.warnings);
    if (result.removed.length > 0) {
      files.push({ filePath: result.filePath, removed: result.removed });
    }
  }

  return {
    root,
    removedCount: files.reduce((sum, file) => sum + file.removed.length, 0),
    files,
    warnings,
    failed,
  };
}
