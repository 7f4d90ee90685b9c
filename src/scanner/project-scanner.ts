import { isFileError, type AccessError } from '../errors.js';
import { parseTodoFile } from '../parser/block-parser.js';
import type { ScanWarning } from '../parser/types.js';
import { walkSourceFiles } from '../walker/file-walker.js';
import type { ProjectOptions, ProjectScanResult, SkippedFile } from './types.js';

export interface ProjectFileVisit<T> {
  results: T[];
  warnings: ScanWarning[];
  failed: SkippedFile[];
}

export function directoryWarning(error: AccessError): ScanWarning {
  return { file: error.filePath, message: `Skipping unreadable directory (${error.reason})` };
}

/**
 * Run `visit` on every source file of the project.
 *
 * Unreadable directories become warnings and per-file errors are collected in
 * `failed`; only a bad root (AccessError) or an unexpected error escapes.
 */
export function visitProjectFiles<T>(
  root: string,
  options: ProjectOptions,
  visit: (filePath: string) => T
): ProjectFileVisit<T> {
  const visitResult: ProjectFileVisit<T> = { results: [], warnings: [], failed: [] };

  const files = walkSourceFiles(root, {
    ...options,
    onAccessError: (error) => visitResult.warnings.push(directoryWarning(error)),
  });

  for (const filePath of files) {
    try {
      visitResult.results.push(visit(filePath));
    } catch (error) {
      if (!isFileError(error)) {
        throw error;
      }
      visitResult.failed.push({ filePath, error });
    }
  }

  return visitResult;
}

/**
 * Parse every TODO block of the project.
 */
export function scanProject(root: string, options: ProjectOptions): ProjectScanResult {
  const { results: files, warnings, failed } = visitProjectFiles(root, options, parseTodoFile);

  return {
    root,
    files,
    entries: files.flatMap((file) => file.entries),
    warnings: [...warnings, ...files.flatMap((file) => file.warnings)],
    skipped: failed,
  };
}
