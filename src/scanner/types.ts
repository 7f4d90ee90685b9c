import type { FileError } from '../errors.js';
import type { ParsedTodoFile, ScanWarning } from '../parser/types.js';
import type { TodoEntry } from '../schema/index.js';
import type { WalkOptions } from '../walker/file-walker.js';

export type ProjectOptions = Pick<WalkOptions, 'extensions' | 'ignore' | 'readDirectory'>;

export interface SkippedFile {
  filePath: string;
  error: FileError;
}

export interface ProjectScanResult {
  root: string;
  files: ParsedTodoFile[];
  /** Walk order, then in-file order. */
  entries: TodoEntry[];
  warnings: ScanWarning[];
  skipped: SkippedFile[];
}

export type { ScanWarning };
