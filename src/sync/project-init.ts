import type { ScanWarning } from '../parser/types.js';
import { visitProjectFiles } from '../scanner/project-scanner.js';
import type { ProjectOptions, SkippedFile } from '../scanner/types.js';
import type { TodoEntry, TodoFields } from '../schema/index.js';
import { syncFile } from './synchronizer.js';

export interface InitProjectOptions extends ProjectOptions {
  template: TodoFields;
  dryRun?: boolean;
}

export interface InitProjectResult {
  root: string;
  /** Blocks inserted (or that would be inserted under dry run), in path order. */
  initialized: TodoEntry[];
  /** Files that already had at least one block. */
  unchanged: string[];
  warnings: ScanWarning[];
  failed: SkippedFile[];
}

/**
 * Insert the template block into every project file that has none.
 * Running it twice changes nothing the second time.
 */
export function initProject(root: string, options: InitProjectOptions): InitProjectResult {
  const { template, dryRun, ...walkOptions } = options;

  const { results, warnings, failed } = visitProjectFiles(root, walkOptions, (filePath) =>
    syncFile(filePath, { type: 'init', template }, { dryRun })
  );

  const initialized: TodoEntry[] = [];
  const unchanged: string[] = [];
  for (const result of results) {
    warnings.push(...result.warnings);
    if (result.changed && result.entry) {
      initialized.push(result.entry);
    } else {
      unchanged.push(result.filePath);
    }
  }

  return { root, initialized, unchanged, warnings, failed };
}
