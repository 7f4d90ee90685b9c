import type { ScanWarning } from '../parser/types.js';
import type { SkippedFile } from '../scanner/types.js';
import { stderrText } from './terminal.js';

export function formatWarning(warning: ScanWarning): string {
  const location = warning.line ? `${warning.file}:${warning.line}` : warning.file;
  return `${location}: ${warning.message}`;
}

/**
 * Per-file problems go to stderr; they never change the exit code.
 */
export function printWarnings(warnings: readonly ScanWarning[]): void {
  for (const warning of warnings) {
    console.error(`${stderrText.yellow('warning:')} ${formatWarning(warning)}`);
  }
}

export function printSkippedFiles(skipped: readonly SkippedFile[], heading = 'Skipped'): void {
  if (skipped.length === 0) {
    return;
  }
  console.error(`${stderrText.red(`${heading} ${skipped.length} file(s):`)}`);
  for (const { error } of skipped) {
    console.error(`  ${error.message}`);
  }
}

export function serializeSkipped(skipped: readonly SkippedFile[]): Array<{ file: string; type: string; error: string }> {
  return skipped.map(({ filePath, error }) => ({ file: filePath, type: error.name, error: error.message }));
}
