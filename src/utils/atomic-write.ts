import fs from 'node:fs';
import path from 'node:path';
import { WriteError } from '../errors.js';

/**
 * Replace a file's content through a temp file in the same directory and a rename.
 * Keeps the file mode.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);

  try {
    const mode = fs.existsSync(filePath) ? fs.statSync(filePath).mode & 0o7777 : 0o644;
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw new WriteError(filePath, error);
  }
}
