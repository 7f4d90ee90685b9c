import type { TodoEntry } from '../schema/index.js';

export interface ScanWarning {
  file: string;
  line?: number;
  message: string;
}

export interface ParsedTodoFile {
  filePath: string;
  entries: TodoEntry[];
  warnings: ScanWarning[];
}

export type FieldLine =
  | { kind: 'blank' }
  | { kind: 'field'; key: string; value: string }
  | { kind: 'malformed'; text: string };
