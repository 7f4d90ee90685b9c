function formatLocation(filePath: string, line?: number): string {
  return line ? `${filePath}:${line}` : filePath;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * A file or directory is missing or cannot be read.
 */
export class AccessError extends Error {
  public readonly reason: string;

  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    const reason = describeCause(cause);
    super(`${filePath}: cannot access (${reason})`, { cause });
    this.reason = reason;
    this.name = 'AccessError';
  }
}

/**
 * A TODO block has broken delimiters. The file is skipped by project-wide commands.
 */
export class ParseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly filePath: string,
    public readonly line?: number
  ) {
    super(`${formatLocation(filePath, line)}: ${reason}`);
    this.name = 'ParseError';
  }
}

export class WriteError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`${filePath}: failed to write (${describeCause(cause)})`, { cause });
    this.name = 'WriteError';
  }
}

export class TodoNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly line: number
  ) {
    super(`${formatLocation(filePath, line)}: no TODO block starts at this line`);
    this.name = 'TodoNotFoundError';
  }
}

/**
 * Errors that only concern one file. Project-wide commands report these and move on.
 */
export type FileError = AccessError | ParseError | WriteError;

export function isFileError(error: unknown): error is FileError {
  return error instanceof AccessError || error instanceof ParseError || error instanceof WriteError;
}
