const ESC = '\u001b[';

interface OutputStream {
  isTTY?: boolean;
}

/**
 * ANSI colour only on a terminal, and never with NO_COLOR set or TERM=dumb.
 */
export function colorEnabled(stream: OutputStream, env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(stream.isTTY) && env.NO_COLOR === undefined && env.TERM !== 'dumb';
}

export const supportsAnsiColor = colorEnabled(process.stdout);
/** Colour for warnings, errors and top-level help, which go to stderr. */
export const supportsStderrColor = colorEnabled(process.stderr);

function paint(enabled: boolean, code: number, text: string): string {
  return enabled ? `${ESC}${code}m${text}${ESC}0m` : text;
}

export const boldText = (text: string): string => paint(supportsAnsiColor, 1, text);
export const dimText = (text: string): string => paint(supportsAnsiColor, 2, text);
export const redText = (text: string): string => paint(supportsAnsiColor, 31, text);
export const greenText = (text: string): string => paint(supportsAnsiColor, 32, text);
export const yellowText = (text: string): string => paint(supportsAnsiColor, 33, text);
export const cyanText = (text: string): string => paint(supportsAnsiColor, 36, text);

export const stderrText = {
  bold: (text: string): string => paint(supportsStderrColor, 1, text),
  dim: (text: string): string => paint(supportsStderrColor, 2, text),
  red: (text: string): string => paint(supportsStderrColor, 31, text),
  yellow: (text: string): string => paint(supportsStderrColor, 33, text),
};
