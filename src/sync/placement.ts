import { splitBom } from '../utils/bom.js';

const SHEBANG_REGEX = /^#!/;
// PEP 263 encoding declaration
const ENCODING_COOKIE_REGEX = /^[ \t\f]*#.*?coding[:=][ \t]*[-\w.]+/;
const DOCSTRING_OPEN_REGEX = /^(?:[rRuU])?("""|''')/;

function isBlankOrComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Line (1-indexed) before which a new TODO block goes in a file that has none:
 * after the shebang, the encoding declaration and the module docstring.
 */
export function findInsertionLine(content: string): number {
  const lines = splitBom(content).body.split('\n');
  let index = 0;

  if (SHEBANG_REGEX.test(lines[0] ?? '')) {
    index = 1;
  }
  if (index < 2 && ENCODING_COOKIE_REGEX.test(lines[index] ?? '')) {
    index++;
  }

  const docstringEnd = findModuleDocstringEnd(lines, index);
  return (docstringEnd ?? index - 1) + 2;
}

/**
 * Index of the line closing the module docstring, or null when the module has none.
 */
function findModuleDocstringEnd(lines: string[], from: number): number | null {
  let probe = from;
  while (probe < lines.length && isBlankOrComment(lines[probe] ?? '')) {
    probe++;
  }

  const line = lines[probe] ?? '';
  const match = line.match(DOCSTRING_OPEN_REGEX);
  if (!match) {
    return null;
  }

  const quote = match[1] ?? '"""';
  const rest = line.slice(match[0].length);
  if (rest.includes(quote)) {
    return probe;
  }

  for (let j = probe + 1; j < lines.length; j++) {
    if ((lines[j] ?? '').includes(quote)) {
      return j;
    }
  }
  // Unterminated docstring: leave it alone.
  return null;
}
