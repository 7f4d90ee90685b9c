const BOM = '\uFEFF';

/**
 * Split a leading byte-order mark off `content`. Line numbers are the same with or without it.
 */
export function splitBom(content: string): { bom: string; body: string } {
  return content.startsWith(BOM) ? { bom: BOM, body: content.slice(BOM.length) } : { bom: '', body: content };
}
