// ─────────────────────────────────────────────────────────────
// TSV Tokenizer — Tab-delimited fields with backslash escapes
// ─────────────────────────────────────────────────────────────

import { ESCAPE_CHARACTER, FIELD_DELIMITER } from "../schema/reportFormat";

/**
 * Split one line into raw field bytes. A backslash makes the next byte
 * literal (so "\\\t" keeps a tab inside a field); there is no quoting.
 * An empty line has no fields.
 */
export function splitFields(line: Uint8Array): Buffer[] {
  if (line.length === 0) return [];

  const fields: Buffer[] = [];
  let current: number[] = [];
  for (let i = 0; i < line.length; i++) {
    const byte = line[i];
    if (byte === ESCAPE_CHARACTER && i + 1 < line.length) {
      current.push(line[i + 1]);
      i++;
    } else if (byte === FIELD_DELIMITER) {
      fields.push(Buffer.from(current));
      current = [];
    } else {
      current.push(byte);
    }
  }
  fields.push(Buffer.from(current));
  return fields;
}
