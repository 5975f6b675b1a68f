// ─────────────────────────────────────────────────────────────
// Line Source — Lazy byte lines from plain or gzip report files
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import zlib from "zlib";
import { Readable } from "stream";
import { GZIP_SUFFIX } from "../schema/reportFormat";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export function isCompressed(filePath: string): boolean {
  return filePath.endsWith(GZIP_SUFFIX);
}

function stripCarriageReturn(line: Buffer): Buffer {
  return line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN ? line.subarray(0, line.length - 1) : line;
}

/**
 * Yield the file's lines as raw bytes, without line terminators.
 * Bytes are not decoded here so that each cell can check its own encoding.
 * Ending the iteration early closes the file.
 */
export async function* readLines(filePath: string): AsyncGenerator<Buffer, void, undefined> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Report file not found: ${filePath}`);
  }

  const file = fs.createReadStream(filePath);
  let input: Readable = file;
  if (isCompressed(filePath)) {
    const gunzip = zlib.createGunzip();
    file.on("error", (err) => gunzip.destroy(err));
    input = file.pipe(gunzip);
  }

  let pending: Buffer = Buffer.alloc(0);
  try {
    for await (const chunk of input) {
      const data = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      pending = pending.length === 0 ? data : Buffer.concat([pending, data]);

      let start = 0;
      let newline = pending.indexOf(NEWLINE, start);
      while (newline >= 0) {
        yield stripCarriageReturn(pending.subarray(start, newline));
        start = newline + 1;
        newline = pending.indexOf(NEWLINE, start);
      }
      pending = pending.subarray(start);
    }

    if (pending.length > 0) {
      yield stripCarriageReturn(pending);
    }
  } finally {
    input.destroy();
    file.destroy();
  }
}
