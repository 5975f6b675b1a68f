// ─────────────────────────────────────────────────────────────
// Block Source — JSON-lines block streams back into Blocks
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import readline from "readline";
import { Readable } from "stream";
import { z } from "zod";
import { Block } from "../schema/reportSchema";

const CellRecord = z.discriminatedUnion("kind", [
  z.object({ name: z.string(), kind: z.literal("string"), values: z.array(z.string()) }),
  z.object({ name: z.string(), kind: z.literal("integer"), values: z.array(z.number().int()) }),
  z.object({ name: z.string(), kind: z.literal("decimal"), values: z.array(z.number()) }),
  z.object({ name: z.string(), kind: z.literal("boolean"), values: z.array(z.boolean()) }),
]);

const RowRecord = z.object({
  type: z.string().min(1),
  rowNumber: z.number().int().positive(),
  cells: z.array(CellRecord),
});

export const BlockRecord = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("HEAD"),
    fileNumber: z.number().int(),
    fileName: z.string(),
    version: z.string().optional(),
    profile: z.object({ name: z.string(), version: z.string() }).optional(),
    rows: z.array(RowRecord),
  }),
  z.object({
    kind: z.literal("BODY"),
    fileNumber: z.number().int(),
    number: z.number().int(),
    rows: z.array(RowRecord),
  }),
  z.object({
    kind: z.literal("FOOT"),
    fileNumber: z.number().int(),
    rows: z.array(RowRecord),
  }),
]);

export class BlockDecodeError extends Error {
  constructor(
    public readonly lineNumber: number,
    detail: string
  ) {
    super(`Invalid block on line ${lineNumber}: ${detail}`);
    this.name = "BlockDecodeError";
  }
}

/** Validate one decoded JSON value as a Block */
export function decodeBlock(value: unknown, lineNumber = 1): Block {
  const result = BlockRecord.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new BlockDecodeError(lineNumber, detail);
  }
  return result.data;
}

/**
 * Read blocks written by JsonLinesSink from a stream or file path.
 * Blank lines are skipped; anything else that is not a block throws.
 */
export async function* readJsonLinesBlocks(input: Readable | string): AsyncGenerator<Block, void, undefined> {
  const stream = typeof input === "string" ? fs.createReadStream(input, { encoding: "utf-8" }) : input;
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim().length === 0) continue;

      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (err: unknown) {
        throw new BlockDecodeError(lineNumber, err instanceof Error ? err.message : String(err));
      }
      yield decodeBlock(value, lineNumber);
    }
  } finally {
    lines.close();
    if (typeof input === "string") stream.destroy();
  }
}
