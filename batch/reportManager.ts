// ─────────────────────────────────────────────────────────────
// Report Manager — Parse every file of a multi-file report
// ─────────────────────────────────────────────────────────────

import path from "path";
import { RowSchema } from "../schema/reportSchema";
import { ReportValidationFailure } from "../schema/errors";
import { BlockReader } from "../parser/blockReader";
import type { SchemaResolver } from "../compiler/schemaCompiler";
import type { Diagnostics } from "../diagnostics/reportLogger";
import type { BlockSink } from "../export/blockSink";

export interface ReportFile {
  path: string;
  /** Position of the file in the report; defaults to its 1-based list index */
  fileNumber?: number;
}

export interface ReportManagerOptions {
  sink: BlockSink;
  diagnostics: Diagnostics;
  /** Fixed schema for every file; otherwise each HEAD row resolves one */
  rowSchema?: RowSchema;
  resolveSchema?: SchemaResolver;
  /** HEAD blocks go to the sink unless this is false */
  writeHead?: boolean;
}

export interface ReportSummary {
  files: number;
  headBlocks: number;
  bodyBlocks: number;
  footBlocks: number;
  /** Rows in the blocks written to the sink */
  rowsWritten: number;
}

/**
 * Read the files in order and stream their blocks to the sink. FOOT
 * blocks are not written. A block number used by two files is fatal.
 * Ends by raising if any error was logged along the way.
 */
export async function parseReport(
  files: readonly (ReportFile | string)[],
  options: ReportManagerOptions
): Promise<ReportSummary> {
  const { sink, diagnostics } = options;
  const writeHead = options.writeHead ?? true;
  const blockNumbersByFile = new Map<number, Set<number>>();
  const summary: ReportSummary = { files: 0, headBlocks: 0, bodyBlocks: 0, footBlocks: 0, rowsWritten: 0 };

  for (let i = 0; i < files.length; i++) {
    const entry = files[i];
    const file: ReportFile = typeof entry === "string" ? { path: entry } : entry;
    const fileNumber = file.fileNumber ?? i + 1;

    console.log(`[REPORT] (${i + 1}/${files.length}) ${path.basename(file.path)}`);
    diagnostics.info(`Start parsing file number ${fileNumber}.`);

    const reader = new BlockReader({
      filePath: file.path,
      fileNumber,
      diagnostics,
      rowSchema: options.rowSchema,
      resolveSchema: options.resolveSchema,
    });

    const ownNumbers = blockNumbersByFile.get(fileNumber) ?? new Set<number>();
    blockNumbersByFile.set(fileNumber, ownNumbers);

    for await (const block of reader.blocks()) {
      if (block.kind === "FOOT") {
        summary.footBlocks++;
        continue;
      }

      if (block.kind === "HEAD") {
        summary.headBlocks++;
        if (!writeHead) continue;
      } else {
        for (const [otherFile, numbers] of blockNumbersByFile) {
          if (otherFile !== fileNumber && numbers.has(block.number)) {
            throw new ReportValidationFailure(
              `The block number ${block.number} is not unique. It appears in files number: ` +
                `${Math.min(fileNumber, otherFile)} and ${Math.max(fileNumber, otherFile)}.`
            );
          }
        }
        ownNumbers.add(block.number);
        summary.bodyBlocks++;
      }

      await sink.write(block);
      summary.rowsWritten += block.rows.length;
    }
    summary.files++;
  }

  console.log(
    `[REPORT] ${summary.files} file(s): ${summary.bodyBlocks} body block(s), ` +
      `${diagnostics.errorCount} error(s), ${diagnostics.warningCount} warning(s)`
  );
  diagnostics.raiseIfFatalErrorsFound();
  return summary;
}
