// ─────────────────────────────────────────────────────────────
// Block Assembler — Groups validated rows into HEAD/BODY/FOOT blocks
// ─────────────────────────────────────────────────────────────
//
// Phases:  awaiting-header → in-header → in-body(n) → in-footer → done
//
// Row-level problems are logged and the offending row is dropped;
// schema problems discovered while resolving the HEAD row propagate.
//
// ─────────────────────────────────────────────────────────────

import { Block, BlockKind, Cell, ProfileReference, Row, RowSchema } from "../schema/reportSchema";
import { ReportValidationFailure, RowValidationFailure } from "../schema/errors";
import {
  COMMENT_SIGN,
  FOOT_ROW_TYPES,
  HEADER_ROW_PATTERN,
  SCHEMA_HEADER_ROW,
  normalizeRowType,
} from "../schema/reportFormat";
import { toCell, validateField } from "../validators/fieldValidators";
import type { SchemaResolver } from "../compiler/schemaCompiler";
import type { Diagnostics } from "../diagnostics/reportLogger";

export type AssemblerPhase = "awaiting-header" | "in-header" | "in-body" | "in-footer" | "done";

export interface BlockAssemblerOptions {
  fileName: string;
  fileNumber: number;
  diagnostics: Diagnostics;
  /** Fixed schema; when absent the HEAD row resolves one */
  rowSchema?: RowSchema;
  resolveSchema?: SchemaResolver;
}

interface OpenBlock {
  kind: BlockKind;
  number: number;
  rows: Row[];
  version?: string;
  profile?: ProfileReference;
}

const decoder = new TextDecoder("utf-8");
const BLOCK_NUMBER_TEXT = /^\s*[+-]?\d+\s*$/;

function text(field: Uint8Array | undefined): string {
  return field ? decoder.decode(field) : "";
}

export class BlockAssembler {
  private phaseValue: AssemblerPhase = "awaiting-header";
  private current: OpenBlock | null = null;
  private schema: RowSchema | undefined;
  private readonly seenBlockNumbers = new Set<number>();
  private headerReported = false;

  constructor(private readonly options: BlockAssemblerOptions) {
    this.schema = options.rowSchema;
  }

  get phase(): AssemblerPhase {
    return this.phaseValue;
  }

  /** The schema rows are validated against, once known */
  get rowSchema(): RowSchema | undefined {
    return this.schema;
  }

  /**
   * Feed one physical line. Returns the blocks this line completed.
   */
  accept(fields: readonly Uint8Array[], rowNumber: number): Block[] {
    if (this.phaseValue === "done") {
      throw new Error(`Block assembly for ${this.options.fileName} has already finished`);
    }

    const completed: Block[] = [];
    if (fields.length > 0 && text(fields[0]).startsWith(COMMENT_SIGN)) {
      return completed;
    }

    try {
      this.place(fields, rowNumber, completed);
    } catch (err: unknown) {
      if (!(err instanceof RowValidationFailure)) throw err;
      this.options.diagnostics.error(err);
    }
    return completed;
  }

  /** End of input: flush the open block */
  finish(): Block[] {
    if (this.phaseValue === "done") return [];
    if (this.phaseValue === "awaiting-header") this.reportMissingHeader();

    const completed: Block[] = [];
    this.closeCurrent(completed);
    this.phaseValue = "done";
    return completed;
  }

  // ── Row placement ────────────────────────────────────────

  private place(fields: readonly Uint8Array[], rowNumber: number, completed: Block[]): void {
    const rowType = this.rowTypeOf(fields, rowNumber);
    const isHeader = HEADER_ROW_PATTERN.test(rowType);
    const isFoot = FOOT_ROW_TYPES.has(rowType);

    if (this.phaseValue === "in-footer") {
      if (!isFoot) {
        throw this.rowError(
          rowNumber,
          `Row type ${rowType} follows the FOOT block. The FOOT block must be the last block of a file.`
        );
      }
      this.appendRow(this.buildRow(rowType, fields, rowNumber));
      return;
    }

    if (isFoot) {
      if (this.phaseValue === "awaiting-header") this.reportMissingHeader();
      const row = this.buildRow(rowType, fields, rowNumber);
      this.closeCurrent(completed);
      this.open("FOOT");
      this.phaseValue = "in-footer";
      this.options.diagnostics.info(`Start parsing the FOOT block in file number ${this.options.fileNumber}.`);
      this.appendRow(row);
      return;
    }

    if (isHeader) {
      if (this.phaseValue === "in-body") {
        throw this.rowError(rowNumber, `Row type ${rowType} is only permitted in the HEAD block.`);
      }
      if (this.phaseValue === "awaiting-header") {
        this.open("HEAD");
        this.phaseValue = "in-header";
        this.options.diagnostics.info(`Start parsing the HEAD block in file number ${this.options.fileNumber}.`);
      }
      if (rowType === SCHEMA_HEADER_ROW) this.readSchemaHeader(fields, rowNumber);
      this.appendRow(this.buildRow(rowType, fields, rowNumber));
      return;
    }

    const blockNumber = this.blockNumberOf(fields, rowNumber);
    const row = this.buildRow(rowType, fields, rowNumber, blockNumber);

    if (this.phaseValue === "awaiting-header") this.reportMissingHeader();
    if (this.phaseValue !== "in-body" || this.current?.number !== blockNumber) {
      this.closeCurrent(completed);
      if (this.seenBlockNumbers.has(blockNumber)) {
        this.options.diagnostics.error(
          new ReportValidationFailure(
            `The block number ${blockNumber} appears more than once in file ${this.options.fileName} ` +
              `(repeated at row ${rowNumber}).`
          )
        );
      }
      this.seenBlockNumbers.add(blockNumber);
      this.open("BODY", blockNumber);
      this.phaseValue = "in-body";
      this.options.diagnostics.info(
        `Start parsing block number ${blockNumber} in file number ${this.options.fileNumber}.`
      );
    }
    this.appendRow(row);
  }

  /** HEAD: version in field 1, profile name and version in fields 2 and 3 */
  private readSchemaHeader(fields: readonly Uint8Array[], rowNumber: number): void {
    const version = text(fields[1]);
    const profile: ProfileReference = { name: text(fields[2]), version: text(fields[3]) };

    if (!this.schema) {
      if (!profile.name || !profile.version) {
        throw this.rowError(rowNumber, "The HEAD row does not name a profile and profile version.");
      }
      if (!this.options.resolveSchema) {
        throw this.rowError(rowNumber, "No schema was supplied and none can be resolved from the HEAD row.");
      }
      this.options.diagnostics.info(`Detected profile and version from HEAD: ${profile.name} (${profile.version})`);
      this.schema = this.options.resolveSchema(profile);
    }

    if (this.current) {
      this.current.version = version;
      this.current.profile = profile;
    }
  }

  private rowTypeOf(fields: readonly Uint8Array[], rowNumber: number): string {
    if (fields.length === 0) {
      throw this.rowError(rowNumber, "It is not permissible to include empty Records.");
    }
    const rowType = normalizeRowType(text(fields[0]));
    if (this.schema && !this.schema.has(rowType)) {
      throw this.rowError(
        rowNumber,
        `Row type ${rowType} does not exist in the XSD. Valid row types are: [${[...this.schema.keys()].join(", ")}].`
      );
    }
    return rowType;
  }

  private blockNumberOf(fields: readonly Uint8Array[], rowNumber: number): number {
    const raw = text(fields[1]);
    if (!BLOCK_NUMBER_TEXT.test(raw)) {
      throw this.rowError(
        rowNumber,
        `The block id "${raw.toUpperCase()}" in line number ${rowNumber} was expected to be an integer.`
      );
    }
    return Number(raw);
  }

  /** Fields are paired with validators by position; extras on either side are ignored */
  private buildRow(rowType: string, fields: readonly Uint8Array[], rowNumber: number, blockNumber?: number): Row {
    if (!this.schema) {
      throw this.rowError(rowNumber, `Row type ${rowType} cannot be validated before the HEAD row names a schema.`);
    }
    const validators = this.schema.get(rowType);
    if (!validators) {
      throw this.rowError(rowNumber, `Row type ${rowType} does not exist in the XSD.`);
    }

    const cells: Cell[] = [];
    const count = Math.min(validators.length, fields.length);
    for (let i = 0; i < count; i++) {
      const validator = validators[i];
      const values = validateField(
        validator,
        fields[i],
        { cellName: validator.name, rowNumber, fileName: this.options.fileName, blockNumber },
        this.options.diagnostics
      );
      if (values !== undefined) cells.push(toCell(validator, values));
    }
    return { type: rowType, rowNumber, cells };
  }

  // ── Block bookkeeping ────────────────────────────────────

  private open(kind: BlockKind, number = 0): void {
    this.current = { kind, number, rows: [] };
  }

  private appendRow(row: Row): void {
    this.current?.rows.push(row);
  }

  private closeCurrent(completed: Block[]): void {
    const open = this.current;
    if (!open) return;
    this.current = null;

    const { fileNumber, fileName } = this.options;
    switch (open.kind) {
      case "HEAD":
        completed.push({
          kind: "HEAD",
          fileNumber,
          fileName,
          ...(open.version !== undefined ? { version: open.version } : {}),
          ...(open.profile !== undefined ? { profile: open.profile } : {}),
          rows: open.rows,
        });
        break;
      case "BODY":
        completed.push({ kind: "BODY", fileNumber, number: open.number, rows: open.rows });
        break;
      case "FOOT":
        completed.push({ kind: "FOOT", fileNumber, rows: open.rows });
        break;
    }
  }

  private reportMissingHeader(): void {
    if (this.headerReported) return;
    this.headerReported = true;
    this.options.diagnostics.error(
      new ReportValidationFailure(`File ${this.options.fileName} does not start with a HEAD block.`)
    );
  }

  private rowError(rowNumber: number, detail: string): RowValidationFailure {
    return new RowValidationFailure(rowNumber, this.options.fileName, detail);
  }
}
