// ─────────────────────────────────────────────────────────────
// Validation Errors — Failure taxonomy for schema, row, cell,
// report and conformance checks
// ─────────────────────────────────────────────────────────────

/** Base class of every failure raised while validating a report */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * A structural-definition document could not be compiled.
 * Always fatal: no partial schema is usable.
 */
export class SchemaCompileFailure extends ValidationError {
  constructor(
    public readonly schemaFileName: string,
    public readonly detail: string
  ) {
    super(`Unexpected error while parsing the xsd file ${schemaFileName} (error = ${detail}).`);
    this.name = "SchemaCompileFailure";
  }
}

/** A row could not be placed in a block (row-local, logged and skipped) */
export class RowValidationFailure extends ValidationError {
  constructor(
    public readonly rowNumber: number,
    public readonly fileName: string,
    public readonly detail: string
  ) {
    super(`Row number ${rowNumber} (file=${fileName}) is invalid (error=${detail}).`);
    this.name = "RowValidationFailure";
  }
}

/** Where a cell sits in the report, for diagnostics */
export interface CellLocation {
  cellName: string;
  rowNumber: number;
  fileName: string;
  /** Not populated for HEAD/FOOT rows */
  blockNumber?: number;
}

function locationSuffix(location: CellLocation): string {
  const block = location.blockNumber ? `Block: ${location.blockNumber}, ` : "";
  return `[${block}Row: ${location.rowNumber}, file=${location.fileName}].`;
}

/** A cell value does not fit its declared kind (row-local, logged) */
export class CellValidationFailure extends ValidationError {
  constructor(
    public readonly location: CellLocation,
    public readonly cellValue: string,
    public readonly expectedValue: string,
    message?: string
  ) {
    super(
      message ??
        `Cell "${location.cellName}" contains invalid value "${cellValue}". ` +
          `Value was expected to be ${expectedValue}. ${locationSuffix(location)}`
    );
    this.name = "CellValidationFailure";
  }
}

/** The raw bytes of a String cell are not valid UTF-8 */
export class BadEncodingError extends CellValidationFailure {
  constructor(
    location: CellLocation,
    cellValue: string,
    public readonly errorDetail: string
  ) {
    super(
      location,
      cellValue,
      "a string",
      `Cell "${location.cellName}" contained a non-utf8 string: ${JSON.stringify(cellValue)}. ` +
        `Error detail: "${errorDetail}". ${locationSuffix(location)}`
    );
    this.name = "BadEncodingError";
  }
}

/** A required cell is empty */
export class RequiredCellMissing extends CellValidationFailure {
  constructor(location: CellLocation, expectedValue: string) {
    super(
      location,
      "",
      expectedValue,
      `Cell "${location.cellName}" is required. Value was expected to be ${expectedValue}. ` +
        locationSuffix(location)
    );
    this.name = "RequiredCellMissing";
  }
}

/** Report-level failure: cross-file checks and the final error summary */
export class ReportValidationFailure extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "ReportValidationFailure";
  }
}

/** A BODY block's row sequence is not generated by the profile grammar */
export class BlockConformanceFailure extends ValidationError {
  constructor(
    public readonly blockNumber: number,
    public readonly fileNumber: number,
    /** Row number of the first row the grammar could not consume */
    public readonly rowNumber: number,
    public readonly expectedStructure: string,
    public readonly actualStructure: readonly string[]
  ) {
    super(
      `Block ${blockNumber} in file number ${fileNumber} is non-conformant ` +
        `(first unmatched row: ${rowNumber}).\n` +
        `Expected structure:\n${expectedStructure}\n` +
        `Actual structure:\n[${actualStructure.join(", ")}]`
    );
    this.name = "BlockConformanceFailure";
  }
}
