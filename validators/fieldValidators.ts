// ─────────────────────────────────────────────────────────────
// Field Validators — Typed decoding of single flat-file fields
// ─────────────────────────────────────────────────────────────

import { Cell } from "../schema/reportSchema";
import {
  BadEncodingError,
  CellLocation,
  CellValidationFailure,
  RequiredCellMissing,
} from "../schema/errors";
import { DATETIME_PATTERN, DURATION_PATTERN, REPEATED_VALUE_DELIMITER } from "../schema/reportFormat";
import type { Diagnostics } from "../diagnostics/reportLogger";

interface FieldBase {
  readonly name: string;
  readonly required: boolean;
  /** Several values separated by "|" */
  readonly repeated: boolean;
  /** Human-readable description used in failure messages */
  readonly expected: string;
}

export type FieldValidator =
  | (FieldBase & { readonly kind: "string" })
  | (FieldBase & { readonly kind: "integer" })
  | (FieldBase & { readonly kind: "decimal" })
  | (FieldBase & { readonly kind: "boolean" })
  | (FieldBase & { readonly kind: "pattern"; readonly pattern: RegExp; readonly source: string })
  | (FieldBase & { readonly kind: "enum"; readonly enumName: string; readonly allowed: ReadonlySet<string> });

export type FieldKind = FieldValidator["kind"];

export type CellValue = string | number | boolean;

export interface FieldOptions {
  required?: boolean;
  repeated?: boolean;
}

function base(name: string, expected: string, options: FieldOptions): FieldBase {
  return {
    name,
    required: options.required ?? false,
    repeated: options.repeated ?? false,
    expected,
  };
}

// ── Factories ────────────────────────────────────────────

export function stringField(name: string, options: FieldOptions = {}): FieldValidator {
  return { kind: "string", ...base(name, "a string", options) };
}

export function integerField(name: string, options: FieldOptions = {}): FieldValidator {
  return { kind: "integer", ...base(name, "an integer", options) };
}

export function decimalField(name: string, options: FieldOptions = {}): FieldValidator {
  return { kind: "decimal", ...base(name, "a decimal", options) };
}

export function booleanField(name: string, options: FieldOptions = {}): FieldValidator {
  return { kind: "boolean", ...base(name, "a boolean", options) };
}

/**
 * The whole value must match `source`. Throws SyntaxError for an
 * expression the RegExp engine rejects.
 */
export function patternField(
  name: string,
  source: string,
  options: FieldOptions = {},
  expected = `of the form "${source}"`
): FieldValidator {
  return {
    kind: "pattern",
    ...base(name, expected, options),
    pattern: new RegExp(`^(?:${source})$`),
    source,
  };
}

export function durationField(name: string, options: FieldOptions = {}): FieldValidator {
  return {
    kind: "pattern",
    ...base(name, "ISO 8601 duration", options),
    pattern: DURATION_PATTERN,
    source: DURATION_PATTERN.source,
  };
}

export function dateTimeField(name: string, options: FieldOptions = {}): FieldValidator {
  return {
    kind: "pattern",
    ...base(name, "ISO 8601 dateTime", options),
    pattern: DATETIME_PATTERN,
    source: DATETIME_PATTERN.source,
  };
}

/** Allowed values are matched case-insensitively */
export function enumField(
  name: string,
  enumName: string,
  allowed: readonly string[],
  options: FieldOptions = {}
): FieldValidator {
  return {
    kind: "enum",
    ...base(name, `one of the following: [${allowed.join(", ")}]`, options),
    enumName,
    allowed: new Set(allowed.map((value) => value.toUpperCase())),
  };
}

// ── Validation ───────────────────────────────────────────

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });
const lenientUtf8 = new TextDecoder("utf-8");

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const DECIMAL_TEXT = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Validate one raw field. Failures are logged to `diagnostics` and yield
 * undefined, as does an empty optional field.
 */
export function validateField(
  validator: FieldValidator,
  raw: string | Uint8Array,
  location: CellLocation,
  diagnostics: Diagnostics
): CellValue[] | undefined {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else {
    try {
      text = strictUtf8.decode(raw);
    } catch (err: unknown) {
      const lossy = lenientUtf8.decode(raw);
      diagnostics.error(
        validator.kind === "string"
          ? new BadEncodingError(location, lossy, err instanceof Error ? err.message : String(err))
          : new CellValidationFailure(location, lossy, validator.expected)
      );
      return undefined;
    }
  }

  if (text.length === 0) {
    if (validator.required) {
      diagnostics.error(new RequiredCellMissing(location, validator.expected));
    }
    return undefined;
  }

  const parts = validator.repeated ? text.split(REPEATED_VALUE_DELIMITER) : [text];
  const values: CellValue[] = [];
  for (const part of parts) {
    const value = validateValue(validator, part, location, diagnostics);
    if (value === undefined) return undefined;
    values.push(value);
  }
  return values;
}

function validateValue(
  validator: FieldValidator,
  value: string,
  location: CellLocation,
  diagnostics: Diagnostics
): CellValue | undefined {
  switch (validator.kind) {
    case "string":
      return value;

    case "integer": {
      if (!DECIMAL_TEXT.test(value)) break;
      const parsed = Number(value);
      if (!Number.isSafeInteger(parsed)) break;
      if (!INTEGER_TEXT.test(value) && value.includes(".")) {
        diagnostics.warning(
          `The cell ${validator.name} in line number ${location.rowNumber} (file=${location.fileName}) ` +
            `is a decimal (${value}), but expected to be an integer.`
        );
      }
      return parsed;
    }

    case "decimal": {
      if (!DECIMAL_TEXT.test(value)) break;
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
      break;
    }

    case "boolean": {
      const lowered = value.toLowerCase();
      if (lowered === "true") return true;
      if (lowered === "false") return false;
      break;
    }

    case "pattern":
      if (validator.pattern.test(value)) return value;
      break;

    case "enum": {
      const upper = value.toUpperCase();
      if (validator.allowed.has(upper)) return upper;
      break;
    }
  }

  diagnostics.error(new CellValidationFailure(location, value, validator.expected));
  return undefined;
}

/** Build the typed cell for values produced by `validateField` */
export function toCell(validator: FieldValidator, values: readonly CellValue[]): Cell {
  const name = validator.name;
  switch (validator.kind) {
    case "integer":
      return { name, kind: "integer", values: values.filter((v): v is number => typeof v === "number") };
    case "decimal":
      return { name, kind: "decimal", values: values.filter((v): v is number => typeof v === "number") };
    case "boolean":
      return { name, kind: "boolean", values: values.filter((v): v is boolean => typeof v === "boolean") };
    default:
      return { name, kind: "string", values: values.filter((v): v is string => typeof v === "string") };
  }
}
