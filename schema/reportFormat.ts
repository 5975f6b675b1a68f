// ─────────────────────────────────────────────────────────────
// Report Format — Flat file and schema document conventions
// ─────────────────────────────────────────────────────────────

/** Namespace of the XML Schema vocabulary itself */
export const XSD_NAMESPACE = "http://www.w3.org/2001/XMLSchema";

/** Namespace the row document uses to import the enumeration document */
export const ENUMERATION_NAMESPACE = "http://ddex.net/xml/avs/avs";

/** Every row declaration in the row document starts with this name */
export const ROW_TYPE_PREFIX = "RecordType-";

/** Prefix of row and composite type references in the row document */
export const ROW_SCHEMA_TYPE_PREFIX = "dsrf";

/** Prefix of enumeration type references (AVS = Allowed Value Set) */
export const ENUMERATION_TYPE_PREFIX = "avs";

/** Profile declarations that are groupings, not profiles */
export const NON_PROFILE_NAME_PREFIX = "ResourceIdentificationGroupingFor";

export const FIELD_DELIMITER = 0x09; // \t
export const ESCAPE_CHARACTER = 0x5c; // \\
export const REPEATED_VALUE_DELIMITER = "|";
export const COMMENT_SIGN = "#";

/** Compressed report files carry this suffix */
export const GZIP_SUFFIX = ".gz";

/** Row types that belong to the header, i.e. occur only at the top of a file */
export const HEADER_ROW_PATTERN = /^SY[0-9]{2,4}$|^HEAD|^FHEA/;

/** The header row that carries the message version and profile */
export const SCHEMA_HEADER_ROW = "HEAD";

/** Row types that form the FOOT block */
export const FOOT_ROW_TYPES: ReadonlySet<string> = new Set(["FOOT", "FFOO"]);

/** Versioned row types such as "SY02.01" */
export const VERSIONED_ROW_TYPE_PATTERN = /^[A-Z]{2}\d{2}\.\d{2}$/;

/** xs:duration */
export const DURATION_PATTERN =
  /^(?<sign>[+-])?P(?!\b)(?<years>[0-9]+([,.][0-9]+)?Y)?(?<months>[0-9]+([,.][0-9]+)?M)?(?<weeks>[0-9]+([,.][0-9]+)?W)?(?<days>[0-9]+([,.][0-9]+)?D)?((?<separator>T)(?<hours>[0-9]+([,.][0-9]+)?H)?(?<minutes>[0-9]+([,.][0-9]+)?M)?(?<seconds>[0-9]+([,.][0-9]+)?S)?)?$/;

/** xs:dateTime */
export const DATETIME_PATTERN =
  /^[0-9]{4}-[0-9]{2}-[0-9]{2}T[0-9]{2}:[0-9]{2}:[0-9]{2}(Z|([-+][0-9]{2}:?[0-9]{2}))$/;

export function isRowTypeName(name: string): boolean {
  return name.startsWith(ROW_TYPE_PREFIX);
}

/**
 * Normalize the first field of a line into a row type code.
 * "sy02.01" → "SY0201"
 */
export function normalizeRowType(raw: string): string {
  const rowType = raw.toUpperCase();
  return VERSIONED_ROW_TYPE_PATTERN.test(rowType) ? rowType.replace(".", "") : rowType;
}
