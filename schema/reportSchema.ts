// ─────────────────────────────────────────────────────────────
// Sales Report Engine — Core Schema Definitions
// ─────────────────────────────────────────────────────────────

import type { FieldValidator } from "../validators/fieldValidators";

/** Typed kinds a cell can carry */
export type CellKind = "string" | "integer" | "decimal" | "boolean";

/** A named, typed value extracted from one field position in a row */
export type Cell =
  | { readonly name: string; readonly kind: "string"; readonly values: readonly string[] }
  | { readonly name: string; readonly kind: "integer"; readonly values: readonly number[] }
  | { readonly name: string; readonly kind: "decimal"; readonly values: readonly number[] }
  | { readonly name: string; readonly kind: "boolean"; readonly values: readonly boolean[] };

/** One physical line of the report */
export interface Row {
  readonly type: string;     // "SU02", "SY0201"
  readonly rowNumber: number; // 1-based line number in the file
  readonly cells: readonly Cell[];
}

export type BlockKind = "HEAD" | "BODY" | "FOOT";

/** Profile announced by the HEAD row */
export interface ProfileReference {
  readonly name: string;
  readonly version: string;
}

export interface HeadBlock {
  readonly kind: "HEAD";
  readonly fileNumber: number;
  readonly fileName: string;
  readonly version?: string;
  readonly profile?: ProfileReference;
  readonly rows: readonly Row[];
}

export interface BodyBlock {
  readonly kind: "BODY";
  readonly fileNumber: number;
  readonly number: number;
  readonly rows: readonly Row[];
}

export interface FootBlock {
  readonly kind: "FOOT";
  readonly fileNumber: number;
  readonly rows: readonly Row[];
}

/** A maximal run of rows of one kind */
export type Block = HeadBlock | BodyBlock | FootBlock;

/** Row type code → positional field validators */
export type RowSchema = ReadonlyMap<string, readonly FieldValidator[]>;

/** Enumeration type name → allowed values (unions already expanded) */
export type EnumerationTable = ReadonlyMap<string, readonly string[]>;

/** Occurrence bounds; an unbounded maximum is Infinity */
export interface Occurs {
  readonly minOccurs: number;
  readonly maxOccurs: number;
}

export interface LeafNode extends Occurs {
  readonly kind: "leaf";
  readonly rowType: string;
}

export interface SequenceNode extends Occurs {
  readonly kind: "sequence";
  readonly children: readonly GrammarNode[];
}

export interface ChoiceNode extends Occurs {
  readonly kind: "choice";
  readonly children: readonly GrammarNode[];
}

/** Root of a profile content model; matches its child exactly once */
export interface RootNode {
  readonly kind: "root";
  readonly child: GrammarNode;
}

export type GrammarNode = LeafNode | SequenceNode | ChoiceNode | RootNode;
