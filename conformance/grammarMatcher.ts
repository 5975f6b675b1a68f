// ─────────────────────────────────────────────────────────────
// Grammar Matcher — Greedy row-sequence matching against a
// profile grammar
// ─────────────────────────────────────────────────────────────

import { BodyBlock, ChoiceNode, GrammarNode, LeafNode, RootNode, SequenceNode } from "../schema/reportSchema";
import { BlockConformanceFailure } from "../schema/errors";

/** The part of a row the matcher looks at */
export interface TypedRow {
  readonly type: string;
  readonly rowNumber: number;
}

export const QUANTIFIER_LEGEND =
  "Quantifiers:\n" +
  "\t* Zero or more occurrences\n" +
  "\t+ One or more occurrences\n" +
  "\t? Zero or one occurrences\n";

/**
 * Number of rows `node` consumes from `rows` starting at `index`.
 * Zero means the node failed, or (for optional nodes) matched nothing.
 * Matching is greedy and never backtracks.
 */
export function matchNode(node: GrammarNode, rows: readonly TypedRow[], index: number): number {
  switch (node.kind) {
    case "leaf":
      return matchLeaf(node, rows, index);
    case "choice":
    case "sequence":
      return matchRepeated(node, rows, index);
    case "root":
      return matchNode(node.child, rows, index);
  }
}

function matchLeaf(node: LeafNode, rows: readonly TypedRow[], index: number): number {
  let occurs = 0;
  while (occurs < node.maxOccurs && index + occurs < rows.length && rows[index + occurs].type === node.rowType) {
    occurs++;
  }
  return occurs < node.minOccurs ? 0 : occurs;
}

/** One repetition: the first child consuming anything wins */
function matchChoiceOnce(node: ChoiceNode, rows: readonly TypedRow[], index: number): number {
  for (const child of node.children) {
    const consumed = matchNode(child, rows, index);
    if (consumed > 0) return consumed;
  }
  return 0;
}

/** One repetition: a required child consuming nothing fails the whole sequence */
function matchSequenceOnce(node: SequenceNode, rows: readonly TypedRow[], index: number): number {
  let total = 0;
  for (const child of node.children) {
    const consumed = matchNode(child, rows, index + total);
    if (consumed === 0 && minOccursOf(child) > 0) return 0;
    total += consumed;
  }
  return total;
}

function matchRepeated(node: ChoiceNode | SequenceNode, rows: readonly TypedRow[], index: number): number {
  let occurs = 0;
  let total = 0;
  while (occurs < node.maxOccurs) {
    const consumed =
      node.kind === "choice" ? matchChoiceOnce(node, rows, index + total) : matchSequenceOnce(node, rows, index + total);
    if (consumed === 0) break;
    total += consumed;
    occurs++;
  }
  return occurs < node.minOccurs ? 0 : total;
}

function minOccursOf(node: GrammarNode): number {
  return node.kind === "root" ? 1 : node.minOccurs;
}

/**
 * Match a BODY block against the profile root. Throws
 * BlockConformanceFailure unless every row is consumed.
 */
export function matchBlock(
  root: RootNode,
  block: Pick<BodyBlock, "number" | "fileNumber"> & { readonly rows: readonly TypedRow[] }
): number {
  const rows = block.rows;
  const consumed = matchNode(root, rows, 0);
  if (rows.length > 0 && consumed !== rows.length) {
    throw new BlockConformanceFailure(
      block.number,
      block.fileNumber,
      rows[consumed].rowNumber,
      renderGrammar(root),
      rows.map((row) => row.type)
    );
  }
  return consumed;
}

/** (0,1) → "?", (0,∞) → "*", (1,∞) → "+", anything else → "" */
export function quantifierOf(minOccurs: number, maxOccurs: number): string {
  if (minOccurs === 0 && maxOccurs === 1) return "?";
  if (minOccurs === 0 && maxOccurs === Infinity) return "*";
  if (minOccurs === 1 && maxOccurs === Infinity) return "+";
  return "";
}

/**
 * Text form used in conformance failures, e.g.
 * "Sequence ([Sequence (AS01 and MW01*) or AS02]+ and RU01*)"
 */
export function renderGrammar(node: GrammarNode): string {
  switch (node.kind) {
    case "root":
      return renderGrammar(node.child);
    case "leaf":
      return node.rowType + quantifierOf(node.minOccurs, node.maxOccurs);
    case "sequence":
      return `Sequence (${node.children.map(renderGrammar).join(" and ")})` + quantifierOf(node.minOccurs, node.maxOccurs);
    case "choice":
      return `[${node.children.map(renderGrammar).join(" or ")}]` + quantifierOf(node.minOccurs, node.maxOccurs);
  }
}
