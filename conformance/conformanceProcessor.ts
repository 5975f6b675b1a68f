// ─────────────────────────────────────────────────────────────
// Conformance Processor — Checks every BODY block of a report
// against a profile grammar
// ─────────────────────────────────────────────────────────────

import { Block, RootNode } from "../schema/reportSchema";
import { BlockConformanceFailure } from "../schema/errors";
import type { Diagnostics } from "../diagnostics/reportLogger";
import { QUANTIFIER_LEGEND, matchBlock } from "./grammarMatcher";

export interface ConformanceOptions {
  /** Log failures and keep going instead of stopping at the first */
  continueOnFailure?: boolean;
  diagnostics?: Diagnostics;
}

export interface ConformanceSummary {
  blocksValidated: number;
  rowsValidated: number;
  failures: BlockConformanceFailure[];
}

/**
 * Match every BODY block of `source`. HEAD and FOOT blocks are not
 * checked. Without `continueOnFailure` the first failure propagates.
 */
export async function validateConformance(
  source: AsyncIterable<Block> | Iterable<Block>,
  grammar: RootNode,
  options: ConformanceOptions = {}
): Promise<ConformanceSummary> {
  const summary: ConformanceSummary = { blocksValidated: 0, rowsValidated: 0, failures: [] };

  for await (const block of source) {
    if (block.kind !== "BODY") continue;

    try {
      summary.rowsValidated += matchBlock(grammar, block);
      summary.blocksValidated++;
    } catch (err: unknown) {
      if (!(err instanceof BlockConformanceFailure) || !options.continueOnFailure) throw err;
      summary.failures.push(err);
      options.diagnostics?.error(err);
      console.log(`[CONFORMANCE] ✗ Block ${block.number} in file number ${block.fileNumber}`);
    }
  }

  if (summary.failures.length > 0) {
    console.log(`[CONFORMANCE] ${summary.failures.length} non-conformant block(s)`);
    console.log(QUANTIFIER_LEGEND);
  } else {
    console.log(
      `[CONFORMANCE] ✓ Validated ${summary.blocksValidated} block(s) (${summary.rowsValidated} rows)`
    );
  }
  return summary;
}
