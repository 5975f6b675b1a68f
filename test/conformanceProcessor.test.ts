// ─────────────────────────────────────────────────────────────
// Conformance Processor — Profile grammar over whole reports
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import { validateConformance } from "../conformance/conformanceProcessor";
import { renderGrammar } from "../conformance/grammarMatcher";
import { compileProfile } from "../compiler/profileCompiler";
import { compileSchema } from "../compiler/schemaCompiler";
import { loadXsdDocument } from "../compiler/xsdDocument";
import { BlockReader } from "../parser/blockReader";
import { ReportLogger } from "../diagnostics/reportLogger";
import { BlockConformanceFailure } from "../schema/errors";
import { Block, RootNode, Row } from "../schema/reportSchema";
import { GOOD_REPORT, ROW_SCHEMA_PATH } from "./testUtils";

function loadGrammar(): RootNode {
  const { grammar } = compileProfile(loadXsdDocument(ROW_SCHEMA_PATH), "BasicAudioProfile", new ReportLogger());
  if (!grammar) throw new Error("BasicAudioProfile is missing from the fixture schema");
  return grammar;
}

const grammar = loadGrammar();

function typedRows(firstRow: number, ...types: string[]): Row[] {
  return types.map((type, i) => ({ type, rowNumber: firstRow + i, cells: [] }));
}

function body(number: number, firstRow: number, ...types: string[]): Block {
  return { kind: "BODY", fileNumber: 1, number, rows: typedRows(firstRow, ...types) };
}

const conformant = body(1, 10, "AS01", "MW01", "RU01", "SU03", "LI01");
const nonConformant = body(2, 20, "MW01", "RU01", "SU03");
const trailing = body(3, 30, "AS02", "SU03", "RU01");

describe("validateConformance", () => {
  it("accepts every block of a valid report", async () => {
    const rowSchema = compileSchema({ rowSchemaPath: ROW_SCHEMA_PATH }, new ReportLogger()).rowSchema;
    const reader = new BlockReader({ filePath: GOOD_REPORT, fileNumber: 1, diagnostics: new ReportLogger(), rowSchema });

    const summary = await validateConformance(reader.blocks(), grammar);
    assert.deepEqual(summary, { blocksValidated: 2, rowsValidated: 8, failures: [] });
  });

  it("checks only BODY blocks", async () => {
    const blocks: Block[] = [
      { kind: "HEAD", fileNumber: 1, fileName: "r.tsv", rows: typedRows(1, "HEAD", "SY02") },
      conformant,
      { kind: "FOOT", fileNumber: 1, rows: typedRows(99, "FOOT") },
    ];
    const summary = await validateConformance(blocks, grammar);
    assert.deepEqual(summary, { blocksValidated: 1, rowsValidated: 5, failures: [] });
  });

  it("stops at the first non-conformant block by default", async () => {
    await assert.rejects(validateConformance([conformant, nonConformant, trailing], grammar), (err: unknown) => {
      if (!(err instanceof BlockConformanceFailure)) return false;
      assert.equal(err.blockNumber, 2);
      assert.equal(err.fileNumber, 1);
      assert.equal(err.rowNumber, 20);
      assert.equal(err.expectedStructure, renderGrammar(grammar));
      assert.deepEqual(err.actualStructure, ["MW01", "RU01", "SU03"]);
      return true;
    });
  });

  it("collects failures and logs them when asked to continue", async () => {
    const logger = new ReportLogger();
    const summary = await validateConformance([nonConformant, conformant, trailing], grammar, {
      continueOnFailure: true,
      diagnostics: logger,
    });

    assert.equal(summary.blocksValidated, 1);
    assert.equal(summary.rowsValidated, 5);
    assert.deepEqual(
      summary.failures.map((failure) => [failure.blockNumber, failure.rowNumber]),
      [
        [2, 20],
        [3, 32],
      ]
    );
    assert.equal(logger.errorCount, 2);
    assert.equal(logger.entries[0].message, summary.failures[0].message);
  });
});
