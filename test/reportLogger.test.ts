// ─────────────────────────────────────────────────────────────
// Report Logger — Counts, log files, fail-fast and config
// ─────────────────────────────────────────────────────────────

import { after, before, describe, it } from "node:test";
import { strict as assert } from "assert";
import fs from "fs";
import path from "path";
import { ReportLogger } from "../diagnostics/reportLogger";
import { loadReportConfig } from "../config/reportConfig";
import { ReportValidationFailure, RowValidationFailure } from "../schema/errors";
import { makeScratchDir, removeScratchDir } from "./testUtils";

let scratch = "";
before(() => {
  scratch = makeScratchDir();
});
after(() => {
  removeScratchDir(scratch);
});

describe("ReportLogger", () => {
  it("counts entries per severity", () => {
    const logger = new ReportLogger();
    logger.info("one");
    logger.warning("two");
    logger.warning("three");
    logger.error("four");

    assert.equal(logger.infoCount, 1);
    assert.equal(logger.warningCount, 2);
    assert.equal(logger.errorCount, 1);
    assert.deepEqual(logger.entries[3], { severity: "ERROR", message: "four" });
  });

  it("does not raise without errors", () => {
    const logger = new ReportLogger();
    logger.warning("only a warning");
    assert.doesNotThrow(() => logger.raiseIfFatalErrorsFound());
  });

  it("raises with counts and the first error", () => {
    const logger = new ReportLogger();
    logger.error(new RowValidationFailure(3, "a.tsv", "bad"));
    logger.error("second");
    logger.warning("careful");

    assert.throws(() => logger.raiseIfFatalErrorsFound(), {
      name: "ReportValidationFailure",
      message:
        "Found 2 fatal error(s) and 1 warnings, please check the log output for details.\n" +
        "First error: Row number 3 (file=a.tsv) is invalid (error=bad).",
    });
  });

  it("writes every entry to the log file", () => {
    const logFilePath = path.join(scratch, "report.log");
    fs.writeFileSync(logFilePath, "stale\n");

    const logger = new ReportLogger({ logFilePath });
    logger.info("hello");
    logger.error("boom");
    logger.close();

    assert.equal(fs.readFileSync(logFilePath, "utf-8"), "[INFO] hello\n[ERROR] boom\n");
    assert.throws(() => logger.raiseIfFatalErrorsFound(), {
      message:
        `Found 1 fatal error(s) and 0 warnings, please check log file at "${logFilePath}" for details.\n` +
        "First error: boom",
    });
  });

  it("throws the logged error in fail-fast mode", () => {
    const logger = new ReportLogger({ failFast: true });
    const failure = new RowValidationFailure(1, "a.tsv", "bad");

    assert.throws(
      () => logger.error(failure),
      (err: unknown) => err === failure
    );
    assert.throws(() => logger.error("plain"), (err: unknown) => err instanceof ReportValidationFailure);
    assert.equal(logger.errorCount, 2);
    assert.doesNotThrow(() => logger.warning("warnings never throw"));
  });
});

describe("loadReportConfig", () => {
  it("falls back to defaults", () => {
    const config = loadReportConfig({}, {});
    assert.equal(config.schemaDir, path.resolve(process.cwd(), "schemas"));
    assert.equal(config.rowSchemaFileName, "sales-reporting-flat.xsd");
    assert.equal(config.logFilePath, undefined);
    assert.equal(config.failFast, false);
    assert.equal(config.echoLog, true);
  });

  it("reads the environment", () => {
    const config = loadReportConfig(
      {},
      {
        DSR_SCHEMA_DIR: "/srv/schemas",
        DSR_ROW_SCHEMA_FILE: "rows.xsd",
        DSR_LOG_FILE: "/tmp/dsr.log",
        DSR_FAIL_FAST: "Yes",
        DSR_ECHO_LOG: "0",
      }
    );
    assert.deepEqual(config, {
      schemaDir: "/srv/schemas",
      rowSchemaFileName: "rows.xsd",
      logFilePath: "/tmp/dsr.log",
      failFast: true,
      echoLog: false,
    });
  });

  it("lets overrides win", () => {
    const config = loadReportConfig({ failFast: false, schemaDir: "/opt/s" }, { DSR_FAIL_FAST: "1" });
    assert.equal(config.failFast, false);
    assert.equal(config.schemaDir, "/opt/s");
  });
});
