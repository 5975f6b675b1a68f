// ─────────────────────────────────────────────────────────────
// Field Validators — Typed decoding of single cells
// ─────────────────────────────────────────────────────────────

import { describe, it } from "node:test";
import { strict as assert } from "assert";
import {
  booleanField,
  dateTimeField,
  decimalField,
  durationField,
  enumField,
  integerField,
  patternField,
  stringField,
  toCell,
  validateField,
} from "../validators/fieldValidators";
import { ReportLogger } from "../diagnostics/reportLogger";
import { BadEncodingError, CellLocation } from "../schema/errors";

function at(cellName: string): CellLocation {
  return { cellName, rowNumber: 8, fileName: "report.tsv", blockNumber: 1 };
}

describe("integer fields", () => {
  const usages = integerField("Usages", { required: true });

  it("accepts whole numbers", () => {
    const logger = new ReportLogger();
    assert.deepEqual(validateField(usages, "23", at("Usages"), logger), [23]);
    assert.deepEqual(validateField(usages, "-4", at("Usages"), logger), [-4]);
    assert.equal(logger.entries.length, 0);
  });

  it("accepts an integral decimal with a warning", () => {
    const logger = new ReportLogger();
    assert.deepEqual(validateField(usages, "23.00", at("Usages"), logger), [23]);
    assert.equal(logger.errorCount, 0);
    assert.deepEqual(logger.entries, [
      {
        severity: "WARNING",
        message:
          "The cell Usages in line number 8 (file=report.tsv) is a decimal (23.00), but expected to be an integer.",
      },
    ]);
  });

  it("rejects fractions and garbage", () => {
    const logger = new ReportLogger();
    assert.equal(validateField(usages, "23.2", at("Usages"), logger), undefined);
    assert.equal(validateField(usages, "23a", at("Usages"), logger), undefined);
    assert.equal(logger.errorCount, 2);
    assert.equal(
      logger.entries[0].message,
      'Cell "Usages" contains invalid value "23.2". Value was expected to be an integer. [Block: 1, Row: 8, file=report.tsv].'
    );
  });

  it("takes exponent notation without a warning", () => {
    const logger = new ReportLogger();
    assert.deepEqual(validateField(usages, "1e3", at("Usages"), logger), [1000]);
    assert.equal(logger.entries.length, 0);
  });

  it("rejects integers that cannot be represented exactly", () => {
    const logger = new ReportLogger();
    assert.equal(validateField(usages, "9007199254740993", at("Usages"), logger), undefined);
    assert.equal(validateField(usages, "1e999", at("Usages"), logger), undefined);
    assert.equal(logger.errorCount, 2);
    assert.equal(logger.warningCount, 0);
    assert.equal(
      logger.entries[0].message,
      'Cell "Usages" contains invalid value "9007199254740993". Value was expected to be an integer. ' +
        "[Block: 1, Row: 8, file=report.tsv]."
    );
  });
});

describe("decimal and boolean fields", () => {
  it("parses decimals", () => {
    const logger = new ReportLogger();
    const revenue = decimalField("NetRevenue");
    assert.deepEqual(validateField(revenue, "120.50", at("NetRevenue"), logger), [120.5]);
    assert.deepEqual(validateField(revenue, "-1e3", at("NetRevenue"), logger), [-1000]);
    assert.deepEqual(validateField(revenue, ".5", at("NetRevenue"), logger), [0.5]);
    assert.equal(validateField(revenue, "abc", at("NetRevenue"), logger), undefined);
    assert.equal(logger.errorCount, 1);
  });

  it("rejects decimals that overflow", () => {
    const logger = new ReportLogger();
    const revenue = decimalField("NetRevenue");
    assert.equal(validateField(revenue, "1e999", at("NetRevenue"), logger), undefined);
    assert.equal(validateField(revenue, "-1e999", at("NetRevenue"), logger), undefined);
    assert.deepEqual(
      logger.entries.map((entry) => entry.message),
      [
        'Cell "NetRevenue" contains invalid value "1e999". Value was expected to be a decimal. [Block: 1, Row: 8, file=report.tsv].',
        'Cell "NetRevenue" contains invalid value "-1e999". Value was expected to be a decimal. [Block: 1, Row: 8, file=report.tsv].',
      ]
    );
  });

  it("matches booleans case-insensitively", () => {
    const logger = new ReportLogger();
    const explicit = booleanField("IsExplicit");
    assert.deepEqual(validateField(explicit, "TRUE", at("IsExplicit"), logger), [true]);
    assert.deepEqual(validateField(explicit, "False", at("IsExplicit"), logger), [false]);
    assert.equal(validateField(explicit, "yes", at("IsExplicit"), logger), undefined);
    assert.equal(
      logger.entries[0].message,
      'Cell "IsExplicit" contains invalid value "yes". Value was expected to be a boolean. [Block: 1, Row: 8, file=report.tsv].'
    );
  });
});

describe("string, pattern and enumeration fields", () => {
  it("splits repeated values", () => {
    const logger = new ReportLogger();
    const artists = stringField("DisplayArtistName", { repeated: true });
    assert.deepEqual(validateField(artists, "Artist A|Artist B", at("DisplayArtistName"), logger), [
      "Artist A",
      "Artist B",
    ]);
  });

  it("decodes UTF-8 bytes", () => {
    const logger = new ReportLogger();
    const title = stringField("Title");
    assert.deepEqual(validateField(title, Buffer.from("Café", "utf-8"), at("Title"), logger), ["Café"]);
  });

  it("reports bytes that are not UTF-8", () => {
    const logger = new ReportLogger({ failFast: true });
    const title = stringField("Title");
    assert.throws(() => validateField(title, Buffer.from([0x41, 0xff]), at("Title"), logger), BadEncodingError);
  });

  it("anchors patterns to the whole value", () => {
    const logger = new ReportLogger();
    const territory = patternField("Territory", "[A-Z]{2}");
    assert.deepEqual(validateField(territory, "GB", at("Territory"), logger), ["GB"]);
    assert.equal(validateField(territory, "GBR", at("Territory"), logger), undefined);
    assert.equal(
      logger.entries[0].message,
      'Cell "Territory" contains invalid value "GBR". Value was expected to be of the form "[A-Z]{2}". [Block: 1, Row: 8, file=report.tsv].'
    );
  });

  it("checks ISO 8601 durations and date-times", () => {
    const logger = new ReportLogger();
    const duration = durationField("Duration");
    const created = dateTimeField("Created");
    assert.deepEqual(validateField(duration, "PT3M20S", at("Duration"), logger), ["PT3M20S"]);
    assert.deepEqual(validateField(duration, "P1Y2M", at("Duration"), logger), ["P1Y2M"]);
    assert.equal(validateField(duration, "3 minutes", at("Duration"), logger), undefined);
    assert.deepEqual(validateField(created, "2024-02-01T00:00:00+01:00", at("Created"), logger), [
      "2024-02-01T00:00:00+01:00",
    ]);
    assert.equal(validateField(created, "2024-02-01", at("Created"), logger), undefined);
    assert.equal(
      logger.entries[0].message,
      'Cell "Duration" contains invalid value "3 minutes". Value was expected to be ISO 8601 duration. [Block: 1, Row: 8, file=report.tsv].'
    );
  });

  it("upper-cases enumeration values", () => {
    const logger = new ReportLogger();
    const channel = enumField("DistributionChannel", "DistributionChannelType", ["Internet", "Mobile"]);
    assert.deepEqual(validateField(channel, "internet", at("DistributionChannel"), logger), ["INTERNET"]);
    assert.equal(validateField(channel, "Satellite", at("DistributionChannel"), logger), undefined);
    assert.equal(
      logger.entries[0].message,
      'Cell "DistributionChannel" contains invalid value "Satellite". ' +
        "Value was expected to be one of the following: [Internet, Mobile]. [Block: 1, Row: 8, file=report.tsv]."
    );
  });
});

describe("empty fields", () => {
  it("reports a missing required value", () => {
    const logger = new ReportLogger();
    assert.equal(validateField(integerField("Usages", { required: true }), "", at("Usages"), logger), undefined);
    assert.equal(
      logger.entries[0].message,
      'Cell "Usages" is required. Value was expected to be an integer. [Block: 1, Row: 8, file=report.tsv].'
    );
  });

  it("skips an empty optional value silently", () => {
    const logger = new ReportLogger();
    assert.equal(validateField(integerField("Usages"), "", at("Usages"), logger), undefined);
    assert.equal(logger.entries.length, 0);
  });

  it("leaves the block out of HEAD row locations", () => {
    const logger = new ReportLogger();
    const location: CellLocation = { cellName: "FileNumber", rowNumber: 1, fileName: "report.tsv" };
    validateField(integerField("FileNumber"), "one", location, logger);
    assert.equal(
      logger.entries[0].message,
      'Cell "FileNumber" contains invalid value "one". Value was expected to be an integer. [Row: 1, file=report.tsv].'
    );
  });
});

describe("toCell", () => {
  it("types cells by validator kind", () => {
    assert.deepEqual(toCell(integerField("Usages"), [23]), { name: "Usages", kind: "integer", values: [23] });
    assert.deepEqual(toCell(booleanField("IsExplicit"), [false]), {
      name: "IsExplicit",
      kind: "boolean",
      values: [false],
    });
    assert.deepEqual(toCell(patternField("Territory", "[A-Z]{2}"), ["GB"]), {
      name: "Territory",
      kind: "string",
      values: ["GB"],
    });
    assert.deepEqual(toCell(enumField("Channel", "DistributionChannelType", ["Internet"]), ["INTERNET"]), {
      name: "Channel",
      kind: "string",
      values: ["INTERNET"],
    });
  });
});
