#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Sales Report Validator — Command Line Entry Point
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   dsr-validate parse <file> [<file> ...] [options]
//   dsr-validate conformance --profile <name> [options]
//   dsr-validate profiles [options]
//
// Examples:
//   dsr-validate parse ./reports/report_1of2.tsv ./reports/report_2of2.tsv.gz
//   dsr-validate parse ./reports/report.tsv --profile BasicAudioProfile
//   dsr-validate parse ./reports/report.tsv --schema ./schemas/1.0/sales-reporting-flat.xsd --no-head
//   dsr-validate conformance --profile BasicAudioProfile --input ./output/report.jsonl
//   cat ./output/report.jsonl | dsr-validate conformance --profile BasicAudioProfile --version 1.0
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { Block, RootNode, RowSchema } from "./schema/reportSchema";
import { BlockConformanceFailure, ReportValidationFailure, SchemaCompileFailure } from "./schema/errors";
import { ReportConfig, loadReportConfig } from "./config/reportConfig";
import { ReportLogger } from "./diagnostics/reportLogger";
import { compileSchema, createSchemaLocator, createSchemaResolver } from "./compiler/schemaCompiler";
import { compileProfile, listProfiles } from "./compiler/profileCompiler";
import { loadXsdDocument } from "./compiler/xsdDocument";
import { parseReport } from "./batch/reportManager";
import { BlockSink, JsonLinesSink } from "./export/blockSink";
import { readJsonLinesBlocks } from "./ingest/blockSource";
import { validateConformance } from "./conformance/conformanceProcessor";
import { QUANTIFIER_LEGEND } from "./conformance/grammarMatcher";

// ── CLI Argument Parsing ─────────────────────────────────────

type Command = "parse" | "conformance" | "profiles";

interface CLIOptions {
  command: Command;
  files: string[];
  outputPath: string;
  inputPath: string | null;
  profile: string | null;
  schemaPath: string | null;
  enumerationPath: string | null;
  version: string | null;
  writeHead: boolean;
  continueOnFailure: boolean;
  config: ReportConfig;
}

const COMMANDS: readonly Command[] = ["parse", "conformance", "profiles"];

const FLAGS_WITH_VALUES = new Set([
  "--output", "--input", "--profile", "--schema", "--enumerations", "--version", "--log", "--schema-dir",
]);

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const command = args[0];
  if (!isCommand(command)) {
    console.error(`[CLI] Unknown command: ${command}`);
    printHelp();
    process.exit(1);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  // Positional arguments after the command, skipping flags and their values
  const files: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (FLAGS_WITH_VALUES.has(arg)) i++;
      continue;
    }
    files.push(arg);
  }

  const overrides: Partial<ReportConfig> = {};
  const logPath = getFlag("--log");
  const schemaDir = getFlag("--schema-dir");
  if (logPath) overrides.logFilePath = logPath;
  if (schemaDir) overrides.schemaDir = path.resolve(schemaDir);
  if (args.includes("--fail-fast")) overrides.failFast = true;
  if (args.includes("--quiet")) overrides.echoLog = false;

  return {
    command,
    files,
    outputPath: getFlag("--output") || "./output/report.jsonl",
    inputPath: getFlag("--input"),
    profile: getFlag("--profile"),
    schemaPath: getFlag("--schema"),
    enumerationPath: getFlag("--enumerations"),
    version: getFlag("--version"),
    writeHead: !args.includes("--no-head"),
    continueOnFailure: args.includes("--continue"),
    config: loadReportConfig(overrides),
  };
}

function printHelp(): void {
  console.log(`
Sales Report Validator

COMMANDS:
  parse <file...>            Validate report files and write decoded blocks as JSON lines
  conformance                Check decoded BODY blocks against a profile grammar
  profiles                   List the profiles a row schema declares

OPTIONS:
  --output <path>            JSON-lines output of parse (default: ./output/report.jsonl)
  --input <path>             JSON-lines input of conformance (default: stdin)
  --profile <name>           Profile to check conformance against
  --schema <path>            Row/profile schema document (default: resolved from the HEAD row)
  --enumerations <path>      Allowed-value document (default: the one the schema imports)
  --version <v>              Schema version directory when no --schema is given
  --schema-dir <dir>         Root of versioned schemas (env DSR_SCHEMA_DIR)
  --log <path>               Diagnostics log file (env DSR_LOG_FILE)
  --no-head                  Do not write HEAD blocks
  --fail-fast                Stop at the first error (env DSR_FAIL_FAST)
  --continue                 Report every non-conformant block instead of stopping
  --quiet                    Do not echo diagnostics to the console (env DSR_ECHO_LOG)
  `);
}

// ── Helpers ──────────────────────────────────────────────────

/** Forwards to a sink and remembers the first HEAD block's profile version */
class HeadTrackingSink implements BlockSink {
  profileVersion: string | null = null;

  constructor(private readonly inner: BlockSink) {}

  write(block: Block): Promise<void> {
    if (block.kind === "HEAD" && this.profileVersion === null && block.profile) {
      this.profileVersion = block.profile.version;
    }
    return this.inner.write(block);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

function rowDocumentPath(options: CLIOptions, detectedVersion: string | null): string {
  if (options.schemaPath) return options.schemaPath;
  const version = options.version ?? detectedVersion;
  if (!version) {
    throw new Error("A --schema or --version is required to locate the profile definitions");
  }
  return createSchemaLocator(options.config)(version).rowSchemaPath;
}

function loadGrammar(options: CLIOptions, logger: ReportLogger, detectedVersion: string | null): RootNode {
  if (!options.profile) {
    throw new Error("--profile is required");
  }
  const doc = loadXsdDocument(rowDocumentPath(options, detectedVersion));
  const { grammar } = compileProfile(doc, options.profile, logger);
  if (!grammar) {
    throw new ReportValidationFailure(`Profile ${options.profile} is not declared in ${doc.fileName}`);
  }
  return grammar;
}

async function checkConformance(
  source: AsyncIterable<Block>,
  grammar: RootNode,
  options: CLIOptions,
  logger: ReportLogger
): Promise<boolean> {
  try {
    const summary = await validateConformance(source, grammar, {
      continueOnFailure: options.continueOnFailure,
      diagnostics: logger,
    });
    return summary.failures.length === 0;
  } catch (err: unknown) {
    if (!(err instanceof BlockConformanceFailure)) throw err;
    console.error(`\n[CONFORMANCE] ${err.message}\n\n${QUANTIFIER_LEGEND}`);
    return false;
  }
}

// ── Commands ─────────────────────────────────────────────────

async function runParse(options: CLIOptions, logger: ReportLogger): Promise<boolean> {
  if (options.files.length === 0) {
    throw new Error("parse needs at least one report file");
  }

  let rowSchema: RowSchema | undefined;
  if (options.schemaPath) {
    rowSchema = compileSchema(
      { rowSchemaPath: options.schemaPath, enumerationPath: options.enumerationPath ?? undefined },
      logger
    ).rowSchema;
  }

  fs.mkdirSync(path.dirname(path.resolve(options.outputPath)), { recursive: true });
  const sink = new HeadTrackingSink(new JsonLinesSink(options.outputPath));

  try {
    const summary = await parseReport(options.files, {
      sink,
      diagnostics: logger,
      rowSchema,
      resolveSchema: createSchemaResolver(createSchemaLocator(options.config), logger),
      writeHead: options.writeHead,
    });
    console.log(`[PARSE] ✓ ${summary.bodyBlocks} block(s), ${summary.rowsWritten} row(s) → ${options.outputPath}`);
  } finally {
    await sink.close();
  }

  if (!options.profile) return true;
  const grammar = loadGrammar(options, logger, sink.profileVersion);
  return checkConformance(readJsonLinesBlocks(options.outputPath), grammar, options, logger);
}

async function runConformance(options: CLIOptions, logger: ReportLogger): Promise<boolean> {
  const grammar = loadGrammar(options, logger, null);
  const source = readJsonLinesBlocks(options.inputPath ?? process.stdin);
  return checkConformance(source, grammar, options, logger);
}

function runProfiles(options: CLIOptions): boolean {
  const doc = loadXsdDocument(rowDocumentPath(options, null));
  for (const name of listProfiles(doc)) {
    console.log(`  ${name}`);
  }
  return true;
}

// ── Main Pipeline ────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs();
  const logger = new ReportLogger({
    logFilePath: options.config.logFilePath,
    failFast: options.config.failFast,
    echo: options.config.echoLog,
  });

  try {
    const ok =
      options.command === "parse"
        ? await runParse(options, logger)
        : options.command === "conformance"
          ? await runConformance(options, logger)
          : runProfiles(options);
    if (!ok) process.exitCode = 1;
  } catch (err: unknown) {
    if (err instanceof ReportValidationFailure || err instanceof SchemaCompileFailure) {
      console.error(`\n[VALIDATION] ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    logger.close();
  }
}

// ── Run ──────────────────────────────────────────────────────

main().catch((err: unknown) => {
  console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : err);
  process.exit(1);
});
