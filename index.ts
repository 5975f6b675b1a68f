// ─────────────────────────────────────────────────────────────
// Sales Report Validator — Library Entry Point
// ─────────────────────────────────────────────────────────────

export * from "./schema/reportSchema";
export * from "./schema/reportFormat";
export * from "./schema/errors";
export * from "./validators/fieldValidators";
export * from "./diagnostics/reportLogger";
export * from "./config/reportConfig";
export * from "./compiler/xsdDocument";
export * from "./compiler/enumerationCompiler";
export * from "./compiler/profileCompiler";
export * from "./compiler/rowSchemaCompiler";
export * from "./compiler/schemaCompiler";
export * from "./ingest/lineSource";
export * from "./ingest/blockSource";
export * from "./parser/tsvTokenizer";
export * from "./parser/blockAssembler";
export * from "./parser/blockReader";
export * from "./conformance/grammarMatcher";
export * from "./conformance/conformanceProcessor";
export * from "./export/blockSink";
export * from "./batch/reportManager";
