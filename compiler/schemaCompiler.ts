// ─────────────────────────────────────────────────────────────
// Schema Compiler — Row document + enumeration document → schema
// ─────────────────────────────────────────────────────────────

import path from "path";
import { EnumerationTable, ProfileReference, RowSchema } from "../schema/reportSchema";
import { ReportValidationFailure, SchemaCompileFailure } from "../schema/errors";
import { ENUMERATION_NAMESPACE } from "../schema/reportFormat";
import type { ReportConfig } from "../config/reportConfig";
import type { Diagnostics } from "../diagnostics/reportLogger";
import { XsdDocument, childrenByTag, loadXsdDocument } from "./xsdDocument";
import { compileEnumerations } from "./enumerationCompiler";
import { compileRowSchema } from "./rowSchemaCompiler";

export interface SchemaPaths {
  rowSchemaPath: string;
  /** Defaults to the document the row schema imports */
  enumerationPath?: string;
}

export interface CompiledSchema {
  rowDocument: XsdDocument;
  enumerations: EnumerationTable;
  rowSchema: RowSchema;
}

/** Maps a profile version announced in a HEAD row to schema files */
export type SchemaLocator = (profileVersion: string) => SchemaPaths;

/** Called by the reader when a HEAD row names the profile */
export type SchemaResolver = (profile: ProfileReference) => RowSchema;

/**
 * Path of the enumeration document imported by the row document,
 * resolved against the row document's directory.
 */
export function locateEnumerationDocument(rowDocument: XsdDocument): string {
  const imported = childrenByTag(rowDocument.root, "import").find(
    (element) => element.attributes.namespace === ENUMERATION_NAMESPACE
  );
  const location = imported?.attributes.schemaLocation;
  if (!location) {
    throw new SchemaCompileFailure(
      rowDocument.fileName,
      `No AVS import found (namespace = ${ENUMERATION_NAMESPACE}).`
    );
  }
  const baseDir = rowDocument.filePath ? path.dirname(rowDocument.filePath) : process.cwd();
  return path.resolve(baseDir, location);
}

export function compileSchema(paths: SchemaPaths, diagnostics: Diagnostics): CompiledSchema {
  const rowDocument = loadXsdDocument(paths.rowSchemaPath);
  const enumerationPath = paths.enumerationPath ?? locateEnumerationDocument(rowDocument);
  const enumerations = compileEnumerations(loadXsdDocument(enumerationPath));
  const rowSchema = compileRowSchema(rowDocument, enumerations, diagnostics);
  return { rowDocument, enumerations, rowSchema };
}

const PROFILE_VERSION_TEXT = /^[\w.-]+$/;

/**
 * <schemaDir>/<profileVersion>/<rowSchemaFileName>. The version comes from
 * the report file, so it must name a single directory below schemaDir.
 */
export function createSchemaLocator(config: Pick<ReportConfig, "schemaDir" | "rowSchemaFileName">): SchemaLocator {
  return (profileVersion) => {
    if (!PROFILE_VERSION_TEXT.test(profileVersion) || profileVersion.includes("..")) {
      throw new ReportValidationFailure(
        `The profile version "${profileVersion}" is invalid. ` +
          `Expected letters, digits, "_", "-" or single dots (e.g. "1.0").`
      );
    }
    return { rowSchemaPath: path.join(config.schemaDir, profileVersion, config.rowSchemaFileName) };
  };
}

/**
 * Resolver that compiles each located schema once and reuses it for
 * later files announcing the same version.
 */
export function createSchemaResolver(locator: SchemaLocator, diagnostics: Diagnostics): SchemaResolver {
  const cache = new Map<string, RowSchema>();
  return (profile) => {
    const paths = locator(profile.version);
    const cached = cache.get(paths.rowSchemaPath);
    if (cached) return cached;
    console.log(`[SCHEMA] Resolving ${profile.name} ${profile.version} → ${paths.rowSchemaPath}`);
    const { rowSchema } = compileSchema(paths, diagnostics);
    cache.set(paths.rowSchemaPath, rowSchema);
    return rowSchema;
  };
}
