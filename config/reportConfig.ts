// ─────────────────────────────────────────────────────────────
// Report Config — Environment-driven settings for the validator
// ─────────────────────────────────────────────────────────────

import path from "path";

export interface ReportConfig {
  /** Root of the versioned schema directories (<schemaDir>/<version>/...) */
  schemaDir: string;
  /** File name of the row/profile document inside a version directory */
  rowSchemaFileName: string;
  /** Diagnostics log; empty disables the file */
  logFilePath?: string;
  failFast: boolean;
  echoLog: boolean;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

/**
 * Load configuration from the environment, then apply explicit overrides.
 */
export function loadReportConfig(
  overrides: Partial<ReportConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ReportConfig {
  const config: ReportConfig = {
    schemaDir: env.DSR_SCHEMA_DIR || path.resolve(process.cwd(), "schemas"),
    rowSchemaFileName: env.DSR_ROW_SCHEMA_FILE || "sales-reporting-flat.xsd",
    logFilePath: env.DSR_LOG_FILE || undefined,
    failFast: flag(env.DSR_FAIL_FAST, false),
    echoLog: flag(env.DSR_ECHO_LOG, true),
  };
  return { ...config, ...overrides };
}
