// ─────────────────────────────────────────────────────────────
// Report Logger — Severity-counted diagnostics with optional
// log file, console echo and fail-fast mode
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import { ReportValidationFailure } from "../schema/errors";

export type Severity = "INFO" | "WARNING" | "ERROR";

export interface DiagnosticEntry {
  severity: Severity;
  message: string;
}

/**
 * Sink for row-local problems. Validators and readers log here and carry on;
 * the caller decides at the end whether the report is acceptable.
 */
export interface Diagnostics {
  info(message: string): void;
  warning(message: string): void;
  error(problem: Error | string): void;
  readonly errorCount: number;
  readonly warningCount: number;
  /** Throws ReportValidationFailure when any error was logged */
  raiseIfFatalErrorsFound(): void;
}

export interface ReportLoggerOptions {
  /** Truncated when the logger opens it */
  logFilePath?: string;
  /** Throw on the first error instead of counting it */
  failFast?: boolean;
  /** Mirror every entry to the console */
  echo?: boolean;
}

export class ReportLogger implements Diagnostics {
  readonly entries: DiagnosticEntry[] = [];
  private counts: Record<Severity, number> = { INFO: 0, WARNING: 0, ERROR: 0 };
  private firstError: string | null = null;
  private fd: number | null = null;
  private readonly failFast: boolean;
  private readonly echo: boolean;
  readonly logFilePath?: string;

  constructor(options: ReportLoggerOptions = {}) {
    this.failFast = options.failFast ?? false;
    this.echo = options.echo ?? false;
    this.logFilePath = options.logFilePath;
    if (options.logFilePath) {
      this.fd = fs.openSync(options.logFilePath, "w");
    }
  }

  get errorCount(): number {
    return this.counts.ERROR;
  }

  get warningCount(): number {
    return this.counts.WARNING;
  }

  get infoCount(): number {
    return this.counts.INFO;
  }

  info(message: string): void {
    this.record("INFO", message);
  }

  warning(message: string): void {
    this.record("WARNING", message);
  }

  error(problem: Error | string): void {
    const message = typeof problem === "string" ? problem : problem.message;
    this.record("ERROR", message);
    if (this.firstError === null) {
      this.firstError = message;
    }
    if (this.failFast) {
      throw typeof problem === "string" ? new ReportValidationFailure(problem) : problem;
    }
  }

  raiseIfFatalErrorsFound(): void {
    if (this.counts.ERROR === 0) return;
    const where = this.logFilePath
      ? `please check log file at "${this.logFilePath}" for details.`
      : "please check the log output for details.";
    throw new ReportValidationFailure(
      `Found ${this.counts.ERROR} fatal error(s) and ${this.counts.WARNING} warnings, ${where}\n` +
        `First error: ${this.firstError}`
    );
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  // ── Helpers ──────────────────────────────────────────────

  private record(severity: Severity, message: string): void {
    this.counts[severity]++;
    this.entries.push({ severity, message });
    const line = `[${severity}] ${message}`;
    if (this.fd !== null) {
      fs.writeSync(this.fd, line + "\n");
    }
    if (this.echo) {
      if (severity === "ERROR") console.error(line);
      else console.log(line);
    }
  }
}
