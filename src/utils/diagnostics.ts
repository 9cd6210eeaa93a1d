/**
 * Collects diagnostics for one synthesis pass and mirrors them to the logger
 */

import type { Diagnostic, DiagnosticSeverity } from "../types/diagnostics.js";
import {
  ModelSmithError,
  UnsupportedPointerDialectError,
  type RecoverableError,
} from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

export class DiagnosticLog {
  private entries: Diagnostic[] = [];

  constructor(private readonly log: Logger = defaultLogger) {}

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
    const meta = {
      code: diagnostic.code,
      ...(diagnostic.documentId ? { documentId: diagnostic.documentId } : {}),
      ...(diagnostic.path ? { path: diagnostic.path } : {}),
    };
    if (diagnostic.severity === "warning") {
      this.log.warn(diagnostic.message, meta);
    } else {
      this.log.error(diagnostic.message, meta);
    }
  }

  /**
   * Record a thrown ModelSmithError; location is read from its details
   */
  reportError(error: ModelSmithError, severity: DiagnosticSeverity): void {
    const documentId = error.details?.documentId;
    const path = error.details?.path;
    this.report({
      severity,
      code: error.code,
      message: error.message,
      ...(typeof documentId === "string" ? { documentId } : {}),
      ...(typeof path === "string" ? { path } : {}),
      ...(error.details ? { details: error.details } : {}),
    });
  }

  /** Unsupported refs are warnings; unreadable or malformed input is an error */
  reportRecoverable(error: RecoverableError): void {
    this.reportError(error, error instanceof UnsupportedPointerDialectError ? "warning" : "error");
  }

  all(): Diagnostic[] {
    return [...this.entries];
  }

  bySeverity(severity: DiagnosticSeverity): Diagnostic[] {
    return this.entries.filter((entry) => entry.severity === severity);
  }

  hasFatal(): boolean {
    return this.entries.some((entry) => entry.severity === "fatal");
  }
}
