/**
 * Diagnostics collected during a synthesis pass
 */

import type { ErrorCode } from "../utils/errors.js";

/**
 * fatal: the run cannot produce a plan (dangling references, inheritance cycles)
 * error: one subtree degraded to an unknown type, siblings continue
 * warning: recoverable, a default was applied
 */
export type DiagnosticSeverity = "fatal" | "error" | "warning";

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: ErrorCode;
  message: string;
  documentId?: string;
  path?: string;
  details?: Record<string, unknown>;
}
