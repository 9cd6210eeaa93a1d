/**
 * Standard error classes for modelsmith
 */

import type { Diagnostic } from "../types/diagnostics.js";

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  DANGLING_REFERENCE = "DANGLING_REFERENCE",
  UNSUPPORTED_POINTER_DIALECT = "UNSUPPORTED_POINTER_DIALECT",
  MALFORMED_SCHEMA_NODE = "MALFORMED_SCHEMA_NODE",
  CONFLICTING_CONSTRAINT = "CONFLICTING_CONSTRAINT",
  UNKNOWN_FORMAT = "UNKNOWN_FORMAT",
  CYCLIC_INHERITANCE = "CYCLIC_INHERITANCE",
  DANGLING_MODEL_REFERENCE = "DANGLING_MODEL_REFERENCE",
  PASS_FAILED = "PASS_FAILED",
}

export type ErrorDetails = Record<string, unknown>;

export class ModelSmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ModelSmithError";
  }

  /**
   * Convert error to a plain object suitable for reporting
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends ModelSmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends ModelSmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class DanglingReferenceError extends ModelSmithError {
  constructor(
    public readonly ref: string,
    public readonly documentId: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.DANGLING_REFERENCE,
      `Unresolvable reference "${ref}" at ${documentId}${path}`,
      { ref, documentId, path },
      options,
    );
    this.name = "DanglingReferenceError";
  }
}

export class UnsupportedPointerDialectError extends ModelSmithError {
  constructor(
    public readonly ref: string,
    public readonly documentId: string,
    public readonly path: string,
    reason: string,
  ) {
    super(
      ErrorCode.UNSUPPORTED_POINTER_DIALECT,
      `Unsupported reference "${ref}" at ${documentId}${path}: ${reason}`,
      { ref, documentId, path, reason },
    );
    this.name = "UnsupportedPointerDialectError";
  }
}

export class MalformedSchemaNodeError extends ModelSmithError {
  constructor(
    public readonly documentId: string,
    public readonly path: string,
    reason: string,
  ) {
    super(
      ErrorCode.MALFORMED_SCHEMA_NODE,
      `Malformed schema node at ${documentId}${path}: ${reason}`,
      { documentId, path, reason },
    );
    this.name = "MalformedSchemaNodeError";
  }
}

export class CyclicInheritanceError extends ModelSmithError {
  constructor(public readonly chain: string[]) {
    super(
      ErrorCode.CYCLIC_INHERITANCE,
      `Cyclic inheritance: ${chain.join(" -> ")}`,
      { chain },
    );
    this.name = "CyclicInheritanceError";
  }
}

export class DanglingModelReferenceError extends ModelSmithError {
  constructor(
    public readonly modelId: string,
    public readonly referencedBy: string[],
  ) {
    super(
      ErrorCode.DANGLING_MODEL_REFERENCE,
      `Model ${modelId} is referenced by ${referencedBy.join(", ")} but was never defined`,
      { modelId, referencedBy },
    );
    this.name = "DanglingModelReferenceError";
  }
}

export class PassFailedError extends ModelSmithError {
  constructor(public readonly diagnostics: Diagnostic[]) {
    const fatal = diagnostics.filter((d) => d.severity === "fatal");
    super(
      ErrorCode.PASS_FAILED,
      `Model synthesis failed with ${fatal.length} fatal error(s): ${fatal
        .map((d) => d.message)
        .join("; ")}`,
      { fatal: fatal.length },
    );
    this.name = "PassFailedError";
  }
}

/** Errors confined to one node: the node degrades and the pass goes on */
export type RecoverableError =
  | UnsupportedPointerDialectError
  | MalformedSchemaNodeError
  | FileIOError;

export function isRecoverable(error: unknown): error is RecoverableError {
  return (
    error instanceof UnsupportedPointerDialectError ||
    error instanceof MalformedSchemaNodeError ||
    error instanceof FileIOError
  );
}
