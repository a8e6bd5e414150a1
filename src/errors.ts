/**
 * @fileoverview Error hierarchy for the workload compiler.
 *
 * Every failure raised by the compiler is a {@link CompilerError} carrying a
 * stable code from {@link ErrorCodes}, so callers can branch on the code
 * instead of parsing messages.
 *
 * @module Errors
 * @since 1.0.0
 */

export const ErrorCodes = {
  VALIDATION_FAILED: "VALIDATION_FAILED",
  INVALID_MANIFEST: "INVALID_MANIFEST",
  INVALID_CONFIG: "INVALID_CONFIG",
  STATE_STORE_FAILED: "STATE_STORE_FAILED",
  WORKLOAD_FILE_UNREADABLE: "WORKLOAD_FILE_UNREADABLE",
  OUTPUT_EXISTS: "OUTPUT_EXISTS",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all compiler errors.
 */
export class CompilerError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CompilerError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Raised when a workload description fails schema or cross-field checks.
 *
 * `issues` holds one `<dotted.path>: <message>` entry per problem; all
 * problems of one input are reported together.
 */
export class WorkloadValidationError extends CompilerError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Workload validation failed:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
      ErrorCodes.VALIDATION_FAILED,
      { issues },
    );
    this.name = "WorkloadValidationError";
    this.issues = issues;
  }
}

export class ManifestValidationError extends CompilerError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, ErrorCodes.INVALID_MANIFEST, details);
    this.name = "ManifestValidationError";
  }
}

export class ConfigError extends CompilerError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, ErrorCodes.INVALID_CONFIG, details, options);
    this.name = "ConfigError";
  }
}

export class StateStoreError extends CompilerError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, ErrorCodes.STATE_STORE_FAILED, details, options);
    this.name = "StateStoreError";
  }
}

/**
 * Renders any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
