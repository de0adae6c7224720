/**
 * Error types for autojson operations
 *
 * Invariants:
 * - Every error derives from JSONError
 * - `kind` is one of three tags: "json", "file", "validation"
 * - Errors raised for a target carry its absolute path, both as a field and in the message
 * - The underlying error is always preserved as `cause`
 */

/**
 * Error kind tag for programmatic matching
 */
export type JSONErrorKind = "json" | "file" | "validation";

/**
 * Store operations that can raise an error
 */
export type Operation = "auto" | "read" | "write" | "update" | "delete" | "create" | "exists" | "open";

/**
 * Structured fields shared by all autojson errors
 */
export interface JSONErrorOptions extends ErrorOptions {
  path?: string;
  operation?: Operation;
}

/**
 * Base class for all autojson errors.
 *
 * Raised directly when data cannot be serialized or store options are invalid.
 */
export class JSONError extends Error {
  readonly kind: JSONErrorKind = "json";
  readonly code: string = "JSON_ERROR";
  readonly path?: string;
  readonly operation?: Operation;

  constructor(message: string, options?: JSONErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.path = options?.path;
    this.operation = options?.operation;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown for missing files or directories, permission problems and other I/O failures
 */
export class JSONFileError extends JSONError {
  override readonly kind = "file";
  override readonly code = "FILE_ERROR";
  /** True when the target does not exist */
  readonly notFound: boolean;

  constructor(message: string, options?: JSONErrorOptions & { notFound?: boolean }) {
    super(message, options);
    this.notFound = options?.notFound ?? false;
  }
}

/**
 * Why content was rejected:
 * - "syntax": not valid JSON
 * - "precision": holds an integer a JavaScript number cannot represent exactly
 * - "schema": reserved, no schema checks exist yet
 */
export type ValidationReason = "syntax" | "precision" | "schema";

/**
 * Thrown when file content is not valid JSON, or cannot be rewritten without loss
 */
export class JSONValidationError extends JSONError {
  override readonly kind = "validation";
  override readonly code = "VALIDATION_ERROR";
  readonly reason: ValidationReason;

  constructor(message: string, options?: JSONErrorOptions & { reason?: ValidationReason }) {
    super(message, options);
    this.reason = options?.reason ?? "syntax";
  }
}

/**
 * Describe an unknown thrown value for inclusion in a message
 */
export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Extract a Node.js errno code from an unknown error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
