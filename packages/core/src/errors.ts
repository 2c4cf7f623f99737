/**
 * packages/core/src/errors.ts — Error codes and the kernel error class.
 *
 * Programming mistakes (reentrant stack mutation, a missing service, a wrong window kind)
 * throw `TesseraError`. Failures of sources and background jobs are values: they travel
 * through the control queue as `{ ok: false, error }` and reach the application error hook.
 */

// =============================================================================
// TesseraErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for every kernel violation.
 * These are surfaced as TesseraError instances.
 */
export type TesseraErrorCode =
  | "TSR_INVALID_PROPS"
  | "TSR_INVALID_STATE"
  | "TSR_REENTRANT_CALL"
  | "TSR_WRONG_TYPE"
  | "TSR_NOT_CONFIGURED"
  | "TSR_NO_FOCUS"
  | "TSR_POOL_CLOSED"
  | "TSR_JOB_FAILED"
  | "TSR_USER_CODE_THROW";

// =============================================================================
// TesseraError Class
// =============================================================================

/**
 * Error class for all deterministic kernel violations.
 * The `code` property identifies the specific violation.
 */
export class TesseraError extends Error {
  override readonly name = "TesseraError";
  readonly code: TesseraErrorCode;

  constructor(code: TesseraErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TesseraError);
    }
  }
}

export function isTesseraError(v: unknown, code?: TesseraErrorCode): v is TesseraError {
  if (!(v instanceof TesseraError)) return false;
  return code === undefined || v.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export function invalidProps(detail: string): never {
  throw new TesseraError("TSR_INVALID_PROPS", detail);
}
