/**
 * Error codes and the error class for Trellis.
 */

// =============================================================================
// TrellisErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for renderer failures.
 * These are surfaced as TrellisError instances.
 */
export type TrellisErrorCode =
  | "TRELLIS_PARSE_FAILURE"
  | "TRELLIS_LAYOUT_FAILURE"
  | "TRELLIS_FLUSH_TIMEOUT"
  | "TRELLIS_FLUSH_FAILED"
  | "TRELLIS_CANCELLED"
  | "TRELLIS_WRONG_THREAD"
  | "TRELLIS_STALE_LAYOUT_HANDLE"
  | "TRELLIS_INVALID_CONFIG"
  | "TRELLIS_UNKNOWN_VIEW";

// =============================================================================
// TrellisError Class
// =============================================================================

/**
 * Error class for all renderer violations.
 * The `code` property identifies the specific violation.
 */
export class TrellisError extends Error {
  override readonly name = "TrellisError";
  readonly code: TrellisErrorCode;

  constructor(code: TrellisErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrellisError);
    }
  }
}

export function isTrellisError(e: unknown, code?: TrellisErrorCode): e is TrellisError {
  if (!(e instanceof TrellisError)) return false;
  return code === undefined || e.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}
