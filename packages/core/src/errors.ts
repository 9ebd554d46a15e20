/**
 * packages/core/src/errors.ts — Coded error type for layout and focus violations.
 *
 * Why: Misconfigured widget trees (two weights along an unconstrained axis,
 * a grid with no width, a row of nothing but Max children) are programmer
 * errors. They surface as a single error class whose `code` is stable so
 * tests and callers can branch on it without parsing messages.
 *
 * "Not consumed" results from input handling are plain booleans and never
 * errors.
 */

// =============================================================================
// LoomErrorCode Union
// =============================================================================

/**
 * Deterministic error codes.
 *
 * Configuration errors:
 *   - LOOM_MULTIPLE_WEIGHTS
 *   - LOOM_SIZE_REQUIRED
 *   - LOOM_ALL_CHILDREN_MAX
 *   - LOOM_INVALID_DIMENSION
 *
 * Consistency errors:
 *   - LOOM_INVALID_POSITION
 *   - LOOM_LISTENER_THREW
 */
export type LoomErrorCode =
  | "LOOM_MULTIPLE_WEIGHTS"
  | "LOOM_SIZE_REQUIRED"
  | "LOOM_ALL_CHILDREN_MAX"
  | "LOOM_INVALID_DIMENSION"
  | "LOOM_INVALID_POSITION"
  | "LOOM_LISTENER_THREW";

// =============================================================================
// LoomError Class
// =============================================================================

/**
 * Error class for all deterministic layout and focus violations.
 * The `code` property identifies the specific violation.
 */
export class LoomError extends Error {
  override readonly name = "LoomError";
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError);
    }
  }
}

export function throwCode(code: LoomErrorCode, detail: string): never {
  throw new LoomError(code, detail);
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

// =============================================================================
// Result objects
// =============================================================================

export type LoomResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: Readonly<{ code: LoomErrorCode; detail: string }> }>;

export function invalidPosition<T>(detail: string): LoomResult<T> {
  return { ok: false, error: { code: "LOOM_INVALID_POSITION", detail } };
}

/** Reject focus and preferred positions that are not integers. */
export function assertPosition(value: number, what: string): void {
  if (!Number.isInteger(value)) {
    throwCode("LOOM_INVALID_POSITION", `${what}: expected an integer position, got ${String(value)}`);
  }
}
