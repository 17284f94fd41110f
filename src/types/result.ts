/**
 * Result Type for Functional Error Handling
 *
 * Analysis is all-or-nothing: every public entry point of the core returns
 * either a finished value or the single error that aborted it.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Extracts the value from a Result, throwing if it's an error
 *
 * @throws The contained error if Result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

/**
 * Extracts the error from a Result, throwing if it's Ok
 *
 * @throws Error if Result is Ok
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (!result.ok) return result.error;
  throw new Error("Called unwrapErr on an Ok result");
}

// =============================================================================
// Capturing
// =============================================================================

/**
 * Runs a throwing computation, capturing errors that satisfy the guard.
 * Anything else is rethrown, so programming errors are never turned into
 * analysis results.
 */
export function tryCatch<T, E>(
  fn: () => T,
  isExpected: (error: unknown) => error is E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    if (isExpected(error)) {
      return err(error);
    }
    throw error;
  }
}
