/**
 * Result Type for Functional Error Handling
 *
 * Expected failures in the build pipeline (a language that fails to build,
 * a query that cannot run) travel as values instead of exceptions so that
 * sibling languages and sources keep going.
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
// Type Guards
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}
