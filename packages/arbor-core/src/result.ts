/**
 * Result type for operations that can fail in an expected way
 *
 * Structural edits are driven by keystrokes, and an invalid edit is a
 * normal outcome that gets reported back to the user. These operations
 * return a Result instead of throwing.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok(value?: unknown): Result<unknown, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
