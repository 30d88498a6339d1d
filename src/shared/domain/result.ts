/**
 * Outcome of an operation that can fail for business reasons.
 * Infrastructure failures are thrown, not returned.
 */
export type Result<T, E> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok(): Result<void, never>;
export function ok<T>(value: T): Result<T, never>;
export function ok(value?: unknown): Result<unknown, never> {
  return { success: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { success: false, error };
}
