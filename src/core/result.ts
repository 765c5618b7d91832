/**
 * Discriminated union for operations that can fail expectedly.
 * Pipeline steps return these instead of throwing so the generator can
 * report which step failed and stop there.
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Create a successful Result. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Create a failed Result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Type guard for successful Result. */
export function isOk<T, E>(
  result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
  return result.ok;
}

/** Type guard for failed Result. */
export function isErr<T, E>(
  result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
  return !result.ok;
}

/**
 * Run an async operation, converting a thrown error into a failed Result.
 * `mapError` receives whatever was thrown.
 */
export async function tryAsync<T, E>(
  operation: () => Promise<T>,
  mapError: (thrown: unknown) => E,
): Promise<Result<T, E>> {
  try {
    return ok(await operation());
  } catch (thrown) {
    return err(mapError(thrown));
  }
}

/**
 * Unwrap a Result, throwing if it's an error.
 * Only use in tests or truly unrecoverable situations.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error instanceof Error ? result.error : new Error(String(result.error));
}
