/**
 * Internal result type for safeTry
 */
export type SafeResult<T, E = unknown> =
  | { isOk: true; value: T; isErr: false; error: null }
  | { isOk: false; value: null; isErr: true; error: E };

/**
 * Runs an async operation and returns a result object instead of rejecting.
 * Keeps the client free of a slang-ts dependency and try/catch boilerplate.
 *
 * @example
 * const { isOk, value, error } = await safeTry(() => fetch(url));
 */
export async function safeTry<T>(
  fn: () => Promise<T>
): Promise<SafeResult<T>> {
  try {
    const value = await fn();
    return { isOk: true, value, isErr: false, error: null };
  } catch (error) {
    return { isOk: false, value: null, isErr: true, error };
  }
}
