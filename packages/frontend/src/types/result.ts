/**
 * Result type for functional error handling
 *
 * Every pipeline stage returns a Result; the first error stops the run.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E>(error: E): Result<T, E> => ({
  ok: false,
  error,
});

/**
 * Map every item, stopping at the first error.
 */
export const collect = <T, U, E>(
  items: readonly T[],
  fn: (item: T, index: number) => Result<U, E>
): Result<readonly U[], E> => {
  const values: U[] = [];
  for (const [index, item] of items.entries()) {
    const result = fn(item, index);
    if (!result.ok) {
      return result;
    }
    values.push(result.value);
  }
  return ok(values);
};
