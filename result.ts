/**
 * Result type used by the validators instead of exceptions.
 * A validation walk returns on its first Err.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/** Shared success value for checks that produce nothing. */
export const OK_VOID: Result<void, never> = Ok(undefined);

/**
 * Run `fn` on the value if the result is Ok, otherwise pass the error through.
 */
export const andThen = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => {
  if (result.ok) {
    return fn(result.value);
  }
  return result;
};
