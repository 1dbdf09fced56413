/** Successful outcome of a domain operation. */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failed outcome of a domain operation. */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Outcome of a fallible domain operation.
 * Callers narrow on `ok` before touching `value` or `error`.
 */
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Returns the value of a successful result and throws the error of a failed one.
 * For use at layer boundaries where a failure ends the request.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
