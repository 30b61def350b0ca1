export interface Ok<T> {
  ok: true;
  value: T;
}
export interface Err<E> {
  ok: false;
  error: E;
}
export type Result<T, E> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E>(error: E): Err<E> => ({ ok: false, error });

/**
 * Runs `fn` and captures a thrown error of class `errorType` as an `Err`.
 * Anything else is rethrown.
 */
export const attempt = <T, E extends Error>(
  fn: () => T,
  errorType: abstract new (...args: never[]) => E
): Result<T, E> => {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof errorType) return err(error);
    throw error;
  }
};
