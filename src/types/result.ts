/**
 * Success-or-failure value returned by the result-based entry points.
 */

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Success<T> | Failure<E>;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function failure<E>(error: E): Failure<E> {
  return { ok: false, error };
}

export function isSuccess<T, E>(result: Result<T, E>): result is Success<T> {
  return result.ok;
}

export function isFailure<T, E>(result: Result<T, E>): result is Failure<E> {
  return !result.ok;
}

/**
 * Transforms the success value, passing failures through.
 */
export function mapResult<T, E, R>(result: Result<T, E>, transform: (value: T) => R): Result<R, E> {
  return result.ok ? success(transform(result.value)) : result;
}

/**
 * Transforms the error, passing successes through.
 */
export function mapError<T, E, F>(result: Result<T, E>, transform: (error: E) => F): Result<T, F> {
  return result.ok ? result : failure(transform(result.error));
}

/**
 * Folds both variants into a single value.
 */
export function match<T, E, R>(
  result: Result<T, E>,
  handlers: { success: (value: T) => R; failure: (error: E) => R }
): R {
  return result.ok ? handlers.success(result.value) : handlers.failure(result.error);
}

/**
 * Returns the success value or throws the error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
