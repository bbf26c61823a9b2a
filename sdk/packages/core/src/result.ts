import type { TokenError } from "./errors.js";

/** Outcome of a token operation */
export type Result<T, E = TokenError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E = TokenError>(error: E): Result<never, E> {
  return { success: false, error };
}

/** Return the data of a successful result, throw the error otherwise */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) return result.data;
  throw result.error;
}
