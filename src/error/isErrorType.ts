import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error matches a specific error class,
 * anywhere in its `cause` chain.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
