import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Whether `err` or anything in its `cause` chain is an `errorClass`.
 *
 * @example
 * const [err] = await client.getProtein('mScrlet');
 * if (isErrorType(NotFoundError, err)) {
 *   console.log(err.suggestion);
 * }
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
