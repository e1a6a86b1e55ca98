import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Abort reason for a request cancelled by its caller or by disposing the client,
 * used when the aborting signal carried no reason of its own.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}

/**
 * Extract an {@link AbortError} from an unknown error value, following nested causes.
 */
export function getAbortError(error: unknown): null | AbortError {
  return unwrapErrorType(AbortError, error);
}
