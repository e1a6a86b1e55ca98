import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an argument is well-formed but unusable, such as a name
 * that resolves to a dye when a protein was requested.
 */
export class InvalidArgumentError extends Error {
  /** InvalidArgumentError error-name */
  name = 'InvalidArgumentError';
}

/**
 * Type guard for {@link InvalidArgumentError}.
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return isErrorType(InvalidArgumentError, error);
}
