import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed request/response cycle: connection refused,
 * DNS failure, timeout, or an unreadable body.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  name = 'TransportError';
}

/**
 * Type guard for {@link TransportError} (matches {@link HTTPError} too).
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
