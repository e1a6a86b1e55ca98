/**
 * Error entrypoint: exports the client's error classes and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, getAbortError, isAbortError } from './abortError.js';
/** Error raised when the service answers with GraphQL `errors`. */
export { GraphQLResponseError, isGraphQLResponseError } from './graphQLResponseError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Error raised for unusable arguments such as a dye passed to a protein lookup. */
export { InvalidArgumentError, isInvalidArgumentError } from './invalidArgumentError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a name cannot be resolved, with an optional suggestion. */
export { getNotFoundError, isNotFoundError, type LookupFamily, NotFoundError } from './notFoundError.js';
/** Error thrown when a request exceeds the configured timeout. */
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error representing a failed request/response cycle. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { formatIssuePath, getValidationError, isValidationError, ValidationError } from './validationError.js';
