import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Entity families a name can be resolved within. */
export type LookupFamily = 'fluorophore' | 'filter' | 'camera' | 'light';

const FAMILY_LABELS: Record<LookupFamily, string> = {
  fluorophore: 'fluorophore',
  filter: 'filter',
  camera: 'camera',
  light: 'light source',
};

/**
 * Error raised when a name cannot be resolved to an identifier.
 * Carries the original query and, when one was close enough, a suggested key.
 */
export class NotFoundError extends Error {
  /** NotFoundError error-name */
  name = 'NotFoundError';
  /** Family the lookup was made in */
  readonly family: LookupFamily;
  /** Query exactly as the caller supplied it */
  readonly query: string;
  /** Closest known key, if any */
  readonly suggestion: string | null;

  constructor(family: LookupFamily, query: string, suggestion: string | null = null, opts?: ErrorOptions) {
    const hint = suggestion === null ? '' : `, did you mean '${suggestion}'?`;
    super(`error ${FAMILY_LABELS[family]} '${query}' not found${hint}`, opts);

    this.family = family;
    this.query = query;
    this.suggestion = suggestion;
  }
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}

/**
 * Extract a {@link NotFoundError} from an unknown error value, following nested causes.
 */
export function getNotFoundError(error: unknown): null | NotFoundError {
  return unwrapErrorType(NotFoundError, error);
}
