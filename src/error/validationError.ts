import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Renders an issue path as `states[0].spectra[1].subtype`.
 */
export function formatIssuePath(path: StandardSchemaV1.Issue['path']): string {
  let result = '';
  for (const segment of path ?? []) {
    const key = typeof segment === 'object' ? segment.key : segment;
    if (typeof key === 'number') {
      result += `[${key}]`;
      continue;
    }

    result += result ? `.${String(key)}` : String(key);
  }

  return result;
}

function formatIssues(issues: ReadonlyArray<StandardSchemaV1.Issue>): string {
  const lines = issues.map((issue) => {
    const path = formatIssuePath(issue.path);
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return `[${lines.join(', ')}]`;
}

/**
 * Error representing a payload that does not match its declared shape when validating with @standard-schema.
 * The message lists every issue prefixed with its field path.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema validation issues */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError that extends Error, with accompanying Issues */
  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(`${message}; issues: ${formatIssues(issues)}`, opts);

    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
