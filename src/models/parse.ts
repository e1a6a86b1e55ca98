import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Builds an entity from a raw payload with one of the model schemas.
 * Unknown fields are dropped; the error lists every issue with its path.
 *
 * @example
 * const [err, protein] = await parseEntity(payload, proteinSchema, 'error parsing protein');
 */
export function parseEntity<T extends StandardSchemaV1>(
  raw: unknown,
  schema: T,
  message?: string,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  return validator(raw, schema, message);
}
