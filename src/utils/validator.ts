import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Validates `input` against a Standard Schema, sync or async.
 *
 * A schema that throws (or rejects) gives a `ValidationError` with no issues and the thrown value as `cause`;
 * a result with issues gives a `ValidationError` prefixed with `message`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
  message = 'error validating data',
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [err, result] = await safeWrapAsync(async () => schema['~standard'].validate(input));
  if (err) {
    return [new ValidationError('error running schema validation', [], { cause: err }), null];
  }

  if (result.issues) {
    return [new ValidationError(message, [...result.issues]), null];
  }

  return [null, result.value];
}
