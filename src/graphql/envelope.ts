import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { GraphQLResponseError } from '../error/graphQLResponseError.js';
import { ValidationError } from '../error/validationError.js';
import { parseEntity } from '../models/parse.js';
import { isRecord } from '../utils/isRecord.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

const errorsSchema = z.array(z.object({ message: z.string() }).passthrough()).nullish();

/**
 * Parses a GraphQL-over-HTTP response body and returns its `data` member.
 *
 * A body that is not JSON, or not an object, fails with a `ValidationError`.
 * A non-empty `errors` list fails with a `GraphQLResponseError`, even next to partial `data`.
 */
export function decodeEnvelope(text: string): SafeWrap<Error, unknown> {
  const [errParse, body] = safeWrap<unknown>(() => JSON.parse(text));
  if (errParse) {
    return [new ValidationError('error decoding response body as JSON', [], { cause: errParse }), null];
  }

  if (!isRecord(body)) {
    return [new ValidationError('error decoding response body', [{ message: 'Expected object' }]), null];
  }

  const errors = errorsSchema.safeParse(body.errors);
  if (!errors.success) {
    return [new ValidationError('error decoding response errors', [...errors.error.issues]), null];
  }

  if (errors.data && errors.data.length > 0) {
    return [new GraphQLResponseError(errors.data.map((error) => error.message)), null];
  }

  if (body.data === undefined || body.data === null) {
    return [new ValidationError('error decoding response body', [{ message: 'Required', path: ['data'] }]), null];
  }

  return [null, body.data];
}

/**
 * {@link decodeEnvelope} followed by validation of `data` against `schema`.
 * Issue paths are relative to `data`.
 */
export async function decodeResponse<T extends StandardSchemaV1>(
  text: string,
  schema: T,
  message?: string,
): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>> {
  const [err, data] = decodeEnvelope(text);
  if (err) {
    return [err, null];
  }

  return parseEntity(data, schema, message);
}
