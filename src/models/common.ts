import { z } from 'zod';

/** Frozen shallow copy of a list held by an entity. */
export function frozenCopy<T>(items: ReadonlyArray<T>): ReadonlyArray<T> {
  return Object.freeze([...items]);
}

/**
 * Identifiers arrive as strings or integers depending on the entity and protocol revision;
 * they are exposed as strings everywhere.
 */
export const idSchema = z.union([z.string().min(1), z.number().int()]).transform((id) => String(id));

/** A list field where `null` or absence means empty. */
export function nullableList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((list) => list ?? []);
}

/** An optional number; `null` becomes `undefined`. */
export const optionalNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

/** An optional string; `null` becomes `undefined`. */
export const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/** A string field where `null` or absence means `''`. */
export const stringOrEmpty = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/** `{ id }` reference to another record. */
export const idReferenceSchema = z.object({ id: idSchema });
