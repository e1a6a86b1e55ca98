/** Constructor of an error class, matched with `instanceof`. */
// biome-ignore lint/suspicious/noExplicitAny: error classes take arbitrary constructor arguments
export type ErrorClass<T extends Error> = new (...args: any[]) => T;

/**
 * Walks `err` and its `cause` chain and returns the first instance of `errorClass`.
 * The walk stops at the first cause that is not an `Error`.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
