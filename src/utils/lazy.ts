import type { SafeWrapAsync } from './wrap.js';

/**
 * Computes a value at most once, on first request.
 *
 * Concurrent callers before the first build completes share the same pending build.
 * A failed build is not kept, so the next call starts over.
 */
export class Lazy<T> {
  #build: () => SafeWrapAsync<Error, T>;
  #value: { data: T } | null = null;
  #pending: SafeWrapAsync<Error, T> | null = null;

  constructor(build: () => SafeWrapAsync<Error, T>) {
    this.#build = build;
  }

  /** Whether a value has been built and kept. */
  get ready(): boolean {
    return this.#value !== null;
  }

  get(): SafeWrapAsync<Error, T> {
    if (this.#value) {
      return Promise.resolve([null, this.#value.data]);
    }

    if (this.#pending) {
      return this.#pending;
    }

    const pending = (async (): SafeWrapAsync<Error, T> => {
      const [err, data] = await this.#build();
      if (this.#pending === pending) {
        this.#pending = null;
        if (!err) {
          this.#value = { data };
        }
      }

      if (err) {
        return [err, null];
      }

      return [null, data];
    })();

    this.#pending = pending;
    return pending;
  }

  /** Forgets the built value and any build in flight. */
  reset() {
    this.#value = null;
    this.#pending = null;
  }
}
