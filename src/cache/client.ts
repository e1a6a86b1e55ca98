import { createHash } from 'node:crypto';
import type { GraphQLVariables, JsonValue } from '../types/graphql.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/**
 * Sorts object keys recursively so equal variable mappings serialize identically.
 */
function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  const sorted: { [key: string]: JsonValue } = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = canonicalize(value[key]);
  }

  return sorted;
}

/**
 * Response cache for the transport.
 *
 * Stores successful response bodies by query digest for the lifetime of the owning client.
 * Entries are never evicted.
 * Failures are never stored.
 */
export class ResponseCache {
  #cache: Map<string, string> = new Map();
  #pending: Map<string, SafeWrapAsync<Error, string>> = new Map();

  /** Number of stored responses. */
  get size(): number {
    return this.#cache.size;
  }

  /** Whether a response is stored under `key`. */
  public has(key: string): boolean {
    return this.#cache.has(key);
  }

  /**
   * Drops stored responses and forgets fetches in flight.
   */
  public clear() {
    this.#cache = new Map();
    this.#pending = new Map();
  }

  /**
   * Add request to the pending list, to be reused by other callers asking for the same key
   * until it settles. Only a successful body is promoted into the cache.
   */
  #addPendingRequest = (key: string, request: () => SafeWrapAsync<Error, string>) => {
    const pending = (async (): SafeWrapAsync<Error, string> => {
      const [errWrapped, wrapped] = await safeWrapAsync(() => request());
      const current = this.#pending.get(key) === pending;
      if (current) {
        this.#pending.delete(key);
      }

      if (errWrapped) {
        return [new Error('error thrown on cache wrapping request', { cause: errWrapped }), null];
      }

      const [errData, data] = wrapped;
      if (errData) {
        return [errData, null];
      }

      if (current) {
        this.#cache.set(key, data);
      }

      return [null, data];
    })();

    this.#pending.set(key, pending);
    return pending;
  };

  /**
   * Returns the stored body for `key`, or runs `fetch`, stores its body and returns it.
   * @param key - cache key from {@link ResponseCache.key}
   * @param fetch - request to run on a miss
   */
  public get = (key: string, fetch: () => SafeWrapAsync<Error, string>): SafeWrapAsync<Error, string> => {
    const cached = this.#cache.get(key);
    if (cached !== undefined) {
      return Promise.resolve([null, cached]);
    }

    const pending = this.#pending.get(key);
    if (pending !== undefined) {
      return pending;
    }

    return this.#addPendingRequest(key, fetch);
  };

  /**
   * Constructs a deterministic cache key: the SHA-256 hex digest of the JSON tuple
   * `[endpoint, query, variables]`, with variable keys sorted at every depth.
   */
  public key(endpoint: string, query: string, variables: GraphQLVariables = {}): string {
    const canonical = JSON.stringify([endpoint, query, canonicalize(variables)]);
    return createHash('sha256').update(canonical).digest('hex');
  }
}
