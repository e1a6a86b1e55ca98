import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import type { GraphQLPayload } from '../types/graphql.js';
import type { FetchImplementation, HeaderOptions, PostOptions } from '../types/request.js';
import { requestSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Headers sent with every request unless overridden. */
export const DEFAULT_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
  'User-Agent': 'fpbase-ts',
} as const;

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** Headers merged over {@link DEFAULT_HEADERS}. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /** Fetch implementation, defaults to the global `fetch`. */
  fetch?: FetchImplementation;
}

/** Contract for transports used by the client. */
export interface TransportDefinition {
  /** Sends one POST and resolves to the raw response body of a 2xx response. */
  post: (endpoint: string, payload: GraphQLPayload, opts?: PostOptions) => SafeWrapAsync<Error, string>;
  /** Updates headers/timeout at run time. */
  config?: (opts: Omit<FetchTransportOptions, 'fetch'>) => void;
}

/** Factory signature for constructing transports. */
export interface TransportProvider {
  new (opts: FetchTransportOptions): TransportDefinition;
}

/**
 * Thin wrapper around `fetch` that:
 * - sends GraphQL-over-HTTP POST requests with JSON bodies,
 * - merges default and configured headers,
 * - applies a timeout per request,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * One attempt per call, no retries.
 */
export class FetchTransport implements TransportDefinition {
  /** Headers sent with every request. */
  #headers: Headers;
  /** Request timeout in milliseconds. */
  #timeout: number | false;
  #fetch: FetchImplementation;

  /** Creates a new transport with merged default headers */
  constructor(opts: FetchTransportOptions = {}) {
    this.#headers = mergeHeaderOptions(DEFAULT_HEADERS, opts.headers);
    this.#timeout = opts.timeout ?? 60_000;
    this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Updates default headers (merged with existing ones) and the timeout.
   */
  public config(opts: Omit<FetchTransportOptions, 'fetch'>) {
    this.#headers = mergeHeaderOptions(this.#headers, opts.headers);
    if (opts.timeout !== undefined) {
      this.#timeout = opts.timeout;
    }
  }

  /**
   * Executes a POST of `payload` as JSON against `endpoint`.
   *
   * Errors:
   * - Network failures, timeouts and aborts are wrapped in `TransportError`.
   * - Non-2xx responses become `HTTPError`.
   *
   * @returns A promise resolving to `[error, body]`.
   */
  public async post(endpoint: string, payload: GraphQLPayload, opts: PostOptions = {}): SafeWrapAsync<Error, string> {
    const { signal, settle } = requestSignal(this.#timeout, opts.signal);

    const [err, res] = await safeWrapAsync(() =>
      this.#fetch(endpoint, {
        method: 'POST',
        body: JSON.stringify(payload),
        headers: new Headers(this.#headers),
        ...(signal && { signal }),
      }),
    );

    if (err) {
      settle();
      return [new TransportError(`error in POST request to ${endpoint}`, { cause: signal?.reason ?? err }), null];
    }

    if (!res.ok) {
      settle();
      return [new HTTPError(res, `error in POST request to ${endpoint}: HTTP ${res.status}`), null];
    }

    const [errText, text] = await safeWrapAsync(() => res.text());
    settle();
    if (errText) {
      return [new TransportError(`error reading response body from ${endpoint}`, { cause: errText }), null];
    }

    return [null, text];
  }
}
