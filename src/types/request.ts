/** Header options accepted by the transport; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Fetch-compatible function the transport sends requests through. */
export type FetchImplementation = (input: string, init: RequestInit) => Promise<Response>;

/** Per-call options accepted by transports. */
export interface PostOptions {
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}
