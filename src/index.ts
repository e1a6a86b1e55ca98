/**
 * Root entrypoint: re-exports the client, entity models and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './core/index.js';
export * from './error/index.js';
export * from './models/index.js';

/**
 * Transport used by default, and the contract custom transports implement.
 */
export {
  DEFAULT_HEADERS,
  FetchTransport,
  type FetchTransportOptions,
  type TransportDefinition,
  type TransportProvider,
} from './fetch/client.js';

/**
 * Response cache keyed by query digest.
 */
export { ResponseCache } from './cache/client.js';

/**
 * Name resolution tables and their normalization rules.
 */
export {
  type FluorophoreEntry,
  type LookupEntry,
  LookupTable,
  NameResolver,
  normalizeFluorophoreName,
  normalizeOwnerName,
  type OwnerFamily,
} from './resolver/index.js';

/** Query templates sent to the service. */
export * from './graphql/queries.js';

export type { GraphQLPayload, GraphQLVariables, JsonValue } from './types/graphql.js';
export type { FetchImplementation, HeaderOptions, PostOptions } from './types/request.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
