/**
 * Transport entrypoint: exports the fetch-based transport and its contracts.
 * @module
 */
export {
  DEFAULT_HEADERS,
  FetchTransport,
  type FetchTransportOptions,
  type TransportDefinition,
  type TransportProvider,
} from './client.js';
