/**
 * Core entrypoint: exports the client, its options and the shared default instance.
 * Import from here if you only need the client without models or error helpers.
 * @module
 */

/**
 * Typed FPbase client plus its constructor options.
 */
export { type ClientConfig, DEFAULT_ENDPOINT, FPbaseClient, type FPbaseClientProps, type Logger } from './client.js';

/**
 * Lazily constructed shared client and functions calling through it.
 */
export {
  getCamera,
  getDefaultClient,
  getDye,
  getFilter,
  getFluorophore,
  getLight,
  getMicroscope,
  getProtein,
  getSpectrum,
  listCameras,
  listDyes,
  listFilters,
  listFluorophores,
  listLights,
  listMicroscopes,
  listProteins,
  query,
  resetDefaultClient,
} from './default.js';
