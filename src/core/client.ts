import { ResponseCache } from '../cache/client.js';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { ValidationError } from '../error/validationError.js';
import {
  FetchTransport,
  type FetchTransportOptions,
  type TransportDefinition,
  type TransportProvider,
} from '../fetch/client.js';
import { decodeEnvelope, decodeResponse } from '../graphql/envelope.js';
import {
  DYE_QUERY,
  MICROSCOPE_LIST_QUERY,
  MICROSCOPE_QUERY,
  PROTEIN_QUERY,
  SPECTRUM_QUERY,
} from '../graphql/queries.js';
import type { Fluorophore, Protein } from '../models/fluorophore.js';
import type { Microscope } from '../models/microscope.js';
import {
  dyeDataSchema,
  microscopeDataSchema,
  microscopeListDataSchema,
  proteinDataSchema,
  spectrumDataSchema,
} from '../models/responses.js';
import type { Camera, Filter, LightSource, Spectrum } from '../models/spectrum.js';
import { NameResolver, type OwnerFamily, type QueryRunner } from '../resolver/nameResolver.js';
import type { GraphQLVariables } from '../types/graphql.js';
import type { FetchImplementation, HeaderOptions } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Public FPbase GraphQL endpoint. */
export const DEFAULT_ENDPOINT = 'https://www.fpbase.org/graphql/';

/** Anything with a `debug` method, such as `console`. */
export type Logger = Pick<Console, 'debug'>;

/** Options accepted by {@link FPbaseClient.config}. */
export type ClientConfig = Omit<FetchTransportOptions, 'fetch'>;

/** Configuration for constructing an {@link FPbaseClient}. */
export interface FPbaseClientProps {
  /**
   * GraphQL endpoint.
   * @default 'https://www.fpbase.org/graphql/'
   */
  endpoint?: string;
  /** Headers merged over the transport defaults. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /** Fetch implementation handed to the transport. */
  fetch?: FetchImplementation;
  /** Transport implementation. Defaults to {@link FetchTransport}. */
  transportProvider?: TransportProvider;
  /** Log cache, request and lookup table activity through `logger`. */
  debug?: boolean;
  /** @default console */
  logger?: Logger;
}

/**
 * Converts an id to the integer some queries declare.
 */
function toIntegerId(id: string): SafeWrap<InvalidArgumentError, number> {
  if (!/^\d+$/.test(id)) {
    return [new InvalidArgumentError(`error expected a numeric id, got '${id}'`), null];
  }

  return [null, Number(id)];
}

/**
 * Typed client for the FPbase GraphQL API.
 *
 * - resolves loosely written names (any case, slugs, near misses get a suggestion),
 * - fetches records through an in-memory response cache,
 * - validates responses into frozen entities.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 * Instances are independent; use {@link getDefaultClient} for a shared one.
 */
export class FPbaseClient {
  /** Endpoint every query is posted to. */
  #endpoint: string;
  #transport: TransportDefinition;
  /** Response bodies by query digest. */
  #cache: ResponseCache;
  /** Name to id lookup tables. */
  #resolver: NameResolver;
  #debug: boolean;
  #logger: Logger;
  /** Global abort-controller for disposing */
  #abortController: AbortController;

  /**
   * @param props - Endpoint, transport and logging options.
   */
  constructor({
    endpoint = DEFAULT_ENDPOINT,
    headers,
    timeout,
    fetch,
    transportProvider = FetchTransport,
    debug = false,
    logger = console,
  }: FPbaseClientProps = {}) {
    this.#endpoint = endpoint;
    this.#transport = new transportProvider({ headers, timeout, fetch });
    this.#cache = new ResponseCache();
    this.#debug = debug;
    this.#logger = logger;
    this.#abortController = new AbortController();
    this.#resolver = new NameResolver(this.#run, { debug: (message) => this.#log(message) });
  }

  get endpoint(): string {
    return this.#endpoint;
  }

  /**
   * Updates headers and timeout at run time.
   */
  config(opts: ClientConfig) {
    this.#transport.config?.(opts);
  }

  /**
   * Aborts requests in flight and drops cached responses and lookup tables.
   * A disposed client fails every further request.
   */
  dispose() {
    this.#abortController.abort('client was disposed');
    this.#cache.clear();
    this.#resolver.clear();
  }

  #log(message: string) {
    if (this.#debug) {
      this.#logger.debug(`[fpbase] ${message}`);
    }
  }

  /**
   * Posts a query through the response cache.
   */
  #send(query: string, variables: GraphQLVariables): SafeWrapAsync<Error, string> {
    const key = this.#cache.key(this.#endpoint, query, variables);
    this.#log(`cache ${this.#cache.has(key) ? 'hit' : 'miss'} ${key}`);

    return this.#cache.get(key, () => {
      this.#log(`POST ${this.#endpoint}`);
      return this.#transport.post(this.#endpoint, { query, variables }, { signal: this.#abortController.signal });
    });
  }

  #run: QueryRunner = async (query, variables, schema) => {
    const [err, text] = await this.#send(query, variables);
    if (err) {
      return [new Error('error sending query', { cause: err }), null];
    }

    return decodeResponse(text, schema);
  };

  async #fetchDye(id: string): SafeWrapAsync<Error, Fluorophore> {
    const [errId, numericId] = toIntegerId(id);
    if (errId) {
      return [errId, null];
    }

    const [err, data] = await this.#run(DYE_QUERY, { id: numericId }, dyeDataSchema);
    if (err) {
      return [new Error(`error fetching dye ${id}`, { cause: err }), null];
    }

    return [null, data.dye];
  }

  async #fetchProtein(id: string): SafeWrapAsync<Error, Protein> {
    const [err, data] = await this.#run(PROTEIN_QUERY, { id }, proteinDataSchema);
    if (err) {
      return [new Error(`error fetching protein ${id}`, { cause: err }), null];
    }

    return [null, data.protein];
  }

  /**
   * Fetches a dye or protein by name, slug or protein id.
   *
   * @example
   * const [err, egfp] = await client.getFluorophore('egfp');
   */
  async getFluorophore(name: string): SafeWrapAsync<Error, Fluorophore> {
    const [err, entry] = await this.#resolver.resolveFluorophore(name);
    if (err) {
      return [err, null];
    }

    if (entry.kind === 'dye') {
      return this.#fetchDye(entry.id);
    }

    return this.#fetchProtein(entry.id);
  }

  /**
   * Fetches a protein by name, slug or id. Fails with an `InvalidArgumentError` when the name is a dye's.
   */
  async getProtein(name: string): SafeWrapAsync<Error, Protein> {
    const [err, entry] = await this.#resolver.resolveFluorophore(name);
    if (err) {
      return [err, null];
    }

    if (entry.kind !== 'protein') {
      return [new InvalidArgumentError(`error '${name}' is a dye, not a protein`), null];
    }

    return this.#fetchProtein(entry.id);
  }

  /**
   * Fetches a dye by name or slug. Fails with an `InvalidArgumentError` when the name is a protein's.
   */
  async getDye(name: string): SafeWrapAsync<Error, Fluorophore> {
    const [err, entry] = await this.#resolver.resolveFluorophore(name);
    if (err) {
      return [err, null];
    }

    if (entry.kind !== 'dye') {
      return [new InvalidArgumentError(`error '${name}' is a protein, not a dye`), null];
    }

    return this.#fetchDye(entry.id);
  }

  /**
   * Fetches a spectrum by id, along with the filter, camera or light source owning it.
   */
  async getSpectrum(id: string): SafeWrapAsync<Error, Spectrum> {
    const [errId, numericId] = toIntegerId(id);
    if (errId) {
      return [errId, null];
    }

    const [err, data] = await this.#run(SPECTRUM_QUERY, { id: numericId }, spectrumDataSchema);
    if (err) {
      return [new Error(`error fetching spectrum ${id}`, { cause: err }), null];
    }

    return [null, data.spectrum];
  }

  async #fetchOwnedSpectrum(family: OwnerFamily, name: string): SafeWrapAsync<Error, Spectrum> {
    const [errResolve, entry] = await this.#resolver.resolveOwner(family, name);
    if (errResolve) {
      return [errResolve, null];
    }

    const [err, spectrum] = await this.getSpectrum(entry.id);
    if (err) {
      return [new Error(`error fetching ${family} '${name}'`, { cause: err }), null];
    }

    return [null, spectrum];
  }

  #missingOwner(family: OwnerFamily, name: string, field: 'ownerFilter' | 'ownerCamera' | 'ownerLight') {
    return new ValidationError(`error fetching ${family} '${name}'`, [
      { message: 'Required', path: ['spectrum', field] },
    ]);
  }

  /**
   * Fetches a filter by name; case, spaces and slashes do not matter.
   *
   * @example
   * const [err, filter] = await client.getFilter('Chroma ET525/50m');
   */
  async getFilter(name: string): SafeWrapAsync<Error, Filter> {
    const [err, spectrum] = await this.#fetchOwnedSpectrum('filter', name);
    if (err) {
      return [err, null];
    }

    if (!spectrum.ownerFilter) {
      return [this.#missingOwner('filter', name, 'ownerFilter'), null];
    }

    return [null, spectrum.ownerFilter];
  }

  async getCamera(name: string): SafeWrapAsync<Error, Camera> {
    const [err, spectrum] = await this.#fetchOwnedSpectrum('camera', name);
    if (err) {
      return [err, null];
    }

    if (!spectrum.ownerCamera) {
      return [this.#missingOwner('camera', name, 'ownerCamera'), null];
    }

    return [null, spectrum.ownerCamera];
  }

  async getLight(name: string): SafeWrapAsync<Error, LightSource> {
    const [err, spectrum] = await this.#fetchOwnedSpectrum('light', name);
    if (err) {
      return [err, null];
    }

    if (!spectrum.ownerLight) {
      return [this.#missingOwner('light', name, 'ownerLight'), null];
    }

    return [null, spectrum.ownerLight];
  }

  /**
   * Fetches a microscope by its id, as found in the microscope's FPbase URL.
   */
  async getMicroscope(id: string): SafeWrapAsync<Error, Microscope> {
    const [err, data] = await this.#run(MICROSCOPE_QUERY, { id }, microscopeDataSchema);
    if (err) {
      return [new Error(`error fetching microscope ${id}`, { cause: err }), null];
    }

    return [null, data.microscope];
  }

  /** Sorted names of every dye and protein. */
  listFluorophores(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.fluorophoreNames();
  }

  listProteins(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.fluorophoreNames('protein');
  }

  listDyes(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.fluorophoreNames('dye');
  }

  listFilters(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.ownerNames('filter');
  }

  listCameras(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.ownerNames('camera');
  }

  listLights(): SafeWrapAsync<Error, string[]> {
    return this.#resolver.ownerNames('light');
  }

  /**
   * Sorted ids of every microscope, the keys {@link FPbaseClient.getMicroscope} takes.
   */
  async listMicroscopes(): SafeWrapAsync<Error, string[]> {
    const [err, data] = await this.#run(MICROSCOPE_LIST_QUERY, {}, microscopeListDataSchema);
    if (err) {
      return [new Error('error listing microscopes', { cause: err }), null];
    }

    const ids = new Set(data.microscopes.map((microscope) => microscope.id));
    return [null, [...ids].sort()];
  }

  /**
   * Runs any query through the cache and returns its `data` as decoded, without validation.
   *
   * @example
   * const [err, data] = await client.query('{ proteins { id name } }');
   */
  async query(query: string, variables: GraphQLVariables = {}): SafeWrapAsync<Error, unknown> {
    const [err, text] = await this.#send(query, variables);
    if (err) {
      return [new Error('error sending query', { cause: err }), null];
    }

    return decodeEnvelope(text);
  }
}
