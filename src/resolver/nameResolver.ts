import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { LookupFamily } from '../error/notFoundError.js';
import { FLUOROPHORE_LIST_QUERY, OWNER_SPECTRA_LIST_QUERY } from '../graphql/queries.js';
import type { FluorophoreKind } from '../models/fluorophore.js';
import { fluorophoreListDataSchema, ownerSpectraListDataSchema } from '../models/responses.js';
import type { GraphQLVariables } from '../types/graphql.js';
import { Lazy } from '../utils/lazy.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import {
  type LookupEntry,
  LookupTable,
  normalizeFluorophoreName,
  normalizeOwnerName,
} from './lookupTable.js';

/** Runs a query and validates its `data` against `schema`. */
export type QueryRunner = <T extends StandardSchemaV1>(
  query: string,
  variables: GraphQLVariables,
  schema: T,
) => SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>>;

export interface FluorophoreEntry extends LookupEntry {
  kind: FluorophoreKind;
}

/** Families whose members are looked up through the spectrum they own. */
export type OwnerFamily = Exclude<LookupFamily, 'fluorophore'>;

/** Spectrum category code per owner family. */
export const OWNER_CATEGORIES: Record<OwnerFamily, 'F' | 'C' | 'L'> = {
  filter: 'F',
  camera: 'C',
  light: 'L',
};

export interface NameResolverOptions {
  /** Called with a line of text after each table build. */
  debug?: (message: string) => void;
}

/**
 * Resolves loosely written names to identifiers.
 *
 * Each family's table is built from one listing query on first use and kept until {@link NameResolver.clear}.
 */
export class NameResolver {
  #run: QueryRunner;
  #debug: (message: string) => void;
  #fluorophores: Lazy<LookupTable<FluorophoreEntry>>;
  #owners: Record<OwnerFamily, Lazy<LookupTable<LookupEntry>>>;

  constructor(run: QueryRunner, opts: NameResolverOptions = {}) {
    this.#run = run;
    this.#debug = opts.debug ?? (() => {});
    this.#fluorophores = new Lazy(() => this.#buildFluorophores());
    this.#owners = {
      filter: new Lazy(() => this.#buildOwners('filter')),
      camera: new Lazy(() => this.#buildOwners('camera')),
      light: new Lazy(() => this.#buildOwners('light')),
    };
  }

  async #buildFluorophores(): SafeWrapAsync<Error, LookupTable<FluorophoreEntry>> {
    const [err, data] = await this.#run(FLUOROPHORE_LIST_QUERY, {}, fluorophoreListDataSchema);
    if (err) {
      return [new Error('error building fluorophore lookup table', { cause: err }), null];
    }

    const entries = new Map<string, FluorophoreEntry>();
    for (const dye of data.dyes) {
      const entry: FluorophoreEntry = { id: dye.id, name: dye.name, kind: 'dye' };
      entries.set(normalizeFluorophoreName(dye.name), entry);
      if (dye.slug) {
        entries.set(normalizeFluorophoreName(dye.slug), entry);
      }
    }

    for (const protein of data.proteins) {
      const entry: FluorophoreEntry = { id: protein.id, name: protein.name, kind: 'protein' };
      entries.set(normalizeFluorophoreName(protein.name), entry);
      if (protein.slug) {
        entries.set(normalizeFluorophoreName(protein.slug), entry);
      }
      entries.set(normalizeFluorophoreName(protein.id), entry);
    }

    this.#debug(`built fluorophore lookup table with ${entries.size} keys`);
    return [null, new LookupTable('fluorophore', entries, normalizeFluorophoreName)];
  }

  async #buildOwners(family: OwnerFamily): SafeWrapAsync<Error, LookupTable<LookupEntry>> {
    const [err, data] = await this.#run(
      OWNER_SPECTRA_LIST_QUERY,
      { category: OWNER_CATEGORIES[family] },
      ownerSpectraListDataSchema,
    );
    if (err) {
      return [new Error(`error building ${family} lookup table`, { cause: err }), null];
    }

    const entries = new Map<string, LookupEntry>();
    for (const spectrum of data.spectra) {
      if (!spectrum.owner) {
        continue;
      }

      entries.set(normalizeOwnerName(spectrum.owner.name), { id: spectrum.id, name: spectrum.owner.name });
    }

    this.#debug(`built ${family} lookup table with ${entries.size} keys`);
    return [null, new LookupTable(family, entries, normalizeOwnerName)];
  }

  /**
   * Resolves a dye or protein by name, slug or (proteins only) id, case-insensitively.
   */
  public async resolveFluorophore(name: string): SafeWrapAsync<Error, FluorophoreEntry> {
    const [err, table] = await this.#fluorophores.get();
    if (err) {
      return [err, null];
    }

    return table.resolve(name);
  }

  /**
   * Resolves a filter, camera or light source name to the id of the spectrum it owns.
   */
  public async resolveOwner(family: OwnerFamily, name: string): SafeWrapAsync<Error, LookupEntry> {
    const [err, table] = await this.#owners[family].get();
    if (err) {
      return [err, null];
    }

    return table.resolve(name);
  }

  /** Sorted distinct fluorophore names, optionally of one kind only. */
  public async fluorophoreNames(kind?: FluorophoreKind): SafeWrapAsync<Error, string[]> {
    const [err, table] = await this.#fluorophores.get();
    if (err) {
      return [err, null];
    }

    return [null, table.names((entry) => kind === undefined || entry.kind === kind)];
  }

  /** Sorted distinct names of one owner family. */
  public async ownerNames(family: OwnerFamily): SafeWrapAsync<Error, string[]> {
    const [err, table] = await this.#owners[family].get();
    if (err) {
      return [err, null];
    }

    return [null, table.names()];
  }

  /** Forgets every built table. */
  public clear() {
    this.#fluorophores.reset();
    for (const table of Object.values(this.#owners)) {
      table.reset();
    }
  }
}
