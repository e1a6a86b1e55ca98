import { type LookupFamily, NotFoundError } from '../error/notFoundError.js';
import { closestMatch } from '../utils/similarity.js';
import type { SafeWrap } from '../utils/wrap.js';

/** What a lookup key resolves to. */
export interface LookupEntry {
  id: string;
  /** Display name */
  name: string;
}

/** Lower-cases a fluorophore name, slug or id. */
export function normalizeFluorophoreName(query: string): string {
  return query.toLowerCase();
}

/** Lower-cases a filter, camera or light source name and replaces spaces and slashes with hyphens. */
export function normalizeOwnerName(query: string): string {
  return query.toLowerCase().replace(/[ /]/g, '-');
}

/**
 * Normalized-key to entry table for one family, with a fuzzy suggestion on a miss.
 */
export class LookupTable<Entry extends LookupEntry> {
  readonly family: LookupFamily;
  #entries: ReadonlyMap<string, Entry>;
  #normalize: (query: string) => string;

  constructor(family: LookupFamily, entries: ReadonlyMap<string, Entry>, normalize: (query: string) => string) {
    this.family = family;
    this.#entries = entries;
    this.#normalize = normalize;
  }

  /** Number of keys. */
  get size(): number {
    return this.#entries.size;
  }

  /**
   * Looks `query` up after normalizing it. On a miss the error suggests the closest key
   * scoring at least 0.5, if there is one.
   */
  public resolve(query: string): SafeWrap<NotFoundError, Entry> {
    const key = this.#normalize(query);
    const entry = this.#entries.get(key);
    if (entry) {
      return [null, entry];
    }

    return [new NotFoundError(this.family, query, closestMatch(key, this.#entries.keys())), null];
  }

  /**
   * Sorted, distinct display names of the entries, optionally filtered.
   * A name whose key resolves to another entry is left out, so every listed name resolves to its own entry.
   */
  public names(predicate: (entry: Entry) => boolean = () => true): string[] {
    const names = new Set<string>();
    for (const entry of this.#entries.values()) {
      if (predicate(entry) && this.#entries.get(this.#normalize(entry.name)) === entry) {
        names.add(entry.name);
      }
    }

    return [...names].sort();
  }
}
