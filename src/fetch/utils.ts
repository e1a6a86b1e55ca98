import type { HeaderOptions } from '../types/request.js';

type HeaderValue = string | ReadonlyArray<string> | null | undefined;

/**
 * `[name, value]` pairs of any accepted header shape, in order.
 */
function headerPairs(headers?: HeaderOptions): Array<[string, HeaderValue]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers.map((pair): [string, HeaderValue] => [String(pair[0]), pair[1]]);
  }

  return Object.entries<HeaderValue>(headers);
}

/**
 * Layers `overrides` over `base` into one `Headers`; names compare case-insensitively.
 * A `null`/`undefined` override removes the header, list values are joined with `, `.
 */
export function mergeHeaderOptions(base?: HeaderOptions, overrides?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [name, value] of [...headerPairs(base), ...headerPairs(overrides)]) {
    if (value === null || value === undefined) {
      merged.delete(name);
      continue;
    }

    merged.set(name, typeof value === 'string' ? value : value.join(', '));
  }

  return merged;
}
