export type ClientId = string;

/** Root-relative, slash-separated path. Used on the wire and as snapshot keys. */
export type NormalizedPath = string;

/**
 * Map keyed by normalized path. Prototype-less, so a path such as
 * `__proto__` is stored as an ordinary key.
 */
export function createPathMap<T>(): Record<NormalizedPath, T> {
  return Object.create(null);
}
