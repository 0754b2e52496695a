/**
 * Common call contracts: Router types
 */

/**
 * Outcome of a prefix lookup. `matched` is the registered prefix (or `/` when
 * only the default handler applied) and `remainder` is what follows it.
 */
export interface PathMatch<T> {
  readonly matched: string;
  readonly remainder: string;
  readonly value: T | undefined;
}

export interface SubstringMatch<T> {
  readonly key: string;
  readonly value: T;
}

/**
 * Exact-string index the matcher probes.
 *
 * `get(key, length)` must only return an entry whose key equals the first
 * `length` characters of `key`, never some other key of the same length.
 */
export interface StringIndex<T> {
  put(key: string, value: T): void;
  get(key: string, length?: number): SubstringMatch<T> | undefined;
  keys(): string[];
  size(): number;
}

export interface PathMatcherOptions<T> {
  index?: StringIndex<T>;
}
