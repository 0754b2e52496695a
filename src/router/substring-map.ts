/**
 * Exact-key string index with substring probes
 *
 * `get(path, n)` answers "is the first n characters of path a stored key?"
 * without the caller building the substring itself.
 */

import type { StringIndex, SubstringMatch } from '../common/router';

export class SubstringMap<T> implements StringIndex<T> {
  private readonly entries = new Map<string, SubstringMatch<T>>();

  put(key: string, value: T): void {
    // Entries are replaced, never mutated in place
    this.entries.set(key, Object.freeze({ key, value }));
  }

  get(
    key: string,
    length: number = key.length
  ): SubstringMatch<T> | undefined {
    if (length === key.length) return this.entries.get(key);
    if (length < 0 || length > key.length) return undefined;
    return this.entries.get(key.slice(0, length));
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  size(): number {
    return this.entries.size;
  }
}
