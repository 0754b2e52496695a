/**
 * Single-segment longest-prefix path matching
 *
 * Registered prefixes are probed longest-first using a descending index of
 * their distinct lengths. The index is an immutable snapshot swapped on every
 * registration, so `match` never sees a half-built one.
 */

import { InvalidArgumentError, InvalidRouteError } from '../common/errors';
import type {
  PathMatch,
  PathMatcherOptions,
  StringIndex,
} from '../common/router';
import { assertDescending, assertWritePrecondition } from '../dev/invariant';
import { devWarn } from '../dev/warnings';
import { SubstringMap } from './substring-map';

const PATH_SEPARATOR = '/';

const EMPTY_LENGTHS: readonly number[] = Object.freeze([]);

function pathMatch<T>(
  matched: string,
  remainder: string,
  value: T | undefined
): PathMatch<T> {
  return Object.freeze({ matched, remainder, value });
}

export class PathMatcher<T> {
  private readonly paths: StringIndex<T>;
  private defaultValue: T | undefined = undefined;
  private hasDefault = false;
  private lengthIndex: readonly number[] = EMPTY_LENGTHS;
  private writing = false;

  constructor(options: PathMatcherOptions<T> = {}) {
    this.paths = options.index ?? new SubstringMap<T>();
  }

  /**
   * Resolve `path` to the longest registered prefix.
   *
   * Never throws. When nothing matches, the result carries `/` as the matched
   * prefix, the whole path as the remainder, and the default handler (which
   * may be undefined).
   *
   * @example
   * matcher.addPrefixPath('/api', api).addPrefixPath('/api/v2', v2);
   * matcher.match('/api/v2/users');
   * // → { matched: '/api/v2', remainder: '/users', value: v2 }
   */
  match(path: string): PathMatch<T> {
    const length = path.length;
    const lengths = this.lengthIndex;
    for (let i = 0; i < lengths.length; i++) {
      const pathLength = lengths[i];
      if (pathLength === length) {
        const next = this.paths.get(path, length);
        if (next !== undefined) {
          return pathMatch(path, '', next.value);
        }
      } else if (pathLength < length) {
        const next = this.paths.get(path, pathLength);
        if (next !== undefined) {
          return pathMatch(next.key, path.slice(pathLength), next.value);
        }
      }
    }
    return pathMatch(PATH_SEPARATOR, path, this.defaultValue);
  }

  /**
   * Add a prefix and the handler bound to it. Registering `/` replaces the
   * default handler instead of adding a prefix. Re-registering a prefix
   * replaces its handler.
   *
   * @throws {InvalidArgumentError} when the path is empty
   * @throws {InvalidRouteError} when the path ends with `/`
   */
  addPrefixPath(path: string, handler: T): this {
    if (typeof path !== 'string' || path.length === 0) {
      throw new InvalidArgumentError();
    }

    assertWritePrecondition(
      this.writing,
      'Re-entrant prefix registration while another is in progress',
      { path }
    );

    if (path === PATH_SEPARATOR) {
      devWarn(!this.hasDefault, 'Default handler replaced by "/"');
      this.defaultValue = handler;
      this.hasDefault = true;
      return this;
    }
    if (path.endsWith(PATH_SEPARATOR)) {
      throw new InvalidRouteError(path);
    }

    this.writing = true;
    try {
      devWarn(
        () => this.paths.get(path) === undefined,
        `Prefix ${JSON.stringify(path)} registered twice; the later handler wins`
      );
      this.paths.put(path, handler);
    } finally {
      // Republished even when put threw: the index may already hold the key
      this.writing = false;
      this.lengthIndex = this.buildLengths();
    }
    return this;
  }

  /** Same as {@link PathMatcher.addPrefixPath}. */
  register(path: string, handler: T): this {
    return this.addPrefixPath(path, handler);
  }

  /** Current length index snapshot, longest first. */
  lengths(): readonly number[] {
    return this.lengthIndex;
  }

  /** Number of registered prefixes; `/` is not counted. */
  size(): number {
    return this.paths.size();
  }

  defaultHandler(): T | undefined {
    return this.defaultValue;
  }

  // Full rebuild from the stored keys on every registration
  private buildLengths(): readonly number[] {
    const distinct = new Set<number>();
    for (const key of this.paths.keys()) {
      distinct.add(key.length);
    }
    const lengths = Array.from(distinct).sort((a, b) => b - a);
    assertDescending(lengths);
    return Object.freeze(lengths);
  }
}

export function createPathMatcher<T>(
  options?: PathMatcherOptions<T>
): PathMatcher<T> {
  return new PathMatcher<T>(options);
}
