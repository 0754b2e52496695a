/**
 * prefix-router: single-segment longest-prefix path matching
 *
 * Public API surface. The matcher and its index are also exposed via the
 * `prefix-router/router` subpath.
 */

export { PathMatcher, createPathMatcher, SubstringMap } from './router';
export type {
  PathMatch,
  PathMatcherOptions,
  StringIndex,
  SubstringMatch,
} from './router';

export { InvalidArgumentError, InvalidRouteError } from './common/errors';
