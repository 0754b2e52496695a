/**
 * prefix-router/router — matcher and its string index
 */

export { PathMatcher, createPathMatcher } from './path-matcher';
export { SubstringMap } from './substring-map';
export type {
  PathMatch,
  PathMatcherOptions,
  StringIndex,
  SubstringMatch,
} from '../common/router';
