/**
 * Prefix matching benchmark
 *
 * Measures lookup cost against tables of varying size and depth.
 */

import { bench, describe } from 'vitest';
import { PathMatcher } from '../../src/router/path-matcher';
import { benchN } from '../helpers/bench_config';

function buildMatcher(count: number): PathMatcher<number> {
  const matcher = new PathMatcher<number>().addPrefixPath('/', -1);
  for (let i = 0; i < count; i++) {
    matcher.addPrefixPath(`/service-${i}`, i);
    matcher.addPrefixPath(`/service-${i}/v${i % 3}`, i);
  }
  return matcher;
}

describe('prefix matching', () => {
  const small = buildMatcher(benchN(10));
  const large = buildMatcher(benchN(500));
  const urls = [
    '/service-7/v1/users/42',
    '/service-3',
    '/service-9/orders',
    '/static/app.js',
  ];

  bench('small table (mixed hits and fallbacks)', () => {
    for (const url of urls) small.match(url);
  });

  bench('large table (mixed hits and fallbacks)', () => {
    for (const url of urls) large.match(url);
  });
});

describe('prefix registration', () => {
  bench('register 200 prefixes', () => {
    buildMatcher(benchN(100));
  });
});
