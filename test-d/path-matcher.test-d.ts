import { expectType } from 'tsd';
import { createPathMatcher, PathMatcher } from '../src/index';
import type { PathMatch, StringIndex } from '../src/index';

type Handler = (remainder: string) => string;

const matcher = createPathMatcher<Handler>();
expectType<PathMatcher<Handler>>(matcher.addPrefixPath('/api', (r) => r));

const result = matcher.match('/api/users');
expectType<PathMatch<Handler>>(result);
expectType<Handler | undefined>(result.value);

expectType<readonly number[]>(matcher.lengths());
expectType<Handler | undefined>(matcher.defaultHandler());

declare const index: StringIndex<number>;
expectType<PathMatcher<number>>(new PathMatcher({ index }));
