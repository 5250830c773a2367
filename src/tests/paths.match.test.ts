import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import {
  any,
  chain,
  key,
  match,
  matchMulti,
  type OperatorChain,
  overlaps,
  type PathMatch,
  recursive,
  regex,
  slot
} from '../index';

type MatchInput = {
  pattern: OperatorChain;
  path: OperatorChain;
  partial?: boolean;
};

const helloThere = chain(key('hello'), key('there'));

describe('Path matching: match and overlaps.', () => {
  /**
   * Pattern against concrete path
   * Priority: captured groups per operator, recursion splits, partial tails.
   */
  describe('Match', () => {
    const scenarios: Array<TestScenario<MatchInput, PathMatch | undefined>> = [
      {
        id: 'Wildcard Capture',
        description: 'Each operator captures the key it matched.',
        input: { pattern: chain(key(any()), key('there')), path: helloThere },
        expected: { path: 'hello.there', groups: ['hello', 'there'] }
      },
      {
        id: 'Partial Tail',
        description: 'A shorter pattern lets its last group take the rest.',
        input: { pattern: chain(key(any())), path: helloThere },
        expected: { path: 'hello.there', groups: ['hello.there'] }
      },
      {
        id: 'Exact Only',
        description: 'Without partial matching the lengths must agree.',
        input: { pattern: chain(key(any())), path: helloThere, partial: false },
        expected: undefined
      },
      {
        id: 'Path Too Short',
        description: 'A pattern longer than the path does not match.',
        input: { pattern: chain(key(any()), key(any())), path: chain(key('hello')) },
        expected: undefined
      },
      {
        id: 'Partial After Literal',
        description: 'The trailing group joins the remaining segments.',
        input: {
          pattern: chain(key('hello'), key(any())),
          path: chain(key('hello'), key('there'), key('bye'))
        },
        expected: { path: 'hello.there.bye', groups: ['hello', 'there.bye'] }
      },
      {
        id: 'Recursive Split',
        description: 'Recursion consumes segments until the rest matches.',
        input: {
          pattern: chain(recursive(), key('c')),
          path: chain(key('a'), key('b'), key('c'))
        },
        expected: { path: 'a.b.c', groups: ['a.b', 'c'] }
      },
      {
        id: 'Recursive Rejects Step',
        description: 'A named recursion only consumes its own key.',
        input: { pattern: chain(recursive('b')), path: chain(key('a'), key('b'), key('c')) },
        expected: undefined
      },
      {
        id: 'Recursive Shortest',
        description: 'With partial matching the shortest split wins.',
        input: { pattern: chain(recursive('b')), path: chain(key('b'), key('b'), key('b')) },
        expected: { path: 'b.b.b', groups: ['b'] }
      },
      {
        id: 'Recursive Whole',
        description: 'Without partial matching recursion takes the whole path.',
        input: {
          pattern: chain(recursive('b')),
          path: chain(key('b'), key('b'), key('b')),
          partial: false
        },
        expected: { path: 'b.b.b', groups: ['b.b.b'] }
      },
      {
        id: 'Index Capture',
        description: 'Index operators capture the index.',
        input: { pattern: chain(key('a'), slot(any())), path: chain(key('a'), slot(3)) },
        expected: { path: 'a[3]', groups: ['a', 3] }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { pattern, path, partial } = resolveScenarioInput(input);
      expect(match(pattern, path, { partial })).toStrictEqual(expected);
    });
  });

  describe('Overlaps', () => {
    test('a path overlaps its extension', () => {
      expect(overlaps(chain(key('a')), chain(key('a'), key('b')))).toBe(true);
    });

    test('siblings do not overlap', () => {
      expect(overlaps(chain(key('a'), key('b')), chain(key('a'), key('c')))).toBe(false);
    });
  });

  describe('Match Many', () => {
    test('matchMulti keeps only the matching paths, in order', () => {
      const paths = [chain(key('hello')), chain(key('there')), chain(key('hi'))];
      const found = matchMulti(chain(key(regex('h.*'))), paths);
      expect(found.map(({ path }) => path)).toStrictEqual(['hello', 'hi']);
    });
  });
});
