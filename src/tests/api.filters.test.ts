import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import { type ReadInput, runGet } from './helpers';
import {
  allOf,
  any,
  anyOf,
  bytesGlob,
  chain,
  filter,
  firstOf,
  fkey,
  fslot,
  get,
  glob,
  globEntry,
  guard,
  key,
  literal,
  mapping,
  negated,
  oneOf,
  regex,
  seq,
  set,
  sliceFilter,
  slot,
  strGlob,
  transform,
  UnsupportedMutationError,
  update,
  where
} from '../index';

const people = [{ id: 1 }, { id: 2 }, { id: 1, x: 1 }];

describe('Filters and value guards.', () => {
  /**
   * Item filters
   * Priority: first to pin down which items each filter form keeps.
   */
  describe('Item Filters', () => {
    const scenarios: Array<TestScenario<ReadInput, unknown>> = [
      {
        id: 'Filtered Children',
        description: 'Children failing the filter are skipped before the rest of the path.',
        input: {
          data: {
            a: [
              { id: 1, name: 'x' },
              { id: 2, name: 'y' }
            ]
          },
          path: chain(key('a'), where(slot(any()), filter('id', '=', 2)), key('name'))
        },
        expected: ['y']
      },
      {
        id: 'Filtered Selection',
        description: 'A filtered selection reads the passing elements as one sequence.',
        input: { data: { a: people }, path: chain(key('a'), sliceFilter(filter('id', '=', 1))) },
        expected: [{ id: 1 }, { id: 1, x: 1 }]
      },
      {
        id: 'Conjunction',
        description: 'Every filter must pass.',
        input: {
          data: { a: people },
          path: chain(key('a'), sliceFilter(allOf(filter('id', '=', 1), filter('x', '=', 1))))
        },
        expected: [{ id: 1, x: 1 }]
      },
      {
        id: 'Disjunction',
        description: 'Each filter contributes its selection in turn.',
        input: {
          data: { a: people },
          path: chain(key('a'), sliceFilter(anyOf(filter('id', '=', 2), filter('id', '=', 1))))
        },
        expected: [{ id: 2 }, { id: 1 }, { id: 1, x: 1 }]
      },
      {
        id: 'Negation',
        description: 'A negated filter keeps the failing items.',
        input: {
          data: { a: people },
          path: chain(key('a'), sliceFilter(negated(filter('id', '=', 1))))
        },
        expected: [{ id: 2 }]
      },
      {
        id: 'First Passing',
        description: 'The first-only form keeps one item.',
        input: {
          data: { a: people },
          path: chain(key('a'), sliceFilter(firstOf(filter('id', '=', 1))))
        },
        expected: [{ id: 1 }]
      },
      {
        id: 'Nested Key',
        description: 'A dotted filter key compares a nested value.',
        input: {
          data: [{ user: { id: 5 } }, { user: { id: 1 } }],
          path: chain(where(slot(any()), filter([fkey('user'), fkey('id')], '>', 3)))
        },
        expected: [{ user: { id: 5 } }]
      },
      {
        id: 'Indexed Key',
        description: 'An index step compares every element of a nested sequence.',
        input: {
          data: [{ tags: ['x', 'y'] }, { tags: ['z'] }],
          path: chain(where(slot(any()), filter([fkey('tags'), fslot(any())], '=', 'x')))
        },
        expected: [{ tags: ['x', 'y'] }]
      },
      {
        id: 'Inequality',
        description: 'Items without the key pass an inequality.',
        input: {
          data: [{ id: 1 }, { x: 2 }],
          path: chain(where(slot(any()), filter('id', '!=', 1)))
        },
        expected: [{ x: 2 }]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runGet(resolveScenarioInput(input))).toStrictEqual(expected);
    });

    test('a filtered selection cannot be updated', () => {
      const path = chain(key('a'), sliceFilter(filter('id', '=', 1)));
      expect(() => update({ a: [{ id: 1 }] }, path, [])).toThrow(UnsupportedMutationError);
    });
  });

  /**
   * Value guards
   * Priority: second; container patterns and orderings on child values.
   */
  describe('Value Guards', () => {
    const scenarios: Array<TestScenario<ReadInput, unknown>> = [
      {
        id: 'Sequence Glob',
        description: 'A sequence pattern with a glob in the middle.',
        input: {
          data: { a: [1, 2, 3], b: [1, 3], c: [1, 2] },
          path: chain(guard(key(any()), '=', seq(1, glob(), 3)))
        },
        expected: [
          [1, 2, 3],
          [1, 3]
        ]
      },
      {
        id: 'Mapping Pattern',
        description: 'A required entry plus any other entries.',
        input: {
          data: { x: { a: 1, b: 2 }, y: { b: 2 } },
          path: chain(guard(key(any()), '=', mapping(['a', 1], globEntry())))
        },
        expected: [{ a: 1, b: 2 }]
      },
      {
        id: 'Set Pattern',
        description: 'A required member plus any other members.',
        input: {
          data: { s: new Set([1, 2]), t: new Set([2]) },
          path: chain(guard(key(any()), '=', set(1, glob())))
        },
        expected: [new Set([1, 2])]
      },
      {
        id: 'String Prefix',
        description: 'A string glob matches by prefix.',
        input: {
          data: { a: 'hello', b: 'yo' },
          path: chain(guard(key(any()), '=', strGlob('he', glob())))
        },
        expected: ['hello']
      },
      {
        id: 'Bytes Prefix',
        description: 'A bytes glob matches by leading bytes.',
        input: {
          data: { a: new Uint8Array([71, 73, 70, 56]), b: new Uint8Array([1, 2]) },
          path: chain(guard(key(any()), '=', bytesGlob(new Uint8Array([71, 73, 70]), glob())))
        },
        expected: [new Uint8Array([71, 73, 70, 56])]
      },
      {
        id: 'Bytes Bounded Tail',
        description: 'A bounded glob fixes how many bytes follow.',
        input: {
          data: { a: new Uint8Array([1, 2]), b: new Uint8Array([1, 2, 3]) },
          path: chain(guard(key(any()), '=', bytesGlob(new Uint8Array([1]), glob(undefined, 1, 1))))
        },
        expected: [new Uint8Array([1, 2])]
      },
      {
        id: 'Alternatives',
        description: 'A value group accepts any alternative.',
        input: { data: { a: 1, b: 2, c: 3 }, path: chain(guard(key(any()), '=', oneOf(1, 2))) },
        expected: [1, 2]
      },
      {
        id: 'Ordering',
        description: 'Ordering operators compare numbers.',
        input: { data: [1, 2, 3], path: chain(guard(slot(any()), '>', 1)) },
        expected: [2, 3]
      },
      {
        id: 'Not Equal',
        description: 'Inequality keeps the other values.',
        input: { data: { a: 1, b: 2 }, path: chain(guard(key(any()), '!=', 1)) },
        expected: [2]
      },
      {
        id: 'Transformed Comparison',
        description: 'Values are transformed before comparing; the raw value is returned.',
        input: {
          data: { a: '7', b: '8' },
          path: chain(guard(key(any()), '=', 7, [transform('int')]))
        },
        expected: ['7']
      },
      {
        id: 'Regex Value',
        description: 'A regular expression matches whole string values.',
        input: { data: { a: 'hi', b: 'no' }, path: chain(guard(key(any()), '=', regex('h.*'))) },
        expected: ['hi']
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runGet(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Chain Guards', () => {
    test('a guarded chain returns a passing value', () => {
      expect(get({ a: 7 }, chain(key('a')).guarded('=', literal(7)))).toBe(7);
    });

    test('a guarded chain selects nothing when the value fails', () => {
      expect(get({ a: 8 }, chain(key('a')).guarded('=', literal(7)))).toBeUndefined();
    });
  });
});
