import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import { type ReadInput, runGet, runUpdate, type WriteInput } from './helpers';
import {
  any,
  chain,
  expand,
  filter,
  guard,
  key,
  recursive,
  recursiveFirst,
  slot
} from '../index';

/**
 * Builds a mapping that holds itself under `self`.
 */
function selfReferencing(): Record<string, unknown> {
  const node: Record<string, unknown> = { a: 1 };
  node.self = node;
  return node;
}

describe('Recursive descent: targets, depth ranges, guards and cycles.', () => {
  /**
   * Recursive reads
   * Priority: first to highlight parent-before-child order and depth
   * selection.
   */
  describe('Recursive Reads', () => {
    const scenarios: Array<TestScenario<ReadInput, unknown>> = [
      {
        id: 'Any Depth',
        description: 'A key is found below every descendant.',
        input: {
          data: { a: { b: { c: 1 } }, x: { b: { c: 2 } } },
          path: chain(recursive(), key('c'))
        },
        expected: [1, 2]
      },
      {
        id: 'Named Chain',
        description: 'Recursion follows only the named key.',
        input: { data: { b: { b: { c: 1 } } }, path: chain(recursive('b'), key('c')) },
        expected: [1]
      },
      {
        id: 'Leaves Only',
        description: 'A depth start of -1 selects leaves.',
        input: { data: { a: { b: 1 }, c: 2 }, path: chain(recursive(any(), { depth: { start: -1 } })) },
        expected: [1, 2]
      },
      {
        id: 'Exact Depth',
        description: 'A lone depth start selects that level only.',
        input: { data: { a: { b: 1 }, c: 2 }, path: chain(recursive(any(), { depth: { start: 1 } })) },
        expected: [1]
      },
      {
        id: 'Depth Range',
        description: 'A start and stop select an inclusive range of levels.',
        input: {
          data: { a: { b: { c: 1 } } },
          path: chain(recursive(any(), { depth: { start: 1, stop: 2 } }))
        },
        expected: [{ c: 1 }, 1]
      },
      {
        id: 'Guarded',
        description: 'Only descendants passing the comparison are selected.',
        input: { data: { a: { b: 7 } }, path: chain(guard(recursive(), '=', 7)) },
        expected: [7]
      },
      {
        id: 'First Only',
        description: 'The first-only form stops at the first descendant.',
        input: { data: { a: { b: 1 } }, path: chain(recursiveFirst()) },
        expected: [{ b: 1 }]
      },
      {
        id: 'Accessor List',
        description: 'Recursion steps through keys, then through indexes.',
        input: {
          data: { a: [{ b: 1 }] },
          path: chain(recursive([{ segment: key(any()), cut: 'hard' }, slot(any())]), key('b'))
        },
        expected: [1]
      },
      {
        id: 'Filtered',
        description: 'Only descendants passing the filter are selected.',
        input: {
          data: { a: { id: 1 }, b: { id: 2, c: { id: 1, d: 0 } } },
          path: chain(recursive(any(), { filter: filter('id', '=', 1) }))
        },
        expected: [{ id: 1 }, { id: 1, d: 0 }]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runGet(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Recursive Updates', () => {
    const scenarios: Array<TestScenario<WriteInput, unknown>> = [
      {
        id: 'Guarded Replace',
        description: 'Every descendant passing the guard is replaced.',
        input: {
          data: { a: { b: 7, c: 3 }, d: 7 },
          path: chain(guard(recursive(), '=', 7)),
          value: 99
        },
        expected: { a: { b: 99, c: 3 }, d: 99 }
      },
      {
        id: 'Tail Below Matches',
        description: 'The rest of the path is written below every match.',
        input: {
          data: { b: { x: 1 } },
          path: chain(recursive('b'), key('c')),
          value: 0
        },
        expected: { b: { x: 1, c: 0 } }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runUpdate(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Concrete Paths And Cycles', () => {
    test('accessor lists expand to mixed key and index paths', () => {
      const path = chain(recursive([{ segment: key(any()), cut: 'hard' }, slot(any())]), key('b'));
      expect(expand({ a: [{ b: 1 }] }, path)).toStrictEqual(['a[0].b']);
    });

    test('a value already on the path is not entered again', () => {
      expect(expand(selfReferencing(), chain(recursive()))).toStrictEqual(['a', 'self']);
    });
  });
});
