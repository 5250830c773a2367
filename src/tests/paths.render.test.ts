import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import {
  any,
  assemble,
  attr,
  chain,
  cut,
  filter,
  guard,
  invert,
  key,
  nop,
  not,
  only,
  type OperatorChain,
  or,
  recursive,
  slice,
  sliceFilter,
  slot,
  where
} from '../index';

describe('Path rendering: assemble.', () => {
  /**
   * Notation form
   * Priority: every operator renders back to the notation that reads as it.
   */
  describe('Notation Form', () => {
    const scenarios: Array<TestScenario<OperatorChain, string>> = [
      {
        id: 'Keys, Index, Transform',
        description: 'Dots between keys, brackets for indexes, a pipe per transform.',
        input: chain(key('hello'), key('there'), slot(1)).pipe('int'),
        expected: 'hello.there[1]|int'
      },
      {
        id: 'Quoted Key',
        description: 'Keys holding reserved characters are quoted.',
        input: chain(key('a.b')),
        expected: "'a.b'"
      },
      {
        id: 'Integer String Key',
        description: 'A string that reads as an integer stays a string.',
        input: chain(key('7')),
        expected: "'7'"
      },
      {
        id: 'Float Key',
        description: 'A non-integral number key takes the quoted float form.',
        input: chain(key(1.5)),
        expected: "#'1.5'"
      },
      {
        id: 'Wildcards',
        description: 'Wildcard keys and indexes.',
        input: chain(key(any()), slot(any()), key('x')),
        expected: '*[*].x'
      },
      {
        id: 'Open Slice',
        description: 'A slice with a start only.',
        input: chain(key('a'), slice(1)),
        expected: 'a[1:]'
      },
      {
        id: 'Trailing Empty Slice',
        description: 'A trailing full slice is dropped.',
        input: chain(key('a'), slice()),
        expected: 'a'
      },
      {
        id: 'Recursive',
        description: 'Recursion over any key.',
        input: chain(recursive(), key('c')),
        expected: '**.c'
      },
      {
        id: 'Named Recursive',
        description: 'Recursion over one key.',
        input: chain(key('a'), recursive('b')),
        expected: 'a.*b'
      },
      {
        id: 'Cut Group',
        description: 'Branches with their cut markers.',
        input: chain(or(cut(key('a')), key('b'))),
        expected: '(a#, b)'
      },
      {
        id: 'Negation',
        description: 'Negated operators.',
        input: chain(not(key('a'))),
        expected: '(!a)'
      },
      {
        id: 'Nop Parent',
        description: 'The no-op marker leads a top operator.',
        input: chain(nop(key('a')), key('b')),
        expected: '~a.b'
      },
      {
        id: 'Nop Leaf',
        description: 'The no-op marker follows the separator.',
        input: chain(key('a'), nop(key('b'))),
        expected: 'a.~b'
      },
      {
        id: 'Value Guard',
        description: 'The comparison follows the operator.',
        input: chain(guard(key(any()), '=', 7)),
        expected: '*=7'
      },
      {
        id: 'Filtered Index',
        description: 'A filter sits inside the index brackets.',
        input: chain(key('a'), where(slot(any()), filter('id', '=', 1))),
        expected: 'a[*&id=1]'
      },
      {
        id: 'Filtered Selection',
        description: 'A filtered selection is a bracketed filter.',
        input: chain(key('a'), sliceFilter(filter('id', '=', 1))),
        expected: 'a[id=1]'
      },
      {
        id: 'Inversion',
        description: 'The operator after an inversion renders at the top.',
        input: chain(invert(), key('a')),
        expected: '-a'
      },
      {
        id: 'Field Access',
        description: 'Record fields use the at sign.',
        input: chain(key('a'), attr('x')),
        expected: 'a@x'
      },
      {
        id: 'Type Restriction',
        description: 'One type name after a colon.',
        input: chain(key(any()), only(key(0), 'sequence')),
        expected: '*.0:sequence'
      },
      {
        id: 'Negated Type List',
        description: 'Several negated type names in parentheses.',
        input: chain(only(key(any()), ['string', 'int'], true)),
        expected: '*:!(string, int)'
      },
      {
        id: 'Transform Argument',
        description: 'Transform arguments are quoted when they hold reserved characters.',
        input: chain(key('a')).pipe('str', '%s!'),
        expected: "a|str:'%s!'"
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(assemble(resolveScenarioInput(input))).toBe(expected);
    });
  });

  describe('Pedantic Form', () => {
    test('keeps a trailing full slice', () => {
      expect(assemble(chain(key('a'), slice()), true)).toBe('a[]');
    });

    test('renders a bare operator list', () => {
      expect(assemble([key('a'), slot(0)])).toBe('a[0]');
    });
  });
});
