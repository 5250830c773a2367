import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { expectArray, resolveScenarioInput } from './test-utils';
import { type ReadInput, runGet } from './helpers';
import {
  any,
  anyFirst,
  assemble,
  attr,
  chain,
  expand,
  expandMulti,
  FieldRecord,
  get,
  getMulti,
  has,
  key,
  mutatesInPlace,
  nop,
  only,
  type OperatorChain,
  pluck,
  pluckMulti,
  recursive,
  regex,
  regexFirst,
  root,
  slice,
  slot,
  unpack,
  updateMulti,
  walk
} from '../index';

/** A pattern read and the concrete chains its expansion names, in order. */
type RoundTripInput = ReadInput & {
  concrete: OperatorChain[];
};

describe('Reading: get, has, expand, pluck and walk.', () => {
  /**
   * Access operators
   * Priority: first to pin down what each operator selects on each kind.
   */
  describe('Access Operators', () => {
    const scenarios: Array<TestScenario<ReadInput, unknown>> = [
      {
        id: 'Nested Index',
        description: 'Keys then an index reach one value.',
        input: {
          data: { hello: { there: [1, 2, 3] } },
          path: chain(key('hello'), key('there'), slot(1))
        },
        expected: 2
      },
      {
        id: 'Negative Index',
        description: 'A negative index counts from the end.',
        input: {
          data: { hello: { there: [1, 2, 3] } },
          path: chain(key('hello'), key('there'), slot(-1))
        },
        expected: 3
      },
      {
        id: 'Missing Key',
        description: 'A missing key selects nothing.',
        input: { data: { a: 1 }, path: chain(key('nope')) },
        expected: undefined
      },
      {
        id: 'Key Indexes Sequence',
        description: 'A literal integer key indexes a sequence.',
        input: { data: ['a', 'b'], path: chain(key(0)) },
        expected: 'a'
      },
      {
        id: 'Strict Key On Sequence',
        description: 'Strict calls keep keys to mappings.',
        input: { data: ['a', 'b'], path: chain(key(0)), options: { strict: true } },
        expected: undefined
      },
      {
        id: 'Slot Falls Back',
        description: 'An index operator reads a mapping key.',
        input: { data: { a: 1 }, path: chain(slot('a')) },
        expected: 1
      },
      {
        id: 'Strict Slot On Mapping',
        description: 'Strict calls keep indexes to sequences.',
        input: { data: { a: 1 }, path: chain(slot('a')), options: { strict: true } },
        expected: undefined
      },
      {
        id: 'Numeric Key On Object',
        description: 'A number addresses its decimal property name.',
        input: { data: { '7': 'seven' }, path: chain(key(7)) },
        expected: 'seven'
      },
      {
        id: 'Key Skips Records',
        description: 'Mapping access does not read record fields.',
        input: { data: new FieldRecord({ x: 1 }), path: chain(key('x')) },
        expected: undefined
      },
      {
        id: 'Attr On Record',
        description: 'Field access reads record fields.',
        input: { data: new FieldRecord({ x: 1 }), path: chain(attr('x')) },
        expected: 1
      },
      {
        id: 'Attr Skips Mappings',
        description: 'Field access does not read mapping keys.',
        input: { data: { x: 1 }, path: chain(attr('x')) },
        expected: undefined
      },
      {
        id: 'Map Keys',
        description: 'Map entries are mapping keys.',
        input: { data: new Map<unknown, unknown>([['k', 5]]), path: chain(key('k')) },
        expected: 5
      },
      {
        id: 'Wildcard',
        description: 'A pattern returns every match in order.',
        input: { data: { a: 1, b: 2 }, path: chain(key(any())) },
        expected: [1, 2]
      },
      {
        id: 'First Wildcard',
        description: 'The first-only wildcard still returns a list.',
        input: { data: { a: 1, b: 2 }, path: chain(key(anyFirst())) },
        expected: [1]
      },
      {
        id: 'Regex Keys',
        description: 'Regular expressions match whole keys.',
        input: { data: { ab: 1, abc: 2, b: 3 }, path: chain(key(regex('a.'))) },
        expected: [1]
      },
      {
        id: 'First Regex',
        description: 'The first-only regular expression keeps the first matching key.',
        input: { data: { ab: 1, ac: 2, b: 3 }, path: chain(key(regexFirst('a.'))) },
        expected: [1]
      },
      {
        id: 'Empty Path',
        description: 'The empty path selects the value itself.',
        input: { data: 5, path: chain(root()) },
        expected: 5
      },
      {
        id: 'Open Slice',
        description: 'A slice selects one new sequence.',
        input: { data: [1, '2', 3], path: chain(slice(1)) },
        expected: ['2', 3]
      },
      {
        id: 'Stepped Slice',
        description: 'A step skips elements.',
        input: { data: [1, 2, 3, 4, 5], path: chain(slice(undefined, undefined, 2)) },
        expected: [1, 3, 5]
      },
      {
        id: 'Slice Of String',
        description: 'A slice of a string is a substring.',
        input: { data: 'hello', path: chain(slice(0, 3)) },
        expected: 'hel'
      },
      {
        id: 'Strings Not Navigable',
        description: 'Index access does not enter strings.',
        input: { data: 'abc', path: chain(slot(0)) },
        expected: undefined
      },
      {
        id: 'Transform Pipeline',
        description: 'The chain transforms the value it reads.',
        input: { data: { a: '7' }, path: chain(key('a')).pipe('int') },
        expected: 7
      },
      {
        id: 'Type Restriction',
        description: 'The operator applies only to nodes of the listed type.',
        input: {
          data: { a: { '0': 'm' }, b: ['s'] },
          path: chain(key(any()), only(key(0), 'sequence'))
        },
        expected: ['s']
      },
      {
        id: 'Negated Type Restriction',
        description: 'A negated restriction applies to every other type.',
        input: {
          data: { a: { '0': 'm' }, b: ['s'] },
          path: chain(key(any()), only(key(0), 'sequence', true))
        },
        expected: ['m']
      },
      {
        id: 'Nop Reads Through',
        description: 'The no-op marker does not change reads.',
        input: { data: { a: 1 }, path: chain(nop(key('a'))) },
        expected: 1
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runGet(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('Defaults', () => {
    test('non-pattern chain returns the default when nothing is selected', () => {
      expect(get({}, chain(key('a')), { default: 'none' })).toBe('none');
    });

    test('pattern chain returns an empty list when nothing is selected', () => {
      expect(get({}, chain(key(any())))).toStrictEqual([]);
    });

    test('pattern chain returns the pattern default when nothing is selected', () => {
      expect(get({}, chain(key(any())), { patternDefault: ['x'] })).toStrictEqual(['x']);
    });
  });

  describe('Presence', () => {
    test('a key holding null is present', () => {
      expect(has({ a: null }, chain(key('a')))).toBe(true);
    });

    test('a missing key is absent', () => {
      expect(has({}, chain(key('a')))).toBe(false);
    });
  });

  describe('Concrete Paths', () => {
    test('expand lists every concrete path', () => {
      const data = { hello: { there: [1, 2] } };
      expect(expand(data, chain(key(any()), key(any()), slot(any())))).toStrictEqual([
        'hello.there[0]',
        'hello.there[1]'
      ]);
    });

    test('expand carries the chain transforms', () => {
      expect(expand({ a: '1' }, chain(key('a')).pipe('int'))).toStrictEqual(['a|int']);
    });

    test('expand quotes keys that need it', () => {
      expect(expand({ 'a.b': 1, '7': 2 }, chain(key(any())))).toStrictEqual(["'7'", "'a.b'"]);
    });

    test('pluck pairs each path with its raw value', () => {
      const pairs = pluck({ a: 1, b: 2 }, chain(key(any())));
      expectArray(pairs);
      expect(pairs).toStrictEqual([
        ['a', 1],
        ['b', 2]
      ]);
    });

    test('pluck of a non-pattern chain is one pair', () => {
      expect(pluck({ a: { b: 1 } }, chain(key('a'), key('b')))).toStrictEqual(['a.b', 1]);
    });

    test('pluck of a missing non-pattern path is undefined', () => {
      expect(pluck({}, chain(key('a')))).toBeUndefined();
    });

    test('walk yields pairs lazily in traversal order', () => {
      const pairs = walk({ a: [1, 2] }, chain(key('a'), slot(any())));
      expect(pairs.next().value).toStrictEqual(['a[0]', 1]);
      expect([...pairs]).toStrictEqual([['a[1]', 2]]);
    });
  });

  /**
   * Expansion round trip
   * Priority: every expanded path reads back the value the pattern read.
   */
  describe('Round Trip', () => {
    const scenarios: Array<TestScenario<RoundTripInput, unknown[]>> = [
      {
        id: 'Wildcards',
        description: 'Keys and indexes expand in traversal order.',
        input: {
          data: { hello: { there: [1, 2] }, bye: { there: [3] } },
          path: chain(key(any()), key('there'), slot(any())),
          concrete: [
            chain(key('hello'), key('there'), slot(0)),
            chain(key('hello'), key('there'), slot(1)),
            chain(key('bye'), key('there'), slot(0))
          ]
        },
        expected: [1, 2, 3]
      },
      {
        id: 'Recursive',
        description: 'Recursion expands to the keys it passed through.',
        input: {
          data: { a: { c: 1 }, b: { d: { c: 2 } } },
          path: chain(recursive(), key('c')),
          concrete: [chain(key('a'), key('c')), chain(key('b'), key('d'), key('c'))]
        },
        expected: [1, 2]
      },
      {
        id: 'Regex Then Index',
        description: 'A regular expression key followed by a literal index.',
        input: {
          data: { ab: [5, 6], b: [7] },
          path: chain(key(regex('a.')), slot(1)),
          concrete: [chain(key('ab'), slot(1))]
        },
        expected: [6]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { data, path, concrete } = resolveScenarioInput(input);
      expect(expand(data, path)).toStrictEqual(concrete.map((each) => assemble(each)));
      expect(concrete.map((each) => get(data, each))).toStrictEqual(get(data, path));
      expect(get(data, path)).toStrictEqual(expected);
    });
  });

  describe('Batched Reads', () => {
    test('getMulti leaves out chains that select nothing', () => {
      const data = { hello: 7, there: 9 };
      const paths = [chain(key('hello')), chain(key('nope')), chain(key('there'))];
      expect(getMulti(data, paths)).toStrictEqual([7, 9]);
    });

    test('getMulti reads a pattern as a list', () => {
      expect(getMulti({ a: 1, b: 2 }, [chain(key(any()))])).toStrictEqual([[1, 2]]);
    });

    test('expandMulti lists each concrete path once', () => {
      const data = { hello: { there: [1] }, bye: 7 };
      expect(expandMulti(data, [chain(key('hello')), chain(key(any()))])).toStrictEqual([
        'hello',
        'bye'
      ]);
    });

    test('pluckMulti lists each concrete path once', () => {
      const data = { hello: 7, a: { b: 'seven' } };
      const paths = [chain(key('hello')), chain(key('a'), key('b')), chain(key(any()))];
      expect(pluckMulti(data, paths)).toStrictEqual([
        ['hello', 7],
        ['a.b', 'seven'],
        ['a', { b: 'seven' }]
      ]);
    });
  });

  describe('Normal Form', () => {
    const nested = () => ({ a: { b: [1, 2, 3] }, x: { y: { z: [4, 5] } }, extra: 'stuff' });

    test('unpack lists the deepest keyed paths and the uncovered top-level keys', () => {
      const pairs = unpack(nested()).map(([path, value]) => [assemble(path), value]);
      expect(pairs).toStrictEqual([
        ['a.b', [1, 2, 3]],
        ['x.y.z', [4, 5]],
        ['extra', 'stuff']
      ]);
    });

    test('replaying the unpacked pairs rebuilds the value', () => {
      expect(updateMulti({}, unpack(nested()))).toStrictEqual(nested());
    });

    test('every unpacked chain reads back its value', () => {
      const data = nested();
      for (const [path, value] of unpack(data)) expect(get(data, path)).toBe(value);
    });
  });

  describe('In-Place Mutation', () => {
    const scenarios: Array<TestScenario<ReadInput, boolean>> = [
      {
        id: 'Mutable Mapping',
        description: 'A plain object is changed in place.',
        input: { data: { a: 1 }, path: chain(key('a')) },
        expected: true
      },
      {
        id: 'Empty Path',
        description: 'The empty path replaces the root instead.',
        input: { data: { a: 1 }, path: chain(root()) },
        expected: false
      },
      {
        id: 'Frozen Sequence',
        description: 'A frozen array is rebuilt.',
        input: { data: Object.freeze([1, 2]), path: chain(slot(0)) },
        expected: false
      },
      {
        id: 'Mutable Sequence',
        description: 'A plain array is changed in place.',
        input: { data: [1, 2], path: chain(slot(0)) },
        expected: true
      },
      {
        id: 'Mutable Above Frozen',
        description: 'A mutable parent takes the rebuilt child in place.',
        input: { data: { a: Object.freeze([1, 2]) }, path: chain(key('a'), slot(0)) },
        expected: true
      },
      {
        id: 'Mutable Below Frozen',
        description: 'A mutable child is changed in place under a frozen root.',
        input: { data: Object.freeze([{ a: 1 }]), path: chain(slot(0), key('a')) },
        expected: true
      },
      {
        id: 'Frozen Throughout',
        description: 'Nothing on the way is mutable.',
        input: { data: Object.freeze([Object.freeze([1, 2])]), path: chain(slot(0), slot(0)) },
        expected: false
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { data, path } = resolveScenarioInput(input);
      expect(mutatesInPlace(data, path)).toBe(expected);
    });
  });
});
