import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import { resolveScenarioInput } from './test-utils';
import { deepCopy, deepEqual, FieldRecord, kindOf, MISSING, StructuralTypeError } from '../index';
import { append, assign, discard, entries, lookup } from '../value';

type PairInput = {
  left: unknown;
  right: unknown;
};

/**
 * Builds two separately allocated mappings, each holding itself.
 */
function selfReferencingPair(): PairInput {
  const left: Record<string, unknown> = { a: 1 };
  left.self = left;
  const right: Record<string, unknown> = { a: 1 };
  right.self = right;
  return { left, right };
}

describe('Value model: kinds, equality, copies and container primitives.', () => {
  /**
   * Structural equality
   * Priority: first; removal by value and the unchanged-slice check rely on it.
   */
  describe('Deep Equality', () => {
    const scenarios: Array<TestScenario<PairInput, boolean>> = [
      {
        id: 'Nested',
        description: 'Nested containers compare by content.',
        input: { left: { a: [1, { b: 2 }] }, right: { a: [1, { b: 2 }] } },
        expected: true
      },
      {
        id: 'Null, Undefined',
        description: 'Both absent values are equal.',
        input: { left: null, right: undefined },
        expected: true
      },
      {
        id: 'Different Kinds',
        description: 'A number never equals its text.',
        input: { left: 1, right: '1' },
        expected: false
      },
      {
        id: 'Different Lengths',
        description: 'Sequences of different lengths differ.',
        input: { left: [1], right: [1, 2] },
        expected: false
      },
      {
        id: 'Set Members',
        description: 'Set members match structurally, in any order.',
        input: { left: new Set([[1], [2]]), right: new Set([[2], [1]]) },
        expected: true
      },
      {
        id: 'Record, Mapping',
        description: 'A record never equals a mapping with the same fields.',
        input: { left: new FieldRecord({ x: 1 }), right: { x: 1 } },
        expected: false
      },
      {
        id: 'Frozen, Mutable',
        description: 'Frozenness does not affect equality.',
        input: { left: Object.freeze([1, 2]), right: [1, 2] },
        expected: true
      },
      {
        id: 'Bytes',
        description: 'Byte arrays compare element-wise.',
        input: { left: new Uint8Array([1, 2]), right: new Uint8Array([1, 2]) },
        expected: true
      },
      {
        id: 'Bytes, Differing',
        description: 'One differing byte makes the arrays unequal.',
        input: { left: new Uint8Array([1, 2]), right: new Uint8Array([1, 3]) },
        expected: false
      },
      {
        id: 'Self-Cycle, Stable',
        description: 'Self-referencing values terminate and compare equal.',
        input: selfReferencingPair,
        expected: true
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      const { left, right } = resolveScenarioInput(input);
      expect(deepEqual(left, right)).toBe(expected);
    });
  });

  describe('Kinds', () => {
    const scenarios: Array<TestScenario<unknown, string>> = [
      { id: 'Null', description: 'null is null.', input: null, expected: 'null' },
      { id: 'Number', description: 'Numbers.', input: 1.5, expected: 'number' },
      { id: 'BigInt', description: 'Big integers.', input: 1n, expected: 'bigint' },
      { id: 'Bytes', description: 'Byte arrays.', input: new Uint8Array(1), expected: 'bytes' },
      { id: 'Sequence', description: 'Arrays.', input: [], expected: 'sequence' },
      { id: 'Map', description: 'Maps are mappings.', input: new Map(), expected: 'mapping' },
      { id: 'Object', description: 'Plain objects are mappings.', input: {}, expected: 'mapping' },
      { id: 'Set', description: 'Sets.', input: new Set(), expected: 'set' },
      {
        id: 'Record',
        description: 'Class instances are records.',
        input: new FieldRecord(),
        expected: 'record'
      },
      { id: 'Date', description: 'Dates are opaque.', input: new Date(0), expected: 'other' }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(kindOf(input)).toBe(expected);
    });
  });

  describe('Deep Copy', () => {
    test('cycles stay cyclic in the copy', () => {
      const { left } = selfReferencingPair();
      const copy = deepCopy(left);

      expect(copy).not.toBe(left);
      expect(copy instanceof Object && Reflect.get(copy, 'self')).toBe(copy);
    });

    test('frozen containers come back frozen', () => {
      const copy = deepCopy(Object.freeze({ a: [1] }));
      expect(Object.isFrozen(copy)).toBe(true);
      expect(copy).toStrictEqual({ a: [1] });
    });

    test('records keep their prototype', () => {
      const copy = deepCopy(new FieldRecord({ x: [1] }));
      expect(copy).toBeInstanceOf(FieldRecord);
      expect(copy).toStrictEqual(new FieldRecord({ x: [1] }));
    });
  });

  describe('Container Primitives', () => {
    test('assigning past the end pads with null', () => {
      expect(assign([], 2, 'x')).toStrictEqual([null, null, 'x']);
    });

    test('assigning into a frozen array returns a frozen copy', () => {
      const frozen = Object.freeze([1, 2]);
      const result = assign(frozen, 0, 9);

      expect(result).toStrictEqual([9, 2]);
      expect(Object.isFrozen(result)).toBe(true);
      expect(frozen).toStrictEqual([1, 2]);
    });

    test('assigning into a scalar raises', () => {
      expect(() => assign(5, 'a', 1)).toThrow(StructuralTypeError);
    });

    test('discarding from a frozen mapping returns a frozen copy', () => {
      const result = discard(Object.freeze({ a: 1, b: 2 }), 'a');
      expect(result).toStrictEqual({ b: 2 });
      expect(Object.isFrozen(result)).toBe(true);
    });

    test('appending to a frozen set returns a frozen copy', () => {
      const result = append(Object.freeze(new Set([1])), 2);
      expect(result).toStrictEqual(new Set([1, 2]));
      expect(Object.isFrozen(result)).toBe(true);
    });

    test('sets have no keyed entries', () => {
      expect(entries(new Set([1]))).toStrictEqual([]);
    });

    test('a missing key looks up as the sentinel', () => {
      expect(lookup({}, 'a')).toBe(MISSING);
    });

    test('a negative index counts from the end', () => {
      expect(lookup([1, 2, 3], -1)).toBe(3);
    });
  });
});
