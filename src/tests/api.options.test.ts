import { describe, expect, test } from 'vitest';

import { captureError } from './test-utils';
import {
  chain,
  get,
  InvalidOptionsError,
  key,
  normalizeOptions,
  ref,
  subst,
  transform,
  transforms,
  UnresolvedTemplateError,
  update
} from '../index';

describe('Call options, bindings and references.', () => {
  describe('Option Validation', () => {
    test('defaults are filled in', () => {
      const settings = normalizeOptions({});
      expect(settings.strict).toBe(false);
      expect(settings.mutable).toBe(true);
      expect(settings.partial).toBe(false);
      expect(settings.applyTransforms).toBe(true);
      expect(settings.registry).toBe(transforms);
      expect(settings.bindings).toBeUndefined();
    });

    test('a mistyped option is reported by name', () => {
      const error = captureError(() => normalizeOptions(JSON.parse('{"strict":"yes"}')));
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.code).toBe('INVALID_OPTIONS');
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^strict: /);
      }
    });

    test('an unknown option is reported against the options object', () => {
      const error = captureError(() => normalizeOptions(JSON.parse('{"bogus":true}')));
      expect(error).toBeInstanceOf(InvalidOptionsError);
      if (error instanceof InvalidOptionsError) {
        expect(error.issues[0]).toMatch(/^<options>: /);
      }
    });

    test('every call validates its options', () => {
      expect(() => get({}, chain(key('a')), JSON.parse('{"mutable":1}'))).toThrow(
        InvalidOptionsError
      );
    });
  });

  /**
   * Template bindings
   * Priority: placeholders resolve before traversal, or fail loudly.
   */
  describe('Bindings', () => {
    test('a positional placeholder takes its binding', () => {
      const path = chain(key(subst(0)), key('b'));
      expect(get({ a: { b: 1 } }, path, { bindings: ['a'] })).toBe(1);
    });

    test('a named placeholder takes its binding', () => {
      const path = chain(key(subst('name')), key('b'));
      expect(get({ a: { b: 1 } }, path, { bindings: { name: 'a' } })).toBe(1);
    });

    test('placeholder transforms run on the bound value', () => {
      const path = chain(key(subst(0, transform('str'))));
      expect(get({ '7': 'x' }, path, { bindings: [7] })).toBe('x');
    });

    test('a placeholder without bindings raises', () => {
      expect(() => get({}, chain(key(subst(0))))).toThrow(UnresolvedTemplateError);
    });

    test('a missing binding raises', () => {
      expect(() => get({}, chain(key(subst(0))), { bindings: [] })).toThrow(
        UnresolvedTemplateError
      );
    });

    test('partial resolution keeps missing placeholders', () => {
      const resolved = chain(key(subst(0))).resolve([], { partial: true });
      expect(resolved.render()).toBe('$0');
    });

    test('bound placeholders are written like literal keys', () => {
      expect(update({}, chain(key(subst(0))), 1, { bindings: ['a'] })).toStrictEqual({ a: 1 });
    });
  });

  describe('Document References', () => {
    test('a root reference supplies a key', () => {
      const path = chain(key('a'), key(ref(chain(key('ptr')))));
      expect(get({ ptr: 'b', a: { b: 5 } }, path)).toBe(5);
    });

    test('a reference relative to the current node', () => {
      const path = chain(key('a'), key(ref(chain(key('ptr')), 1)));
      expect(get({ a: { ptr: 'b', b: 5 } }, path)).toBe(5);
    });

    test('a reference relative to the parent', () => {
      const path = chain(key('a'), key(ref(chain(key('sel')), 2)));
      expect(get({ sel: 'b', a: { b: 5 } }, path)).toBe(5);
    });

    test('an unresolved reference selects nothing on read', () => {
      const path = chain(key('a'), key(ref(chain(key('ptr')))));
      expect(get({ a: { b: 5 } }, path)).toBeUndefined();
    });

    test('an unresolved reference raises on write', () => {
      const path = chain(key('a'), key(ref(chain(key('ptr')))));
      expect(() => update({ a: {} }, path, 1)).toThrow(UnresolvedTemplateError);
    });

    test('references render in notation form', () => {
      expect(chain(key('a'), key(ref(chain(key('ptr'))))).render()).toBe('a.$$(ptr)');
    });
  });
});
