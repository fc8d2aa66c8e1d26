/**
 * Pebble Value Tests
 * NaN-boxed encoding: tags, payloads and the double space
 */

import { describe, expect, it } from 'vitest';
import {
  asBool,
  asDouble,
  asGcPtr,
  asInt32,
  asNumber,
  FALSE,
  isBoxed,
  isDouble,
  isGcPtr,
  isInt32,
  isNull,
  isNumber,
  isUndefined,
  makeBool,
  makeDouble,
  makeGcPtr,
  makeInt32,
  makeNull,
  makeUndefined,
  NIL,
  TAG,
  tagOf,
  TRUE,
  UNDEFINED,
} from '../../src/index.js';
import { fitsInt32, makeIntegerResult } from '../../src/runtime/core/value.js';

describe('Pebble Values', () => {
  describe('int32', () => {
    it('round-trips boundary values', () => {
      for (const n of [0, 1, -1, 42, -5, 2147483647, -2147483648]) {
        const value = makeInt32(n);
        expect(tagOf(value)).toBe(TAG.INT32);
        expect(asInt32(value)).toBe(n);
      }
    });

    it('rejects values outside the int32 range', () => {
      expect(() => makeInt32(2147483648)).toThrow(RangeError);
      expect(() => makeInt32(1.5)).toThrow(RangeError);
    });

    it('promotes overflowing results to doubles', () => {
      expect(isInt32(makeIntegerResult(7))).toBe(true);
      const big = makeIntegerResult(2147483648);
      expect(isDouble(big)).toBe(true);
      expect(asDouble(big)).toBe(2147483648);
      expect(fitsInt32(-2147483649)).toBe(false);
    });
  });

  describe('doubles', () => {
    it('round-trips ordinary and special doubles', () => {
      for (const n of [3.5, -0.25, Infinity, -Infinity, Number.MAX_VALUE]) {
        const value = makeDouble(n);
        expect(isDouble(value)).toBe(true);
        expect(asDouble(value)).toBe(n);
      }
      expect(Object.is(asDouble(makeDouble(-0)), -0)).toBe(true);
    });

    it('canonicalizes NaN', () => {
      const value = makeDouble(NaN);
      expect(value).toBe(makeDouble(0 / 0));
      expect(value).toBe(0x7ff8000000000000n);
      expect(isDouble(value)).toBe(true);
      expect(Number.isNaN(asDouble(value))).toBe(true);
    });

    it('treats unused tags and signed NaNs as doubles', () => {
      expect(isBoxed(0x7ffe000000000000n)).toBe(false);
      expect(isBoxed(0xfffa000000000000n)).toBe(false);
      expect(tagOf(0x7fff000000000000n)).toBe(TAG.DOUBLE);
    });
  });

  describe('singletons', () => {
    it('encodes booleans', () => {
      expect(makeBool(true)).toBe(TRUE);
      expect(makeBool(false)).toBe(FALSE);
      expect(asBool(TRUE)).toBe(true);
      expect(asBool(FALSE)).toBe(false);
      expect(tagOf(TRUE)).toBe(TAG.BOOL);
    });

    it('keeps nil and undefined distinct', () => {
      expect(makeNull()).toBe(NIL);
      expect(makeUndefined()).toBe(UNDEFINED);
      expect(NIL).not.toBe(UNDEFINED);
      expect(isNull(UNDEFINED)).toBe(false);
      expect(isUndefined(UNDEFINED)).toBe(true);
      expect(tagOf(NIL)).toBe(TAG.NIL);
    });

    it('does not count non-numbers as numbers', () => {
      expect(isNumber(makeInt32(1))).toBe(true);
      expect(isNumber(makeDouble(1))).toBe(true);
      expect(isNumber(TRUE)).toBe(false);
      expect(isNumber(NIL)).toBe(false);
      expect(asNumber(makeInt32(-3))).toBe(-3);
    });
  });

  describe('heap pointers', () => {
    it('round-trips a 48-bit handle', () => {
      const value = makeGcPtr(0xffffffffffffn);
      expect(isGcPtr(value)).toBe(true);
      expect(asGcPtr(value)).toBe(0xffffffffffffn);
    });

    it('rejects handles that do not fit the payload', () => {
      expect(() => makeGcPtr(-1n)).toThrow(RangeError);
      expect(() => makeGcPtr(0x1000000000000n)).toThrow(RangeError);
    });
  });

  describe('extraction', () => {
    it('refuses to read a value as the wrong kind', () => {
      expect(() => asInt32(NIL)).toThrow(TypeError);
      expect(() => asDouble(makeInt32(1))).toThrow(TypeError);
      expect(() => asBool(makeInt32(1))).toThrow('is not a bool');
      expect(() => asGcPtr(TRUE)).toThrow('is not a heap reference');
    });
  });
});
