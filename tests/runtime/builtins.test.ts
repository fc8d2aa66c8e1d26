/**
 * Pebble Builtin Function Tests
 * print, length, type, str, push and pop on both engines
 */

import { describe, expect, it } from 'vitest';
import {
  BUILTIN_FUNCTIONS,
  createRuntimeContext,
  makeInt32,
  NIL,
  VARIADIC,
} from '../../src/index.js';
import { MODES, run, runError, runFull } from '../helpers/runtime.js';

describe('Pebble Builtins', () => {
  it('declares the arity of every builtin', () => {
    const arities = Object.fromEntries(
      Object.entries(BUILTIN_FUNCTIONS).map(([name, def]) => [name, def.arity])
    );
    expect(arities).toEqual({
      print: VARIADIC,
      length: 1,
      type: 1,
      str: 1,
      push: 2,
      pop: 1,
    });
  });

  it('binds builtins immutably in the globals', () => {
    const context = createRuntimeContext();
    expect(context.globals.names()).toEqual(['print', 'length', 'type', 'str', 'push', 'pop']);
    expect(context.globals.set('print', NIL).ok).toBe(false);
  });

  it('reports failures as messages rather than throwing', () => {
    const context = createRuntimeContext();
    const result = BUILTIN_FUNCTIONS['pop']?.fn([makeInt32(1)], context.services);
    expect(result).toEqual({ ok: false, error: 'pop() argument must be an array' });
  });

  describe.each(MODES)('%s engine', (mode) => {
    describe('print', () => {
      it('joins its arguments with spaces', () => {
        const result = runFull('print(1, "a", [2, "b"], 2.5);', { mode });
        expect(result.output).toEqual(['1 a [2, b] 2.5']);
        expect(result.text).toBe('nil');
      });

      it('prints an empty line with no arguments', () => {
        expect(runFull('print();', { mode }).output).toEqual(['']);
      });
    });

    describe('length', () => {
      it('measures strings, arrays and dicts', () => {
        expect(run('length("hello");', { mode })).toBe('5');
        expect(run('length([1, 2]);', { mode })).toBe('2');
        expect(run('length({"a": 1});', { mode })).toBe('1');
      });

      it('rejects other values', () => {
        const error = runError('length(5);', { mode });
        expect(error.errorId).toBe('PEB-R012');
        expect(error.message).toBe(
          'length() can only be called on strings, arrays, or dictionaries at 1:1'
        );
      });

      it('checks the argument count', () => {
        const error = runError('length(1, 2);', { mode });
        expect(error.errorId).toBe('PEB-R006');
        expect(error.message).toBe('length() expects 1 arguments, got 2 at 1:1');
      });
    });

    describe('type', () => {
      it('names the type of its argument', () => {
        expect(run('type(1);', { mode })).toBe('integer');
        expect(run('type(1.5);', { mode })).toBe('float');
        expect(run('type(7 / 7);', { mode })).toBe('float');
        expect(run('type(nil);', { mode })).toBe('null');
        expect(run('type(true);', { mode })).toBe('boolean');
        expect(run('type("s");', { mode })).toBe('string');
        expect(run('type([]);', { mode })).toBe('array');
        expect(run('type({});', { mode })).toBe('dict');
        expect(run('type(print);', { mode })).toBe('builtin_function');
        expect(run('func f() {} type(f);', { mode })).toBe('function');
      });
    });

    describe('str', () => {
      it('returns the display text as a string', () => {
        expect(run('str([1, "a"]);', { mode })).toBe('[1, a]');
        expect(run('type(str(12));', { mode })).toBe('string');
      });
    });

    describe('push and pop', () => {
      it('append and remove the last element', () => {
        expect(run('let a = [1]; push(a, 2); push(a, 3); pop(a); a;', { mode })).toBe('[1, 2]');
        expect(run('let a = [1, 2, 3]; pop(a);', { mode })).toBe('3');
      });

      it('pops nil from an empty array', () => {
        expect(run('pop([]);', { mode })).toBe('nil');
      });

      it('requires an array', () => {
        expect(runError('push(1, 2);', { mode }).message).toBe(
          'push() first argument must be an array at 1:1'
        );
      });
    });

    it('refuses to rebind a builtin', () => {
      const error = runError('print = 1;', { mode });
      expect(error.errorId).toBe('PEB-R002');
      expect(error.message).toBe('Cannot assign to immutable variable print at 1:1');
    });
  });
});
