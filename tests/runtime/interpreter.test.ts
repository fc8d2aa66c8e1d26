/**
 * Pebble Runtime Tests: Tree-Walker
 * Closures, for loops and return handling the VM does not offer
 */

import { describe, expect, it, vi } from 'vitest';
import {
  createRuntimeContext,
  execute,
  isDouble,
  parse,
  type PebbleError,
} from '../../src/index.js';
import { run, runError, runFull } from '../helpers/runtime.js';

const tree = { mode: 'tree' } as const;

const MAKE_COUNTER = 'func make() { var c = 0; func inc() { c = c + 1; c } inc } ';

describe('Pebble Tree-Walker', () => {
  describe('closures', () => {
    it('captures the defining scope', () => {
      expect(run(`${MAKE_COUNTER}let f = make(); f(); f();`, tree)).toBe('2');
    });

    it('gives each call its own captured scope', () => {
      expect(
        run(`${MAKE_COUNTER}let a = make(); let b = make(); a(); a(); b();`, tree)
      ).toBe('1');
    });

    it('lets a block-local function recurse', () => {
      expect(
        run(
          'var r = 0; { func down(n) { if n == 0 { "done" } else { down(n - 1) } } r = down(2); } r;',
          tree
        )
      ).toBe('done');
    });
  });

  describe('for loops', () => {
    it('iterates array elements', () => {
      expect(run('var s = 0; for x in [1, 2, 3] { s = s + x; } s;', tree)).toBe('6');
    });

    it('iterates dict keys in insertion order', () => {
      expect(
        run('var ks = []; for k in {"a": 1, "b": 2} { push(ks, k); } ks;', tree)
      ).toBe('[a, b]');
    });

    it('observes elements pushed by the body', () => {
      expect(
        run(
          'let a = [1]; var n = 0; for x in a { n = n + 1; if n < 3 { push(a, x); } } n;',
          tree
        )
      ).toBe('3');
    });

    it('scopes the loop variable to the body', () => {
      expect(runError('for x in [1] { } x;', tree).errorId).toBe('PEB-R001');
    });

    it('rejects values that are not iterable', () => {
      const error = runError('for x in 5 { }', tree);
      expect(error.errorId).toBe('PEB-R017');
      expect(error.message).toBe('Cannot iterate over integer at 1:10');
    });

    it('returns from inside a loop body', () => {
      expect(
        run('func first() { for x in [5, 6] { return x; } 0 } first();', tree)
      ).toBe('5');
    });
  });

  describe('return', () => {
    it('rejects return at the top level', () => {
      const error = runError('return 1;', tree);
      expect(error.errorId).toBe('PEB-R013');
      expect(error.message).toBe('Cannot return from top-level code at 1:1');
    });

    it('rejects return inside a top-level loop', () => {
      expect(runError('while true { return 2; }', tree).message).toBe(
        'Cannot return from top-level code at 1:14'
      );
    });
  });

  describe('literals', () => {
    it('promotes integer literals beyond int32 to double', () => {
      const result = runFull('2147483648;', tree);
      expect(result.text).toBe('2147483648');
      expect(isDouble(result.value)).toBe(true);
    });
  });

  describe('context', () => {
    it('keeps globals across runs', () => {
      const context = createRuntimeContext();
      execute(parse('var x = 41;'), context, tree);
      expect(execute(parse('x + 1;'), context, tree).text).toBe('42');
    });

    it('reports runtime errors to the host', () => {
      const onRuntimeError = vi.fn<(error: PebbleError) => void>();
      const result = runFull('missing;', { ...tree, observability: { onRuntimeError } });

      expect(result.status).toBe('runtime_error');
      expect(onRuntimeError).toHaveBeenCalledTimes(1);
      expect(onRuntimeError.mock.calls[0]?.[0].message).toBe(
        'Undefined variable missing at 1:1'
      );
    });

    it('refuses functions compiled for the VM', () => {
      const context = createRuntimeContext();
      execute(parse('func g() { 1 }'), context, { mode: 'vm' });
      const result = execute(parse('g();'), context, tree);
      expect(result.errors[0]?.message).toBe('Function g is compiled bytecode at 1:1');
    });
  });
});
