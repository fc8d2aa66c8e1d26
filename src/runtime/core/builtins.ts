/**
 * Built-in Functions
 *
 * Native functions bound (immutably) in every global environment.
 * Arity is checked at the call site; these functions only validate
 * argument types.
 */

import { err, ok, type Result } from '../../result.js';
import type { Environment } from './environment.js';
import type { Heap } from './heap.js';
import {
  ArrayObject,
  BuiltinFunctionObject,
  DictObject,
  StringObject,
  VARIADIC,
  type BuiltinFn,
} from './objects.js';
import { typeName } from './stringify.js';
import { makeInt32, NIL, type Value } from './value.js';

export interface BuiltinDefinition {
  /** Fixed argument count, or VARIADIC */
  readonly arity: number;
  readonly fn: BuiltinFn;
}

function allocateString(heap: Heap, text: string): Value {
  return heap.allocate(StringObject, text).ref;
}

function arrayArgument(
  heap: Heap,
  value: Value | undefined,
  message: string
): Result<ArrayObject, string> {
  const array = value === undefined ? undefined : heap.getAs(value, ArrayObject);
  return array ? ok(array) : err(message);
}

// ============================================================
// BUILTIN TABLE
// ============================================================

export const BUILTIN_FUNCTIONS: Readonly<Record<string, BuiltinDefinition>> = {
  print: {
    arity: VARIADIC,
    fn: (args, services) => {
      services.print(args.map((arg) => services.stringify(arg)).join(' '));
      return ok(NIL);
    },
  },

  length: {
    arity: 1,
    fn: ([value], { heap }) => {
      if (value !== undefined) {
        const str = heap.getAs(value, StringObject);
        if (str) return ok(makeInt32(str.length));
        const array = heap.getAs(value, ArrayObject);
        if (array) return ok(makeInt32(array.elements.length));
        const dict = heap.getAs(value, DictObject);
        if (dict) return ok(makeInt32(dict.entries.size));
      }
      return err('length() can only be called on strings, arrays, or dictionaries');
    },
  },

  type: {
    arity: 1,
    fn: ([value = NIL], { heap }) => ok(allocateString(heap, typeName(heap, value))),
  },

  str: {
    arity: 1,
    fn: ([value = NIL], services) =>
      ok(allocateString(services.heap, services.stringify(value))),
  },

  push: {
    arity: 2,
    fn: ([target, value = NIL], { heap }) => {
      const array = arrayArgument(heap, target, 'push() first argument must be an array');
      if (!array.ok) return array;
      array.value.elements.push(value);
      return ok(NIL);
    },
  },

  pop: {
    arity: 1,
    fn: ([target], { heap }) => {
      const array = arrayArgument(heap, target, 'pop() argument must be an array');
      if (!array.ok) return array;
      return ok(array.value.elements.pop() ?? NIL);
    },
  },
};

/**
 * Allocate a BuiltinFunction object for every entry and bind it as an
 * immutable name in `env`.
 */
export function installBuiltins(heap: Heap, env: Environment): void {
  for (const [name, { arity, fn }] of Object.entries(BUILTIN_FUNCTIONS)) {
    const builtin = heap.allocate(BuiltinFunctionObject, name, arity, fn);
    env.define(name, builtin.ref, false);
  }
}
