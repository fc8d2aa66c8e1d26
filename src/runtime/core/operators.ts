/**
 * Operator Semantics
 *
 * Arithmetic, comparison, logic and indexing shared by the VM and the
 * tree-walker. Arithmetic and ordering are numeric only. `and` / `or` evaluate both
 * operands and yield a boolean.
 */

import { err, ok, type Result } from '../../result.js';
import type { BinaryOp, UnaryOp } from '../../types.js';
import type { Heap } from './heap.js';
import { ArrayObject, DictObject, StringObject } from './objects.js';
import { isTruthy, typeName, valuesEqual } from './stringify.js';
import {
  asInt32,
  asNumber,
  isInt32,
  isNumber,
  makeBool,
  makeDouble,
  makeIntegerResult,
  type Value,
} from './value.js';

/** Error ID and template context; the caller attaches the location */
export interface OperatorFailure {
  readonly errorId: string;
  readonly context: Record<string, unknown>;
}

const typeMismatch = (operator: string): OperatorFailure => ({
  errorId: 'PEB-R003',
  context: { operator },
});

export function applyBinary(
  op: BinaryOp,
  a: Value,
  b: Value
): Result<Value, OperatorFailure> {
  switch (op) {
    case '==':
      return ok(makeBool(valuesEqual(a, b)));
    case '!=':
      return ok(makeBool(!valuesEqual(a, b)));
    case 'and':
      return ok(makeBool(isTruthy(a) && isTruthy(b)));
    case 'or':
      return ok(makeBool(isTruthy(a) || isTruthy(b)));
  }

  if (!isNumber(a) || !isNumber(b)) return err(typeMismatch(op));
  const x = asNumber(a);
  const y = asNumber(b);
  // int32 op int32 stays int32 unless it overflows; any double promotes
  const integers = isInt32(a) && isInt32(b);
  const numeric = (n: number): Value =>
    integers ? makeIntegerResult(n) : makeDouble(n);

  switch (op) {
    case '+':
      return ok(numeric(x + y));
    case '-':
      return ok(numeric(x - y));
    case '*':
      return ok(numeric(x * y));
    case '/':
      // Always a double; a zero divisor fails for ints and doubles alike
      if (y === 0) return err({ errorId: 'PEB-R004', context: {} });
      return ok(makeDouble(x / y));
    case '<':
      return ok(makeBool(x < y));
    case '>':
      return ok(makeBool(x > y));
    case '<=':
      return ok(makeBool(x <= y));
    case '>=':
      return ok(makeBool(x >= y));
  }
}

export function applyUnary(op: UnaryOp, value: Value): Result<Value, OperatorFailure> {
  if (op === '!') return ok(makeBool(!isTruthy(value)));
  if (!isNumber(value)) return err(typeMismatch(op));
  return ok(
    isInt32(value)
      ? makeIntegerResult(-asInt32(value))
      : makeDouble(-asNumber(value))
  );
}

// ============================================================
// INDEXING
// ============================================================

const notIndexable = (heap: Heap, target: Value, key: Value): OperatorFailure => ({
  errorId: 'PEB-R016',
  context: { type: typeName(heap, target), indexType: typeName(heap, key) },
});

const outOfRange = (index: number, length: number): OperatorFailure => ({
  errorId: 'PEB-R010',
  context: { index, length },
});

/**
 * `target[key]`: array and string by int32, dict by string. Indexing a
 * string allocates a one-character string.
 */
export function indexValue(
  heap: Heap,
  target: Value,
  key: Value
): Result<Value, OperatorFailure> {
  const array = heap.getAs(target, ArrayObject);
  if (array && isInt32(key)) {
    const i = asInt32(key);
    const element = i < 0 ? undefined : array.elements[i];
    return element === undefined
      ? err(outOfRange(i, array.elements.length))
      : ok(element);
  }

  const str = heap.getAs(target, StringObject);
  if (str && isInt32(key)) {
    const i = asInt32(key);
    const char = str.charAt(i);
    if (char === undefined) return err(outOfRange(i, str.length));
    return ok(heap.allocate(StringObject, char).ref);
  }

  const dict = heap.getAs(target, DictObject);
  const name = heap.getAs(key, StringObject);
  if (dict && name) {
    const value = dict.entries.get(name.value);
    return value === undefined
      ? err({ errorId: 'PEB-R011', context: { key: name.value } })
      : ok(value);
  }

  return err(notIndexable(heap, target, key));
}

/** `target[key] = value` on an array slot or a dict key; yields the value */
export function storeIndexValue(
  heap: Heap,
  target: Value,
  key: Value,
  value: Value
): Result<Value, OperatorFailure> {
  const array = heap.getAs(target, ArrayObject);
  if (array && isInt32(key)) {
    const i = asInt32(key);
    if (i < 0 || i >= array.elements.length) {
      return err(outOfRange(i, array.elements.length));
    }
    array.elements[i] = value;
    return ok(value);
  }

  const dict = heap.getAs(target, DictObject);
  const name = heap.getAs(key, StringObject);
  if (dict && name) {
    dict.entries.set(name.value, value);
    return ok(value);
  }

  return err(notIndexable(heap, target, key));
}
