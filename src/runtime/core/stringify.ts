/**
 * Value semantics shared by the VM and the tree-walker:
 * display text, type names, truthiness and equality.
 */

import type { Heap } from './heap.js';
import {
  ArrayObject,
  BuiltinFunctionObject,
  DictObject,
  FunctionObject,
  StringObject,
} from './objects.js';
import {
  asBool,
  asDouble,
  asInt32,
  asNumber,
  isBool,
  isDouble,
  isInt32,
  isNull,
  isNumber,
  isUndefined,
  type Value,
} from './value.js';

// ============================================================
// STRINGIFY
// ============================================================

/**
 * Display text for a value.
 * Strings are raw at every depth; dict keys are quoted. A container that
 * contains itself renders the inner occurrence as `[...]` or `{...}`.
 */
export function stringify(heap: Heap, value: Value): string {
  return render(heap, value, new Set<Value>());
}

function render(heap: Heap, value: Value, active: Set<Value>): string {
  if (isNull(value)) return 'nil';
  if (isUndefined(value)) return 'undefined';
  if (isBool(value)) return asBool(value) ? 'true' : 'false';
  if (isInt32(value)) return String(asInt32(value));
  if (isDouble(value)) return String(asDouble(value));

  const obj = heap.get(value);

  if (obj instanceof StringObject) return obj.value;
  if (obj instanceof FunctionObject) return `<function ${obj.name}>`;
  if (obj instanceof BuiltinFunctionObject) return `<builtin ${obj.name}>`;

  if (obj instanceof ArrayObject) {
    if (active.has(value)) return '[...]';
    active.add(value);
    const parts = obj.elements.map((element) => render(heap, element, active));
    active.delete(value);
    return `[${parts.join(', ')}]`;
  }

  if (obj instanceof DictObject) {
    if (active.has(value)) return '{...}';
    active.add(value);
    const parts: string[] = [];
    for (const [key, entry] of obj.entries) {
      parts.push(`"${key}": ${render(heap, entry, active)}`);
    }
    active.delete(value);
    return `{${parts.join(', ')}}`;
  }

  return '<object>';
}

// ============================================================
// TYPE NAMES
// ============================================================

/** Name reported by the `type` builtin */
export function typeName(heap: Heap, value: Value): string {
  if (isNull(value)) return 'null';
  if (isUndefined(value)) return 'undefined';
  if (isBool(value)) return 'boolean';
  if (isInt32(value)) return 'integer';
  if (isDouble(value)) return 'float';
  return heap.get(value).type;
}

// ============================================================
// TRUTHINESS AND EQUALITY
// ============================================================

/** Booleans are themselves; nil is false; numbers are false iff zero; everything else is true */
export function isTruthy(value: Value): boolean {
  if (isBool(value)) return asBool(value);
  if (isNull(value)) return false;
  if (isNumber(value)) return asNumber(value) !== 0;
  return true;
}

/**
 * Numbers compare numerically across int32 and double; heap objects
 * compare by identity; values of different kinds are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumber(a) && isNumber(b)) return asNumber(a) === asNumber(b);
  return a === b;
}
