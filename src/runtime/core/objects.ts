/**
 * Heap Objects
 *
 * Every garbage-collected runtime object extends HeapObject. Objects are
 * created only through Heap.allocate, which links them into the allocation
 * list and assigns the GC_PTR value that refers to them.
 */

import type { Result } from '../../result.js';
import type { BlockStatementNode } from '../../types.js';
import type { Chunk } from '../bytecode/chunk.js';
import type { Environment } from './environment.js';
import type { Heap } from './heap.js';
import { NIL, type Value } from './value.js';

// ============================================================
// OBJECT TYPES
// ============================================================

export const OBJECT_TYPES = {
  STRING: 'string',
  ARRAY: 'array',
  DICT: 'dict',
  FUNCTION: 'function',
  BUILTIN_FUNCTION: 'builtin_function',
} as const;

export type ObjectType = (typeof OBJECT_TYPES)[keyof typeof OBJECT_TYPES];

/**
 * Receives every reference an object holds during the mark phase.
 * Implemented by the heap's Tracer.
 */
export interface Tracer {
  markValue(value: Value): void;
  markValues(values: Iterable<Value>): void;
  markEnvironment(env: Environment): void;
}

// ============================================================
// BASE OBJECT
// ============================================================

export abstract class HeapObject {
  abstract readonly type: ObjectType;
  /** Set during mark, cleared by sweep */
  marked = false;
  /** Intrusive allocation list */
  next: HeapObject | null = null;
  /** GC_PTR value naming this object, assigned by the heap */
  ref: Value = NIL;

  /** Report every Value or Environment this object references */
  abstract trace(tracer: Tracer): void;
}

// ============================================================
// VARIANTS
// ============================================================

/** Length and indexing count code points, so surrogate pairs stay whole */
export class StringObject extends HeapObject {
  readonly type = OBJECT_TYPES.STRING;
  private codePoints: string[] | undefined;

  constructor(public readonly value: string) {
    super();
  }

  get length(): number {
    return this.chars().length;
  }

  /** Code point at `index`, or undefined when out of range */
  charAt(index: number): string | undefined {
    return index < 0 ? undefined : this.chars()[index];
  }

  private chars(): string[] {
    this.codePoints ??= Array.from(this.value);
    return this.codePoints;
  }

  trace(): void {}
}

export class ArrayObject extends HeapObject {
  readonly type = OBJECT_TYPES.ARRAY;
  readonly elements: Value[];

  constructor(elements: Iterable<Value> = []) {
    super();
    this.elements = [...elements];
  }

  trace(tracer: Tracer): void {
    tracer.markValues(this.elements);
  }
}

/** String keys are stored by value; only the values are references */
export class DictObject extends HeapObject {
  readonly type = OBJECT_TYPES.DICT;
  readonly entries: Map<string, Value>;

  constructor(entries: Iterable<readonly [string, Value]> = []) {
    super();
    this.entries = new Map(entries);
  }

  trace(tracer: Tracer): void {
    tracer.markValues(this.entries.values());
  }
}

/**
 * Function body: an AST block for the tree-walker, or a compiled chunk
 * for the VM. The AST is owned by the parser's caller, not the heap.
 */
export type FunctionBody =
  | { readonly kind: 'ast'; readonly block: BlockStatementNode }
  | { readonly kind: 'chunk'; readonly chunk: Chunk };

export class FunctionObject extends HeapObject {
  readonly type = OBJECT_TYPES.FUNCTION;

  /**
   * @param closure - Defining scope. Null for compiled functions, which
   *   resolve free names against the VM globals.
   */
  constructor(
    public readonly name: string,
    public readonly params: readonly string[],
    public readonly body: FunctionBody,
    public readonly closure: Environment | null
  ) {
    super();
  }

  get arity(): number {
    return this.params.length;
  }

  trace(tracer: Tracer): void {
    if (this.closure) tracer.markEnvironment(this.closure);
    if (this.body.kind === 'chunk') {
      tracer.markValues(this.body.chunk.constants);
    }
  }
}

// ============================================================
// BUILTIN FUNCTIONS
// ============================================================

/** Runtime services handed to native functions */
export interface BuiltinServices {
  readonly heap: Heap;
  /** Emit one line of program output */
  print(text: string): void;
  stringify(value: Value): string;
}

/** Native callable; a failure message becomes a runtime error at the call site */
export type BuiltinFn = (
  args: readonly Value[],
  services: BuiltinServices
) => Result<Value, string>;

/** Arity sentinel for functions taking any number of arguments */
export const VARIADIC = -1;

export class BuiltinFunctionObject extends HeapObject {
  readonly type = OBJECT_TYPES.BUILTIN_FUNCTION;

  constructor(
    public readonly name: string,
    public readonly arity: number,
    public readonly fn: BuiltinFn
  ) {
    super();
  }

  get variadic(): boolean {
    return this.arity === VARIADIC;
  }

  trace(): void {}
}
