/**
 * Pebble Runtime
 *
 * Public API for executing Pebble programs.
 *
 * Module Structure:
 * - core/: value model and memory
 *   - value.ts: NaN-boxed Value
 *   - objects.ts, heap.ts: heap objects and the mark-and-sweep collector
 *   - environment.ts: lexical scopes
 *   - stringify.ts, operators.ts: value semantics shared by both engines
 *   - builtins.ts, context.ts, types.ts: runtime context and host types
 * - bytecode/: opcodes, chunk, disassembler, compiler and VM
 * - interpreter/: tree-walking evaluator
 * - execute.ts: run a program on either engine
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeLimits,
  RuntimeOptions,
  ExecutionStatus,
} from './core/types.js';

export { DEFAULT_LIMITS, EXECUTION_STATUS } from './core/types.js';

// ============================================================
// VALUES
// ============================================================

export {
  TAG,
  NIL,
  UNDEFINED,
  TRUE,
  FALSE,
  makeDouble,
  makeInt32,
  makeBool,
  makeNull,
  makeUndefined,
  makeGcPtr,
  isBoxed,
  isDouble,
  isInt32,
  isBool,
  isNull,
  isUndefined,
  isGcPtr,
  isNumber,
  tagOf,
  asDouble,
  asInt32,
  asBool,
  asGcPtr,
  asNumber,
  type Tag,
  type Value,
} from './core/value.js';

export { stringify, typeName, isTruthy, valuesEqual } from './core/stringify.js';

// ============================================================
// HEAP
// ============================================================

export {
  ArrayObject,
  BuiltinFunctionObject,
  DictObject,
  FunctionObject,
  HeapObject,
  OBJECT_TYPES,
  StringObject,
  VARIADIC,
  type BuiltinFn,
  type BuiltinServices,
  type FunctionBody,
  type ObjectType,
  type Tracer,
} from './core/objects.js';

export {
  DEFAULT_GC_THRESHOLD,
  Heap,
  RootHandle,
  type CollectionStats,
  type HeapOptions,
  type HeapStats,
  type RootSlot,
  type RootTracer,
} from './core/heap.js';

export { Environment, type EnvironmentError } from './core/environment.js';

export { BUILTIN_FUNCTIONS, installBuiltins } from './core/builtins.js';

// ============================================================
// CONTEXT FACTORY
// ============================================================

export { createRuntimeContext } from './core/context.js';

// ============================================================
// BYTECODE
// ============================================================

export { OpCode, opcodeName } from './bytecode/opcodes.js';
export { Chunk, type Instruction } from './bytecode/chunk.js';
export { disassembleChunk } from './bytecode/disassemble.js';
export { compile, Compiler, type CompilerOptions } from './bytecode/compiler.js';
export { VM, type CallFrame } from './bytecode/vm.js';

// ============================================================
// TREE-WALKER
// ============================================================

export { Interpreter, type Interrupt } from './interpreter/interpreter.js';

// ============================================================
// SCRIPT EXECUTION
// ============================================================

export {
  execute,
  EXECUTION_MODES,
  type ExecuteOptions,
  type ExecutionMode,
  type ExecutionResult,
} from './execute.js';
