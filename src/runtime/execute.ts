/**
 * Program Execution
 * Runs a parsed program on the VM (compile first) or the tree-walker.
 */

import type { PebbleError } from '../error-classes.js';
import type { ProgramNode } from '../types.js';
import { compile } from './bytecode/compiler.js';
import { disassembleChunk } from './bytecode/disassemble.js';
import { VM } from './bytecode/vm.js';
import { stringify } from './core/stringify.js';
import {
  EXECUTION_STATUS,
  type ExecutionStatus,
  type RuntimeContext,
} from './core/types.js';
import { NIL, type Value } from './core/value.js';
import { Interpreter } from './interpreter/interpreter.js';

export const EXECUTION_MODES = ['vm', 'tree'] as const;

export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export interface ExecuteOptions {
  /** Execution engine (default 'vm') */
  mode?: ExecutionMode | undefined;
  /** Receives the listing of the compiled chunk before it runs (VM mode only) */
  onDisassemble?: ((listing: string) => void) | undefined;
}

/** Result of running one program */
export interface ExecutionResult {
  readonly status: ExecutionStatus;
  /** Final value; only rooted while the engine runs */
  readonly value: Value;
  /** `stringify(value)`, taken while the value was still rooted */
  readonly text: string;
  /** Compile diagnostics, or the single runtime error */
  readonly errors: readonly PebbleError[];
}

/**
 * Execute a program against a context. Globals defined by the program
 * remain in `context.globals` for the next call.
 *
 * @throws HeapExhaustedError when live objects exceed maxObjects
 */
export function execute(
  program: ProgramNode,
  context: RuntimeContext,
  options: ExecuteOptions = {}
): ExecutionResult {
  return options.mode === 'tree'
    ? executeTree(program, context)
    : executeVm(program, context, options.onDisassemble);
}

function executeVm(
  program: ProgramNode,
  context: RuntimeContext,
  onDisassemble: ((listing: string) => void) | undefined
): ExecutionResult {
  const compiled = compile(program, {
    heap: context.heap,
    onError: context.observability.onCompileError,
  });
  if (!compiled.ok) {
    return {
      status: EXECUTION_STATUS.COMPILE_ERROR,
      value: NIL,
      text: 'nil',
      errors: compiled.error,
    };
  }

  const chunk = compiled.value;
  const vm = new VM(context);
  try {
    onDisassemble?.(disassembleChunk(chunk, context.heap));
    const status = vm.execute(chunk);
    const error = vm.lastError;
    const value = error ? NIL : vm.getResult();
    return {
      status,
      value,
      text: stringify(context.heap, value),
      errors: error ? [error] : [],
    };
  } finally {
    vm.dispose();
    chunk.release();
  }
}

function executeTree(
  program: ProgramNode,
  context: RuntimeContext
): ExecutionResult {
  const interpreter = new Interpreter(context);
  try {
    const result = interpreter.run(program);
    if (!result.ok) {
      return {
        status: EXECUTION_STATUS.RUNTIME_ERROR,
        value: NIL,
        text: 'nil',
        errors: [result.error],
      };
    }
    return {
      status: EXECUTION_STATUS.OK,
      value: result.value,
      text: stringify(context.heap, result.value),
      errors: [],
    };
  } finally {
    interpreter.dispose();
  }
}
