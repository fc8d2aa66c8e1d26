/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { CompileError, PebbleError } from '../../error-classes.js';
import type { Environment } from './environment.js';
import type { CollectionStats, Heap } from './heap.js';
import type { BuiltinServices } from './objects.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with each line written by print() */
  onPrint: (text: string) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called after every garbage collection cycle */
  onCollect?: ((stats: CollectionStats) => void) | undefined;
  /** Called once per compile diagnostic */
  onCompileError?: ((error: CompileError) => void) | undefined;
  /** Called when execution stops on a runtime error */
  onRuntimeError?: ((error: PebbleError) => void) | undefined;
}

/** Execution limits shared by the VM and the tree-walker */
export interface RuntimeLimits {
  /** Operand stack capacity (VM) */
  readonly stackMax: number;
  /** Maximum call depth */
  readonly framesMax: number;
}

export const DEFAULT_LIMITS: RuntimeLimits = {
  stackMax: 256,
  framesMax: 64,
};

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks for monitoring execution */
  observability?: ObservabilityCallbacks | undefined;
  /** Live-object count that triggers the first collection */
  gcThreshold?: number | undefined;
  /** Hard ceiling on live heap objects */
  maxObjects?: number | undefined;
  stackMax?: number | undefined;
  framesMax?: number | undefined;
}

/** Heap, globals and callbacks shared by one program run (or REPL session) */
export interface RuntimeContext {
  readonly heap: Heap;
  /** Global scope, pre-populated with the builtins */
  readonly globals: Environment;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly limits: RuntimeLimits;
  /** Handle passed to native functions */
  readonly services: BuiltinServices;
  /** Unregister the globals root */
  dispose(): void;
}

/** Status codes returned by VM.execute */
export const EXECUTION_STATUS = {
  OK: 'ok',
  COMPILE_ERROR: 'compile_error',
  RUNTIME_ERROR: 'runtime_error',
} as const;

export type ExecutionStatus =
  (typeof EXECUTION_STATUS)[keyof typeof EXECUTION_STATUS];
