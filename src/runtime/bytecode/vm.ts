/**
 * Virtual Machine
 *
 * Stack machine over compiled chunks. One operand stack is shared by
 * every call frame. Runtime errors are sticky: the failing instruction
 * records the error and the dispatch loop stops before the next fetch.
 * HeapExhaustedError is fatal and propagates to the caller.
 */

import { createError, type PebbleError } from '../../error-classes.js';
import type { Result } from '../../result.js';
import type { BinaryOp, SourceLocation } from '../../types.js';
import { Environment } from '../core/environment.js';
import {
  ArrayObject,
  BuiltinFunctionObject,
  DictObject,
  FunctionObject,
  StringObject,
} from '../core/objects.js';
import {
  applyBinary,
  applyUnary,
  indexValue,
  storeIndexValue,
  type OperatorFailure,
} from '../core/operators.js';
import { isTruthy, typeName } from '../core/stringify.js';
import {
  EXECUTION_STATUS,
  type ExecutionStatus,
  type RuntimeContext,
} from '../core/types.js';
import { FALSE, NIL, TRUE, type Value } from '../core/value.js';
import type { Chunk } from './chunk.js';
import { OpCode } from './opcodes.js';

/** Per-invocation bookkeeping */
export interface CallFrame {
  readonly chunk: Chunk;
  ip: number;
  /** Stack index of the callee slot (0 for the script frame) */
  readonly base: number;
  /** Environment to restore on RETURN */
  readonly savedEnv: Environment;
}

const BINARY_OPERATORS: ReadonlyMap<OpCode, BinaryOp> = new Map<OpCode, BinaryOp>([
  [OpCode.ADD, '+'],
  [OpCode.SUBTRACT, '-'],
  [OpCode.MULTIPLY, '*'],
  [OpCode.DIVIDE, '/'],
  [OpCode.EQUAL, '=='],
  [OpCode.NOT_EQUAL, '!='],
  [OpCode.LESS, '<'],
  [OpCode.GREATER, '>'],
  [OpCode.LESS_EQUAL, '<='],
  [OpCode.GREATER_EQUAL, '>='],
  [OpCode.AND, 'and'],
  [OpCode.OR, 'or'],
]);

export class VM {
  private readonly stack: Value[] = [];
  private readonly frames: CallFrame[] = [];
  private env: Environment;
  private error: PebbleError | null = null;
  private location: SourceLocation | undefined;
  private readonly unregister: () => void;

  constructor(private readonly context: RuntimeContext) {
    this.env = context.globals;
    this.unregister = context.heap.addRootTracer((tracer) => {
      tracer.markValues(this.stack);
      tracer.markEnvironment(this.env);
      for (const frame of this.frames) {
        tracer.markValues(frame.chunk.constants);
        tracer.markEnvironment(frame.savedEnv);
      }
    });
  }

  // ============================================================
  // PUBLIC API
  // ============================================================

  /**
   * Run a chunk from its first instruction. The stack and frames are
   * reset; globals persist across calls.
   */
  execute(chunk: Chunk): ExecutionStatus {
    this.stack.length = 0;
    this.frames.length = 0;
    this.error = null;
    this.location = undefined;
    this.env = this.context.globals;
    this.frames.push({ chunk, ip: 0, base: 0, savedEnv: this.env });

    this.run();

    if (this.error) {
      this.context.observability.onRuntimeError?.(this.error);
      return EXECUTION_STATUS.RUNTIME_ERROR;
    }
    return EXECUTION_STATUS.OK;
  }

  /** Top of stack after execution, or nil when the stack is empty */
  getResult(): Value {
    return this.stack[this.stack.length - 1] ?? NIL;
  }

  /** Message of the last runtime error, or null */
  getError(): string | null {
    return this.error?.message ?? null;
  }

  get lastError(): PebbleError | null {
    return this.error;
  }

  get stackDepth(): number {
    return this.stack.length;
  }

  get globals(): Environment {
    return this.context.globals;
  }

  /** Stop rooting this VM's stack and environments */
  dispose(): void {
    this.unregister();
  }

  // ============================================================
  // DISPATCH LOOP
  // ============================================================

  private run(): void {
    while (this.error === null) {
      const frame = this.frames[this.frames.length - 1];
      if (!frame) return;

      const instruction = frame.chunk.code[frame.ip];
      // Running off the end behaves like HALT
      if (!instruction) return;
      this.location = frame.chunk.locations[frame.ip];
      frame.ip++;

      const { opcode, operand } = instruction;

      switch (opcode) {
        case OpCode.LOAD_CONST: {
          const value = frame.chunk.constants[operand];
          if (value === undefined) {
            this.fail('PEB-R009', { table: 'constant', index: operand });
          } else {
            this.push(value);
          }
          break;
        }

        case OpCode.LOAD_NULL:
          this.push(NIL);
          break;

        case OpCode.LOAD_TRUE:
          this.push(TRUE);
          break;

        case OpCode.LOAD_FALSE:
          this.push(FALSE);
          break;

        case OpCode.LOAD_VAR: {
          const name = this.variableName(frame, operand);
          if (name === undefined) break;
          const result = this.env.get(name);
          if (result.ok) {
            this.push(result.value);
          } else {
            this.fail('PEB-R001', { name });
          }
          break;
        }

        case OpCode.STORE_VAR: {
          const name = this.variableName(frame, operand);
          const value = this.peek(0);
          if (name === undefined || value === undefined) break;
          const result = this.env.set(name, value);
          if (!result.ok) {
            this.fail(
              result.error.kind === 'immutable_assignment' ? 'PEB-R002' : 'PEB-R001',
              { name }
            );
          }
          break;
        }

        case OpCode.DEFINE_VAR:
        case OpCode.DEFINE_LET: {
          const name = this.variableName(frame, operand);
          const value = this.pop();
          if (name === undefined || value === undefined) break;
          this.env.define(name, value, opcode === OpCode.DEFINE_VAR);
          break;
        }

        case OpCode.ADD:
        case OpCode.SUBTRACT:
        case OpCode.MULTIPLY:
        case OpCode.DIVIDE:
        case OpCode.EQUAL:
        case OpCode.NOT_EQUAL:
        case OpCode.LESS:
        case OpCode.GREATER:
        case OpCode.LESS_EQUAL:
        case OpCode.GREATER_EQUAL:
        case OpCode.AND:
        case OpCode.OR:
          this.binary(opcode);
          break;

        case OpCode.NEGATE:
        case OpCode.NOT: {
          const value = this.pop();
          if (value === undefined) break;
          this.settle(applyUnary(opcode === OpCode.NEGATE ? '-' : '!', value));
          break;
        }

        case OpCode.JUMP:
          frame.ip = operand;
          break;

        case OpCode.JUMP_IF_FALSE:
        case OpCode.JUMP_IF_TRUE: {
          const condition = this.pop();
          if (condition === undefined) break;
          if (isTruthy(condition) === (opcode === OpCode.JUMP_IF_TRUE)) {
            frame.ip = operand;
          }
          break;
        }

        case OpCode.CALL:
          this.call(operand);
          break;

        case OpCode.RETURN: {
          const result = this.pop();
          if (result === undefined) break;
          const finished = this.frames.pop();
          if (!finished) break;
          this.stack.length = finished.base;
          this.env = finished.savedEnv;
          this.push(result);
          break;
        }

        case OpCode.BUILD_ARRAY:
          this.buildArray(operand);
          break;

        case OpCode.BUILD_DICT:
          this.buildDict(operand);
          break;

        case OpCode.INDEX:
          this.index();
          break;

        case OpCode.STORE_INDEX:
          this.storeIndex();
          break;

        case OpCode.POP:
          this.pop();
          break;

        case OpCode.DUP: {
          const value = this.peek(0);
          if (value !== undefined) this.push(value);
          break;
        }

        case OpCode.PUSH_ENV:
          this.env = new Environment(this.env);
          break;

        case OpCode.POP_ENV:
          this.env = this.env.parent ?? this.context.globals;
          break;

        case OpCode.HALT:
          return;

        default:
          this.fail('PEB-R014', { opcode: String(opcode) });
      }
    }
  }

  // ============================================================
  // STACK
  // ============================================================

  private push(value: Value): void {
    if (this.stack.length >= this.context.limits.stackMax) {
      this.fail('PEB-R007', { limit: this.context.limits.stackMax, unit: 'values' });
      return;
    }
    this.stack.push(value);
  }

  private pop(): Value | undefined {
    const value = this.stack.pop();
    if (value === undefined) this.fail('PEB-R008', {});
    return value;
  }

  private peek(distance: number): Value | undefined {
    const value = this.stack[this.stack.length - 1 - distance];
    if (value === undefined) this.fail('PEB-R008', {});
    return value;
  }

  /** Drop `count` values and push one */
  private replaceTop(count: number, value: Value): void {
    this.stack.length -= count;
    this.push(value);
  }

  private variableName(frame: CallFrame, index: number): string | undefined {
    const name = frame.chunk.variableNames[index];
    if (name === undefined) {
      this.fail('PEB-R009', { table: 'variable', index });
    }
    return name;
  }

  // ============================================================
  // OPERATORS
  // ============================================================

  private binary(opcode: OpCode): void {
    const b = this.pop();
    const a = this.pop();
    const operator = BINARY_OPERATORS.get(opcode);
    if (a === undefined || b === undefined || operator === undefined) return;
    this.settle(applyBinary(operator, a, b));
  }

  /** Push an operator's result, or record its failure without pushing */
  private settle(result: Result<Value, OperatorFailure>): void {
    if (result.ok) {
      this.push(result.value);
    } else {
      this.fail(result.error.errorId, result.error.context);
    }
  }

  // ============================================================
  // CALLS
  // ============================================================

  /** The callee sits `argc` slots below the top of the stack */
  private call(argc: number): void {
    const calleeIndex = this.stack.length - 1 - argc;
    const callee = this.stack[calleeIndex];
    if (callee === undefined) {
      this.fail('PEB-R008', {});
      return;
    }
    const { heap } = this.context;

    const builtin = heap.getAs(callee, BuiltinFunctionObject);
    if (builtin) {
      if (!builtin.variadic && argc !== builtin.arity) {
        this.fail('PEB-R006', { name: builtin.name, expected: builtin.arity, actual: argc });
        return;
      }
      // Arguments stay on the stack, and so stay rooted, during the call
      const result = builtin.fn(this.stack.slice(calleeIndex + 1), this.context.services);
      if (!result.ok) {
        this.fail('PEB-R012', { message: result.error });
        return;
      }
      this.replaceTop(argc + 1, result.value);
      return;
    }

    const fn = heap.getAs(callee, FunctionObject);
    if (!fn) {
      this.fail('PEB-R005', { type: typeName(heap, callee) });
      return;
    }
    if (fn.body.kind !== 'chunk') {
      this.fail('PEB-R012', { message: `Function ${fn.name} was not compiled to bytecode` });
      return;
    }
    if (argc !== fn.arity) {
      this.fail('PEB-R006', { name: fn.name, expected: fn.arity, actual: argc });
      return;
    }
    if (this.frames.length >= this.context.limits.framesMax) {
      this.fail('PEB-R007', { limit: this.context.limits.framesMax, unit: 'frames' });
      return;
    }

    const scope = new Environment(fn.closure ?? this.context.globals);
    fn.params.forEach((param, i) => {
      scope.define(param, this.stack[calleeIndex + 1 + i] ?? NIL);
    });

    this.frames.push({
      chunk: fn.body.chunk,
      ip: 0,
      base: calleeIndex,
      savedEnv: this.env,
    });
    this.env = scope;
  }

  // ============================================================
  // COLLECTIONS
  // ============================================================

  /** Allocate before popping so the elements stay rooted */
  private buildArray(count: number): void {
    if (this.stack.length < count) {
      this.fail('PEB-R008', {});
      return;
    }
    const elements = this.stack.slice(this.stack.length - count);
    const array = this.context.heap.allocate(ArrayObject, elements);
    this.replaceTop(count, array.ref);
  }

  private buildDict(pairs: number): void {
    const count = pairs * 2;
    if (this.stack.length < count) {
      this.fail('PEB-R008', {});
      return;
    }
    const { heap } = this.context;
    const flat = this.stack.slice(this.stack.length - count);
    const entries: [string, Value][] = [];
    for (let i = 0; i < flat.length; i += 2) {
      const key = flat[i];
      const value = flat[i + 1];
      if (key === undefined || value === undefined) break;
      const str = heap.getAs(key, StringObject);
      if (!str) {
        this.fail('PEB-R016', { type: 'dict', indexType: typeName(heap, key) });
        return;
      }
      entries.push([str.value, value]);
    }
    const dict = heap.allocate(DictObject, entries);
    this.replaceTop(count, dict.ref);
  }

  /** Peek both operands so they stay rooted while a string index allocates */
  private index(): void {
    const key = this.peek(0);
    const target = this.peek(1);
    if (key === undefined || target === undefined) return;
    const result = indexValue(this.context.heap, target, key);
    if (result.ok) {
      this.replaceTop(2, result.value);
    } else {
      this.fail(result.error.errorId, result.error.context);
    }
  }

  /** target[key] = value; leaves the value on the stack */
  private storeIndex(): void {
    const value = this.peek(0);
    const key = this.peek(1);
    const target = this.peek(2);
    if (value === undefined || key === undefined || target === undefined) return;
    const result = storeIndexValue(this.context.heap, target, key, value);
    if (result.ok) {
      this.replaceTop(3, result.value);
    } else {
      this.fail(result.error.errorId, result.error.context);
    }
  }

  // ============================================================
  // ERRORS
  // ============================================================

  /** Record the first runtime error; the loop stops before the next fetch */
  private fail(errorId: string, context: Record<string, unknown>): void {
    if (this.error) return;
    this.error = createError(errorId, context, this.location);
  }
}
