/**
 * Tree-Walking Interpreter
 *
 * Evaluates the AST directly against the same heap, builtins and value
 * model as the VM. Every step returns a Result whose failure side is an
 * Interrupt: either a runtime error or a `return` travelling up to the
 * nearest call.
 */

import { createError, type PebbleError } from '../../error-classes.js';
import { err, ok, type Result } from '../../result.js';
import type {
  AssignmentNode,
  BlockStatementNode,
  CallNode,
  ExpressionNode,
  ForLoopNode,
  IfElseNode,
  ProgramNode,
  SourceLocation,
  StatementNode,
} from '../../types.js';
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
import type { RuntimeContext } from '../core/types.js';
import {
  FALSE,
  makeDouble,
  makeIntegerResult,
  NIL,
  TRUE,
  type Value,
} from '../core/value.js';

/** Abrupt completion of an evaluation step */
export type Interrupt =
  | { readonly kind: 'error'; readonly error: PebbleError }
  | { readonly kind: 'return'; readonly value: Value };

type Eval = Result<Value, Interrupt>;

const NORMAL: Eval = ok(NIL);

export class Interpreter {
  private env: Environment;
  /** Environments suspended by block entry and calls */
  private readonly savedEnvs: Environment[] = [];
  /** Values held only by JS locals across a nested evaluation */
  private readonly temps: Value[] = [];
  private lastValue: Value = NIL;
  private depth = 0;
  private readonly unregister: () => void;

  constructor(private readonly context: RuntimeContext) {
    this.env = context.globals;
    this.unregister = context.heap.addRootTracer((tracer) => {
      tracer.markValues(this.temps);
      tracer.markValue(this.lastValue);
      tracer.markEnvironment(this.env);
      for (const env of this.savedEnvs) tracer.markEnvironment(env);
    });
  }

  /**
   * Run a program in the global environment. Resolves to the value of the
   * last top-level expression statement, or nil.
   */
  run(program: ProgramNode): Result<Value, PebbleError> {
    this.env = this.context.globals;
    this.savedEnvs.length = 0;
    this.temps.length = 0;
    this.lastValue = NIL;
    this.depth = 0;

    for (const statement of program.statements) {
      const result = this.execute(statement);
      if (!result.ok) {
        // Top-level return is rejected in execute(), so this is an error
        const error =
          result.error.kind === 'error'
            ? result.error.error
            : createError('PEB-R013', {}, statement.span.start);
        this.context.observability.onRuntimeError?.(error);
        return err(error);
      }
      if (statement.type === 'ExpressionStatement') {
        this.lastValue = result.value;
      }
    }

    return ok(this.lastValue);
  }

  /** Stop rooting this interpreter's environments and temporaries */
  dispose(): void {
    this.unregister();
  }

  // ============================================================
  // STATEMENTS
  // ============================================================

  /** Expression statements yield their value; other statements yield nil */
  private execute(node: StatementNode): Eval {
    switch (node.type) {
      case 'VariableStatement': {
        const value = this.evaluate(node.value);
        if (!value.ok) return value;
        this.env.define(node.name, value.value, node.mutable);
        return NORMAL;
      }

      case 'FunctionStatement': {
        const fn = this.context.heap.allocate(
          FunctionObject,
          node.name,
          node.params,
          { kind: 'ast', block: node.body },
          this.env
        );
        this.env.define(node.name, fn.ref, true);
        return NORMAL;
      }

      case 'ReturnStatement': {
        if (this.depth === 0) {
          return this.fail('PEB-R013', {}, node.span.start);
        }
        const value = node.value ? this.evaluate(node.value) : NORMAL;
        if (!value.ok) return value;
        return err({ kind: 'return', value: value.value });
      }

      case 'WhileLoop':
        for (;;) {
          const condition = this.evaluate(node.condition);
          if (!condition.ok) return condition;
          if (!isTruthy(condition.value)) return NORMAL;
          const body = this.executeBlock(node.body, new Environment(this.env));
          if (!body.ok) return body;
        }

      case 'ForLoop':
        return this.executeFor(node);

      case 'BlockStatement': {
        const result = this.executeBlock(node, new Environment(this.env));
        return result.ok ? NORMAL : result;
      }

      case 'ExpressionStatement':
        return this.evaluate(node.expression);
    }
  }

  /** Run a block in `scope`; yields its tail value, or nil */
  private executeBlock(node: BlockStatementNode, scope: Environment): Eval {
    return this.inScope(scope, () => {
      for (const statement of node.statements) {
        const result = this.execute(statement);
        if (!result.ok) return result;
      }
      return node.tail ? this.evaluate(node.tail) : NORMAL;
    });
  }

  /** Arrays yield their elements, dicts their keys; each pass gets a fresh scope */
  private executeFor(node: ForLoopNode): Eval {
    const iterable = this.evaluate(node.iterable);
    if (!iterable.ok) return iterable;
    const { heap } = this.context;

    return this.withTemps(() => {
      this.temps.push(iterable.value);

      const array = heap.getAs(iterable.value, ArrayObject);
      if (array) {
        // Indexed so elements pushed or popped by the body are observed
        for (let i = 0; i < array.elements.length; i++) {
          const result = this.iterate(node, array.elements[i] ?? NIL);
          if (!result.ok) return result;
        }
        return NORMAL;
      }

      const dict = heap.getAs(iterable.value, DictObject);
      if (dict) {
        for (const key of [...dict.entries.keys()]) {
          const result = this.iterate(node, heap.allocate(StringObject, key).ref);
          if (!result.ok) return result;
        }
        return NORMAL;
      }

      return this.fail(
        'PEB-R017',
        { type: typeName(heap, iterable.value) },
        node.iterable.span.start
      );
    });
  }

  private iterate(node: ForLoopNode, item: Value): Eval {
    const scope = new Environment(this.env);
    scope.define(node.variable, item);
    return this.executeBlock(node.body, scope);
  }

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  private evaluate(node: ExpressionNode): Eval {
    const { heap } = this.context;
    const location = node.span.start;

    switch (node.type) {
      case 'IntegerLiteral':
        return ok(makeIntegerResult(node.value));

      case 'FloatLiteral':
        return ok(makeDouble(node.value));

      case 'StringLiteral':
        return ok(heap.allocate(StringObject, node.value).ref);

      case 'BooleanLiteral':
        return ok(node.value ? TRUE : FALSE);

      case 'NilLiteral':
        return NORMAL;

      case 'ArrayLiteral':
        return this.withTemps(() => {
          const start = this.temps.length;
          for (const element of node.elements) {
            const value = this.evaluate(element);
            if (!value.ok) return value;
            this.temps.push(value.value);
          }
          return ok(heap.allocate(ArrayObject, this.temps.slice(start)).ref);
        });

      case 'DictLiteral':
        return this.withTemps(() => {
          const start = this.temps.length;
          for (const entry of node.entries) {
            const value = this.evaluate(entry.value);
            if (!value.ok) return value;
            this.temps.push(value.value);
          }
          const values = this.temps.slice(start);
          const entries = node.entries.map(
            (entry, i): [string, Value] => [entry.key, values[i] ?? NIL]
          );
          return ok(heap.allocate(DictObject, entries).ref);
        });

      case 'Identifier': {
        const result = this.env.get(node.name);
        return result.ok
          ? result
          : this.fail('PEB-R001', { name: node.name }, location);
      }

      case 'Assignment':
        return this.evaluateAssignment(node);

      case 'Binary':
        return this.withTemps(() => {
          const left = this.evaluate(node.left);
          if (!left.ok) return left;
          this.temps.push(left.value);
          const right = this.evaluate(node.right);
          if (!right.ok) return right;
          return this.settle(applyBinary(node.op, left.value, right.value), location);
        });

      case 'Unary': {
        const operand = this.evaluate(node.operand);
        if (!operand.ok) return operand;
        return this.settle(applyUnary(node.op, operand.value), location);
      }

      case 'IfElse':
        return this.evaluateIfElse(node);

      case 'Call':
        return this.evaluateCall(node);

      case 'Index':
        return this.withTemps(() => {
          const target = this.evaluate(node.object);
          if (!target.ok) return target;
          this.temps.push(target.value);
          const key = this.evaluate(node.index);
          if (!key.ok) return key;
          this.temps.push(key.value);
          return this.settle(indexValue(heap, target.value, key.value), location);
        });
    }
  }

  private evaluateAssignment(node: AssignmentNode): Eval {
    const location = node.span.start;
    const { target } = node;

    if (target.type === 'Identifier') {
      const value = this.evaluate(node.value);
      if (!value.ok) return value;
      const result = this.env.set(target.name, value.value);
      if (result.ok) return result;
      return this.fail(
        result.error.kind === 'immutable_assignment' ? 'PEB-R002' : 'PEB-R001',
        { name: target.name },
        location
      );
    }

    return this.withTemps(() => {
      const object = this.evaluate(target.object);
      if (!object.ok) return object;
      this.temps.push(object.value);
      const key = this.evaluate(target.index);
      if (!key.ok) return key;
      this.temps.push(key.value);
      const value = this.evaluate(node.value);
      if (!value.ok) return value;
      return this.settle(
        storeIndexValue(this.context.heap, object.value, key.value, value.value),
        location
      );
    });
  }

  private evaluateIfElse(node: IfElseNode): Eval {
    const condition = this.evaluate(node.condition);
    if (!condition.ok) return condition;

    if (isTruthy(condition.value)) {
      return this.executeBlock(node.thenBranch, new Environment(this.env));
    }
    if (node.elseBranch === null) return NORMAL;
    if (node.elseBranch.type === 'IfElse') {
      return this.evaluateIfElse(node.elseBranch);
    }
    return this.executeBlock(node.elseBranch, new Environment(this.env));
  }

  // ============================================================
  // CALLS
  // ============================================================

  private evaluateCall(node: CallNode): Eval {
    const location = node.span.start;
    const { heap, services } = this.context;

    return this.withTemps(() => {
      const callee = this.evaluate(node.callee);
      if (!callee.ok) return callee;
      this.temps.push(callee.value);

      const start = this.temps.length;
      for (const arg of node.args) {
        const value = this.evaluate(arg);
        if (!value.ok) return value;
        this.temps.push(value.value);
      }
      // Arguments stay rooted in temps for the duration of the call
      const args = this.temps.slice(start);

      const builtin = heap.getAs(callee.value, BuiltinFunctionObject);
      if (builtin) {
        if (!builtin.variadic && args.length !== builtin.arity) {
          return this.fail(
            'PEB-R006',
            { name: builtin.name, expected: builtin.arity, actual: args.length },
            location
          );
        }
        const result = builtin.fn(args, services);
        return result.ok
          ? result
          : this.fail('PEB-R012', { message: result.error }, location);
      }

      const fn = heap.getAs(callee.value, FunctionObject);
      if (!fn) {
        return this.fail('PEB-R005', { type: typeName(heap, callee.value) }, location);
      }
      if (fn.body.kind !== 'ast') {
        return this.fail(
          'PEB-R012',
          { message: `Function ${fn.name} is compiled bytecode` },
          location
        );
      }
      if (args.length !== fn.arity) {
        return this.fail(
          'PEB-R006',
          { name: fn.name, expected: fn.arity, actual: args.length },
          location
        );
      }
      if (this.depth >= this.context.limits.framesMax) {
        return this.fail(
          'PEB-R007',
          { limit: this.context.limits.framesMax, unit: 'frames' },
          location
        );
      }

      const scope = new Environment(fn.closure ?? this.context.globals);
      fn.params.forEach((param, i) => scope.define(param, args[i] ?? NIL));

      this.depth++;
      try {
        const result = this.executeBlock(fn.body.block, scope);
        if (result.ok) return result;
        return result.error.kind === 'return' ? ok(result.error.value) : result;
      } finally {
        this.depth--;
      }
    });
  }

  // ============================================================
  // HELPERS
  // ============================================================

  /** Run `body` with `scope` as the current environment */
  private inScope<T>(scope: Environment, body: () => T): T {
    this.savedEnvs.push(this.env);
    this.env = scope;
    try {
      return body();
    } finally {
      this.env = this.savedEnvs.pop() ?? this.context.globals;
    }
  }

  /** Discard temporaries pushed by `body` once it finishes */
  private withTemps<T>(body: () => T): T {
    const mark = this.temps.length;
    try {
      return body();
    } finally {
      this.temps.length = mark;
    }
  }

  private settle(result: Result<Value, OperatorFailure>, location: SourceLocation): Eval {
    return result.ok
      ? result
      : this.fail(result.error.errorId, result.error.context, location);
  }

  private fail(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ): Eval {
    return err({ kind: 'error', error: createError(errorId, context, location) });
  }
}
