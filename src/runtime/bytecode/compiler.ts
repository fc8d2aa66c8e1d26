/**
 * Bytecode Compiler
 *
 * Translates a Program AST into a Chunk. Diagnostics are collected, not
 * thrown: compilation continues after an error so one pass reports as
 * many problems as it can, and any error discards the chunk.
 */

import { CompileError, createError } from '../../error-classes.js';
import { err, ok, type Result } from '../../result.js';
import type {
  AssignmentNode,
  BinaryOp,
  BlockStatementNode,
  ExpressionNode,
  FunctionStatementNode,
  IfElseNode,
  ProgramNode,
  SourceLocation,
  StatementNode,
  UnaryOp,
} from '../../types.js';
import type { Heap } from '../core/heap.js';
import { FunctionObject, StringObject } from '../core/objects.js';
import { fitsInt32, makeDouble, makeInt32, type Value } from '../core/value.js';
import { Chunk } from './chunk.js';
import { OpCode } from './opcodes.js';

// ============================================================
// SCOPES
// ============================================================

export const SCOPE_KIND = {
  GLOBAL: 'global',
  FUNCTION: 'function',
  BLOCK: 'block',
  LOOP: 'loop',
} as const;

export type ScopeKind = (typeof SCOPE_KIND)[keyof typeof SCOPE_KIND];

interface NameInfo {
  readonly slot: number;
  readonly mutable: boolean;
}

interface Scope {
  readonly kind: ScopeKind;
  readonly names: Map<string, NameInfo>;
  counter: number;
}

/** A chunk being filled, with its name-index cache */
interface CompileUnit {
  readonly chunk: Chunk;
  readonly nameIndices: Map<string, number>;
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const BINARY_OPCODES: ReadonlyMap<BinaryOp, OpCode> = new Map<BinaryOp, OpCode>([
  ['+', OpCode.ADD],
  ['-', OpCode.SUBTRACT],
  ['*', OpCode.MULTIPLY],
  ['/', OpCode.DIVIDE],
  ['==', OpCode.EQUAL],
  ['!=', OpCode.NOT_EQUAL],
  ['<', OpCode.LESS],
  ['>', OpCode.GREATER],
  ['<=', OpCode.LESS_EQUAL],
  ['>=', OpCode.GREATER_EQUAL],
  ['and', OpCode.AND],
  ['or', OpCode.OR],
]);

const UNARY_OPCODES: ReadonlyMap<UnaryOp, OpCode> = new Map<UnaryOp, OpCode>([
  ['-', OpCode.NEGATE],
  ['!', OpCode.NOT],
]);

// ============================================================
// PUBLIC API
// ============================================================

export interface CompilerOptions {
  /** Heap that owns string and function constants */
  readonly heap: Heap;
  /** Called once per diagnostic, in source order */
  readonly onError?: ((error: CompileError) => void) | undefined;
}

/**
 * Compile a program to a top-level chunk ending in HALT. The chunk's
 * constants stay rooted in the heap until `chunk.release()`.
 *
 * @example
 * const result = compile(parse('1 + 2 * 3;'), { heap });
 * if (result.ok) {
 *   vm.execute(result.value);
 *   result.value.release();
 * }
 */
export function compile(
  program: ProgramNode,
  options: CompilerOptions
): Result<Chunk, CompileError[]> {
  return new Compiler(options).compileProgram(program);
}

// ============================================================
// COMPILER
// ============================================================

export class Compiler {
  private readonly heap: Heap;
  private readonly onError: ((error: CompileError) => void) | undefined;
  private readonly units: CompileUnit[] = [];
  private readonly scopes: Scope[] = [];
  private readonly errors: CompileError[] = [];
  private hadError = false;
  /** A top-level expression statement's value is still on the stack */
  private pendingResult = false;

  constructor(options: CompilerOptions) {
    this.heap = options.heap;
    this.onError = options.onError;
  }

  compileProgram(program: ProgramNode): Result<Chunk, CompileError[]> {
    const unit = this.beginUnit('<script>');
    // Constants are rooted while their chunk is still being filled
    const unregister = this.heap.addRootTracer((tracer) => {
      for (const { chunk } of this.units) tracer.markValues(chunk.constants);
    });

    try {
      this.pushScope(SCOPE_KIND.GLOBAL);
      for (const statement of program.statements) {
        this.compileStatement(statement);
      }
      this.popScope();
      this.emit(OpCode.HALT, 0, program.span.end);
      // Hand the root over before dropping the compile-time tracer
      if (!this.hadError) unit.chunk.retain(this.heap);
    } finally {
      this.units.pop();
      unregister();
    }

    return this.hadError ? err(this.errors) : ok(unit.chunk);
  }

  // ============================================================
  // STATEMENTS
  // ============================================================

  private compileStatement(node: StatementNode): void {
    const location = node.span.start;

    switch (node.type) {
      case 'VariableStatement': {
        this.compileExpression(node.value);
        const opcode = node.mutable ? OpCode.DEFINE_VAR : OpCode.DEFINE_LET;
        this.emit(opcode, this.nameIndex(node.name), location);
        this.declare(node.name, node.mutable);
        return;
      }

      case 'FunctionStatement':
        this.compileFunction(node);
        return;

      case 'ReturnStatement':
        if (!this.insideFunction()) {
          this.error('PEB-C005', {}, location);
          return;
        }
        if (node.value) {
          this.compileExpression(node.value);
        } else {
          this.emit(OpCode.LOAD_NULL, 0, location);
        }
        this.emit(OpCode.RETURN, 0, location);
        return;

      case 'WhileLoop': {
        const loopStart = this.currentChunk().size;
        this.compileExpression(node.condition);
        const exitJump = this.emit(OpCode.JUMP_IF_FALSE, 0, location);
        this.compileBlock(node.body, SCOPE_KIND.LOOP, false);
        this.emit(OpCode.JUMP, loopStart, location);
        this.currentChunk().patchJump(exitJump, this.currentChunk().size);
        return;
      }

      case 'ForLoop':
        this.error('PEB-C003', { construct: 'for loop' }, location);
        return;

      case 'BlockStatement':
        this.compileBlock(node, SCOPE_KIND.BLOCK, false);
        return;

      case 'ExpressionStatement':
        if (this.atGlobalScope()) {
          // Keep only the latest top-level result on the stack
          if (this.pendingResult) this.emit(OpCode.POP, 0, location);
          this.compileExpression(node.expression);
          this.pendingResult = true;
        } else {
          this.compileExpression(node.expression);
          this.emit(OpCode.POP, 0, location);
        }
        return;
    }
  }

  /**
   * Compile a block. As an expression it leaves exactly one value (its
   * tail, or nil); as a statement it leaves none.
   */
  private compileBlock(
    node: BlockStatementNode,
    kind: ScopeKind,
    asExpression: boolean
  ): void {
    const declares = node.statements.some(
      (s) => s.type === 'VariableStatement' || s.type === 'FunctionStatement'
    );

    this.pushScope(kind);
    if (declares) this.emit(OpCode.PUSH_ENV, 0, node.span.start);

    for (const statement of node.statements) {
      this.compileStatement(statement);
    }

    if (node.tail) {
      this.compileExpression(node.tail);
      if (!asExpression) this.emit(OpCode.POP, 0, node.tail.span.end);
    } else if (asExpression) {
      this.emit(OpCode.LOAD_NULL, 0, node.span.end);
    }

    if (declares) this.emit(OpCode.POP_ENV, 0, node.span.end);
    this.popScope();
  }

  /**
   * Compile the body into its own chunk, wrap it in a Function object in
   * the constant pool and bind it with DEFINE_VAR.
   */
  private compileFunction(node: FunctionStatementNode): void {
    const location = node.span.start;
    const unit = this.beginUnit(node.name);

    this.pushScope(SCOPE_KIND.FUNCTION);
    for (const param of node.params) {
      this.declare(param, true);
    }
    for (const statement of node.body.statements) {
      this.compileStatement(statement);
    }
    if (node.body.tail) {
      this.compileExpression(node.body.tail);
    } else {
      this.emit(OpCode.LOAD_NULL, 0, node.body.span.end);
    }
    this.emit(OpCode.RETURN, 0, node.body.span.end);
    this.popScope();

    // Allocate while the body chunk is still rooted through this.units
    const fn = this.heap.allocate(FunctionObject, node.name, node.params, {
      kind: 'chunk',
      chunk: unit.chunk,
    }, null);
    this.units.pop();

    this.emitConstant(fn.ref, location);
    this.emit(OpCode.DEFINE_VAR, this.nameIndex(node.name), location);
    this.declare(node.name, true);
  }

  // ============================================================
  // EXPRESSIONS
  // ============================================================

  private compileExpression(node: ExpressionNode): void {
    const location = node.span.start;

    switch (node.type) {
      case 'IntegerLiteral':
        if (!fitsInt32(node.value)) {
          this.error('PEB-C002', { literal: node.raw }, location);
          return;
        }
        this.emitConstant(makeInt32(node.value), location);
        return;

      case 'FloatLiteral':
        this.emitConstant(makeDouble(node.value), location);
        return;

      case 'StringLiteral':
        this.emitString(node.value, location);
        return;

      case 'BooleanLiteral':
        this.emit(node.value ? OpCode.LOAD_TRUE : OpCode.LOAD_FALSE, 0, location);
        return;

      case 'NilLiteral':
        this.emit(OpCode.LOAD_NULL, 0, location);
        return;

      case 'ArrayLiteral':
        for (const element of node.elements) {
          this.compileExpression(element);
        }
        this.emit(OpCode.BUILD_ARRAY, node.elements.length, location);
        return;

      case 'DictLiteral':
        for (const entry of node.entries) {
          this.emitString(entry.key, location);
          this.compileExpression(entry.value);
        }
        this.emit(OpCode.BUILD_DICT, node.entries.length, location);
        return;

      case 'Identifier':
        this.emit(OpCode.LOAD_VAR, this.nameIndex(node.name), location);
        return;

      case 'Assignment':
        this.compileAssignment(node);
        return;

      case 'Binary': {
        const opcode = BINARY_OPCODES.get(node.op);
        if (opcode === undefined) {
          this.error('PEB-C001', { operator: node.op }, location);
          return;
        }
        this.compileExpression(node.left);
        this.compileExpression(node.right);
        this.emit(opcode, 0, location);
        return;
      }

      case 'Unary': {
        const opcode = UNARY_OPCODES.get(node.op);
        if (opcode === undefined) {
          this.error('PEB-C001', { operator: node.op }, location);
          return;
        }
        this.compileExpression(node.operand);
        this.emit(opcode, 0, location);
        return;
      }

      case 'IfElse':
        this.compileIfElse(node);
        return;

      case 'Call':
        this.compileExpression(node.callee);
        for (const arg of node.args) {
          this.compileExpression(arg);
        }
        this.emit(OpCode.CALL, node.args.length, location);
        return;

      case 'Index':
        this.compileExpression(node.object);
        this.compileExpression(node.index);
        this.emit(OpCode.INDEX, 0, location);
        return;
    }
  }

  private compileAssignment(node: AssignmentNode): void {
    const location = node.span.start;
    const { target } = node;

    if (target.type === 'Identifier') {
      const known = this.resolve(target.name);
      if (known && !known.mutable) {
        this.error('PEB-C004', { name: target.name }, location);
        return;
      }
      this.compileExpression(node.value);
      this.emit(OpCode.STORE_VAR, this.nameIndex(target.name), location);
      return;
    }

    this.compileExpression(target.object);
    this.compileExpression(target.index);
    this.compileExpression(node.value);
    this.emit(OpCode.STORE_INDEX, 0, location);
  }

  /** Always leaves one value: the taken branch's, or nil without an else */
  private compileIfElse(node: IfElseNode): void {
    const location = node.span.start;
    const chunk = this.currentChunk();

    this.compileExpression(node.condition);
    const elseJump = this.emit(OpCode.JUMP_IF_FALSE, 0, location);
    this.compileBlock(node.thenBranch, SCOPE_KIND.BLOCK, true);
    const endJump = this.emit(OpCode.JUMP, 0, location);

    chunk.patchJump(elseJump, chunk.size);
    if (node.elseBranch === null) {
      this.emit(OpCode.LOAD_NULL, 0, location);
    } else if (node.elseBranch.type === 'IfElse') {
      this.compileIfElse(node.elseBranch);
    } else {
      this.compileBlock(node.elseBranch, SCOPE_KIND.BLOCK, true);
    }
    chunk.patchJump(endJump, chunk.size);
  }

  // ============================================================
  // EMISSION
  // ============================================================

  private beginUnit(name: string): CompileUnit {
    const unit: CompileUnit = { chunk: new Chunk(name), nameIndices: new Map() };
    this.units.push(unit);
    return unit;
  }

  private currentUnit(): CompileUnit {
    const unit = this.units[this.units.length - 1];
    if (!unit) throw new Error('No chunk is being compiled');
    return unit;
  }

  private currentChunk(): Chunk {
    return this.currentUnit().chunk;
  }

  private emit(opcode: OpCode, operand: number, location: SourceLocation): number {
    return this.currentChunk().addInstruction(opcode, operand, location);
  }

  private emitConstant(value: Value, location: SourceLocation): void {
    const index = this.currentChunk().addConstant(value);
    this.emit(OpCode.LOAD_CONST, index, location);
  }

  private emitString(text: string, location: SourceLocation): void {
    const str = this.heap.allocate(StringObject, text);
    this.emitConstant(str.ref, location);
  }

  /** Variable-name index, one per distinct name per chunk */
  private nameIndex(name: string): number {
    const unit = this.currentUnit();
    const cached = unit.nameIndices.get(name);
    if (cached !== undefined) return cached;
    const index = unit.chunk.addVariableName(name);
    unit.nameIndices.set(name, index);
    return index;
  }

  // ============================================================
  // SCOPE TRACKING
  // ============================================================

  private pushScope(kind: ScopeKind): void {
    this.scopes.push({ kind, names: new Map(), counter: 0 });
  }

  private popScope(): void {
    this.scopes.pop();
  }

  private declare(name: string, mutable: boolean): void {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) return;
    scope.names.set(name, { slot: scope.counter++, mutable });
  }

  /**
   * Look a name up the way the VM will: through the enclosing scopes of
   * the current function, then the global scope.
   */
  private resolve(name: string): NameInfo | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const scope = this.scopes[i];
      if (!scope) continue;
      const info = scope.names.get(name);
      if (info) return info;
      if (scope.kind === SCOPE_KIND.FUNCTION) {
        return this.scopes[0]?.names.get(name);
      }
    }
    return undefined;
  }

  private atGlobalScope(): boolean {
    const scope = this.scopes[this.scopes.length - 1];
    return scope?.kind === SCOPE_KIND.GLOBAL;
  }

  private insideFunction(): boolean {
    return this.scopes.some((scope) => scope.kind === SCOPE_KIND.FUNCTION);
  }

  // ============================================================
  // DIAGNOSTICS
  // ============================================================

  private error(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ): void {
    const error = createError(errorId, context, location);
    if (!(error instanceof CompileError)) {
      throw new TypeError(`Not a compile error ID: ${errorId}`);
    }
    this.hadError = true;
    this.errors.push(error);
    this.onError?.(error);
  }
}
