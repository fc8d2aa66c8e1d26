/**
 * Pebble AST Types
 * Tokens, source locations and syntax tree nodes shared by the front end,
 * the compiler and the tree-walking interpreter.
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

export {
  PebbleError,
  LexerError,
  ParseError,
  CompileError,
  RuntimeError,
  HeapExhaustedError,
  createError,
  type PebbleErrorData,
} from './error-classes.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  getHelpUrl,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

// ============================================================
// TOKENS
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  IDENTIFIER: 'IDENTIFIER',

  // Keywords
  AND: 'AND',
  OR: 'OR',
  IF: 'IF',
  ELSE: 'ELSE',
  TRUE: 'TRUE',
  FALSE: 'FALSE',
  FOR: 'FOR',
  IN: 'IN',
  WHILE: 'WHILE',
  FUNC: 'FUNC',
  RETURN: 'RETURN',
  LET: 'LET',
  VAR: 'VAR',
  NIL: 'NIL',

  // Punctuation
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  COMMA: 'COMMA', // ,
  DOT: 'DOT', // .
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;

  // Operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  BANG: 'BANG', // !
  NE: 'NE', // !=
  ASSIGN: 'ASSIGN', // =
  EQ: 'EQ', // ==
  LT: 'LT', // <
  GT: 'GT', // >
  LE: 'LE', // <=
  GE: 'GE', // >=

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'VariableStatement'
  | 'FunctionStatement'
  | 'ReturnStatement'
  | 'WhileLoop'
  | 'ForLoop'
  | 'BlockStatement'
  | 'ExpressionStatement'
  | 'Binary'
  | 'Unary'
  | 'Identifier'
  | 'Assignment'
  | 'IfElse'
  | 'Call'
  | 'Index'
  | 'IntegerLiteral'
  | 'FloatLiteral'
  | 'StringLiteral'
  | 'BooleanLiteral'
  | 'NilLiteral'
  | 'ArrayLiteral'
  | 'DictLiteral';

interface BaseNode {
  readonly span: SourceSpan;
}

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

/** let x = 1;  var y = 2; */
export interface VariableStatementNode extends BaseNode {
  readonly type: 'VariableStatement';
  readonly name: string;
  readonly mutable: boolean;
  readonly value: ExpressionNode;
}

/** func name(a, b) { ... } */
export interface FunctionStatementNode extends BaseNode {
  readonly type: 'FunctionStatement';
  readonly name: string;
  readonly params: string[];
  readonly body: BlockStatementNode;
}

export interface ReturnStatementNode extends BaseNode {
  readonly type: 'ReturnStatement';
  readonly value: ExpressionNode | null;
}

export interface WhileLoopNode extends BaseNode {
  readonly type: 'WhileLoop';
  readonly condition: ExpressionNode;
  readonly body: BlockStatementNode;
}

/** for item in items { ... } */
export interface ForLoopNode extends BaseNode {
  readonly type: 'ForLoop';
  readonly variable: string;
  readonly iterable: ExpressionNode;
  readonly body: BlockStatementNode;
}

/**
 * Block: { statements; tail }
 * The tail is a final expression written without a semicolon and is the
 * block's value. A block without a tail evaluates to nil.
 */
export interface BlockStatementNode extends BaseNode {
  readonly type: 'BlockStatement';
  readonly statements: StatementNode[];
  readonly tail: ExpressionNode | null;
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

export type StatementNode =
  | VariableStatementNode
  | FunctionStatementNode
  | ReturnStatementNode
  | WhileLoopNode
  | ForLoopNode
  | BlockStatementNode
  | ExpressionStatementNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | 'and'
  | 'or';

export type UnaryOp = '-' | '!';

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

/** name = value  |  target[index] = value */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: IdentifierNode | IndexNode;
  readonly value: ExpressionNode;
}

/** if cond { ... } else { ... } */
export interface IfElseNode extends BaseNode {
  readonly type: 'IfElse';
  readonly condition: ExpressionNode;
  readonly thenBranch: BlockStatementNode;
  /** Either a block or a chained `else if` */
  readonly elseBranch: BlockStatementNode | IfElseNode | null;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface IndexNode extends BaseNode {
  readonly type: 'Index';
  readonly object: ExpressionNode;
  readonly index: ExpressionNode;
}

export interface IntegerLiteralNode extends BaseNode {
  readonly type: 'IntegerLiteral';
  /** Parsed value; may lie outside the int32 range */
  readonly value: number;
  readonly raw: string;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BooleanLiteralNode extends BaseNode {
  readonly type: 'BooleanLiteral';
  readonly value: boolean;
}

export interface NilLiteralNode extends BaseNode {
  readonly type: 'NilLiteral';
}

export interface ArrayLiteralNode extends BaseNode {
  readonly type: 'ArrayLiteral';
  readonly elements: ExpressionNode[];
}

export interface DictEntryNode {
  readonly key: string;
  readonly value: ExpressionNode;
}

export interface DictLiteralNode extends BaseNode {
  readonly type: 'DictLiteral';
  readonly entries: DictEntryNode[];
}

export type LiteralNode =
  | IntegerLiteralNode
  | FloatLiteralNode
  | StringLiteralNode
  | BooleanLiteralNode
  | NilLiteralNode
  | ArrayLiteralNode
  | DictLiteralNode;

export type ExpressionNode =
  | BinaryNode
  | UnaryNode
  | IdentifierNode
  | AssignmentNode
  | IfElseNode
  | CallNode
  | IndexNode
  | LiteralNode;

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;
