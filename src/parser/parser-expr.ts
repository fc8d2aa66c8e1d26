/**
 * Parser Extension: Expression Parsing
 * Precedence chain from assignment down to postfix calls and indexing
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  SourceLocation,
  TokenType,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseConditionalLevel(): ExpressionNode;
    parseBinaryLevel(level: number): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLE
// ============================================================

/** Binary precedence levels, loosest first */
const BINARY_LEVELS: ReadonlyArray<Partial<Record<TokenType, BinaryOp>>> = [
  { [TOKEN_TYPES.OR]: 'or' },
  { [TOKEN_TYPES.AND]: 'and' },
  { [TOKEN_TYPES.EQ]: '==', [TOKEN_TYPES.NE]: '!=' },
  {
    [TOKEN_TYPES.LT]: '<',
    [TOKEN_TYPES.GT]: '>',
    [TOKEN_TYPES.LE]: '<=',
    [TOKEN_TYPES.GE]: '>=',
  },
  { [TOKEN_TYPES.PLUS]: '+', [TOKEN_TYPES.MINUS]: '-' },
  { [TOKEN_TYPES.STAR]: '*', [TOKEN_TYPES.SLASH]: '/' },
];

// ============================================================
// ASSIGNMENT AND CONDITIONALS
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

/** Right-associative: a = b = 1 */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const target = this.parseConditionalLevel();

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) {
    return target;
  }

  const equals = advance(this.state);
  if (target.type !== 'Identifier' && target.type !== 'Index') {
    throw new ParseError(
      'PEB-P003',
      'Invalid assignment target',
      equals.span.start
    );
  }

  const value = this.parseAssignment();
  return {
    type: 'Assignment',
    target,
    value,
    span: spanFrom(this.state, target.span.start),
  };
};

Parser.prototype.parseConditionalLevel = function (
  this: Parser
): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.IF)) {
    return this.parseIfElse();
  }
  return this.parseBinaryLevel(0);
};

// ============================================================
// BINARY OPERATORS
// ============================================================

Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  level: number
): ExpressionNode {
  const operators = BINARY_LEVELS[level];
  if (!operators) {
    return this.parseUnary();
  }

  let left = this.parseBinaryLevel(level + 1);

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) break;
    advance(this.state);
    const right = this.parseBinaryLevel(level + 1);
    left = {
      type: 'Binary',
      op,
      left,
      right,
      span: spanFrom(this.state, left.span.start),
    };
  }

  return left;
};

// ============================================================
// UNARY AND POSTFIX
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.MINUS)) {
    const operator = advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'Unary',
      op: operator.type === TOKEN_TYPES.BANG ? '!' : '-',
      operand,
      span: spanFrom(this.state, operator.span.start),
    };
  }
  return this.parsePostfix();
};

/** primary ( '(' args ')' | '[' index ']' )* */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();
  const start: SourceLocation = expr.span.start;

  for (;;) {
    if (match(this.state, TOKEN_TYPES.LPAREN)) {
      const args: ExpressionNode[] = [];
      if (!check(this.state, TOKEN_TYPES.RPAREN)) {
        do {
          args.push(this.parseExpression());
        } while (match(this.state, TOKEN_TYPES.COMMA));
      }
      expect(this.state, TOKEN_TYPES.RPAREN, "')' after arguments");
      expr = {
        type: 'Call',
        callee: expr,
        args,
        span: spanFrom(this.state, start),
      };
    } else if (match(this.state, TOKEN_TYPES.LBRACKET)) {
      const index = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "']' after index");
      expr = {
        type: 'Index',
        object: expr,
        index,
        span: spanFrom(this.state, start),
      };
    } else {
      return expr;
    }
  }
};
