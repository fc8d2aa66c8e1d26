/**
 * Parser Extension: Program and Statements
 */

import { Parser } from './parser.js';
import type {
  ExpressionStatementNode,
  ProgramNode,
  ReturnStatementNode,
  StatementNode,
  VariableStatementNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  match,
  peek,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseStatement(): StatementNode;
    parseVariableStatement(): VariableStatementNode;
    parseReturnStatement(): ReturnStatementNode;
    parseExpressionStatement(): ExpressionStatementNode;
    startsDictLiteral(): boolean;
  }
}

// ============================================================
// PROGRAM
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    statements.push(this.parseStatement());
  }

  return {
    type: 'Program',
    statements,
    span: { start, end: current(this.state).span.end },
  };
};

// ============================================================
// STATEMENTS
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  switch (current(this.state).type) {
    case TOKEN_TYPES.LET:
    case TOKEN_TYPES.VAR:
      return this.parseVariableStatement();
    case TOKEN_TYPES.FUNC:
      return this.parseFunctionStatement();
    case TOKEN_TYPES.RETURN:
      return this.parseReturnStatement();
    case TOKEN_TYPES.WHILE:
      return this.parseWhileLoop();
    case TOKEN_TYPES.FOR:
      return this.parseForLoop();
    case TOKEN_TYPES.LBRACE:
      if (this.startsDictLiteral()) {
        return this.parseExpressionStatement();
      }
      return this.parseBlock();
    default:
      return this.parseExpressionStatement();
  }
};

/**
 * At `{`: a dict literal starts with `"key":`, or is `{}` used as an
 * expression statement (`{};`). Anything else opens a block.
 */
Parser.prototype.startsDictLiteral = function (this: Parser): boolean {
  const next = peek(this.state, 1);
  if (next.type === TOKEN_TYPES.STRING) {
    return peek(this.state, 2).type === TOKEN_TYPES.COLON;
  }
  return (
    next.type === TOKEN_TYPES.RBRACE &&
    peek(this.state, 2).type === TOKEN_TYPES.SEMICOLON
  );
};

Parser.prototype.parseVariableStatement = function (
  this: Parser
): VariableStatementNode {
  const keyword = advance(this.state);
  const name = expect(
    this.state,
    TOKEN_TYPES.IDENTIFIER,
    `variable name after '${keyword.value}'`
  );
  expect(this.state, TOKEN_TYPES.ASSIGN, "'=' after variable name");
  const value = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after variable declaration");

  return {
    type: 'VariableStatement',
    name: name.value,
    mutable: keyword.type === TOKEN_TYPES.VAR,
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};

Parser.prototype.parseReturnStatement = function (
  this: Parser
): ReturnStatementNode {
  const keyword = advance(this.state);
  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after return value");

  return {
    type: 'ReturnStatement',
    value,
    span: spanFrom(this.state, keyword.span.start),
  };
};

/**
 * expression ';'
 * The semicolon is optional after an if-expression, which ends in '}'.
 */
Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();

  if (!match(this.state, TOKEN_TYPES.SEMICOLON) && expression.type !== 'IfElse') {
    expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");
  }

  return {
    type: 'ExpressionStatement',
    expression,
    span: spanFrom(this.state, start),
  };
};
