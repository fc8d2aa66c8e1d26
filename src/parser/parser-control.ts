/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops and function declarations
 */

import { Parser } from './parser.js';
import type {
  BlockStatementNode,
  ExpressionNode,
  ForLoopNode,
  FunctionStatementNode,
  IfElseNode,
  StatementNode,
  WhileLoopNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  match,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockStatementNode;
    parseIfElse(): IfElseNode;
    parseWhileLoop(): WhileLoopNode;
    parseForLoop(): ForLoopNode;
    parseFunctionStatement(): FunctionStatementNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

const STATEMENT_KEYWORDS = [
  TOKEN_TYPES.LET,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FUNC,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.FOR,
] as const;

/**
 * '{' statement* expression? '}'
 * A final expression with no semicolon becomes the block's tail value.
 */
Parser.prototype.parseBlock = function (this: Parser): BlockStatementNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "'{'");
  const statements: StatementNode[] = [];
  let tail: ExpressionNode | null = null;

  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    if (
      check(this.state, ...STATEMENT_KEYWORDS) ||
      (check(this.state, TOKEN_TYPES.LBRACE) && !this.startsDictLiteral())
    ) {
      statements.push(this.parseStatement());
      continue;
    }

    const start = current(this.state).span.start;
    const expression = this.parseExpression();

    const terminated = match(this.state, TOKEN_TYPES.SEMICOLON);
    const atClose = check(this.state, TOKEN_TYPES.RBRACE);

    if (!terminated && atClose) {
      tail = expression;
      break;
    }
    if (!terminated && expression.type !== 'IfElse') {
      expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");
    }
    statements.push({
      type: 'ExpressionStatement',
      expression,
      span: spanFrom(this.state, start),
    });
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' to close block");

  return {
    type: 'BlockStatement',
    statements,
    tail,
    span: spanFrom(this.state, open.span.start),
  };
};

// ============================================================
// CONDITIONALS
// ============================================================

/** 'if' condition block ('else' (ifElse | block))? */
Parser.prototype.parseIfElse = function (this: Parser): IfElseNode {
  const keyword = expect(this.state, TOKEN_TYPES.IF, "'if'");
  const condition = this.parseExpression();
  const thenBranch = this.parseBlock();

  let elseBranch: BlockStatementNode | IfElseNode | null = null;
  if (match(this.state, TOKEN_TYPES.ELSE)) {
    elseBranch = check(this.state, TOKEN_TYPES.IF)
      ? this.parseIfElse()
      : this.parseBlock();
  }

  return {
    type: 'IfElse',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, keyword.span.start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhileLoop = function (this: Parser): WhileLoopNode {
  const keyword = advance(this.state);
  const condition = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'WhileLoop',
    condition,
    body,
    span: spanFrom(this.state, keyword.span.start),
  };
};

/** 'for' IDENT 'in' expression block */
Parser.prototype.parseForLoop = function (this: Parser): ForLoopNode {
  const keyword = advance(this.state);
  const variable = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'loop variable');
  expect(this.state, TOKEN_TYPES.IN, "'in' after loop variable");
  const iterable = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'ForLoop',
    variable: variable.value,
    iterable,
    body,
    span: spanFrom(this.state, keyword.span.start),
  };
};

// ============================================================
// FUNCTIONS
// ============================================================

/** 'func' IDENT '(' params ')' block */
Parser.prototype.parseFunctionStatement = function (
  this: Parser
): FunctionStatementNode {
  const keyword = advance(this.state);
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name');
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after function name");

  const params: string[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      params.push(
        expect(this.state, TOKEN_TYPES.IDENTIFIER, 'parameter name').value
      );
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after parameters");

  const body = this.parseBlock();

  return {
    type: 'FunctionStatement',
    name: name.value,
    params,
    body,
    span: spanFrom(this.state, keyword.span.start),
  };
};
