/**
 * Parser Extension: Literal Parsing
 * Primaries: numbers, strings, booleans, nil, identifiers, groups,
 * array and dict literals
 */

import { Parser } from './parser.js';
import type {
  ArrayLiteralNode,
  DictEntryNode,
  DictLiteralNode,
  ExpressionNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  expect,
  match,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseArrayLiteral(): ArrayLiteralNode;
    parseDictLiteral(): DictLiteralNode;
  }
}

// ============================================================
// PRIMARY
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const start = token.span.start;

  switch (token.type) {
    case TOKEN_TYPES.INTEGER:
      advance(this.state);
      return {
        type: 'IntegerLiteral',
        value: Number(token.value),
        raw: token.value,
        span: token.span,
      };

    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      return { type: 'FloatLiteral', value: Number(token.value), span: token.span };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BooleanLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'NilLiteral', span: token.span };

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      const inner = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "')' after expression");
      return { ...inner, span: spanFrom(this.state, start) };
    }

    case TOKEN_TYPES.LBRACKET:
      return this.parseArrayLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseDictLiteral();

    default:
      throw new ParseError(
        'PEB-P001',
        `Unexpected token: ${describeToken(token)}`,
        start,
        { token: describeToken(token) }
      );
  }
};

// ============================================================
// COLLECTIONS
// ============================================================

/** '[' (expression (',' expression)*)? ']' */
Parser.prototype.parseArrayLiteral = function (this: Parser): ArrayLiteralNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACKET, "'['");
  const elements: ExpressionNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    do {
      elements.push(this.parseExpression());
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RBRACKET, "']' to close array");

  return {
    type: 'ArrayLiteral',
    elements,
    span: spanFrom(this.state, open.span.start),
  };
};

/** '{' (STRING ':' expression (',' STRING ':' expression)*)? '}' */
Parser.prototype.parseDictLiteral = function (this: Parser): DictLiteralNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE, "'{'");
  const entries: DictEntryNode[] = [];

  if (!check(this.state, TOKEN_TYPES.RBRACE)) {
    do {
      const key = expect(this.state, TOKEN_TYPES.STRING, 'string key in dict');
      expect(this.state, TOKEN_TYPES.COLON, "':' after dict key");
      entries.push({ key: key.value, value: this.parseExpression() });
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RBRACE, "'}' to close dict");

  return {
    type: 'DictLiteral',
    entries,
    span: spanFrom(this.state, open.span.start),
  };
};
