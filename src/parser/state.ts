/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the token if it matches; report whether it did */
export function match(state: ParserState, type: TokenType): boolean {
  if (!check(state, type)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const message = `Expected ${expected}`;
  throw new ParseError(
    'PEB-P002',
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, found: describeToken(token) }
  );
}

/** Quote a token for error messages */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'end of input';
  if (token.type === TOKEN_TYPES.STRING) return `"${token.value}"`;
  return `'${token.value}'`;
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actual: Token): string | null {
  if (actual.type === TOKEN_TYPES.EOF) {
    if (expectedType === TOKEN_TYPES.RPAREN) {
      return 'Hint: Check for unclosed parenthesis';
    }
    if (expectedType === TOKEN_TYPES.RBRACE) {
      return 'Hint: Check for unclosed brace';
    }
    if (expectedType === TOKEN_TYPES.RBRACKET) {
      return 'Hint: Check for unclosed bracket';
    }
  }

  if (actual.type === TOKEN_TYPES.IDENTIFIER) {
    const typoHints: Record<string, string> = {
      fucn: 'func',
      fun: 'func',
      function: 'func',
      retrun: 'return',
      retrn: 'return',
      whiel: 'while',
      esle: 'else',
      elif: 'else if',
      null: 'nil',
      const: 'let',
    };
    const suggestion = typoHints[actual.value];
    if (suggestion !== undefined && Object.hasOwn(typoHints, actual.value)) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from `start` to the end of the most recently consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const previous = state.tokens[state.pos - 1];
  return makeSpan(start, previous ? previous.span.end : start);
}
