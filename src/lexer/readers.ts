/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = currentLocation(state);
  const escaped = advance(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    case '"':
      return '"';
    default:
      throw new LexerError(
        'PEB-L003',
        `Invalid escape sequence: \\${escaped}`,
        location,
        { char: escaped }
      );
  }
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw new LexerError('PEB-L001', 'Unterminated string literal', start);
    }
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * Read INTEGER (`42`) or FLOAT (`3.14`, `.5`).
 * A dot only belongs to the number when a digit follows it.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (isDigit(peek(state))) {
    value += advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state); // consume .
    while (isDigit(peek(state))) {
      value += advance(state);
    }
    return makeToken(TOKEN_TYPES.FLOAT, value, start, currentLocation(state));
  }

  return makeToken(TOKEN_TYPES.INTEGER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = KEYWORDS.get(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
