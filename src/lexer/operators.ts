/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
};

/** Keyword lookup table (a Map, so names like "constructor" stay identifiers) */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['and', TOKEN_TYPES.AND],
  ['or', TOKEN_TYPES.OR],
  ['if', TOKEN_TYPES.IF],
  ['else', TOKEN_TYPES.ELSE],
  ['true', TOKEN_TYPES.TRUE],
  ['false', TOKEN_TYPES.FALSE],
  ['for', TOKEN_TYPES.FOR],
  ['in', TOKEN_TYPES.IN],
  ['while', TOKEN_TYPES.WHILE],
  ['func', TOKEN_TYPES.FUNC],
  ['return', TOKEN_TYPES.RETURN],
  ['let', TOKEN_TYPES.LET],
  ['var', TOKEN_TYPES.VAR],
  ['nil', TOKEN_TYPES.NIL],
]);
