/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program and statements
 * - parser-control.ts: Blocks, if/else, loops, function declarations
 * - parser-expr.ts: Precedence chain, calls and indexing
 * - parser-literals.ts: Literals, arrays, dicts, grouping
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Token cursor */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }
}
