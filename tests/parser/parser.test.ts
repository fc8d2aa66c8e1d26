/**
 * Pebble Parser Tests
 * Statements, precedence, postfix chains and syntax errors
 */

import { describe, expect, it } from 'vitest';
import { parse, ParseError } from '../../src/index.js';
import type { StatementNode } from '../../src/index.js';

function first(source: string): StatementNode | undefined {
  return parse(source).statements[0];
}

function parseFailure(source: string): ParseError {
  try {
    parse(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`Expected ${source} to fail`);
}

describe('Pebble Parser', () => {
  describe('statements', () => {
    it('parses let and var declarations', () => {
      expect(first('let x = 1;')).toMatchObject({
        type: 'VariableStatement',
        name: 'x',
        mutable: false,
        value: { type: 'IntegerLiteral', value: 1, raw: '1' },
      });
      expect(first('var y = nil;')).toMatchObject({
        type: 'VariableStatement',
        name: 'y',
        mutable: true,
        value: { type: 'NilLiteral' },
      });
    });

    it('records statement spans', () => {
      expect(first('let x = 1;')?.span).toEqual({
        start: { line: 1, column: 1, offset: 0 },
        end: { line: 1, column: 11, offset: 10 },
      });
    });

    it('parses a function declaration', () => {
      expect(first('func add(a, b) { a + b }')).toMatchObject({
        type: 'FunctionStatement',
        name: 'add',
        params: ['a', 'b'],
        body: {
          type: 'BlockStatement',
          statements: [],
          tail: { type: 'Binary', op: '+' },
        },
      });
    });

    it('parses return with and without a value', () => {
      const fn = first('func f() { return; return 1; }');
      expect(fn).toMatchObject({
        body: {
          statements: [
            { type: 'ReturnStatement', value: null },
            { type: 'ReturnStatement', value: { type: 'IntegerLiteral', value: 1 } },
          ],
          tail: null,
        },
      });
    });

    it('parses while and for loops', () => {
      expect(first('while i < 3 { i = i + 1; }')).toMatchObject({
        type: 'WhileLoop',
        condition: { type: 'Binary', op: '<' },
        body: { statements: [{ type: 'ExpressionStatement' }] },
      });
      expect(first('for x in xs { print(x); }')).toMatchObject({
        type: 'ForLoop',
        variable: 'x',
        iterable: { type: 'Identifier', name: 'xs' },
      });
    });

    it('keeps the last unterminated expression as the block tail', () => {
      expect(first('{ let a = 1; a }')).toMatchObject({
        type: 'BlockStatement',
        statements: [{ type: 'VariableStatement', name: 'a' }],
        tail: { type: 'Identifier', name: 'a' },
      });
    });

    it('tells dict literals from blocks', () => {
      expect(first('{"a": 1};')).toMatchObject({
        type: 'ExpressionStatement',
        expression: { type: 'DictLiteral', entries: [{ key: 'a' }] },
      });
      expect(first('{};')).toMatchObject({
        type: 'ExpressionStatement',
        expression: { type: 'DictLiteral', entries: [] },
      });
      expect(first('{ }')).toMatchObject({
        type: 'BlockStatement',
        statements: [],
        tail: null,
      });
    });

    it('allows an if expression without a semicolon', () => {
      const program = parse('if a { 1 } else if b { 2 } else { 3 } x;');
      expect(program.statements).toHaveLength(2);
      expect(program.statements[0]).toMatchObject({
        type: 'ExpressionStatement',
        expression: {
          type: 'IfElse',
          thenBranch: { tail: { type: 'IntegerLiteral', value: 1 } },
          elseBranch: {
            type: 'IfElse',
            elseBranch: { type: 'BlockStatement', tail: { value: 3 } },
          },
        },
      });
    });
  });

  describe('expressions', () => {
    it('binds multiplication tighter than addition', () => {
      expect(first('1 + 2 * 3;')).toMatchObject({
        expression: {
          type: 'Binary',
          op: '+',
          left: { type: 'IntegerLiteral', value: 1 },
          right: { type: 'Binary', op: '*' },
        },
      });
    });

    it('orders logic below equality and comparison', () => {
      expect(first('a or b and c == d < e;')).toMatchObject({
        expression: {
          op: 'or',
          left: { name: 'a' },
          right: {
            op: 'and',
            left: { name: 'b' },
            right: { op: '==', left: { name: 'c' }, right: { op: '<' } },
          },
        },
      });
    });

    it('is left-associative within a level', () => {
      expect(first('10 - 4 - 2;')).toMatchObject({
        expression: {
          op: '-',
          left: { op: '-', left: { value: 10 }, right: { value: 4 } },
          right: { value: 2 },
        },
      });
    });

    it('is right-associative for assignment', () => {
      expect(first('a = b = 1;')).toMatchObject({
        expression: {
          type: 'Assignment',
          target: { type: 'Identifier', name: 'a' },
          value: {
            type: 'Assignment',
            target: { name: 'b' },
            value: { value: 1 },
          },
        },
      });
    });

    it('accepts an index target for assignment', () => {
      expect(first('xs[0] = 5;')).toMatchObject({
        expression: {
          type: 'Assignment',
          target: { type: 'Index', object: { name: 'xs' } },
        },
      });
    });

    it('nests unary operators', () => {
      expect(first('-!x;')).toMatchObject({
        expression: { type: 'Unary', op: '-', operand: { type: 'Unary', op: '!' } },
      });
    });

    it('chains calls and indexing', () => {
      expect(first('f(1)[0](2, 3);')).toMatchObject({
        expression: {
          type: 'Call',
          args: [{ value: 2 }, { value: 3 }],
          callee: {
            type: 'Index',
            object: { type: 'Call', callee: { name: 'f' }, args: [{ value: 1 }] },
          },
        },
      });
    });

    it('keeps out-of-range integer literals for the compiler to reject', () => {
      expect(first('2147483648;')).toMatchObject({
        expression: { type: 'IntegerLiteral', value: 2147483648, raw: '2147483648' },
      });
    });

    it('parses collection literals', () => {
      expect(first('[1, "two", [3.5]];')).toMatchObject({
        expression: {
          type: 'ArrayLiteral',
          elements: [
            { type: 'IntegerLiteral' },
            { type: 'StringLiteral', value: 'two' },
            { type: 'ArrayLiteral', elements: [{ type: 'FloatLiteral', value: 3.5 }] },
          ],
        },
      });
    });
  });

  describe('errors', () => {
    it('reports an unexpected token', () => {
      const error = parseFailure('let x = 1 +;');
      expect(error.errorId).toBe('PEB-P001');
      expect(error.message).toBe("Unexpected token: ';' at 1:12");
    });

    it('reports a missing semicolon', () => {
      const error = parseFailure('let x = 1');
      expect(error.errorId).toBe('PEB-P002');
      expect(error.message).toBe("Expected ';' after variable declaration at 1:10");
      expect(error.context).toEqual({
        expected: "';' after variable declaration",
        found: 'end of input',
      });
    });

    it('hints at an unclosed brace', () => {
      expect(parseFailure('while true { x = 1;').message).toBe(
        "Expected '}' to close block. Hint: Check for unclosed brace at 1:20"
      );
    });

    it('suggests a keyword for a common typo', () => {
      expect(parseFailure('let x = 1 retrun').message).toBe(
        "Expected ';' after variable declaration. Hint: Did you mean 'return'? at 1:11"
      );
    });

    it('rejects an invalid assignment target', () => {
      const error = parseFailure('1 = 2;');
      expect(error.errorId).toBe('PEB-P003');
      expect(error.location).toEqual({ line: 1, column: 3, offset: 2 });
    });
  });
});
