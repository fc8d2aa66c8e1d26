/**
 * Pebble Bytecode Tests: Chunk and Opcodes
 */

import { describe, expect, it } from 'vitest';
import { Chunk, makeInt32, OpCode, opcodeName } from '../../src/index.js';

describe('Pebble Chunk', () => {
  it('appends instructions and returns their indices', () => {
    const chunk = new Chunk();
    const location = { line: 2, column: 5, offset: 9 };

    expect(chunk.addInstruction(OpCode.LOAD_TRUE)).toBe(0);
    expect(chunk.addInstruction(OpCode.JUMP, 7, location)).toBe(1);
    expect(chunk.size).toBe(2);
    expect(chunk.code).toEqual([
      { opcode: OpCode.LOAD_TRUE, operand: 0 },
      { opcode: OpCode.JUMP, operand: 7 },
    ]);
    expect(chunk.locationAt(0)).toBeUndefined();
    expect(chunk.locationAt(1)).toEqual(location);
  });

  it('keeps constants and names without deduplicating', () => {
    const chunk = new Chunk('f');
    expect(chunk.name).toBe('f');
    expect(chunk.addConstant(makeInt32(1))).toBe(0);
    expect(chunk.addConstant(makeInt32(1))).toBe(1);
    expect(chunk.addVariableName('x')).toBe(0);
    expect(chunk.addVariableName('x')).toBe(1);
    expect(chunk.constants).toHaveLength(2);
  });

  it('patches a jump operand', () => {
    const chunk = new Chunk();
    const jump = chunk.addInstruction(OpCode.JUMP_IF_FALSE, 0);
    chunk.addInstruction(OpCode.LOAD_NULL);
    chunk.patchJump(jump, chunk.size);
    expect(chunk.code[jump]?.operand).toBe(2);
  });

  it('rejects patching a missing instruction', () => {
    expect(() => new Chunk().patchJump(3, 0)).toThrow('No instruction at index 3');
  });
});

describe('Pebble Opcodes', () => {
  it('numbers opcodes densely from zero', () => {
    const codes = Object.values(OpCode);
    expect(codes).toEqual(codes.map((_, i) => i));
    expect(OpCode.HALT).toBe(35);
  });

  it('names opcodes', () => {
    expect(opcodeName(OpCode.LOAD_CONST)).toBe('LOAD_CONST');
    expect(opcodeName(OpCode.STORE_INDEX)).toBe('STORE_INDEX');
    expect(opcodeName(99)).toBe('UNKNOWN(99)');
  });
});
