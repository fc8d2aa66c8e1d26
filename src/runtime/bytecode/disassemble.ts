/**
 * Disassembler
 * Human-readable listing of a chunk and every function chunk it contains.
 */

import type { Heap } from '../core/heap.js';
import { FunctionObject } from '../core/objects.js';
import { stringify } from '../core/stringify.js';
import type { Chunk, Instruction } from './chunk.js';
import {
  CONSTANT_OPERAND,
  HAS_OPERAND,
  VARIABLE_OPERAND,
  opcodeName,
} from './opcodes.js';

function describeOperand(
  chunk: Chunk,
  heap: Heap,
  instruction: Instruction
): string {
  const { opcode, operand } = instruction;
  if (CONSTANT_OPERAND.has(opcode)) {
    const constant = chunk.constants[operand];
    return constant === undefined
      ? `${operand} (?)`
      : `${operand} (${stringify(heap, constant)})`;
  }
  if (VARIABLE_OPERAND.has(opcode)) {
    return `${operand} (${chunk.variableNames[operand] ?? '?'})`;
  }
  return String(operand);
}

/**
 * Render a chunk as one line per instruction:
 *
 * ```
 * === <script> ===
 * 0000  LOAD_CONST 0 (1)
 * 0001  RETURN
 * ```
 */
export function disassembleChunk(
  chunk: Chunk,
  heap: Heap,
  name: string = chunk.name
): string {
  const lines = [`=== ${name} ===`];

  chunk.code.forEach((instruction, index) => {
    const offset = String(index).padStart(4, '0');
    const mnemonic = opcodeName(instruction.opcode);
    lines.push(
      HAS_OPERAND.has(instruction.opcode)
        ? `${offset}  ${mnemonic} ${describeOperand(chunk, heap, instruction)}`
        : `${offset}  ${mnemonic}`
    );
  });

  for (const constant of chunk.constants) {
    const fn = heap.getAs(constant, FunctionObject);
    if (fn && fn.body.kind === 'chunk') {
      lines.push('', disassembleChunk(fn.body.chunk, heap, fn.name));
    }
  }

  return lines.join('\n');
}
