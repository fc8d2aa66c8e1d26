/**
 * Bytecode Chunk
 *
 * Append-only instruction stream with a constant pool and a
 * variable-name table. Constants and names are never deduplicated by the
 * chunk itself.
 */

import type { SourceLocation } from '../../types.js';
import type { Heap } from '../core/heap.js';
import type { Value } from '../core/value.js';
import type { OpCode } from './opcodes.js';

export interface Instruction {
  readonly opcode: OpCode;
  /** Mutable so forward jumps can be patched */
  operand: number;
}

export class Chunk {
  readonly code: Instruction[] = [];
  readonly constants: Value[] = [];
  readonly variableNames: string[] = [];
  /** Source location per instruction, parallel to `code` */
  readonly locations: (SourceLocation | undefined)[] = [];
  private unroot: (() => void) | undefined;

  constructor(public readonly name = '<script>') {}

  /** Append an instruction and return its index */
  addInstruction(opcode: OpCode, operand = 0, location?: SourceLocation): number {
    this.code.push({ opcode, operand });
    this.locations.push(location);
    return this.code.length - 1;
  }

  addConstant(value: Value): number {
    this.constants.push(value);
    return this.constants.length - 1;
  }

  addVariableName(name: string): number {
    this.variableNames.push(name);
    return this.variableNames.length - 1;
  }

  /** Overwrite the operand of an emitted jump */
  patchJump(index: number, target: number): void {
    const instruction = this.code[index];
    if (!instruction) {
      throw new RangeError(`No instruction at index ${index}`);
    }
    instruction.operand = target;
  }

  /** Index the next emitted instruction will get */
  get size(): number {
    return this.code.length;
  }

  locationAt(index: number): SourceLocation | undefined {
    return this.locations[index];
  }

  /** Root the constant pool in `heap` until release() */
  retain(heap: Heap): void {
    if (this.unroot) return;
    this.unroot = heap.addRootTracer((tracer) => tracer.markValues(this.constants));
  }

  /** Stop rooting the constant pool; constants still referenced elsewhere survive */
  release(): void {
    this.unroot?.();
    this.unroot = undefined;
  }

  get retained(): boolean {
    return this.unroot !== undefined;
  }
}
