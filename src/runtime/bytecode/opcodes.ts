/**
 * Opcodes
 *
 * Every instruction is an opcode plus one operand. The operand is a
 * constant index, variable-name index, absolute jump target or count;
 * opcodes that need none carry 0.
 */

export const OpCode = {
  // Loads
  LOAD_CONST: 0,
  LOAD_NULL: 1,
  LOAD_TRUE: 2,
  LOAD_FALSE: 3,

  // Variables (operand: variable-name index)
  LOAD_VAR: 4,
  STORE_VAR: 5,
  DEFINE_VAR: 6,
  DEFINE_LET: 7,

  // Arithmetic
  ADD: 8,
  SUBTRACT: 9,
  MULTIPLY: 10,
  DIVIDE: 11,
  NEGATE: 12,

  // Comparison
  EQUAL: 13,
  NOT_EQUAL: 14,
  LESS: 15,
  GREATER: 16,
  LESS_EQUAL: 17,
  GREATER_EQUAL: 18,

  // Logic
  NOT: 19,
  AND: 20,
  OR: 21,

  // Control flow (operand: absolute instruction index)
  JUMP: 22,
  JUMP_IF_FALSE: 23,
  JUMP_IF_TRUE: 24,

  // Calls (CALL operand: argument count)
  CALL: 25,
  RETURN: 26,

  // Collections (operand: element or pair count)
  BUILD_ARRAY: 27,
  BUILD_DICT: 28,
  INDEX: 29,
  STORE_INDEX: 30,

  // Stack and scope
  POP: 31,
  DUP: 32,
  PUSH_ENV: 33,
  POP_ENV: 34,

  HALT: 35,
} as const;

export type OpCode = (typeof OpCode)[keyof typeof OpCode];

const OPCODE_NAMES = new Map<number, string>(
  Object.entries(OpCode).map(([name, code]) => [code, name])
);

/** Mnemonic for an opcode, or `UNKNOWN(n)` */
export function opcodeName(opcode: number): string {
  return OPCODE_NAMES.get(opcode) ?? `UNKNOWN(${opcode})`;
}

/** Opcodes whose operand indexes the constant pool */
export const CONSTANT_OPERAND: ReadonlySet<OpCode> = new Set<OpCode>([
  OpCode.LOAD_CONST,
]);

/** Opcodes whose operand indexes the variable-name table */
export const VARIABLE_OPERAND: ReadonlySet<OpCode> = new Set<OpCode>([
  OpCode.LOAD_VAR,
  OpCode.STORE_VAR,
  OpCode.DEFINE_VAR,
  OpCode.DEFINE_LET,
]);

/** Opcodes that carry a meaningful operand at all */
export const HAS_OPERAND: ReadonlySet<OpCode> = new Set<OpCode>([
  ...CONSTANT_OPERAND,
  ...VARIABLE_OPERAND,
  OpCode.JUMP,
  OpCode.JUMP_IF_FALSE,
  OpCode.JUMP_IF_TRUE,
  OpCode.CALL,
  OpCode.BUILD_ARRAY,
  OpCode.BUILD_DICT,
]);
