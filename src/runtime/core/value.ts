/**
 * NaN-boxed Values
 *
 * A Value is a 64-bit pattern. Patterns outside the boxed quiet-NaN space
 * are IEEE-754 doubles. Boxed patterns carry a 3-bit tag at bit 48 and a
 * 48-bit payload (int32, bool, or a heap handle).
 *
 * ```
 *  63  62..52     51  50..48   47..0
 *  s   exponent   q   tag      payload
 *  0   all ones   1   1..5     ...
 * ```
 */

export type Value = bigint;

// ============================================================
// BIT LAYOUT
// ============================================================

const EXP_MASK = 0x7ff0000000000000n;
const QNAN_BIT = 0x0008000000000000n;
const BOXED_BASE = EXP_MASK | QNAN_BIT;
/** Sign, exponent and quiet bit: must equal BOXED_BASE for a boxed value */
const BOX_PREFIX_MASK = 0xfff8000000000000n;
const TAG_MASK = 0x0007000000000000n;
const TAG_SHIFT = 48n;
const PAYLOAD_MASK = 0x0000ffffffffffffn;
const INT32_MASK = 0xffffffffn;
const CANONICAL_NAN = 0x7ff8000000000000n;

export const TAG = {
  DOUBLE: 0,
  GC_PTR: 1,
  INT32: 2,
  BOOL: 3,
  NIL: 4,
  UNDEFINED: 5,
} as const;

export type Tag = (typeof TAG)[keyof typeof TAG];

function box(tag: Tag, payload: bigint): Value {
  return BOXED_BASE | (BigInt(tag) << TAG_SHIFT) | (payload & PAYLOAD_MASK);
}

function tagBits(value: Value): bigint {
  return (value & TAG_MASK) >> TAG_SHIFT;
}

// Scratch buffer for moving doubles in and out of bit patterns
const scratch = new DataView(new ArrayBuffer(8));

// ============================================================
// CONSTRUCTORS
// ============================================================

export const NIL: Value = box(TAG.NIL, 0n);
export const UNDEFINED: Value = box(TAG.UNDEFINED, 0n);
export const TRUE: Value = box(TAG.BOOL, 1n);
export const FALSE: Value = box(TAG.BOOL, 0n);

/** Every NaN collapses to one canonical (tag 0) pattern */
export function makeDouble(n: number): Value {
  if (Number.isNaN(n)) return CANONICAL_NAN;
  scratch.setFloat64(0, n);
  return scratch.getBigUint64(0);
}

export function makeInt32(n: number): Value {
  if (!Number.isInteger(n) || n < -0x80000000 || n > 0x7fffffff) {
    throw new RangeError(`Not an int32: ${n}`);
  }
  return box(TAG.INT32, BigInt.asUintN(32, BigInt(n)));
}

export function makeBool(b: boolean): Value {
  return b ? TRUE : FALSE;
}

export function makeNull(): Value {
  return NIL;
}

export function makeUndefined(): Value {
  return UNDEFINED;
}

/** Wrap a heap handle (slot and generation packed by the heap) */
export function makeGcPtr(handle: bigint): Value {
  if (handle < 0n || handle > PAYLOAD_MASK) {
    throw new RangeError(`Heap handle out of range: ${handle}`);
  }
  return box(TAG.GC_PTR, handle);
}

// ============================================================
// INSPECTION
// ============================================================

/** Tags 0, 6 and 7 in the boxed space are plain NaN doubles */
export function isBoxed(value: Value): boolean {
  if ((value & BOX_PREFIX_MASK) !== BOXED_BASE) return false;
  const tag = tagBits(value);
  return tag >= 1n && tag <= 5n;
}

export function isDouble(value: Value): boolean {
  return !isBoxed(value);
}

export function tagOf(value: Value): Tag {
  if (!isBoxed(value)) return TAG.DOUBLE;
  switch (Number(tagBits(value))) {
    case TAG.GC_PTR:
      return TAG.GC_PTR;
    case TAG.INT32:
      return TAG.INT32;
    case TAG.BOOL:
      return TAG.BOOL;
    case TAG.NIL:
      return TAG.NIL;
    case TAG.UNDEFINED:
      return TAG.UNDEFINED;
    default:
      return TAG.DOUBLE;
  }
}

export function isInt32(value: Value): boolean {
  return tagOf(value) === TAG.INT32;
}

export function isBool(value: Value): boolean {
  return tagOf(value) === TAG.BOOL;
}

export function isNull(value: Value): boolean {
  return value === NIL;
}

export function isUndefined(value: Value): boolean {
  return value === UNDEFINED;
}

export function isGcPtr(value: Value): boolean {
  return tagOf(value) === TAG.GC_PTR;
}

/** int32 or double */
export function isNumber(value: Value): boolean {
  return isInt32(value) || isDouble(value);
}

// ============================================================
// EXTRACTION
// ============================================================

function violation(expected: string, value: Value): TypeError {
  return new TypeError(
    `Value 0x${value.toString(16).padStart(16, '0')} is not ${expected}`
  );
}

export function asDouble(value: Value): number {
  if (!isDouble(value)) throw violation('a double', value);
  scratch.setBigUint64(0, value);
  return scratch.getFloat64(0);
}

export function asInt32(value: Value): number {
  if (!isInt32(value)) throw violation('an int32', value);
  return Number(BigInt.asIntN(32, value & INT32_MASK));
}

export function asBool(value: Value): boolean {
  if (!isBool(value)) throw violation('a bool', value);
  return (value & PAYLOAD_MASK) !== 0n;
}

/** Raw heap handle; resolve it through the Heap */
export function asGcPtr(value: Value): bigint {
  if (!isGcPtr(value)) throw violation('a heap reference', value);
  return value & PAYLOAD_MASK;
}

/** Numeric value of an int32 or double */
export function asNumber(value: Value): number {
  return isInt32(value) ? asInt32(value) : asDouble(value);
}

// ============================================================
// NUMERIC HELPERS
// ============================================================

export function fitsInt32(n: number): boolean {
  return Number.isInteger(n) && n >= -0x80000000 && n <= 0x7fffffff;
}

/**
 * Result of an int32 op int32 operation: int32 when exact, double when the
 * result leaves the int32 range.
 */
export function makeIntegerResult(n: number): Value {
  return fitsInt32(n) ? makeInt32(n) : makeDouble(n);
}
