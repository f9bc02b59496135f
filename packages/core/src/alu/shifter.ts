import { BitVector, requireWidth } from '../bits/bitvec.js';
import type { Bit } from '../bits/bitvec.js';
import { invalidOperationTag, parseTag } from '../exceptions.js';

export const SHIFT_OPS = ['SLL', 'SRL', 'SRA'] as const;
export type ShiftOp = typeof SHIFT_OPS[number];

export function parseShiftOp(name: string): ShiftOp {
  return parseTag('shifter', SHIFT_OPS, name);
}

// Width-agnostic shift; k >= width leaves only fill bits.
export function shiftBits(x: BitVector, k: number, op: ShiftOp): BitVector {
  if (k === 0) return x;
  const w = x.width;
  const n = Math.min(k, w);
  const bits = x.toArray();
  switch (op) {
    case 'SLL':
      return BitVector.of([...bits.slice(n), ...new Array<Bit>(n).fill(0)]);
    case 'SRL':
      return BitVector.of([...new Array<Bit>(n).fill(0), ...bits.slice(0, w - n)]);
    case 'SRA':
      return BitVector.of([...new Array<Bit>(n).fill(x.msb), ...bits.slice(0, w - n)]);
    default:
      throw invalidOperationTag('shifter', op);
  }
}

// 32-bit shifter. A vector amount contributes only its low five bits.
export function shift(x: BitVector, amount: number | BitVector, op: ShiftOp): BitVector {
  requireWidth(x, 32, 'shift operand');
  const raw = typeof amount === 'number' ? amount : Number(amount.toBigUint() & BigInt(31));
  if (!Number.isInteger(raw)) throw new RangeError(`shift amount must be an integer, got ${raw}`);
  return shiftBits(x, ((raw % 32) + 32) % 32, op);
}
