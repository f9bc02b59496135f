import { BitVector, addWithCarry, formatHex, negate, requireWidth } from '../bits/bitvec.js';
import { signExtend, zeroExtend } from '../bits/twos_complement.js';
import { shiftBits } from '../alu/shifter.js';
import { invalidOperationTag, parseTag } from '../exceptions.js';
import { stepLabel } from '../types.js';
import type { Trace } from '../types.js';

export const MUL_OPS = ['MUL', 'MULH', 'MULHU', 'MULHSU'] as const;
export type MulOp = typeof MUL_OPS[number];

export type MulResult = {
  // Architectural rd: low word for MUL, high word for the MULH variants.
  rdBits: BitVector;
  hiBits: BitVector;
  loBits: BitVector;
  // MUL only: the 64-bit product does not fit in a signed 32-bit result.
  overflow: boolean;
  trace: Trace;
};

export function parseMulOp(name: string): MulOp {
  return parseTag('mdu', MUL_OPS, name);
}

type Magnitude = { mag: BitVector; neg: boolean };

function magnitude(bits: BitVector, signed: boolean): Magnitude {
  if (signed && bits.msb === 1) return { mag: negate(bits), neg: true };
  return { mag: bits, neg: false };
}

function operandSignedness(op: MulOp): { a: boolean; b: boolean } {
  switch (op) {
    case 'MUL':
    case 'MULH':
      return { a: true, b: true };
    case 'MULHU':
      return { a: false, b: false };
    case 'MULHSU':
      return { a: true, b: false };
    default:
      throw invalidOperationTag('mdu', op);
  }
}

// Shift-add over the 32 multiplier bits on unsigned magnitudes; the sign is applied to the 64-bit product.
export function mduMul(op: MulOp, a: BitVector, b: BitVector): MulResult {
  requireWidth(a, 32, 'multiplicand');
  requireWidth(b, 32, 'multiplier');
  const signed = operandSignedness(op);
  const A = magnitude(a, signed.a);
  const B = magnitude(b, signed.b);

  let acc = BitVector.zeros(64);
  let mcand = zeroExtend(A.mag, 32, 64);
  let mplier = B.mag;
  const trace: string[] = [];
  for (let step = 0; step < 32; step++) {
    const take = mplier.lsb === 1;
    if (take) acc = addWithCarry(acc, mcand, 0).sum;
    trace.push(`${stepLabel(step)} acc=0x${formatHex(acc)} mcand=0x${formatHex(mcand)} mplier=0x${formatHex(mplier)} action=${take ? 'ADD' : 'NOP'}`);
    mcand = shiftBits(mcand, 1, 'SLL');
    mplier = shiftBits(mplier, 1, 'SRL');
  }
  if (A.neg !== B.neg) acc = negate(acc);

  const hiBits = acc.slice(0, 32);
  const loBits = acc.slice(32);
  const overflow = op === 'MUL' && !signExtend(loBits, 32, 64).equals(acc);
  return { rdBits: op === 'MUL' ? loBits : hiBits, hiBits, loBits, overflow, trace };
}
