import { BitVector, formatHex, negate, requireWidth } from '../bits/bitvec.js';
import { zeroExtend } from '../bits/twos_complement.js';
import { shiftBits } from '../alu/shifter.js';
import { subtract } from '../alu/alu.js';
import { invalidOperationTag, parseTag } from '../exceptions.js';
import { stepLabel } from '../types.js';
import type { Trace } from '../types.js';

export const DIV_OPS = ['DIV', 'DIVU', 'REM', 'REMU'] as const;
export type DivOp = typeof DIV_OPS[number];

export type DivResult = {
  qBits: BitVector;
  rBits: BitVector;
  // Architectural rd: quotient for DIV/DIVU, remainder for REM/REMU.
  rdBits: BitVector;
  // DIV only: INT_MIN / -1.
  overflow: boolean;
  trace: Trace;
};

export function parseDivOp(name: string): DivOp {
  return parseTag('mdu', DIV_OPS, name);
}

const INT_MIN = BitVector.fromUint(0x80000000, 32);
const ONE_BIT = BitVector.of([1]);
const ZERO_BIT = BitVector.of([0]);

function isSigned(op: DivOp): boolean {
  switch (op) {
    case 'DIV':
    case 'REM':
      return true;
    case 'DIVU':
    case 'REMU':
      return false;
    default:
      throw invalidOperationTag('mdu', op);
  }
}

function finish(op: DivOp, qBits: BitVector, rBits: BitVector, overflow: boolean, trace: Trace): DivResult {
  const rdBits = op === 'DIV' || op === 'DIVU' ? qBits : rBits;
  return { qBits, rBits, rdBits, overflow, trace };
}

// Restoring division on unsigned magnitudes with a 33-bit partial remainder.
function restoringDivide(dividend: BitVector, divisor: BitVector): { q: BitVector; r: BitVector; trace: string[] } {
  let r = BitVector.zeros(33);
  let q = dividend;
  const d = zeroExtend(divisor, 32, 33);
  const trace: string[] = [];
  for (let step = 0; step < 32; step++) {
    r = r.slice(1).concat(q.slice(0, 1));
    q = shiftBits(q, 1, 'SLL');
    const trial = subtract(r, d).sum;
    const restore = trial.msb === 1;
    if (!restore) r = trial;
    q = q.slice(0, 31).concat(restore ? ZERO_BIT : ONE_BIT);
    trace.push(`${stepLabel(step)} r=0x${formatHex(r.slice(1))} q=0x${formatHex(q)} action=${restore ? 'RESTORE' : 'SUB'}`);
  }
  return { q, r: r.slice(1), trace };
}

export function mduDiv(op: DivOp, dividend: BitVector, divisor: BitVector): DivResult {
  requireWidth(dividend, 32, 'dividend');
  requireWidth(divisor, 32, 'divisor');
  const signed = isSigned(op);

  if (divisor.isZero()) {
    return finish(op, BitVector.ones(32), dividend, false, ['div_by_zero']);
  }
  if (signed && dividend.equals(INT_MIN) && divisor.isAllOnes()) {
    return finish(op, INT_MIN, BitVector.zeros(32), op === 'DIV', ['int_min_div_minus1']);
  }

  const aNeg = signed && dividend.msb === 1;
  const bNeg = signed && divisor.msb === 1;
  const { q, r, trace } = restoringDivide(aNeg ? negate(dividend) : dividend, bNeg ? negate(divisor) : divisor);
  // Truncating division: quotient sign is the XOR of the operand signs, remainder follows the dividend.
  return finish(op, aNeg !== bNeg ? negate(q) : q, aNeg ? negate(r) : r, false, trace);
}
