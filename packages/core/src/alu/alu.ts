import { BitVector, addWithCarry, and, invert, negate, or, requireWidth, xor } from '../bits/bitvec.js';
import type { AddResult, Bit } from '../bits/bitvec.js';
import { invalidOperationTag, parseTag } from '../exceptions.js';

export const XLEN = 32;

// ADD/SUB/OR are the base set; AND/XOR/SLT/SLTU complete the register-register ALU.
export const ALU_OPS = ['ADD', 'SUB', 'OR', 'AND', 'XOR', 'SLT', 'SLTU'] as const;
export type AluOp = typeof ALU_OPS[number];

export type IntFlags = { N: Bit; Z: Bit; C: Bit; V: Bit };

export type AluResult = { result: BitVector; flags: IntFlags };

export function parseAluOp(name: string): AluOp {
  return parseTag('alu', ALU_OPS, name);
}

// No-borrow form a + ~b + 1: carryOut = 1 iff a >= b unsigned. Used for compares and division.
export function subtract(a: BitVector, b: BitVector): AddResult {
  return addWithCarry(a, invert(b), 1);
}

// SUB proper: a + negate(b) with carry-in 0. C is the raw carry-out, so b = 0 never carries.
export function subtractNegated(a: BitVector, b: BitVector): AddResult {
  return addWithCarry(a, negate(b), 0);
}

export function resultFlags(result: BitVector): IntFlags {
  return { N: result.msb, Z: result.isZero() ? 1 : 0, C: 0, V: 0 };
}

function addFlags(a: BitVector, b: BitVector, r: AddResult): IntFlags {
  const V: Bit = a.msb === b.msb && r.sum.msb !== a.msb ? 1 : 0;
  return { N: r.sum.msb, Z: r.sum.isZero() ? 1 : 0, C: r.carryOut, V };
}

function subFlags(a: BitVector, b: BitVector, r: AddResult): IntFlags {
  const V: Bit = a.msb !== b.msb && r.sum.msb !== a.msb ? 1 : 0;
  return { N: r.sum.msb, Z: r.sum.isZero() ? 1 : 0, C: r.carryOut, V };
}

function setIf(cond: boolean): AluResult {
  const result = BitVector.fromUint(cond ? 1 : 0, XLEN);
  return { result, flags: resultFlags(result) };
}

function logic(result: BitVector): AluResult {
  return { result, flags: resultFlags(result) };
}

export function alu(a: BitVector, b: BitVector, op: AluOp): AluResult {
  requireWidth(a, XLEN, 'alu operand a');
  requireWidth(b, XLEN, 'alu operand b');
  switch (op) {
    case 'ADD': {
      const r = addWithCarry(a, b, 0);
      return { result: r.sum, flags: addFlags(a, b, r) };
    }
    case 'SUB': {
      const r = subtractNegated(a, b);
      return { result: r.sum, flags: subFlags(a, b, r) };
    }
    case 'OR':
      return logic(or(a, b));
    case 'AND':
      return logic(and(a, b));
    case 'XOR':
      return logic(xor(a, b));
    case 'SLT': {
      const f = subFlags(a, b, subtract(a, b));
      return setIf(f.N !== f.V);
    }
    case 'SLTU':
      return setIf(subtract(a, b).carryOut === 0);
    default:
      throw invalidOperationTag('alu', op);
  }
}
