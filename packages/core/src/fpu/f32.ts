import { BitVector, formatHex, requireWidth } from '../bits/bitvec.js';
import type { Bit } from '../bits/bitvec.js';

// IEEE-754 binary32 field layout: [31] sign, [30:23] biased exponent, [22:0] fraction.
export const F32_BIAS = 127;
export const F32_EXP_MAX = 0xff;

export type F32Kind = 'ZERO' | 'SUBNORMAL' | 'NORMAL' | 'INF' | 'NAN';

export type F32Fields = { sign: Bit; exponent: BitVector; fraction: BitVector };

export type FpFlags = {
  NV: boolean; // invalid
  DZ: boolean; // divide by zero (no divide unit, always false)
  OF: boolean; // overflow
  UF: boolean; // underflow
  NX: boolean; // inexact
};

export const FP_FLAG_ORDER = ['NV', 'DZ', 'OF', 'UF', 'NX'] as const;

export function noFlags(): FpFlags {
  return { NV: false, DZ: false, OF: false, UF: false, NX: false };
}

export const CANONICAL_NAN = BitVector.fromUint(0x7fc00000, 32);

export function packF32Fields(sign: Bit, exponent: BitVector, fraction: BitVector): BitVector {
  requireWidth(exponent, 8, 'exponent');
  requireWidth(fraction, 23, 'fraction');
  return BitVector.of([sign]).concat(exponent, fraction);
}

export function unpackF32(bits: BitVector): F32Fields {
  requireWidth(bits, 32, 'float32');
  return { sign: bits.msb, exponent: bits.slice(1, 9), fraction: bits.slice(9) };
}

export function classifyF32(bits: BitVector): { kind: F32Kind; sign: Bit } {
  const { sign, exponent, fraction } = unpackF32(bits);
  if (exponent.isZero()) return { kind: fraction.isZero() ? 'ZERO' : 'SUBNORMAL', sign };
  if (exponent.isAllOnes()) return { kind: fraction.isZero() ? 'INF' : 'NAN', sign };
  return { kind: 'NORMAL', sign };
}

export function flipSign(bits: BitVector): BitVector {
  const { sign, exponent, fraction } = unpackF32(bits);
  return packF32Fields(sign === 1 ? 0 : 1, exponent, fraction);
}

export function f32Infinity(sign: Bit): BitVector {
  return BitVector.fromUint(((sign << 31) | 0x7f800000) >>> 0, 32);
}

export function f32Zero(sign: Bit): BitVector {
  return BitVector.fromUint((sign << 31) >>> 0, 32);
}

export function formatF32Hex(bits: BitVector): string {
  return '0x' + formatHex(requireWidth(bits, 32, 'float32'));
}
