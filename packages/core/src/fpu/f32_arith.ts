import { BitVector, requireWidth } from '../bits/bitvec.js';
import type { Bit } from '../bits/bitvec.js';
import { stepLabel } from '../types.js';
import type { Trace } from '../types.js';
import { CANONICAL_NAN, F32_BIAS, F32_EXP_MAX, classifyF32, f32Infinity, f32Zero, flipSign, noFlags, unpackF32 } from './f32.js';
import type { F32Kind, FpFlags } from './f32.js';

export type FpResult = { resBits: BitVector; flags: FpFlags; trace: Trace };

const ZERO = BigInt(0);
const ONE = BigInt(1);
const GRS = 3;
const FRAC_BITS = 23;
// Weight of the least significant subnormal bit is 2^-149.
const MIN_SCALE = 1 - F32_BIAS - FRAC_BITS;

type Operand = {
  kind: F32Kind;
  sign: Bit;
  // Effective biased exponent: subnormals and zeros read as 1.
  exp: number;
  // 24-bit significand including the hidden bit.
  sig: bigint;
};

function decompose(bits: BitVector): Operand {
  const { sign, exponent, fraction } = unpackF32(bits);
  const { kind } = classifyF32(bits);
  const e = exponent.toUint();
  const hidden = e === 0 ? ZERO : ONE << BigInt(FRAC_BITS);
  return { kind, sign, exp: e === 0 ? 1 : e, sig: hidden | fraction.toBigUint() };
}

function hex(v: bigint): string {
  return v.toString(16).toUpperCase();
}

function bitLength(v: bigint): number {
  return v === ZERO ? 0 : v.toString(2).length;
}

function special(resBits: BitVector, trace: string[], label: string, flags: Partial<FpFlags> = {}): FpResult {
  trace.push(label);
  return { resBits, flags: { ...noFlags(), ...flags }, trace };
}

function invalid(trace: string[], label: string): FpResult {
  return special(CANONICAL_NAN, trace, label, { NV: true });
}

/**
 * Rounds the exact magnitude `sig * 2^scale` (sig > 0) to binary32 with round-to-nearest-even.
 * Below the normal range the result is denormalized to the fixed 2^-149 grid before rounding.
 */
function roundPack(sign: Bit, sig: bigint, scale: number, trace: string[]): FpResult {
  const flags = noFlags();
  const len = bitLength(sig);
  let biased = scale + len - 1 + F32_BIAS;
  const tiny = biased < 1;
  const discard = tiny ? MIN_SCALE - scale : len - (FRAC_BITS + 1);

  let mant: bigint;
  let guard = false;
  let round = false;
  let sticky = false;
  if (discard <= 0) {
    mant = sig << BigInt(-discard);
  } else {
    const k = BigInt(discard);
    mant = sig >> k;
    guard = ((sig >> (k - ONE)) & ONE) === ONE;
    round = discard >= 2 && ((sig >> (k - BigInt(2))) & ONE) === ONE;
    sticky = discard >= 3 && (sig & ((ONE << (k - BigInt(2))) - ONE)) !== ZERO;
  }
  const lsbOdd = (mant & ONE) === ONE;
  const increment = guard && (round || sticky || lsbOdd);
  flags.NX = guard || round || sticky;
  trace.push(`round_rne: mant=0x${hex(mant)} g=${guard ? 1 : 0} r=${round ? 1 : 0} s=${sticky ? 1 : 0} inc=${increment ? 1 : 0}`);
  if (increment) mant += ONE;

  if (tiny) {
    // Tiny before rounding and inexact. A carry into bit 23 lands on the smallest normal through the exponent field.
    flags.UF = flags.NX;
    trace.push(`pack: subnormal frac=0x${hex(mant)}`);
    return { resBits: BitVector.fromUint(((sign << 31) | Number(mant)) >>> 0, 32), flags, trace };
  }

  if (mant >> BigInt(FRAC_BITS + 1) !== ZERO) {
    mant >>= ONE;
    biased += 1;
    trace.push('renormalize: rounding carry-out');
  }
  if (biased >= F32_EXP_MAX) {
    flags.OF = true;
    flags.NX = true;
    trace.push('pack: overflow to infinity');
    return { resBits: f32Infinity(sign), flags, trace };
  }
  const frac = Number(mant & ((ONE << BigInt(FRAC_BITS)) - ONE));
  trace.push(`pack: exp=${biased} frac=0x${frac.toString(16).toUpperCase()}`);
  return { resBits: BitVector.fromUint(((sign << 31) | (biased << 23) | frac) >>> 0, 32), flags, trace };
}

export function faddF32(a: BitVector, b: BitVector): FpResult {
  requireWidth(a, 32, 'fadd operand a');
  requireWidth(b, 32, 'fadd operand b');
  const trace: string[] = [];
  const A = decompose(a);
  const B = decompose(b);
  trace.push(`classify: A=${A.kind} B=${B.kind}`);

  if (A.kind === 'NAN' || B.kind === 'NAN') return invalid(trace, 'nan_operand');
  if (A.kind === 'INF' && B.kind === 'INF') {
    if (A.sign !== B.sign) return invalid(trace, 'inf_minus_inf');
    return special(a, trace, 'inf+inf');
  }
  if (A.kind === 'INF') return special(a, trace, 'inf+finite');
  if (B.kind === 'INF') return special(b, trace, 'finite+inf');
  if (A.kind === 'ZERO' && B.kind === 'ZERO') return special(f32Zero(A.sign === 1 && B.sign === 1 ? 1 : 0), trace, 'zero+zero');
  if (A.kind === 'ZERO') return special(b, trace, '0+x');
  if (B.kind === 'ZERO') return special(a, trace, 'x+0');

  const aLarger = A.exp > B.exp || (A.exp === B.exp && A.sig >= B.sig);
  const L = aLarger ? A : B;
  const S = aLarger ? B : A;

  // Three spare low bits hold guard/round/sticky through alignment.
  const big = L.sig << BigInt(GRS);
  let small = S.sig << BigInt(GRS);
  let sticky = false;
  for (let d = L.exp - S.exp, step = 0; d > 0 && small !== ZERO; d--, step++) {
    sticky = sticky || (small & ONE) === ONE;
    small >>= ONE;
    trace.push(`align ${stepLabel(step)} small=0x${hex(small)} sticky=${sticky ? 1 : 0}`);
  }
  if (sticky) small |= ONE;

  const effectiveAdd = L.sign === S.sign;
  const sum = effectiveAdd ? big + small : big - small;
  trace.push(`${effectiveAdd ? 'add' : 'sub'}: 0x${hex(big)} ${effectiveAdd ? '+' : '-'} 0x${hex(small)} = 0x${hex(sum)}`);
  if (sum === ZERO) return special(f32Zero(0), trace, 'cancel_to_zero');

  return roundPack(L.sign, sum, L.exp - F32_BIAS - FRAC_BITS - GRS, trace);
}

export function fsubF32(a: BitVector, b: BitVector): FpResult {
  return faddF32(a, flipSign(requireWidth(b, 32, 'fsub operand b')));
}

export function fmulF32(a: BitVector, b: BitVector): FpResult {
  requireWidth(a, 32, 'fmul operand a');
  requireWidth(b, 32, 'fmul operand b');
  const trace: string[] = [];
  const A = decompose(a);
  const B = decompose(b);
  const sign: Bit = A.sign === B.sign ? 0 : 1;
  trace.push(`classify: A=${A.kind} B=${B.kind}`);

  if (A.kind === 'NAN' || B.kind === 'NAN') return invalid(trace, 'nan_operand');
  if ((A.kind === 'ZERO' && B.kind === 'INF') || (A.kind === 'INF' && B.kind === 'ZERO')) return invalid(trace, 'zero_times_inf');
  if (A.kind === 'INF' || B.kind === 'INF') return special(f32Infinity(sign), trace, 'inf_times_finite');
  if (A.kind === 'ZERO' || B.kind === 'ZERO') return special(f32Zero(sign), trace, 'zero_times_finite');

  // 24x24 shift-add: one partial product per multiplier bit.
  let acc = ZERO;
  for (let step = 0; step <= FRAC_BITS; step++) {
    const take = ((B.sig >> BigInt(step)) & ONE) === ONE;
    if (take) acc += A.sig << BigInt(step);
    trace.push(`mul ${stepLabel(step)} acc=0x${hex(acc)} action=${take ? 'ADD' : 'NOP'}`);
  }

  const scale = (A.exp - F32_BIAS - FRAC_BITS) + (B.exp - F32_BIAS - FRAC_BITS);
  return roundPack(sign, acc, scale, trace);
}
