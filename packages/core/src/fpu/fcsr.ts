import { BitVector, requireWidth } from '../bits/bitvec.js';
import { FP_FLAG_ORDER, noFlags } from './f32.js';
import type { FpFlags } from './f32.js';

// Rounding-mode encodings for frm. 101-111 are reserved but can still be stored.
export const FRM = {
  RNE: BitVector.parse('000'),
  RTZ: BitVector.parse('001'),
  RDN: BitVector.parse('010'),
  RUP: BitVector.parse('011'),
  RMM: BitVector.parse('100'),
} as const;

export const ROUNDING_MODES = ['RNE', 'RTZ', 'RDN', 'RUP', 'RMM'] as const;
export type RoundingModeName = typeof ROUNDING_MODES[number];

/**
 * Floating-point control/status register. One per CPU, owned by the caller.
 * The arithmetic units only return flags; accumulation is the caller's explicit step.
 */
export type Fcsr = {
  frm: BitVector;
  fflags: FpFlags;
};

export function newFcsr(): Fcsr {
  return { frm: FRM.RNE, fflags: noFlags() };
}

export function fcsrAccumulate(csr: Fcsr, flags: FpFlags): void {
  for (const k of FP_FLAG_ORDER) {
    if (flags[k]) csr.fflags[k] = true;
  }
}

export function fcsrReadFflags(csr: Fcsr): readonly [boolean, boolean, boolean, boolean, boolean] {
  const f = csr.fflags;
  return [f.NV, f.DZ, f.OF, f.UF, f.NX];
}

// [7:5] = 0, 4 = NV, 3 = DZ, 2 = OF, 1 = UF, 0 = NX
export function fcsrPackU8(csr: Fcsr): number {
  let byte = 0;
  for (const k of FP_FLAG_ORDER) byte = (byte << 1) | (csr.fflags[k] ? 1 : 0);
  return byte & 0x1f;
}

// Overwrites fflags from the low five bits of a packed byte.
export function fcsrWriteFflags(csr: Fcsr, byte: number): void {
  FP_FLAG_ORDER.forEach((k, i) => {
    csr.fflags[k] = ((byte >>> (4 - i)) & 1) === 1;
  });
}

export function fcsrClearFflags(csr: Fcsr): void {
  csr.fflags = noFlags();
}

export function fcsrSetRounding(csr: Fcsr, frm: BitVector): void {
  csr.frm = requireWidth(frm, 3, 'frm');
}

export function fcsrGetRounding(csr: Fcsr): BitVector {
  return csr.frm;
}

export function roundingModeName(frm: BitVector): RoundingModeName | 'RESERVED' {
  return ROUNDING_MODES.find((n) => FRM[n].equals(frm)) ?? 'RESERVED';
}

// Whole 8-bit image: [7:5] = frm, [4:0] = fflags.
export function fcsrToU8(csr: Fcsr): number {
  return ((csr.frm.toUint() << 5) | fcsrPackU8(csr)) & 0xff;
}

export function fcsrUnpackU8(byte: number): Fcsr {
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) throw new RangeError(`FCSR image must be a byte, got ${byte}`);
  const csr: Fcsr = { frm: BitVector.fromUint(byte >>> 5, 3), fflags: noFlags() };
  fcsrWriteFflags(csr, byte);
  return csr;
}
