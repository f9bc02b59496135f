import { describe, it, expect } from 'vitest';
import { fmulF32 } from '../src/fpu/f32_arith.js';
import { formatF32Hex, noFlags } from '../src/fpu/f32.js';
import { bitsFromF32, f32, f32FromBits, lcg, randomFiniteF32, u32 } from './helpers/test_utils.js';

function mulHex(a: string, b: string): string {
  return formatF32Hex(fmulF32(f32(a), f32(b)).resBits);
}

describe('FMUL', () => {
  it('multiplies exact values', () => {
    const r = fmulF32(f32('3F800000'), f32('40100000'));
    expect(formatF32Hex(r.resBits)).toBe('0x40100000');
    expect(r.flags).toEqual(noFlags());
    expect(mulHex('3FC00000', '3FC00000')).toBe('0x40100000');
    expect(mulHex('3FC00000', '40100000')).toBe('0x40580000');
    expect(mulHex('BFC00000', '3FC00000')).toBe('0xC0100000');
  });

  it('traces one step per multiplier bit', () => {
    const r = fmulF32(f32('3F800000'), f32('40100000'));
    expect(r.trace.filter((l) => l.startsWith('mul ')).length).toBe(24);
    expect(r.trace[0]).toBe('classify: A=NORMAL B=NORMAL');
    expect(r.trace[r.trace.length - 1]).toBe('pack: exp=128 frac=0x100000');
  });

  it('rounds the 48-bit product to nearest even', () => {
    const r = fmulF32(f32('3F800001'), f32('3F800001'));
    expect(formatF32Hex(r.resBits)).toBe('0x3F800002');
    expect(r.flags).toEqual({ ...noFlags(), NX: true });
  });

  it('zero and infinity operands', () => {
    expect(mulHex('00000000', '40100000')).toBe('0x00000000');
    expect(mulHex('80000000', '40100000')).toBe('0x80000000');
    expect(mulHex('00000000', 'C0100000')).toBe('0x80000000');
    expect(mulHex('7F800000', 'BFC00000')).toBe('0xFF800000');
  });

  it('zero times infinity and NaN operands are invalid', () => {
    for (const [a, b] of [['00000000', '7F800000'], ['FF800000', '80000000'], ['7FC00000', '00000000']] as const) {
      const r = fmulF32(f32(a), f32(b));
      expect(formatF32Hex(r.resBits)).toBe('0x7FC00000');
      expect(r.flags).toEqual({ ...noFlags(), NV: true });
    }
  });

  it('overflows to infinity', () => {
    const r = fmulF32(f32('7F7FFFFF'), f32('40000000'));
    expect(formatF32Hex(r.resBits)).toBe('0x7F800000');
    expect(r.flags).toEqual({ ...noFlags(), OF: true, NX: true });
  });

  it('underflows gradually', () => {
    const exact = fmulF32(f32('00800000'), f32('3E800000'));
    expect(formatF32Hex(exact.resBits)).toBe('0x00200000');
    expect(exact.flags).toEqual(noFlags());

    const tie = fmulF32(f32('00000003'), f32('3F000000'));
    expect(formatF32Hex(tie.resBits)).toBe('0x00000002');
    expect(tie.flags).toEqual({ ...noFlags(), UF: true, NX: true });

    const half = fmulF32(f32('00000001'), f32('3F000000'));
    expect(formatF32Hex(half.resBits)).toBe('0x00000000');
    expect(half.flags).toEqual({ ...noFlags(), UF: true, NX: true });

    expect(mulHex('80000001', '3F000000')).toBe('0x80000000');
  });

  it('matches host binary32 on random finite operands', () => {
    const r = lcg(0x3a17);
    for (let i = 0; i < 200; i++) {
      const a = randomFiniteF32(r);
      const b = randomFiniteF32(r);
      expect(fmulF32(u32(a), u32(b)).resBits.toUint()).toBe(bitsFromF32(f32FromBits(a) * f32FromBits(b)));
    }
  });
});
