import { describe, it, expect } from 'vitest';
import { BitVector } from '../src/bits/bitvec.js';
import { parseShiftOp, shift, shiftBits } from '../src/alu/shifter.js';
import { SHIFT_OPS } from '../src/alu/shifter.js';
import { lcg, u32 } from './helpers/test_utils.js';

describe('Barrel shifter', () => {
  it('shifts 0xD left by two', () => {
    expect(shift(u32(0x0000000d), 2, 'SLL').toUint()).toBe(0x00000034);
  });

  it('logical vs arithmetic right shift', () => {
    expect(shift(u32(0x80000000), 31, 'SRL').toUint()).toBe(1);
    expect(shift(u32(0x80000000), 31, 'SRA').toUint()).toBe(0xffffffff);
    expect(shift(u32(0x80000000), 4, 'SRA').toUint()).toBe(0xf8000000);
    expect(shift(u32(0xf0000000), 4, 'SRL').toUint()).toBe(0x0f000000);
  });

  it('takes the amount modulo 32', () => {
    expect(shift(u32(1), 33, 'SLL').toUint()).toBe(2);
    expect(shift(u32(0x1234), 32, 'SLL').toUint()).toBe(0x1234);
    expect(shift(u32(1), -1, 'SLL').toUint()).toBe(0x80000000);
    expect(() => shift(u32(1), 1.5, 'SLL')).toThrow(RangeError);
  });

  it('uses only the low five bits of a vector amount', () => {
    expect(shift(u32(1), u32(0xffffffe3), 'SLL').toUint()).toBe(8);
  });

  it('matches host shifts and keeps the SRA sign', () => {
    const r = lcg(99);
    for (let i = 0; i < 100; i++) {
      const x = r();
      const k = r() & 31;
      const v = u32(x);
      expect(shift(v, k, 'SLL').toUint()).toBe((x << k) >>> 0);
      expect(shift(v, k, 'SRL').toUint()).toBe(x >>> k);
      const sra = shift(v, k, 'SRA');
      expect(sra.toUint()).toBe(((x | 0) >> k) >>> 0);
      expect(sra.msb).toBe(v.msb);
      for (const op of SHIFT_OPS) expect(shift(v, 0, op).equals(v)).toBe(true);
    }
  });

  it('shiftBits works on any width and saturates to fill bits', () => {
    const wide = shiftBits(BitVector.fromUint(1, 64), 40, 'SLL');
    expect(wide.width).toBe(64);
    expect(wide.toBigUint()).toBe(BigInt(2) ** BigInt(40));
    expect(shiftBits(BitVector.parse('1011'), 9, 'SRA').toString()).toBe('1111');
    expect(shiftBits(BitVector.parse('1011'), 9, 'SRL').toString()).toBe('0000');
  });

  it('validates operand width and op names', () => {
    expect(() => shift(BitVector.zeros(16), 1, 'SLL')).toThrow('WidthMismatch: shift operand must be 32 bits, got 16');
    expect(parseShiftOp('SRA')).toBe('SRA');
    expect(() => parseShiftOp('ROL')).toThrow('InvalidOperationTag: shifter has no operation ROL');
  });
});
