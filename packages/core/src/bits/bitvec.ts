import { widthMismatch } from '../exceptions.js';

export type Bit = 0 | 1;

const HEX_DIGITS = '0123456789ABCDEF';
const ZERO = BigInt(0);
const ONE = BigInt(1);

function checkWidth(width: number): number {
  if (!Number.isInteger(width) || width < 1) throw new RangeError(`BitVector width must be a positive integer, got ${width}`);
  return width;
}

// Immutable, fixed-width bit container. Index 0 is the most significant bit.
export class BitVector {
  private readonly bits: readonly Bit[];

  private constructor(bits: readonly Bit[]) {
    this.bits = bits;
  }

  static of(bits: readonly Bit[]): BitVector {
    checkWidth(bits.length);
    return new BitVector(Object.freeze(bits.slice()));
  }

  static zeros(width: number): BitVector {
    return new BitVector(Object.freeze(new Array<Bit>(checkWidth(width)).fill(0)));
  }

  static ones(width: number): BitVector {
    return new BitVector(Object.freeze(new Array<Bit>(checkWidth(width)).fill(1)));
  }

  // Reduces modulo 2^width, so negative values come out in two's complement.
  static fromBigInt(value: bigint, width: number): BitVector {
    checkWidth(width);
    let v = BigInt.asUintN(width, value);
    const out = new Array<Bit>(width).fill(0);
    for (let i = width - 1; i >= 0; i--) {
      out[i] = (v & ONE) === ONE ? 1 : 0;
      v >>= ONE;
    }
    return new BitVector(Object.freeze(out));
  }

  static fromUint(value: number, width = 32): BitVector {
    return BitVector.fromBigInt(BigInt(value), width);
  }

  // Binary text such as '0001_1010'; underscores and spaces are ignored.
  static parse(text: string): BitVector {
    const s = text.replace(/^0b/i, '').replace(/[_\s]/g, '');
    if (!/^[01]+$/.test(s)) throw new RangeError(`not a binary string: '${text}'`);
    const out: Bit[] = [];
    for (const ch of s) out.push(ch === '1' ? 1 : 0);
    return new BitVector(Object.freeze(out));
  }

  static fromHex(text: string, width = 32): BitVector {
    const s = text.replace(/^0x/i, '').replace(/_/g, '');
    if (!/^[0-9a-fA-F]+$/.test(s)) throw new RangeError(`not a hex string: '${text}'`);
    const v = BigInt('0x' + s);
    if ((v >> BigInt(checkWidth(width))) !== ZERO) throw new RangeError(`0x${s} does not fit in ${width} bits`);
    return BitVector.fromBigInt(v, width);
  }

  get width(): number {
    return this.bits.length;
  }

  get msb(): Bit {
    return this.bit(0);
  }

  get lsb(): Bit {
    return this.bit(this.bits.length - 1);
  }

  bit(i: number): Bit {
    const b = this.bits[i];
    if (b === undefined) throw new RangeError(`bit index ${i} outside width ${this.bits.length}`);
    return b;
  }

  toArray(): Bit[] {
    return this.bits.slice();
  }

  slice(start: number, end?: number): BitVector {
    return BitVector.of(this.bits.slice(start, end));
  }

  concat(...rest: BitVector[]): BitVector {
    const out = this.bits.slice();
    for (const r of rest) out.push(...r.bits);
    return new BitVector(Object.freeze(out));
  }

  isZero(): boolean {
    return this.bits.every((b) => b === 0);
  }

  isAllOnes(): boolean {
    return this.bits.every((b) => b === 1);
  }

  equals(other: BitVector): boolean {
    if (other.width !== this.width) return false;
    for (let i = 0; i < this.bits.length; i++) if (this.bits[i] !== other.bits[i]) return false;
    return true;
  }

  toBigUint(): bigint {
    let v = ZERO;
    for (const b of this.bits) v = (v << ONE) | (b === 1 ? ONE : ZERO);
    return v;
  }

  // Exact for widths up to 53 bits.
  toUint(): number {
    return Number(this.toBigUint());
  }

  toString(): string {
    return formatBinary(this);
  }
}

export function requireWidth(v: BitVector, width: number, label: string): BitVector {
  if (v.width !== width) throw widthMismatch(label, width, v.width);
  return v;
}

function xorBit(a: Bit, b: Bit): Bit {
  return a === b ? 0 : 1;
}

function andBit(a: Bit, b: Bit): Bit {
  return a === 1 && b === 1 ? 1 : 0;
}

function orBit(a: Bit, b: Bit): Bit {
  return a === 1 || b === 1 ? 1 : 0;
}

function fullAdder(a: Bit, b: Bit, cin: Bit): { s: Bit; cout: Bit } {
  const p = xorBit(a, b);
  return { s: xorBit(p, cin), cout: orBit(andBit(a, b), andBit(p, cin)) };
}

export type AddResult = { sum: BitVector; carryOut: Bit };

// Ripple-carry a + b + carryIn, LSB to MSB. Every subtraction in the engine goes through here.
export function addWithCarry(a: BitVector, b: BitVector, carryIn: Bit = 0): AddResult {
  requireWidth(b, a.width, 'addend');
  const out = new Array<Bit>(a.width).fill(0);
  let carry = carryIn;
  for (let i = a.width - 1; i >= 0; i--) {
    const { s, cout } = fullAdder(a.bit(i), b.bit(i), carry);
    out[i] = s;
    carry = cout;
  }
  return { sum: BitVector.of(out), carryOut: carry };
}

export function invert(a: BitVector): BitVector {
  return BitVector.of(a.toArray().map((b): Bit => (b === 1 ? 0 : 1)));
}

export function negate(a: BitVector): BitVector {
  return addWithCarry(invert(a), BitVector.zeros(a.width), 1).sum;
}

function bitwise(a: BitVector, b: BitVector, fn: (x: Bit, y: Bit) => Bit): BitVector {
  requireWidth(b, a.width, 'operand');
  const out = new Array<Bit>(a.width).fill(0);
  for (let i = 0; i < a.width; i++) out[i] = fn(a.bit(i), b.bit(i));
  return BitVector.of(out);
}

export function and(a: BitVector, b: BitVector): BitVector {
  return bitwise(a, b, andBit);
}

export function or(a: BitVector, b: BitVector): BitVector {
  return bitwise(a, b, orBit);
}

export function xor(a: BitVector, b: BitVector): BitVector {
  return bitwise(a, b, xorBit);
}

// Upper-case, left-padded to whole nibbles, no prefix: 32 bits -> 8 digits.
export function formatHex(a: BitVector): string {
  const bits = a.toArray();
  while (bits.length % 4 !== 0) bits.unshift(0);
  let out = '';
  for (let i = 0; i < bits.length; i += 4) {
    const nibble = ((bits[i] ?? 0) << 3) | ((bits[i + 1] ?? 0) << 2) | ((bits[i + 2] ?? 0) << 1) | (bits[i + 3] ?? 0);
    out += HEX_DIGITS.charAt(nibble);
  }
  return out;
}

export function formatBinary(a: BitVector): string {
  return a.toArray().join('');
}

// Groups are counted from the LSB so nibbles line up with the hex digits.
export function formatGrouped(a: BitVector, group = 4): string {
  const s = formatBinary(a);
  if (group <= 0) return s;
  const parts: string[] = [];
  for (let end = s.length; end > 0; end -= group) parts.unshift(s.slice(Math.max(0, end - group), end));
  return parts.join('_');
}
