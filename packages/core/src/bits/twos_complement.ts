import { BitVector, formatBinary, formatHex, requireWidth } from './bitvec.js';
import { ArithException } from '../exceptions.js';

export type Encoded = {
  bits: BitVector;
  bin: string;
  hex: string;
  overflowFlag: boolean;
};

function toBigInt(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) throw new RangeError(`cannot encode non-integer ${value}`);
  return BigInt(value);
}

export function signedRange(width: number): { min: bigint; max: bigint } {
  const half = BigInt(1) << BigInt(width - 1);
  return { min: -half, max: half - BigInt(1) };
}

// Out-of-range values wrap modulo 2^width; overflowFlag reports it.
export function encode(value: number | bigint, width = 32): Encoded {
  const v = toBigInt(value);
  const bits = BitVector.fromBigInt(v, width);
  const { min, max } = signedRange(width);
  return { bits, bin: formatBinary(bits), hex: formatHex(bits), overflowFlag: v < min || v > max };
}

export function signedValue(bits: BitVector): bigint {
  return BigInt.asIntN(bits.width, bits.toBigUint());
}

export function unsignedValue(bits: BitVector): number {
  return bits.toUint();
}

export function decode(bits: BitVector | string): { value: number } {
  const v = typeof bits === 'string' ? BitVector.parse(bits) : bits;
  return { value: Number(signedValue(v)) };
}

function checkExtend(bits: BitVector, fromWidth: number, toWidth: number): void {
  requireWidth(bits, fromWidth, 'extension source');
  if (toWidth < fromWidth) throw new ArithException('WidthMismatch', `cannot extend ${fromWidth} bits down to ${toWidth}`);
}

export function signExtend(bits: BitVector, fromWidth: number, toWidth = 32): BitVector {
  checkExtend(bits, fromWidth, toWidth);
  if (toWidth === fromWidth) return bits;
  const fill = bits.msb === 1 ? BitVector.ones(toWidth - fromWidth) : BitVector.zeros(toWidth - fromWidth);
  return fill.concat(bits);
}

export function zeroExtend(bits: BitVector, fromWidth: number, toWidth = 32): BitVector {
  checkExtend(bits, fromWidth, toWidth);
  if (toWidth === fromWidth) return bits;
  return BitVector.zeros(toWidth - fromWidth).concat(bits);
}

// Bit-select of the low toWidth bits; no range check on the value.
export function truncate(bits: BitVector, toWidth: number): BitVector {
  if (toWidth > bits.width) throw new ArithException('WidthMismatch', `cannot truncate ${bits.width} bits up to ${toWidth}`);
  return bits.slice(bits.width - toWidth);
}
