import { InvalidEncodingError } from '../shifter/exceptions.js';

export type Bit = 0 | 1;

export function toUint32(x: number): number {
  return x >>> 0;
}

export function toInt32(x: number): number {
  return x | 0;
}

export function toBit(x: number): Bit {
  return (x & 1) === 1 ? 1 : 0;
}

function isBitIndex(i: number): boolean {
  return Number.isInteger(i) && i >= 0 && i <= 31;
}

// Inclusive field [hi:lo], right-justified.
export function bits(value: number, hi: number, lo: number): number {
  if (!isBitIndex(hi) || !isBitIndex(lo)) {
    throw new InvalidEncodingError('InvalidBitRange', isBitIndex(hi) ? lo : hi, `bit index must be within 0..31`);
  }
  if (hi < lo) {
    throw new InvalidEncodingError('InvalidBitRange', hi, `high bit ${hi} below low bit ${lo}`);
  }
  const width = hi - lo + 1;
  const mask = width === 32 ? 0xffffffff : ((1 << width) - 1);
  return toUint32((value >>> lo) & mask);
}

export function bit(value: number, index: number): Bit {
  return toBit(bits(value, index, index));
}

// Rotate right within 32 bits; a shift that is a multiple of 32 leaves the value as-is.
export function rotr32(value: number, shift: number): number {
  const m = shift & 31;
  if (m === 0) return toUint32(value);
  return toUint32((value >>> m) | (value << (32 - m)));
}

// SP (13) and PC (15) are not permitted for many Thumb register specifiers.
export function isRestrictedRegister(n: number): boolean {
  return n === 13 || n === 15;
}
