import { bit, bits, rotr32, toUint32, type Bit } from '../utils/bit.js';
import { InvalidEncodingError } from './exceptions.js';
import type { ShiftResult } from './shift.js';

function checkImm12(imm12: number): void {
  if (!Number.isInteger(imm12) || imm12 < 0 || imm12 > 0xfff) {
    throw new InvalidEncodingError('InvalidImmediate', imm12, 'imm12 must be within 0..0xfff');
  }
}

// ARMExpandImm_C: imm12 = rotate:imm8, value = ROR(imm8, 2 * rotate).
export function armExpandImmC(imm12: number, carryIn: Bit): ShiftResult {
  checkImm12(imm12);
  const imm8 = bits(imm12, 7, 0);
  const amount = 2 * bits(imm12, 11, 8);
  if (amount === 0) {
    return { value: imm8, carry: carryIn };
  }
  const value = rotr32(imm8, amount);
  return { value, carry: bit(value, 31) };
}

// Carry-in has no effect on the value.
export function armExpandImm(imm12: number): number {
  return armExpandImmC(imm12, 0).value;
}

// ThumbExpandImm_C over an already assembled i:imm3:imm8 field.
export function thumbExpandImmC(imm12: number, carryIn: Bit): ShiftResult {
  checkImm12(imm12);
  const imm8 = bits(imm12, 7, 0);
  if (bits(imm12, 11, 10) === 0) {
    let value: number;
    switch (bits(imm12, 9, 8)) {
      case 0: value = imm8; break;
      case 1: value = (imm8 << 16) | imm8; break;
      case 2: value = (imm8 << 24) | (imm8 << 8); break;
      default: value = (imm8 << 24) | (imm8 << 16) | (imm8 << 8) | imm8; break;
    }
    return { value: toUint32(value), carry: carryIn };
  }
  const unrotated = 0x80 | bits(imm12, 6, 0);
  const value = rotr32(unrotated, bits(imm12, 11, 7));
  return { value, carry: bit(value, 31) };
}

export function thumbExpandImm(imm12: number): number {
  return thumbExpandImmC(imm12, 0).value;
}

// Gathers i (bit 26), imm3 (bits 14:12) and imm8 (bits 7:0) of a 32-bit Thumb
// instruction into i:imm3:imm8. Also serves as ZeroExtend(i:imm3:imm8, 32).
export function thumbImm12(instr: number): number {
  const i = bit(instr, 26);
  const imm3 = bits(instr, 14, 12);
  const imm8 = bits(instr, 7, 0);
  return toUint32((i << 11) | (imm3 << 8) | imm8);
}

export function thumbExpandImmFromWordC(instr: number, carryIn: Bit): ShiftResult {
  return thumbExpandImmC(thumbImm12(instr), carryIn);
}

export function thumbExpandImmFromWord(instr: number): number {
  return thumbExpandImmFromWordC(instr, 0).value;
}

// ZeroExtend(imm7:'00', 32)
export function thumbImmScaled(instr: number): number {
  return toUint32(bits(instr, 6, 0) * 4);
}
