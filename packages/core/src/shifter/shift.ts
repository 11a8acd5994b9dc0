import { bit, bits, rotr32, toInt32, toUint32, type Bit } from '../utils/bit.js';
import { InvalidEncodingError } from './exceptions.js';
import type { ShiftKind } from './shift_type.js';

export type ShiftResult = {
  value: number;
  carry: Bit;
};

function checkAmount(kind: ShiftKind, amount: number, min: number, max: number): void {
  if (!Number.isInteger(amount) || amount < min || amount > max) {
    throw new InvalidEncodingError('InvalidShiftAmount', amount, `${kind} amount must be within ${min}..${max}`);
  }
}

// Carry is the last bit shifted out past bit 31.
export function lslC(value: number, amount: number): ShiftResult {
  checkAmount('LSL', amount, 1, 31);
  return { value: toUint32(value << amount), carry: bit(value, 32 - amount) };
}

export function lsl(value: number, amount: number): number {
  checkAmount('LSL', amount, 0, 31);
  if (amount === 0) return toUint32(value);
  return lslC(value, amount).value;
}

export function lsrC(value: number, amount: number): ShiftResult {
  checkAmount('LSR', amount, 1, 32);
  // JS masks shift counts to 5 bits, so a 32-bit shift has to be spelled out.
  const result = amount === 32 ? 0 : (value >>> amount);
  return { value: toUint32(result), carry: bit(value, amount - 1) };
}

export function lsr(value: number, amount: number): number {
  checkAmount('LSR', amount, 0, 32);
  if (amount === 0) return toUint32(value);
  return lsrC(value, amount).value;
}

// Equivalent to sign-extending to 64 bits and taking bits [amount+31:amount].
export function asrC(value: number, amount: number): ShiftResult {
  checkAmount('ASR', amount, 1, 32);
  const signed = toInt32(value);
  const result = amount === 32 ? (signed >> 31) : (signed >> amount);
  return { value: toUint32(result), carry: bit(value, amount - 1) };
}

export function asr(value: number, amount: number): number {
  checkAmount('ASR', amount, 0, 32);
  if (amount === 0) return toUint32(value);
  return asrC(value, amount).value;
}

// NOTE: carry is taken from bit 31 of the operand before rotation, not of the result.
export function rorC(value: number, amount: number): ShiftResult {
  checkAmount('ROR', amount, 1, 31);
  return { value: rotr32(value, amount), carry: bit(value, 31) };
}

export function ror(value: number, amount: number): number {
  checkAmount('ROR', amount, 0, 31);
  if (amount === 0) return toUint32(value);
  return rorC(value, amount).value;
}

export function rrxC(value: number, carryIn: Bit): ShiftResult {
  const result = ((carryIn & 1) << 31) | bits(value, 31, 1);
  return { value: toUint32(result), carry: bit(value, 0) };
}

export function rrx(value: number, carryIn: Bit): number {
  return rrxC(value, carryIn).value;
}

// Shift_C: applies a decoded shift operand. A zero amount passes the value and carry through.
export function shiftC(value: number, kind: ShiftKind, amount: number, carryIn: Bit): ShiftResult {
  if (kind === 'RRX' && amount !== 1) {
    throw new InvalidEncodingError('InvalidShiftAmount', amount, 'RRX amount must be 1');
  }
  if (amount === 0) {
    return { value: toUint32(value), carry: carryIn };
  }
  switch (kind) {
    case 'LSL': return lslC(value, amount);
    case 'LSR': return lsrC(value, amount);
    case 'ASR': return asrC(value, amount);
    case 'ROR': return rorC(value, amount);
    case 'RRX': return rrxC(value, carryIn);
    default: {
      const unreachable: never = kind;
      throw new Error(`unknown shift kind ${String(unreachable)}`);
    }
  }
}

export function shift(value: number, kind: ShiftKind, amount: number, carryIn: Bit): number {
  return shiftC(value, kind, amount, carryIn).value;
}
