import { InvalidEncodingError } from './exceptions.js';

export type ShiftKind = 'LSL' | 'LSR' | 'ASR' | 'ROR' | 'RRX';

// Register-controlled shifts never encode RRX.
export type RegShiftKind = Exclude<ShiftKind, 'RRX'>;

export type ShiftOperand = {
  kind: ShiftKind;
  amount: number;
};

export const SHIFT_KINDS: readonly ShiftKind[] = ['LSL', 'LSR', 'ASR', 'ROR', 'RRX'];

export function isShiftKind(s: string): s is ShiftKind {
  return (SHIFT_KINDS as readonly string[]).includes(s);
}

function checkTypeCode(type: number): void {
  if (!Number.isInteger(type) || type < 0 || type > 3) {
    throw new InvalidEncodingError('InvalidShiftType', type, 'shift type must be within 0..3');
  }
}

// DecodeImmShift: type is instr[6:5], imm5 is instr[11:7]. An encoded zero means 32 for
// LSR/ASR and selects RRX for type 3.
export function decodeImmShift(type: number, imm5: number): ShiftOperand {
  checkTypeCode(type);
  if (!Number.isInteger(imm5) || imm5 < 0 || imm5 > 31) {
    throw new InvalidEncodingError('InvalidShiftAmount', imm5, 'imm5 must be within 0..31');
  }
  switch (type) {
    case 0: return { kind: 'LSL', amount: imm5 };
    case 1: return { kind: 'LSR', amount: imm5 === 0 ? 32 : imm5 };
    case 2: return { kind: 'ASR', amount: imm5 === 0 ? 32 : imm5 };
    default:
      return imm5 === 0 ? { kind: 'RRX', amount: 1 } : { kind: 'ROR', amount: imm5 };
  }
}

export function decodeImmShiftAmount(type: number, imm5: number): number {
  return decodeImmShift(type, imm5).amount;
}

export function decodeRegShift(type: number): RegShiftKind {
  checkTypeCode(type);
  switch (type) {
    case 0: return 'LSL';
    case 1: return 'LSR';
    case 2: return 'ASR';
    default: return 'ROR';
  }
}
