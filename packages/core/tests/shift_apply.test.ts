import { describe, it, expect } from 'vitest';
import { asrC, lsl, lslC, lsr, lsrC, ror, rorC, rrx, rrxC, shift, shiftC } from '../src/shifter/shift.js';
import type { ShiftKind } from '../src/shifter/shift_type.js';
import { InvalidEncodingError } from '../src/shifter/exceptions.js';

describe('LSL', () => {
  it('carries out bit (32 - amount)', () => {
    expect(lslC(0x80000001, 1)).toEqual({ value: 0x00000002, carry: 1 });
    expect(lslC(0x00000001, 31)).toEqual({ value: 0x80000000, carry: 0 });
    expect(lslC(0x40000000, 2)).toEqual({ value: 0x00000000, carry: 1 });
  });

  it('accepts a zero amount only in the carry-less form', () => {
    expect(lsl(0xcafef00d, 0)).toBe(0xcafef00d);
    expect(() => lslC(0xcafef00d, 0)).toThrow(InvalidEncodingError);
    expect(() => lsl(1, 32)).toThrow(/InvalidShiftAmount/);
  });
});

describe('LSR', () => {
  it('carries out bit (amount - 1) and handles a full 32-bit shift', () => {
    expect(lsrC(0x80000001, 1)).toEqual({ value: 0x40000000, carry: 1 });
    expect(lsrC(0x80000000, 32)).toEqual({ value: 0, carry: 1 });
    expect(lsrC(0x7fffffff, 32)).toEqual({ value: 0, carry: 0 });
    expect(lsr(0xff00ff00, 8)).toBe(0x00ff00ff);
  });
});

describe('ASR', () => {
  it('replicates the sign bit', () => {
    expect(asrC(0x80000000, 4)).toEqual({ value: 0xf8000000, carry: 0 });
    expect(asrC(0x80000008, 4)).toEqual({ value: 0xf8000000, carry: 1 });
    expect(asrC(0x7ffffff0, 4)).toEqual({ value: 0x07ffffff, carry: 0 });
  });

  it('fills the whole word for a 32-bit shift', () => {
    expect(asrC(0x80000000, 32)).toEqual({ value: 0xffffffff, carry: 1 });
    expect(asrC(0x7fffffff, 32)).toEqual({ value: 0, carry: 0 });
  });
});

describe('ROR', () => {
  it('rotates and takes carry from bit 31 of the unrotated operand', () => {
    expect(rorC(0x12345678, 8)).toEqual({ value: 0x78123456, carry: 0 });
    expect(rorC(0x80000000, 4)).toEqual({ value: 0x08000000, carry: 1 });
    // the result's bit 31 is set but the operand's is not
    expect(rorC(0x00000001, 1)).toEqual({ value: 0x80000000, carry: 0 });
  });

  it('rejects a 32-bit rotate', () => {
    expect(() => rorC(1, 32)).toThrow(InvalidEncodingError);
    expect(ror(0x1234, 0)).toBe(0x1234);
  });
});

describe('RRX', () => {
  it('shifts carry-in into bit 31 and bit 0 into carry-out', () => {
    expect(rrxC(0x00000003, 1)).toEqual({ value: 0x80000001, carry: 1 });
    expect(rrxC(0x80000000, 0)).toEqual({ value: 0x40000000, carry: 0 });
    expect(rrx(0x00000001, 0)).toBe(0);
  });
});

describe('shiftC', () => {
  const kinds: ShiftKind[] = ['LSL', 'LSR', 'ASR', 'ROR'];

  it('passes value and carry through for a zero amount', () => {
    for (const kind of kinds) {
      for (const carry of [0, 1] as const) {
        expect(shiftC(0xdeadbeef, kind, 0, carry)).toEqual({ value: 0xdeadbeef, carry });
      }
    }
  });

  it('dispatches to each operation', () => {
    expect(shiftC(0x80000001, 'LSL', 1, 0)).toEqual({ value: 0x00000002, carry: 1 });
    expect(shiftC(0x80000000, 'LSR', 32, 0)).toEqual({ value: 0, carry: 1 });
    expect(shiftC(0x80000008, 'ASR', 4, 0)).toEqual({ value: 0xf8000000, carry: 1 });
    expect(shiftC(0x12345678, 'ROR', 8, 1)).toEqual({ value: 0x78123456, carry: 0 });
  });

  it('feeds the caller carry into RRX', () => {
    expect(shiftC(0x12345678, 'RRX', 1, 1)).toEqual({ value: 0x891a2b3c, carry: 0 });
    expect(shiftC(0x12345679, 'RRX', 1, 0)).toEqual({ value: 0x091a2b3c, carry: 1 });
  });

  it('rejects RRX with any amount other than 1', () => {
    expect(() => shiftC(1, 'RRX', 0, 0)).toThrow(/InvalidShiftAmount/);
    expect(() => shiftC(1, 'RRX', 2, 1)).toThrow(/InvalidShiftAmount/);
  });

  it('rejects amounts outside the range of the kind', () => {
    expect(() => shiftC(1, 'LSL', 32, 0)).toThrow(InvalidEncodingError);
    expect(() => shiftC(1, 'ROR', 32, 0)).toThrow(InvalidEncodingError);
    expect(() => shiftC(1, 'LSR', 33, 0)).toThrow(InvalidEncodingError);
  });

  it('shift drops the carry', () => {
    expect(shift(0xf0000000, 'ASR', 4, 0)).toBe(0xff000000);
    expect(shift(0x0000000f, 'RRX', 1, 1)).toBe(0x80000007);
  });
});

describe('round trips', () => {
  const samples = [0x00000001, 0x80000000, 0xdeadbeef, 0x12345678];

  it('rotating right by n then by 32 - n restores the value', () => {
    for (const v of samples) {
      for (let n = 1; n < 32; n++) {
        expect(ror(ror(v, n), 32 - n)).toBe(v);
      }
    }
  });

  it('LSR undoes LSL on values whose high bits are clear', () => {
    for (const v of samples) {
      for (let n = 1; n < 32; n++) {
        const low = (v & (0xffffffff >>> n)) >>> 0;
        expect(lsr(lsl(low, n), n)).toBe(low);
      }
    }
  });
});
