export type EncodingErrorCode = 'InvalidShiftType' | 'InvalidShiftAmount' | 'InvalidBitRange' | 'InvalidImmediate';

// Raised for any bitfield outside its encodable domain. Callers treat it as a decode failure
// for the instruction being decoded.
export class InvalidEncodingError extends Error {
  constructor(public readonly code: EncodingErrorCode, public readonly field: number, detail?: string) {
    super(`${code} (${field})${detail ? `: ${detail}` : ''}`);
    this.name = 'InvalidEncodingError';
  }
}

export function isInvalidEncoding(err: unknown): err is InvalidEncodingError {
  return err instanceof InvalidEncodingError;
}
