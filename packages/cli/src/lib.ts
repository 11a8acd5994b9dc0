import {
  armExpandImmC,
  decodeImmShift,
  decodeRegShift,
  isInvalidEncoding,
  isShiftKind,
  shiftC,
  thumbExpandImmC,
  thumbExpandImmFromWordC,
  thumbImm12,
  type Bit,
  type ShiftResult,
} from '@armbits/core';

export type CliOptions = {
  carry: Bit;
  json: boolean;
};

export type ParsedArgs = {
  positional: string[];
  opts: CliOptions;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Strict integer parsing: decimal (optionally negative), 0x hex or 0b binary. The value is not
// wrapped to 32 bits, so the core range checks see what was typed.
export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  let n: number;
  if (/^0x[0-9a-f]+$/i.test(s)) n = parseInt(s.slice(2), 16);
  else if (/^0b[01]+$/i.test(s)) n = parseInt(s.slice(2), 2);
  else if (/^-?[0-9]+$/.test(s)) n = Number(s);
  else return def;
  return Number.isSafeInteger(n) ? n : def;
}

function requireNum(val: string | undefined, name: string): number {
  if (val === undefined) throw new UsageError(`missing <${name}>`);
  const n = parseNum(val, Number.NaN);
  if (Number.isNaN(n)) throw new UsageError(`<${name}> is not an integer: ${val}`);
  return n;
}

// Operands that are whole instruction or data words.
function requireWord(val: string | undefined, name: string): number {
  const n = requireNum(val, name);
  if (n < 0 || n > 0xffffffff) throw new UsageError(`<${name}> does not fit in 32 bits: ${val ?? ''}`);
  return n;
}

function parseCarry(val: string | undefined): Bit {
  if (val === '0') return 0;
  if (val === '1') return 1;
  throw new UsageError(`--carry takes 0 or 1, got ${val ?? 'nothing'}`);
}

export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const opts: CliOptions = { carry: 0, json: false };
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a === '--json') {
      opts.json = true;
    } else if (a === '--carry') {
      const next = (i + 1 < args.length) ? args[++i] : undefined;
      opts.carry = parseCarry(next);
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

export function hex32(x: number): string {
  return '0x' + (x >>> 0).toString(16).padStart(8, '0');
}

function formatResult(label: string, r: ShiftResult, json: boolean): string {
  if (json) return JSON.stringify({ op: label, value: r.value >>> 0, carry: r.carry });
  return `${label} -> ${hex32(r.value)} carry=${r.carry}`;
}

export const USAGE = `Usage:
  armbits imm-shift <type> <imm5> [--json]
  armbits reg-shift <type> [--json]
  armbits shift <value> <LSL|LSR|ASR|ROR|RRX> <amount> [--carry 0|1] [--json]
  armbits arm-imm <imm12> [--carry 0|1] [--json]
  armbits thumb-imm <imm12> [--carry 0|1] [--json]
  armbits thumb-imm-word <instr> [--carry 0|1] [--json]

Numbers accept decimal, 0x hex or 0b binary.`;

// Returns the lines to print for one invocation. Decode errors propagate to the caller.
export function runCommand(cmd: string, args: string[]): string[] {
  const { positional, opts } = parseArgs(args);
  switch (cmd) {
    case 'imm-shift': {
      const type = requireNum(positional[0], 'type');
      const imm5 = requireNum(positional[1], 'imm5');
      const op = decodeImmShift(type, imm5);
      if (opts.json) return [JSON.stringify(op)];
      return [`${op.kind} #${op.amount}`];
    }
    case 'reg-shift': {
      const kind = decodeRegShift(requireNum(positional[0], 'type'));
      return [opts.json ? JSON.stringify({ kind }) : kind];
    }
    case 'shift': {
      const value = requireWord(positional[0], 'value');
      const kind = (positional[1] ?? '').toUpperCase();
      if (!isShiftKind(kind)) throw new UsageError(`unknown shift kind: ${positional[1] ?? ''}`);
      const amount = requireNum(positional[2], 'amount');
      return [formatResult(`${kind} #${amount}`, shiftC(value, kind, amount, opts.carry), opts.json)];
    }
    case 'arm-imm': {
      const imm12 = requireNum(positional[0], 'imm12');
      return [formatResult(`arm-imm ${hex32(imm12)}`, armExpandImmC(imm12, opts.carry), opts.json)];
    }
    case 'thumb-imm': {
      const imm12 = requireNum(positional[0], 'imm12');
      return [formatResult(`thumb-imm ${hex32(imm12)}`, thumbExpandImmC(imm12, opts.carry), opts.json)];
    }
    case 'thumb-imm-word': {
      const instr = requireWord(positional[0], 'instr');
      const label = `thumb-imm ${hex32(thumbImm12(instr))}`;
      return [formatResult(label, thumbExpandImmFromWordC(instr, opts.carry), opts.json)];
    }
    default:
      throw new UsageError(`unknown command: ${cmd}`);
  }
}

export function main(argv: string[]): number {
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    console.log(USAGE);
    return 0;
  }
  try {
    for (const line of runCommand(cmd, argv.slice(1))) console.log(line);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`[armbits] ${err.message}`);
      console.log(USAGE);
      return 1;
    }
    if (isInvalidEncoding(err)) {
      console.error(`[armbits] ${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
