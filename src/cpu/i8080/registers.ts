/**
 * Intel 8080 Register File
 *
 * Seven byte registers indexed by their 3-bit opcode code:
 *   000 B   001 C   010 D   011 E   100 H   101 L   110 M   111 A
 * M (memory at HL) has no cell here; the execution engine resolves it
 * through addressFromPair(Reg.H).
 *
 * Pairs are selected two different ways and the two must not be mixed:
 * - by high-register code (B, D, H) for memory addressing
 * - by the 2-bit rp field (0=BC, 1=DE, 2=HL) of LXI/INX/DCX/DAD/PUSH/POP
 */

import {
  Reg,
  type RegisterCode, type RegisterPair, type RegisterSnapshot, type StorableRegister,
} from './types';
import { InvalidPairError, InvalidRegisterError, KeyTypeError } from './errors';

export const PAIR_BC: RegisterPair = Object.freeze({ hi: Reg.B, lo: Reg.C });
export const PAIR_DE: RegisterPair = Object.freeze({ hi: Reg.D, lo: Reg.E });
export const PAIR_HL: RegisterPair = Object.freeze({ hi: Reg.H, lo: Reg.L });

// rp field order
const RP_TABLE: readonly RegisterPair[] = [PAIR_BC, PAIR_DE, PAIR_HL];

// High-register code → pair, for address resolution
const ADDRESS_PAIRS: ReadonlyMap<number, RegisterPair> = new Map<number, RegisterPair>([
  [Reg.B, PAIR_BC],
  [Reg.D, PAIR_DE],
  [Reg.H, PAIR_HL],
]);

const REGISTER_NAMES = ['B', 'C', 'D', 'E', 'H', 'L', 'M', 'A'] as const;

export type RegisterName = (typeof REGISTER_NAMES)[number];

function isStorable(code: number): code is StorableRegister {
  return Number.isInteger(code) && code >= Reg.B && code <= Reg.A && code !== Reg.M;
}

// 3-bit field value → register code
const FIELD_CODES: readonly RegisterCode[] = [
  Reg.B, Reg.C, Reg.D, Reg.E, Reg.H, Reg.L, Reg.M, Reg.A,
];

/**
 * Register code encoded in `opcode` at `bitOffset` (LSB of the field).
 * Offsets past the opcode's width read zeros. Division instead of `>>`,
 * which only honours the low 5 bits of the shift count.
 *
 * @throws RangeError for a negative or fractional offset
 */
export function registerFromOpcode(opcode: number, bitOffset: number): RegisterCode {
  if (!Number.isInteger(bitOffset) || bitOffset < 0) {
    throw new RangeError(`Invalid bit offset ${bitOffset}`);
  }
  return FIELD_CODES[Math.floor(opcode / 2 ** bitOffset) & 0b111];
}

/** Mnemonic letter of a 3-bit register field. */
export function registerName(code: RegisterCode): RegisterName {
  return REGISTER_NAMES[code];
}

export class RegisterFile {
  static readonly B = Reg.B;
  static readonly C = Reg.C;
  static readonly D = Reg.D;
  static readonly E = Reg.E;
  static readonly H = Reg.H;
  static readonly L = Reg.L;
  static readonly M = Reg.M;
  static readonly A = Reg.A;

  static readonly registerFromOpcode = registerFromOpcode;

  // Indexed by code; slot 6 (M) is never touched
  private readonly regs = new Uint8Array(8);

  get(code: number): number {
    return this.regs[this.checkCode(code)];
  }

  set(code: number, value: number): void {
    this.regs[this.checkCode(code)] = value & 0xff;
  }

  reset(): void {
    this.regs.fill(0);
  }

  /**
   * Address held by the pair whose high register is `code` (B, D or H).
   * This is how M operands are resolved: addressFromPair(Reg.H).
   */
  addressFromPair(code: number): number {
    const pair = ADDRESS_PAIRS.get(code);
    if (!pair) throw new InvalidPairError(code);
    return this.valueFromPair(pair);
  }

  valueFromPair(pair: RegisterPair): number {
    return (this.regs[pair.hi] << 8) | this.regs[pair.lo];
  }

  setValueForPair(pair: RegisterPair, value: number): void {
    const v = value & 0xffff;
    this.regs[pair.hi] = v >> 8;
    this.regs[pair.lo] = v & 0xff;
  }

  /** Pair for the 2-bit rp field: 0=BC, 1=DE, 2=HL. */
  pairFromEncoding(selector: number): RegisterPair {
    const pair = Number.isInteger(selector) ? RP_TABLE[selector] : undefined;
    if (!pair) throw new InvalidPairError(selector);
    return pair;
  }

  snapshot(): RegisterSnapshot {
    return {
      a: this.regs[Reg.A],
      b: this.regs[Reg.B],
      c: this.regs[Reg.C],
      d: this.regs[Reg.D],
      e: this.regs[Reg.E],
      h: this.regs[Reg.H],
      l: this.regs[Reg.L],
    };
  }

  private checkCode(code: number): StorableRegister {
    if (!Number.isInteger(code)) throw new KeyTypeError('register number', code);
    if (!isStorable(code)) throw new InvalidRegisterError(code);
    return code;
  }
}
