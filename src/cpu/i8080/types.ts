/**
 * Intel 8080 Architectural State Types
 *
 * The 8080 has:
 * - Registers: A (accumulator), B, C, D, E, H, L
 * - Register pairs: BC, DE, HL (first register is the high byte)
 * - Flags: S, Z, AC (aux carry), P (parity), CY (carry)
 * - M: pseudo-register selecting memory at (HL)
 */

// 8080 flag bit numbers (in F register)
// Layout: S Z 0 AC 0 P 1 CY  (bits 7→0)
//
// Aux carry sits at bit 4, where the PSW byte carries it. Some 8080 notes
// number it bit 3; the position is defined here only and every accessor
// derives from it.
export const FlagBit = {
  Carry: 0,
  Parity: 2,
  AuxCarry: 4,
  Zero: 6,
  Sign: 7,
} as const;

export type FlagBit = (typeof FlagBit)[keyof typeof FlagBit];

/** Addressable flags in iteration order. */
export const FLAG_ORDER: readonly FlagBit[] = [
  FlagBit.Carry,
  FlagBit.Parity,
  FlagBit.AuxCarry,
  FlagBit.Zero,
  FlagBit.Sign,
];

export const FLAG_CY = 1 << FlagBit.Carry;
export const FLAG_P  = 1 << FlagBit.Parity;
export const FLAG_AC = 1 << FlagBit.AuxCarry;
export const FLAG_Z  = 1 << FlagBit.Zero;
export const FLAG_S  = 1 << FlagBit.Sign;

// Bit 1 always reads as 1; bits 3 and 5 always read as 0
export const FLAG_ALWAYS_ONE = 0x02;
export const FLAG_MASK = FLAG_S | FLAG_Z | FLAG_AC | FLAG_P | FLAG_CY;

// 3-bit register codes as encoded in opcodes
export const Reg = {
  B: 0,
  C: 1,
  D: 2,
  E: 3,
  H: 4,
  L: 5,
  M: 6, // memory at (HL), no storage cell
  A: 7,
} as const;

export type RegisterCode = (typeof Reg)[keyof typeof Reg];

/** Codes that have a storage cell. */
export type StorableRegister = Exclude<RegisterCode, typeof Reg.M>;

/** Two registers read as one 16-bit value, `hi` being the high byte. */
export interface RegisterPair {
  readonly hi: StorableRegister;
  readonly lo: StorableRegister;
}

/** Predicate used to derive the sign flag from a result byte. */
export type SignTest = (value: number) => boolean;

/** Plain copy of the scalar registers. */
export interface RegisterSnapshot {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  h: number;
  l: number;
}

/** Registers plus the flag byte. */
export interface I8080StateSnapshot extends RegisterSnapshot {
  f: number;
}
