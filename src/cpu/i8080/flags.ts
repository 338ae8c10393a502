/**
 * Intel 8080 Condition Flags
 *
 * One byte laid out as S Z 0 AC 0 P 1 CY (bits 7→0):
 *   bit 0  CY  carry out of / borrow into the high bit
 *   bit 1      always 1
 *   bit 2  P   1 if the result has an even number of 1-bits
 *   bit 4  AC  carry out of bit 3
 *   bit 6  Z   1 if the result is zero
 *   bit 7  S   bit 7 of the result
 * Bits 3 and 5 always read 0.
 *
 * Aux carry is placed at bit 4 (the PSW position). Older notes that put it
 * at bit 3 disagree with the PSW byte; `FlagBit.AuxCarry` is the single
 * source for the position.
 *
 * Two ways to address a bit, each with its own error:
 * - set/clear: InvalidFlagError for a non-flag bit
 * - get/setValue: KeyTypeError, FlagOutOfRangeError, InvalidFlagValueError
 */

import { countBits, isNegative } from '@/lib/bits';
import {
  FlagBit, FLAG_ORDER, FLAG_ALWAYS_ONE, FLAG_MASK,
  type SignTest,
} from './types';
import {
  InvalidFlagError, FlagOutOfRangeError, InvalidFlagValueError, KeyTypeError,
} from './errors';

const VALID_BITS: ReadonlySet<number> = new Set<number>(FLAG_ORDER);

function isFlagBit(bit: number): bit is FlagBit {
  return VALID_BITS.has(bit);
}

// Precomputed parity table: 1 if byte has even number of 1-bits
const PARITY_TABLE: Uint8Array = (() => {
  const table = new Uint8Array(256);
  for (let i = 0; i < 256; i++) {
    table[i] = (countBits(i) & 1) === 0 ? 1 : 0;
  }
  return table;
})();

// Debug letters, high bit first
const FLAG_LETTERS: ReadonlyArray<[FlagBit, string]> = [
  [FlagBit.Sign, 'S'],
  [FlagBit.Zero, 'Z'],
  [FlagBit.AuxCarry, 'A'],
  [FlagBit.Parity, 'P'],
  [FlagBit.Carry, 'C'],
];

export class ConditionFlags implements Iterable<number> {
  static readonly CARRY = FlagBit.Carry;
  static readonly PARITY = FlagBit.Parity;
  static readonly AUX_CARRY = FlagBit.AuxCarry;
  static readonly ZERO = FlagBit.Zero;
  static readonly SIGN = FlagBit.Sign;

  private _flags = FLAG_ALWAYS_ONE;
  private readonly signTest: SignTest;

  constructor(signTest?: SignTest) {
    this.signTest = signTest ?? isNegative;
  }

  /** Number of addressable flags. */
  get length(): number {
    return FLAG_ORDER.length;
  }

  /** Full flag byte, reserved bit included (low byte of PSW). */
  get value(): number {
    return this._flags;
  }

  /** Replace the flag byte, as POP PSW does. Reserved bits are forced. */
  load(byte: number): void {
    this._flags = (byte & FLAG_MASK) | FLAG_ALWAYS_ONE;
  }

  reset(): void {
    this._flags = FLAG_ALWAYS_ONE;
  }

  // --- Named access ---
  set(bit: number): void {
    if (!isFlagBit(bit)) throw new InvalidFlagError(bit);
    this.setBit(bit);
  }

  clear(bit: number): void {
    if (!isFlagBit(bit)) throw new InvalidFlagError(bit);
    this.clearBit(bit);
  }

  clearAll(): void {
    for (const bit of FLAG_ORDER) {
      this.clearBit(bit);
    }
  }

  // --- Indexed access ---
  get(bit: number): number {
    return this.readBit(this.checkIndex(bit));
  }

  setValue(bit: number, value: number): void {
    const flag = this.checkIndex(bit);
    if (value === 0) {
      this.clearBit(flag);
    } else if (value === 1) {
      this.setBit(flag);
    } else {
      throw new InvalidFlagValueError(value);
    }
  }

  /** Yields CY, P, AC, Z, S as 0/1. A fresh pass on every call. */
  *[Symbol.iterator](): Iterator<number> {
    for (const bit of FLAG_ORDER) {
      yield this.readBit(bit);
    }
  }

  // --- Derived flags ---

  /** P = 1 if the byte has an even number of 1-bits. */
  calculateParity(data: number): void {
    if (PARITY_TABLE[data & 0xff]) {
      this.setBit(FlagBit.Parity);
    } else {
      this.clearBit(FlagBit.Parity);
    }
  }

  setZero(data: number): void {
    if (data === 0) {
      this.setBit(FlagBit.Zero);
    } else {
      this.clearBit(FlagBit.Zero);
    }
  }

  setSign(value: number): void {
    this.clearBit(FlagBit.Sign);
    if (this.signTest(value)) {
      this.setBit(FlagBit.Sign);
    }
  }

  /** e.g. "SZ-P-": letter when set, '-' when clear, S first. */
  toString(): string {
    return FLAG_LETTERS
      .map(([bit, letter]) => (this.readBit(bit) ? letter : '-'))
      .join('');
  }

  private checkIndex(bit: number): FlagBit {
    if (!Number.isInteger(bit)) throw new KeyTypeError('bit-number of flag', bit);
    if (!isFlagBit(bit)) throw new FlagOutOfRangeError(bit);
    return bit;
  }

  private readBit(bit: FlagBit): number {
    return (this._flags >> bit) & 1;
  }

  private setBit(bit: FlagBit): void {
    this._flags |= 1 << bit;
  }

  private clearBit(bit: FlagBit): void {
    this._flags &= ~(1 << bit);
  }
}
