/** Byte-level helpers shared by the CPU cores. */

/** True if bit 7 of the byte is set (negative in two's complement). */
export function isNegative(value: number): boolean {
  return (value & 0x80) !== 0;
}

/** Number of 1-bits in the low 8 bits of `value`. */
export function countBits(value: number): number {
  let bits = value & 0xff;
  let count = 0;
  while (bits) {
    count += bits & 1;
    bits >>= 1;
  }
  return count;
}
