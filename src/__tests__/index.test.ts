import { describe, it, expect } from 'vitest';
import {
  I8080State, I8080StateError, InvalidPairError, PAIR_HL, Reg, isNegative,
} from '@/index';

describe('package entry', () => {
  it('resolves an M operand through HL', () => {
    const state = new I8080State({ signTest: isNegative });
    state.registers.setValueForPair(PAIR_HL, 0x3c00);
    expect(state.registers.addressFromPair(Reg.H)).toBe(0x3c00);
  });

  it('exports a common base for state errors', () => {
    const err = new InvalidPairError(7);
    expect(err).toBeInstanceOf(I8080StateError);
    expect(err.name).toBe('InvalidPairError');
    expect(err.message).toBe('Invalid register pair 7');
  });
});
