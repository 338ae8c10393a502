export { ConditionFlags } from './flags';
export {
  RegisterFile, PAIR_BC, PAIR_DE, PAIR_HL,
  registerFromOpcode, registerName, type RegisterName,
} from './registers';
export { I8080State, type I8080StateOptions } from './state';
export {
  I8080StateError, InvalidFlagError, FlagOutOfRangeError, InvalidRegisterError,
  InvalidPairError, KeyTypeError, InvalidFlagValueError,
  type I8080StateErrorKind,
} from './errors';
export {
  FlagBit, Reg, FLAG_ORDER,
  FLAG_CY, FLAG_P, FLAG_AC, FLAG_Z, FLAG_S, FLAG_ALWAYS_ONE, FLAG_MASK,
} from './types';
export type {
  RegisterCode, StorableRegister, RegisterPair, SignTest,
  RegisterSnapshot, I8080StateSnapshot,
} from './types';
