/**
 * Errors raised by the flag register and register file accessors.
 *
 * Every error is thrown synchronously to the caller; nothing in the state
 * core catches them. `kind` tells an execution engine which check failed
 * without matching on class names.
 */

export type I8080StateErrorKind =
  | 'InvalidFlag'
  | 'OutOfRangeFlag'
  | 'InvalidRegister'
  | 'InvalidPair'
  | 'TypeMismatch'
  | 'InvalidValue';

export class I8080StateError extends Error {
  readonly kind: I8080StateErrorKind;

  constructor(kind: I8080StateErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** `set`/`clear` called with a bit that is not a condition flag. */
export class InvalidFlagError extends I8080StateError {
  constructor(readonly bit: number) {
    super('InvalidFlag', `${bit}: Invalid condition flag`);
  }
}

/** Indexed flag access with a bit that is not a condition flag. */
export class FlagOutOfRangeError extends I8080StateError {
  constructor(readonly bit: number) {
    super('OutOfRangeFlag', `Flag bit ${bit} out of range`);
  }
}

export class InvalidRegisterError extends I8080StateError {
  constructor(readonly code: number) {
    super('InvalidRegister', `Invalid register code ${code}`);
  }
}

export class InvalidPairError extends I8080StateError {
  constructor(readonly code: number) {
    super('InvalidPair', `Invalid register pair ${code}`);
  }
}

/** Indexed access with a key that is not an integer. */
export class KeyTypeError extends I8080StateError {
  constructor(expected: string, readonly key: unknown) {
    super('TypeMismatch', `Expected ${expected}, got ${String(key)}`);
  }
}

export class InvalidFlagValueError extends I8080StateError {
  constructor(readonly value: number) {
    super('InvalidValue', `Flags can only be 1 or 0, got ${value}`);
  }
}
