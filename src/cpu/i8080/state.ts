/**
 * Per-CPU architectural state: one flag register and one register file.
 *
 * An execution engine creates one of these per emulated 8080 and funnels
 * every register/flag mutation through it. Instances share nothing.
 */

import { ConditionFlags } from './flags';
import { RegisterFile } from './registers';
import { Reg, type I8080StateSnapshot, type SignTest } from './types';

export interface I8080StateOptions {
  /** Negativity test used by setSign. Defaults to bit 7 set. */
  signTest?: SignTest;
}

export class I8080State {
  readonly flags: ConditionFlags;
  readonly registers: RegisterFile;

  constructor(options: I8080StateOptions = {}) {
    this.flags = new ConditionFlags(options.signTest);
    this.registers = new RegisterFile();
  }

  /** Power-on state: registers 0, flags 0x02. */
  reset(): void {
    this.flags.reset();
    this.registers.reset();
  }

  // PSW: A in the high byte, flag byte in the low byte (PUSH/POP PSW)
  get psw(): number {
    return (this.registers.get(Reg.A) << 8) | this.flags.value;
  }
  set psw(v: number) {
    this.registers.set(Reg.A, (v >> 8) & 0xff);
    this.flags.load(v & 0xff);
  }

  snapshot(): I8080StateSnapshot {
    return { ...this.registers.snapshot(), f: this.flags.value };
  }
}
