import { toUint32 } from '../utils/bit.js';
import { Cop0 } from './cop0.js';

// Reset vector inside the PIF boot ROM (KSEG1)
export const RESET_PC = 0xBFC00000 >>> 0;

export class RegisterFile {
  // Uint32Array storage gives modulo 2^32 on every store
  readonly gpr = new Uint32Array(32);
  readonly fpr = new Float64Array(32);
  readonly cop0 = new Cop0();
  private _pc = RESET_PC;
  private _hi = 0 >>> 0;
  private _lo = 0 >>> 0;

  get pc(): number { return this._pc; }
  set pc(value: number) { this._pc = toUint32(value); }

  get hi(): number { return this._hi; }
  set hi(value: number) { this._hi = toUint32(value); }

  get lo(): number { return this._lo; }
  set lo(value: number) { this._lo = toUint32(value); }

  getGpr(i: number): number {
    if ((i >>> 0) >= 32) return 0;
    return (this.gpr[i] ?? 0) >>> 0;
  }

  // Index 0 is not pinned here; the pipeline's writeback is what skips it.
  setGpr(i: number, value: number): void {
    if ((i >>> 0) >= 32) return;
    this.gpr[i] = toUint32(value);
  }
}
