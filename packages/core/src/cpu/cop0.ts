export type Cop0Reg = 8 | 12 | 13 | 14;

export const COP0_BADVADDR = 8;
export const COP0_STATUS = 12;
export const COP0_CAUSE = 13;
export const COP0_EPC = 14;

// Power-on Status: CU0|CU1 usable, FR set
export const STATUS_RESET_VALUE = 0x34000000 >>> 0;

// Control register block: Status (12), Cause (13), EPC (14), BadVAddr (8).
// Nothing in the core raises exceptions yet, so these only hold values for display.
export class Cop0 {
  status = STATUS_RESET_VALUE;
  cause = 0 >>> 0;
  epc = 0 >>> 0;
  badVAddr = 0 >>> 0;

  read(reg: Cop0Reg): number {
    switch (reg) {
      case COP0_STATUS: return this.status >>> 0;
      case COP0_CAUSE: return this.cause >>> 0;
      case COP0_EPC: return this.epc >>> 0;
      case COP0_BADVADDR: return this.badVAddr >>> 0;
    }
  }

  write(reg: Cop0Reg, value: number): void {
    const v = value >>> 0;
    switch (reg) {
      case COP0_STATUS: this.status = v; return;
      case COP0_CAUSE: this.cause = v; return;
      case COP0_EPC: this.epc = v; return;
      case COP0_BADVADDR: this.badVAddr = v; return;
    }
  }
}
