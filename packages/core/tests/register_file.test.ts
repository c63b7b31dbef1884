import { describe, it, expect } from 'vitest';
import { COP0_CAUSE, COP0_EPC, COP0_STATUS } from '../src/cpu/cop0.js';
import { RESET_PC, RegisterFile } from '../src/cpu/registers.js';

describe('RegisterFile', () => {
  it('starts at the reset vector with cleared registers', () => {
    const r = new RegisterFile();
    expect(r.pc).toBe(0xbfc00000);
    expect(RESET_PC).toBe(0xbfc00000);
    expect(Array.from(r.gpr).every((v) => v === 0)).toBe(true);
    expect(Array.from(r.fpr).every((v) => v === 0)).toBe(true);
    expect(r.hi).toBe(0);
    expect(r.lo).toBe(0);
    expect(r.cop0.read(COP0_STATUS)).toBe(0x34000000);
    expect(r.cop0.read(COP0_CAUSE)).toBe(0);
  });

  it('wraps integer registers and PC to 32 bits', () => {
    const r = new RegisterFile();
    r.setGpr(5, 0x100000005);
    expect(r.getGpr(5)).toBe(5);
    r.setGpr(6, -1);
    expect(r.getGpr(6)).toBe(0xffffffff);
    r.pc = 0xfffffffc + 8;
    expect(r.pc).toBe(4);
    r.hi = -2;
    r.lo = 0x1_0000_0001;
    expect(r.hi).toBe(0xfffffffe);
    expect(r.lo).toBe(1);
  });

  it('does not pin register 0 on direct writes', () => {
    // Only pipeline writeback skips index 0; the register file itself stores anything.
    const r = new RegisterFile();
    r.setGpr(0, 7);
    expect(r.getGpr(0)).toBe(7);
  });

  it('ignores out-of-range register indices', () => {
    const r = new RegisterFile();
    r.setGpr(32, 1);
    expect(r.getGpr(32)).toBe(0);
  });

  it('stores control registers as 32-bit values', () => {
    const r = new RegisterFile();
    r.cop0.write(COP0_EPC, -4);
    expect(r.cop0.read(COP0_EPC)).toBe(0xfffffffc);
    expect(r.cop0.epc).toBe(0xfffffffc);
  });
});
