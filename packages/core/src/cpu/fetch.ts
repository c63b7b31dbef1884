import type { Bus } from '../mem/bus.js';
import type { RDRAM } from '../mem/rdram.js';

export interface InstructionFetcher {
  fetch(addr: number): number;
}

export function busFetcher(bus: Bus): InstructionFetcher {
  return { fetch: (addr) => bus.readU32(addr) };
}

// Skips the device table and reads the backing store; used by the unpipelined setup
export function directFetcher(rdram: RDRAM): InstructionFetcher {
  return { fetch: (addr) => rdram.readU32(addr) };
}
