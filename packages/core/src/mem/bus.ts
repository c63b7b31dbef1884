// Anything that answers 32-bit reads and writes can sit on the bus.
// Handlers receive the full (aligned) bus address, not an offset.
export interface Device {
  readU32(addr: number): number;
  writeU32(addr: number, value: number): void;
}

type Mapping = {
  base: number;
  size: number;
  device: Device;
};

// Address-range device registry. A device claims every 4-byte step of
// [base, base + size); later registrations win where ranges overlap.
export class Bus {
  private mappings: Mapping[] = [];

  registerDevice(base: number, size: number, device: Device): void {
    if ((base & 3) !== 0) {
      throw new RangeError(`device base 0x${(base >>> 0).toString(16)} is not 4-byte aligned`);
    }
    if (size <= 0) return;
    this.mappings.push({ base: base >>> 0, size, device });
  }

  // Unaligned addresses are masked down to the word boundary.
  private lookup(addr: number): Device | null {
    const a = (addr & ~3) >>> 0;
    for (let i = this.mappings.length - 1; i >= 0; i--) {
      const m = this.mappings[i];
      if (!m) continue;
      const off = (a - m.base) >>> 0;
      if (off < m.size) return m.device;
    }
    return null;
  }

  readU32(addr: number): number {
    const device = this.lookup(addr);
    if (!device) return 0;
    return device.readU32((addr & ~3) >>> 0) >>> 0;
  }

  writeU32(addr: number, value: number): void {
    const device = this.lookup(addr);
    if (!device) return;
    device.writeU32((addr & ~3) >>> 0, value >>> 0);
  }
}
