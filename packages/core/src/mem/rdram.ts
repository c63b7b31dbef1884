import { readU32BEWrapped, writeU32BEWrapped } from '../utils/bit.js';
import { parseHeader, type RomDescriptor } from '../rom/header.js';
import type { Logger } from '../cpu/cpu.js';
import type { Device } from './bus.js';

export const MB = 1024 * 1024;
// Strips the KSEG0/KSEG1 segment bits so every mirror lands on the same bytes
export const RDRAM_ADDRESS_MASK = 0x1FFFFFFF;

export class RDRAM implements Device {
  readonly bytes: Uint8Array;
  readonly size: number;
  // Copy of the last loaded image, for front ends that want to inspect it
  rom: Uint8Array = new Uint8Array(0);

  constructor(sizeMB = 4, private readonly log?: Logger) {
    if (!Number.isInteger(sizeMB) || sizeMB < 1) {
      throw new RangeError(`RDRAM size must be a positive number of MiB, got ${sizeMB}`);
    }
    this.size = sizeMB * MB;
    this.bytes = new Uint8Array(this.size);
  }

  offsetOf(addr: number): number {
    return ((addr & RDRAM_ADDRESS_MASK) >>> 0) % this.size;
  }

  readU32(addr: number): number {
    return readU32BEWrapped(this.bytes, this.offsetOf(addr));
  }

  writeU32(addr: number, value: number): void {
    writeU32BEWrapped(this.bytes, this.offsetOf(addr), value >>> 0);
  }

  // Copies the image from offset 0; images larger than RDRAM wrap around and
  // later bytes overwrite earlier ones.
  loadROM(data: Uint8Array): RomDescriptor {
    this.rom = data.slice();
    if (data.length <= this.size) {
      this.bytes.set(data, 0);
    } else {
      for (let i = 0; i < data.length; i++) this.bytes[i % this.size] = data[i] ?? 0;
    }
    this.log?.(`[rdram] Loaded ROM (${data.length} bytes)`);
    return parseHeader(data);
  }
}
