export function toUint32(x: number): number {
  return x >>> 0;
}

// Read a big-endian word, wrapping each byte index within the buffer
export function readU32BEWrapped(bytes: Uint8Array, offset: number): number {
  const n = bytes.length;
  const b0 = bytes[offset % n] ?? 0;
  const b1 = bytes[(offset + 1) % n] ?? 0;
  const b2 = bytes[(offset + 2) % n] ?? 0;
  const b3 = bytes[(offset + 3) % n] ?? 0;
  return ((b0 << 24) | (b1 << 16) | (b2 << 8) | b3) >>> 0;
}

export function writeU32BEWrapped(bytes: Uint8Array, offset: number, value: number): void {
  const n = bytes.length;
  bytes[offset % n] = (value >>> 24) & 0xff;
  bytes[(offset + 1) % n] = (value >>> 16) & 0xff;
  bytes[(offset + 2) % n] = (value >>> 8) & 0xff;
  bytes[(offset + 3) % n] = value & 0xff;
}

export function readU32BE(bytes: Uint8Array, offset: number): number {
  const b0 = bytes[offset]!;
  const b1 = bytes[offset + 1]!;
  const b2 = bytes[offset + 2]!;
  const b3 = bytes[offset + 3]!;
  return (
    (b0 << 24) |
    (b1 << 16) |
    (b2 << 8) |
    (b3 << 0)
  ) >>> 0;
}

export function hex32(x: number): string {
  return (x >>> 0).toString(16).toUpperCase().padStart(8, '0');
}
