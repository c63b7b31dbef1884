export type RomByteOrder = 'z64' | 'n64' | 'v64' | 'unknown';

export function detectByteOrder(bytes: Uint8Array): RomByteOrder {
  if (bytes.length < 4) return 'unknown';
  const magic = ((bytes[0]! << 24) | (bytes[1]! << 16) | (bytes[2]! << 8) | bytes[3]!) >>> 0;
  switch (magic) {
    case 0x80371240: return 'z64'; // big-endian
    case 0x40123780: return 'n64'; // little-endian words
    case 0x37804012: return 'v64'; // byteswapped halfwords
    default: return 'unknown';
  }
}

// Never applied by loadROM; callers opt in before loading.
export function normalizeRomToBigEndian(src: Uint8Array): { data: Uint8Array; order: RomByteOrder } {
  const order = detectByteOrder(src);
  const out = new Uint8Array(src);
  if (order === 'n64') {
    for (let i = 0; i + 3 < src.length; i += 4) {
      out[i] = src[i + 3]!;
      out[i + 1] = src[i + 2]!;
      out[i + 2] = src[i + 1]!;
      out[i + 3] = src[i]!;
    }
  } else if (order === 'v64') {
    for (let i = 0; i + 1 < src.length; i += 2) {
      out[i] = src[i + 1]!;
      out[i + 1] = src[i]!;
    }
  }
  return { data: out, order };
}
