import { readU32BE } from '../utils/bit.js';
import { detectByteOrder, type RomByteOrder } from './byteorder.js';

export type RomRegion = 'NTSC' | 'PAL' | 'Unknown';

export interface RomDescriptor {
  size: number;
  title: string;
  byteOrder: RomByteOrder;
  initialPC: number; // header entry point at 0x08, 0 when the image is too short
  crc1: number;
  crc2: number;
  countryCode: number; // raw byte at 0x3E
  region: RomRegion;
  version: number; // mask ROM revision at 0x3F
}

export const ROM_HEADER_SIZE = 64;
const TITLE_OFFSET = 0x20;
const TITLE_LENGTH = 20;
const CRC1_OFFSET = 0x10;
const CRC2_OFFSET = 0x14;
const COUNTRY_OFFSET = 0x3e;
const VERSION_OFFSET = 0x3f;

// Country code letters by video standard
const PAL_CODES = new Set(['D', 'F', 'I', 'P', 'S', 'U', 'X', 'Y']);
const NTSC_CODES = new Set(['A', 'B', 'C', 'E', 'J', 'K', 'N']);

export function regionOf(countryCode: number): RomRegion {
  const c = String.fromCharCode(countryCode & 0xff);
  if (PAL_CODES.has(c)) return 'PAL';
  if (NTSC_CODES.has(c)) return 'NTSC';
  return 'Unknown';
}

// Short or odd images are accepted; they just get placeholder fields.
export function parseHeader(rom: Uint8Array): RomDescriptor {
  const byteOrder = detectByteOrder(rom);
  if (rom.length < ROM_HEADER_SIZE) {
    return {
      size: rom.length,
      title: 'Invalid ROM',
      byteOrder,
      initialPC: 0,
      crc1: 0,
      crc2: 0,
      countryCode: 0,
      region: 'NTSC',
      version: 0,
    };
  }
  const initialPC = readU32BE(rom, 0x8) >>> 0;
  let title = '';
  for (const b of rom.subarray(TITLE_OFFSET, TITLE_OFFSET + TITLE_LENGTH)) {
    if (b === 0) break;
    if (b < 0x80) title += String.fromCharCode(b);
  }
  title = title.trim();
  const countryCode = rom[COUNTRY_OFFSET] ?? 0;
  return {
    size: rom.length,
    title: title || 'Demo ROM',
    byteOrder,
    initialPC,
    crc1: readU32BE(rom, CRC1_OFFSET),
    crc2: readU32BE(rom, CRC2_OFFSET),
    countryCode,
    region: regionOf(countryCode),
    version: rom[VERSION_OFFSET] ?? 0,
  };
}
