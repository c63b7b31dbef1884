import { System, hex32, parseHeader, runFrames, type SystemOptions } from '@ultrasim/core';

export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (let i = 0; i < data.length; i++) {
    let c = (crc ^ (data[i] ?? 0)) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}

// Loaded when no ROM path is given: one word followed by 100 zero bytes
export function demoRom(): Uint8Array {
  const rom = new Uint8Array(104);
  rom.set([0x37, 0x82, 0x00, 0x08], 0);
  return rom;
}

export type RomInfo = {
  size: number;
  title: string;
  byteOrder: string;
  initialPC: string;
  crc1: string;
  crc2: string;
  region: string;
  version: string;
  // Whole-file checksum, handy for telling dumps apart
  crc32: string;
};

export function romInfo(rom: Uint8Array): RomInfo {
  const h = parseHeader(rom);
  return {
    size: h.size,
    title: h.title,
    byteOrder: h.byteOrder,
    initialPC: `0x${hex32(h.initialPC)}`,
    crc1: hex32(h.crc1),
    crc2: hex32(h.crc2),
    region: h.region,
    version: `1.${h.version}`,
    crc32: crc32(rom),
  };
}

export type RunSummary = {
  rom: RomInfo;
  frames: number;
  cycles: number;
  instructions: number;
  booted: boolean;
  pc: string;
  // Non-zero general purpose registers only, keyed r<N>
  gpr: Record<string, string>;
};

export function runHeadless(rom: Uint8Array, frames: number, opts: Partial<SystemOptions> = {}): RunSummary {
  const sys = new System(opts);
  sys.loadROM(rom);
  sys.reset();
  const res = runFrames(sys, frames);
  const snap = sys.cpu.snapshot();
  const gpr: Record<string, string> = {};
  snap.gpr.forEach((v, i) => {
    if (v !== 0) gpr[`r${i}`] = `0x${hex32(v)}`;
  });
  return {
    rom: romInfo(rom),
    frames: res.frames,
    cycles: res.cycles,
    instructions: res.instructions,
    booted: snap.booted,
    pc: `0x${hex32(res.pc)}`,
    gpr,
  };
}
