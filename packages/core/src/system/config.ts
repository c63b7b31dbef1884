import { BOOT_VECTOR, DEFAULT_TRACE_INTERVAL, type Logger } from '../cpu/cpu.js';
import { DEFAULT_PIPELINE_DEPTH } from '../cpu/pipeline.js';
import { ConfigError } from '../errors.js';

// One video frame's worth of CPU cycles
export const DEFAULT_CYCLES_PER_FRAME = 1000;
export const DEFAULT_MEMORY_MB = 4;

// 'direct' reads the backing store without going through the bus
export type FetchMode = 'bus' | 'direct';

export type SystemOptions = {
  memoryMB: number;
  cyclesPerFrame: number;
  stages: number; // 1 = unpipelined
  fetch: FetchMode;
  traceInterval: number;
  bootVector: number;
  logger?: Logger;
};

export const DEFAULT_SYSTEM_OPTIONS: Readonly<SystemOptions> = Object.freeze({
  memoryMB: DEFAULT_MEMORY_MB,
  cyclesPerFrame: DEFAULT_CYCLES_PER_FRAME,
  stages: DEFAULT_PIPELINE_DEPTH,
  fetch: 'bus',
  traceInterval: DEFAULT_TRACE_INTERVAL,
  bootVector: BOOT_VECTOR,
});

function positiveInt(option: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(option, `expected a positive integer, got ${value}`);
  }
  return value;
}

export function resolveSystemOptions(partial: Partial<SystemOptions> = {}): SystemOptions {
  const o: SystemOptions = { ...DEFAULT_SYSTEM_OPTIONS, ...partial };
  positiveInt('memoryMB', o.memoryMB);
  positiveInt('cyclesPerFrame', o.cyclesPerFrame);
  positiveInt('stages', o.stages);
  positiveInt('traceInterval', o.traceInterval);
  if (o.fetch !== 'bus' && o.fetch !== 'direct') {
    throw new ConfigError('fetch', `expected 'bus' or 'direct', got ${String(o.fetch)}`);
  }
  if (!Number.isInteger(o.bootVector) || o.bootVector < 0 || o.bootVector > 0xFFFFFFFF || (o.bootVector & 3) !== 0) {
    throw new ConfigError('bootVector', `expected a 4-byte aligned 32-bit address, got ${o.bootVector}`);
  }
  return o;
}

// Env flags follow the usual convention: unset, empty, '0' and 'false' are off
export function envFlag(value: string | undefined): boolean {
  if (value === undefined) return false;
  const v = value.trim().toLowerCase();
  return v !== '' && v !== '0' && v !== 'false';
}
