import { describe, it, expect } from 'vitest';
import { ConfigError, System } from '@ultrasim/core';
import { parseArgs, parseFrames, parseNum, systemOptionsFromArgs } from '../src/args.js';
import { crc32, demoRom, romInfo, runHeadless } from '../src/lib.js';

describe('headless helpers', () => {
  it('computes the standard CRC-32 check value', () => {
    expect(crc32(new TextEncoder().encode('123456789'))).toBe('cbf43926');
    expect(crc32(new Uint8Array(0))).toBe('00000000');
  });

  it('builds the demo ROM and describes it', () => {
    const rom = demoRom();
    expect(rom.length).toBe(104);
    expect(Array.from(rom.subarray(0, 5))).toEqual([0x37, 0x82, 0x00, 0x08, 0x00]);
    expect(romInfo(rom)).toEqual({
      size: 104,
      title: 'Demo ROM',
      byteOrder: 'unknown',
      initialPC: '0x00000000',
      crc1: '00000000',
      crc2: '00000000',
      region: 'Unknown',
      version: '1.0',
      crc32: crc32(rom),
    });
  });

  it('runs a frame of the demo ROM', () => {
    const summary = runHeadless(demoRom(), 1, { memoryMB: 1 });
    expect(summary).toMatchObject({
      frames: 1,
      cycles: 1000,
      instructions: 1000,
      booted: true,
      pc: '0x800013A0',
      gpr: {},
    });
  });

  it('reports registers written by the program', () => {
    const rom = new Uint8Array(0x408);
    rom.set([0x20, 0x00, 0x28, 0x12], 0x400);
    const summary = runHeadless(rom, 1, { memoryMB: 1, stages: 1, fetch: 'direct' });
    expect(summary.gpr).toEqual({ r5: '0x00002812' });
  });
});

describe('CLI argument parsing', () => {
  it('splits positionals, valued options and bare flags', () => {
    expect(parseArgs(['game.z64', '--frames', '3', '--trace', '--fetch', 'direct'])).toEqual({
      positional: ['game.z64'],
      opts: { frames: '3', trace: '1', fetch: 'direct' },
    });
  });

  it('parses decimal and hex numbers with a fallback', () => {
    expect(parseNum('0x10', 0)).toBe(16);
    expect(parseNum(' 42 ', 0)).toBe(42);
    expect(parseNum(undefined, 7)).toBe(7);
  });

  it('keeps negative numbers negative and turns junk into NaN', () => {
    expect(parseNum('-1', 1)).toBe(-1);
    expect(parseNum('abc', 5)).toBeNaN();
    expect(parseNum('', 5)).toBeNaN();
  });

  it('rejects negative and non-numeric sizes as config errors', () => {
    for (const bad of ['-1', 'abc']) {
      const opts = systemOptionsFromArgs({ 'memory-mb': bad, stages: bad }, {});
      expect(() => new System(opts)).toThrow(ConfigError);
      expect(() => new System(opts)).toThrow(/^memoryMB: /);
    }
    expect(() => new System(systemOptionsFromArgs({ stages: '-1' }, {}))).toThrow('stages: expected a positive integer, got -1');
  });

  it('requires a positive whole frame count', () => {
    expect(parseFrames(undefined)).toBe(1);
    expect(parseFrames('0x3')).toBe(3);
    expect(() => parseFrames('-1')).toThrow(ConfigError);
    expect(() => parseFrames('abc')).toThrow('frames: expected a positive integer, got abc');
    expect(() => parseFrames('1.5')).toThrow(ConfigError);
  });

  it('maps flags onto system options', () => {
    expect(systemOptionsFromArgs({ 'memory-mb': '2', stages: '1', fetch: 'direct', 'cycles-per-frame': '0x20' }, {})).toEqual({
      memoryMB: 2,
      stages: 1,
      fetch: 'direct',
      cyclesPerFrame: 32,
    });
  });

  it('enables tracing from the flag or the environment', () => {
    expect(systemOptionsFromArgs({}, {}).logger).toBeUndefined();
    expect(typeof systemOptionsFromArgs({ trace: '1' }, {}).logger).toBe('function');
    expect(typeof systemOptionsFromArgs({}, { ULTRASIM_TRACE: '1' }).logger).toBe('function');
    expect(systemOptionsFromArgs({}, { ULTRASIM_TRACE: '0' }).logger).toBeUndefined();
  });

  it('rejects unknown fetch modes', () => {
    expect(() => systemOptionsFromArgs({ fetch: 'dma' }, {})).toThrow(ConfigError);
  });
});
