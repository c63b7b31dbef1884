import { afterEach, describe, it, expect, vi } from 'vitest';
import { runFrames, startFrameLoop } from '../src/system/frame_loop.js';
import { System } from '../src/system/system.js';

describe('frame loop', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runFrames steps whole frames and summarises', () => {
    const sys = new System({ memoryMB: 1 });
    expect(runFrames(sys, 3)).toEqual({ frames: 3, cycles: 3000, instructions: 3000, pc: 0x800032e0 });
  });

  it('startFrameLoop steps one frame per tick until stopped', () => {
    vi.useFakeTimers();
    const sys = new System({ memoryMB: 1, cyclesPerFrame: 10 });
    const seen: number[] = [];
    const timer = startFrameLoop(sys, { intervalMs: 16, onFrame: (n) => seen.push(n) });

    vi.advanceTimersByTime(48);
    expect(timer.frames).toBe(3);
    expect(seen).toEqual([1, 2, 3]);
    expect(sys.cpu.cycles).toBe(30);
    expect(timer.running).toBe(true);

    timer.stop();
    vi.advanceTimersByTime(100);
    expect(timer.running).toBe(false);
    expect(timer.frames).toBe(3);
    expect(sys.cpu.cycles).toBe(30);
    timer.stop();
  });
});
