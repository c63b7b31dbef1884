import type { System } from './system.js';

export type FrameLoopResult = {
  frames: number;
  cycles: number;
  instructions: number;
  pc: number;
};

export function runFrames(sys: System, frames: number): FrameLoopResult {
  for (let i = 0; i < frames; i++) sys.stepFrame();
  const { cycles, instructions, pc } = sys.cpu;
  return { frames, cycles, instructions, pc };
}

export type FrameTimerOptions = {
  intervalMs?: number;
  onFrame?: (frame: number, sys: System) => void;
};

export interface FrameTimer {
  readonly frames: number;
  readonly running: boolean;
  stop(): void;
}

// Drives stepFrame on a timer like a front end's ~60 Hz tick. Stopping is coarse:
// the current frame always finishes, no further frames start.
export function startFrameLoop(sys: System, opts: FrameTimerOptions = {}): FrameTimer {
  const intervalMs = opts.intervalMs ?? 16;
  let frames = 0;
  let handle: ReturnType<typeof setInterval> | null = setInterval(() => {
    sys.stepFrame();
    frames++;
    opts.onFrame?.(frames, sys);
  }, intervalMs);

  return {
    get frames() { return frames; },
    get running() { return handle !== null; },
    stop() {
      if (handle === null) return;
      clearInterval(handle);
      handle = null;
    },
  };
}
