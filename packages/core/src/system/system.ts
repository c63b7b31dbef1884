import { CpuCore } from '../cpu/cpu.js';
import { busFetcher, directFetcher } from '../cpu/fetch.js';
import { Bus } from '../mem/bus.js';
import { RDRAM } from '../mem/rdram.js';
import type { RomDescriptor } from '../rom/header.js';
import { resolveSystemOptions, type SystemOptions } from './config.js';

// Physical RDRAM plus its cached (KSEG0) and uncached (KSEG1) windows
export const RDRAM_MIRRORS = [0x00000000, 0x80000000, 0xA0000000] as const;

export class System {
  readonly cpu: CpuCore;
  readonly rdram: RDRAM;
  readonly bus: Bus;
  readonly options: SystemOptions;

  constructor(opts: Partial<SystemOptions> = {}) {
    this.options = resolveSystemOptions(opts);
    const { logger } = this.options;
    this.rdram = new RDRAM(this.options.memoryMB, logger);
    this.bus = new Bus();
    for (const base of RDRAM_MIRRORS) this.bus.registerDevice(base, this.rdram.size, this.rdram);
    this.cpu = new CpuCore({
      fetcher: this.options.fetch === 'direct' ? directFetcher(this.rdram) : busFetcher(this.bus),
      stages: this.options.stages,
      bootVector: this.options.bootVector,
      traceInterval: this.options.traceInterval,
      logger,
    });
  }

  get cyclesPerFrame(): number {
    return this.options.cyclesPerFrame;
  }

  loadROM(data: Uint8Array): RomDescriptor {
    return this.rdram.loadROM(data);
  }

  reset(): void {
    this.cpu.reset();
    this.options.logger?.('[system] Reset complete');
  }

  stepCycles(n: number): void {
    for (let i = 0; i < n; i++) this.cpu.step();
  }

  stepFrame(): void {
    this.stepCycles(this.options.cyclesPerFrame);
  }
}
