import { hex32 } from '../utils/bit.js';
import { COP0_BADVADDR, COP0_CAUSE, COP0_EPC, COP0_STATUS } from './cop0.js';
import type { InstructionFetcher } from './fetch.js';
import { NOP, decodeInstruction, type Instruction } from './instruction.js';
import { DEFAULT_PIPELINE_DEPTH, Pipeline } from './pipeline.js';
import { RegisterFile } from './registers.js';

export type Logger = (line: string) => void;

// Where the PIF hands off to the game after IPL
export const BOOT_VECTOR = 0x80000400 >>> 0;
export const DEFAULT_TRACE_INTERVAL = 500;
export const FETCH_ADDRESS_MASK = 0x1FFFFFFF;

export type CpuCoreOptions = {
  fetcher: InstructionFetcher;
  stages?: number;
  logger?: Logger;
  bootVector?: number;
  traceInterval?: number;
};

export type CpuSnapshot = {
  readonly cycles: number;
  readonly instructions: number;
  readonly booted: boolean;
  readonly pc: number;
  readonly hi: number;
  readonly lo: number;
  readonly gpr: readonly number[];
  readonly cop0: { readonly status: number; readonly cause: number; readonly epc: number; readonly badVAddr: number };
};

export class CpuCore {
  regs = new RegisterFile();
  readonly pipeline: Pipeline;
  cycles = 0;
  instructions = 0;
  // Reserved: nothing raises exceptions yet
  exceptionPending = false;
  booted = false;

  private readonly fetcher: InstructionFetcher;
  private readonly logger: Logger | undefined;
  private readonly bootVector: number;
  private readonly traceInterval: number;

  constructor(opts: CpuCoreOptions) {
    this.fetcher = opts.fetcher;
    this.logger = opts.logger;
    this.bootVector = (opts.bootVector ?? BOOT_VECTOR) >>> 0;
    this.traceInterval = opts.traceInterval ?? DEFAULT_TRACE_INTERVAL;
    this.pipeline = new Pipeline(opts.stages ?? DEFAULT_PIPELINE_DEPTH);
  }

  get pc(): number {
    return this.regs.pc;
  }

  reset(): void {
    this.regs = new RegisterFile();
    this.pipeline.reset();
    this.cycles = 0;
    this.instructions = 0;
    this.exceptionPending = false;
    this.booted = false;
    this.logger?.('[cpu] Core reset');
  }

  // One fetch/decode/advance cycle. Returns the PC after the cycle.
  step(): number {
    this.cycles++;
    this.instructions++;

    let instr: Instruction;
    if (!this.booted) {
      if (this.cycles === 1) {
        this.regs.pc = this.bootVector;
        this.booted = true;
        this.logger?.(`[cpu] Booted to 0x${hex32(this.bootVector)}`);
      }
      instr = NOP;
    } else {
      // PC was already advanced by the previous cycle, so the word to fetch sits 4 bytes back
      const addr = ((this.regs.pc - 4) & FETCH_ADDRESS_MASK) >>> 0;
      instr = decodeInstruction(this.fetcher.fetch(addr));
    }

    const next = this.pipeline.advance(instr, this.regs);

    if (this.logger && this.cycles % this.traceInterval === 0) {
      this.logger(`[cpu] Cycle ${String(this.cycles).padStart(8, '0')} | PC=0x${hex32(this.regs.pc)}`);
    }

    return next ?? this.regs.pc;
  }

  snapshot(): CpuSnapshot {
    const c = this.regs.cop0;
    return {
      cycles: this.cycles,
      instructions: this.instructions,
      booted: this.booted,
      pc: this.regs.pc,
      hi: this.regs.hi,
      lo: this.regs.lo,
      gpr: Array.from(this.regs.gpr),
      cop0: {
        status: c.read(COP0_STATUS),
        cause: c.read(COP0_CAUSE),
        epc: c.read(COP0_EPC),
        badVAddr: c.read(COP0_BADVADDR),
      },
    };
  }
}
