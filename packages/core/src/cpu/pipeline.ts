import { toUint32 } from '../utils/bit.js';
import { OPCODE_ADDIU, type Instruction } from './instruction.js';
import type { RegisterFile } from './registers.js';

export type PipelineStage = {
  readonly instr: Instruction | null;
  value: number;
};

export const DEFAULT_PIPELINE_DEPTH = 5;

function emptyStage(): PipelineStage {
  return { instr: null, value: 0 };
}

// Fixed-depth shift register. Stage 0 holds the newest instruction, stage depth-1 the
// one about to retire. Only the ADDIU family has execute logic; everything else
// passes through with value 0. There is no forwarding: a dependent instruction reads
// whatever the register file holds when it reaches the execute slot.
export class Pipeline {
  readonly depth: number;
  // Single-cycle freeze, set by the caller and consumed by the next advance()
  stall = false;
  private stages: PipelineStage[];

  constructor(depth = DEFAULT_PIPELINE_DEPTH) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`pipeline depth must be a positive integer, got ${depth}`);
    }
    this.depth = depth;
    this.stages = Array.from({ length: depth }, emptyStage);
  }

  // Execute happens one slot behind fetch; a single-stage pipeline executes in place.
  get executeIndex(): number {
    return Math.min(1, this.depth - 1);
  }

  stage(i: number): Readonly<PipelineStage> {
    const s = this.stages[i];
    if (!s) throw new RangeError(`stage ${i} out of range (depth ${this.depth})`);
    return s;
  }

  // Returns the new PC, or null when the cycle was consumed by a stall.
  // The register file is only borrowed for the duration of the call.
  advance(next: Instruction, regs: RegisterFile): number | null {
    if (this.stall) {
      this.stall = false;
      return null;
    }

    // WB
    const oldest = this.stages[this.depth - 1];
    if (oldest?.instr) {
      const rd = oldest.instr.rd;
      if (rd !== 0) regs.setGpr(rd, oldest.value);
    }

    for (let i = this.depth - 1; i > 0; i--) {
      this.stages[i] = this.stages[i - 1] ?? emptyStage();
    }
    this.stages[0] = { instr: next, value: 0 };

    regs.pc = regs.pc + 4;

    const ex = this.stages[this.executeIndex];
    if (ex?.instr && ex.instr.opcode === OPCODE_ADDIU) {
      ex.value = toUint32(regs.getGpr(ex.instr.rs) + ex.instr.immediate);
    }

    return regs.pc;
  }

  reset(): void {
    this.stall = false;
    this.stages = Array.from({ length: this.depth }, emptyStage);
  }
}
