export type Instruction = {
  readonly opcode: number; // 6 bits
  readonly rs: number;
  readonly rt: number;
  readonly rd: number;
  readonly immediate: number; // 16 bits, zero-extended
  readonly target: number; // 26-bit J-type target
};

// The one opcode family the execute stage implements
export const OPCODE_ADDIU = 0x08;

export const NOP: Instruction = Object.freeze({ opcode: 0, rs: 0, rt: 0, rd: 0, immediate: 0, target: 0 });

export function decodeInstruction(word: number): Instruction {
  const w = word >>> 0;
  return {
    opcode: (w >>> 26) & 0x3f,
    rs: (w >>> 21) & 0x1f,
    rt: (w >>> 16) & 0x1f,
    rd: (w >>> 11) & 0x1f,
    immediate: w & 0xffff,
    target: w & 0x03ffffff,
  };
}
