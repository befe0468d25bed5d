import type { Instruction, Word } from './types';

export function decode(word: Word): Instruction {
  const opcode = word & 0xFFFF;
  return {
    opcode,
    opClass: opcode & 0xF000,
    nnn: opcode & 0x0FFF,
    nn: opcode & 0x00FF,
    n: opcode & 0x000F,
    x: (opcode >> 8) & 0x0F,
    y: (opcode >> 4) & 0x0F,
  };
}
