import type { Byte, Word } from "@core/cpu/types";
import { decode } from "@core/cpu/decoder";

export type ReadByteFn = (addr: Word) => Byte;

export interface Disasm {
  opcode: Word;
  mnemonic: string; // "???" for words the interpreter does not implement
  operand: string;
  text: string;
}

const reg = (r: number) => `V${r.toString(16).toUpperCase()}`;
const h2 = (v: number) => v.toString(16).toUpperCase().padStart(2, "0");
const h3 = (v: number) => v.toString(16).toUpperCase().padStart(3, "0");
const h4 = (v: number) => v.toString(16).toUpperCase().padStart(4, "0");

function ops(word: Word): [string, string] {
  const d = decode(word);
  const { x, y, n, nn, nnn } = d;
  switch (d.opClass) {
    case 0x0000:
      if (d.opcode === 0x00E0) return ["CLS", ""];
      if (d.opcode === 0x00EE) return ["RET", ""];
      break;
    case 0x1000: return ["JP", `$${h3(nnn)}`];
    case 0x2000: return ["CALL", `$${h3(nnn)}`];
    case 0x3000: return ["SE", `${reg(x)}, #$${h2(nn)}`];
    case 0x4000: return ["SNE", `${reg(x)}, #$${h2(nn)}`];
    case 0x5000: return ["SE", `${reg(x)}, ${reg(y)}`];
    case 0x6000: return ["LD", `${reg(x)}, #$${h2(nn)}`];
    case 0x7000: return ["ADD", `${reg(x)}, #$${h2(nn)}`];
    case 0x8000: {
      const alu: Record<number, string> = { 0x0: "LD", 0x1: "OR", 0x2: "AND", 0x3: "XOR", 0x4: "ADD", 0x5: "SUB", 0x6: "SHR", 0x7: "SUBN", 0xE: "SHL" };
      const m = alu[n];
      if (m) return [m, `${reg(x)}, ${reg(y)}`];
      break;
    }
    case 0x9000: return ["SNE", `${reg(x)}, ${reg(y)}`];
    case 0xA000: return ["LD", `I, $${h3(nnn)}`];
    case 0xB000: return ["JP", `V0, $${h3(nnn)}`];
    case 0xC000: return ["RND", `${reg(x)}, #$${h2(nn)}`];
    case 0xD000: return ["DRW", `${reg(x)}, ${reg(y)}, ${n.toString(16).toUpperCase()}`];
    case 0xE000:
      if (nn === 0x9E) return ["SKP", reg(x)];
      if (nn === 0xA1) return ["SKNP", reg(x)];
      break;
    case 0xF000:
      switch (nn) {
        case 0x07: return ["LD", `${reg(x)}, DT`];
        case 0x0A: return ["LD", `${reg(x)}, K`];
        case 0x15: return ["LD", `DT, ${reg(x)}`];
        case 0x18: return ["LD", `ST, ${reg(x)}`];
        case 0x1E: return ["ADD", `I, ${reg(x)}`];
        case 0x29: return ["LD", `F, ${reg(x)}`];
        case 0x33: return ["LD", `B, ${reg(x)}`];
        case 0x55: return ["LD", `[I], ${reg(x)}`];
        case 0x65: return ["LD", `${reg(x)}, [I]`];
      }
      break;
  }
  return ["???", `$${h4(d.opcode)}`];
}

export function disassemble(word: Word): Disasm {
  const [mnemonic, operand] = ops(word);
  return { opcode: word & 0xFFFF, mnemonic, operand, text: operand ? `${mnemonic} ${operand}` : mnemonic };
}

export function disasmAt(read: ReadByteFn, pc: Word): Disasm {
  const word = ((read(pc & 0xFFFF) & 0xFF) << 8) | (read((pc + 1) & 0xFFFF) & 0xFF);
  return disassemble(word);
}

// "$0200  60 05  LD V0, #$05"
export function formatTraceLine(pc: Word, d: Disasm): string {
  return `$${h4(pc)}  ${h2(d.opcode >> 8)} ${h2(d.opcode & 0xFF)}  ${d.text}`;
}
