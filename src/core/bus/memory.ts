import type { Byte, Word } from '@core/cpu/types';
import { RomTooLargeError } from '@core/errors';
import font from './font.json';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START; // 3584 bytes
export const FONT_BASE = 0x000;
export const GLYPH_BYTES = 5;

// Hex digit glyphs 0..F, 5 rows each, loaded at $000-$04F
export const FONT: readonly Byte[] = font;

export function createMemory(): Uint8Array {
  const mem = new Uint8Array(MEMORY_SIZE);
  mem.set(FONT, FONT_BASE);
  return mem;
}

export function loadProgram(mem: Uint8Array, rom: Uint8Array): void {
  if (rom.length > MAX_ROM_SIZE) throw new RomTooLargeError(MAX_ROM_SIZE, rom.length);
  mem.set(rom, PROGRAM_START);
}

// All guest memory accesses wrap within the 4KB space
export function readByte(mem: Uint8Array, addr: Word): Byte {
  return mem[addr & 0x0FFF];
}

export function writeByte(mem: Uint8Array, addr: Word, value: Byte): void {
  mem[addr & 0x0FFF] = value & 0xFF;
}

export function readWord(mem: Uint8Array, addr: Word): Word {
  return (readByte(mem, addr) << 8) | readByte(mem, addr + 1);
}
