import { describe, it, expect } from 'vitest';
import { runRom } from '@core/harness/headless';
import { FONT } from '@core/bus/memory';
import { crc32 } from '@utils/crc32';
import { romOf } from '../helpers/cpuh';

// Wait for a key, then draw its glyph at (0, 0) and idle
const KEY_ECHO = romOf([
  0x6100, // LD V1, #$00
  0xF00A, // LD V0, K
  0xF029, // LD F, V0
  0xD115, // DRW V1, V1, 5
  0x1208, // JP $208
]);

function glyphFramebuffer(digit: number): Uint8Array {
  const fb = new Uint8Array(64 * 32);
  for (let row = 0; row < 5; row++) {
    const bits = FONT[digit * 5 + row];
    for (let col = 0; col < 8; col++) if ((bits >> (7 - col)) & 1) fb[row * 64 + col] = 1;
  }
  return fb;
}

describe('Headless harness', () => {
  it('runs a scripted press-and-release and reports the resulting frame', () => {
    const result = runRom(KEY_ECHO, {
      frames: 6,
      keys: [
        { frame: 3, key: 5, down: false },
        { frame: 1, key: 5, down: true },
      ],
    });
    expect(result.frames).toBe(6);
    // frames 0-2 spin on the key wait, frame 3 commits and draws, frames 4-5 idle
    expect(result.instructions).toBe(600 * 5 + 3);
    expect(result.registers.v[0]).toBe(5);
    expect(result.registers.i).toBe(25);
    expect(result.registers.pc).toBe(0x208);
    expect(result.framebuffer.reduce((n, p) => n + p, 0)).toBe(14);
    expect(result.framebuffer).toEqual(glyphFramebuffer(5));
    expect(result.framebufferCrc).toBe(crc32(glyphFramebuffer(5)));
    expect(result.diagnostics).toEqual([]);
    expect(result.halted).toBe(false);
  });

  it('never commits the key while it is held', () => {
    const result = runRom(KEY_ECHO, { frames: 4, keys: [{ frame: 0, key: 9, down: true }] });
    expect(result.registers.pc).toBe(0x202);
    expect(result.registers.v[0]).toBe(0);
    expect(result.framebufferCrc).toBe(crc32(new Uint8Array(64 * 32)));
  });

  it('passes configuration through to the machine', () => {
    const result = runRom(romOf([0x7001, 0x1200]), { frames: 3, config: { instructionsPerFrame: 4 } });
    expect(result.instructions).toBe(12);
    expect(result.registers.v[0]).toBe(6);
  });
});
