import { describe, it, expect } from 'vitest';
import { cpuWithProgram, steps } from '../helpers/cpuh';
import { FONT } from '@core/bus/memory';

describe('CPU: index register and memory transfers', () => {
  it('ANNN loads I', () => {
    const { cpu, state } = cpuWithProgram([0xA123]);
    cpu.step();
    expect(state.i).toBe(0x123);
  });

  it('FX1E adds VX to I with 16-bit wrap', () => {
    let h = cpuWithProgram([0xAFFF, 0x6002, 0xF01E]);
    steps(h.cpu, 3);
    expect(h.state.i).toBe(0x1001);
    h = cpuWithProgram([0x6010, 0xF01E]);
    h.state.i = 0xFFF8;
    steps(h.cpu, 2);
    expect(h.state.i).toBe(0x0008);
  });

  it('FX29 points I at the glyph for VX', () => {
    const { cpu, state } = cpuWithProgram([0x600A, 0xF029]);
    steps(cpu, 2);
    expect(state.i).toBe(50);
    expect(Array.from(state.memory.subarray(50, 55))).toEqual([0xF0, 0x90, 0xF0, 0x90, 0x90]);
  });

  it('FX33 stores hundreds, tens and ones at I..I+2', () => {
    const { cpu, state } = cpuWithProgram([0x60FE, 0xA300, 0xF033]);
    steps(cpu, 3);
    expect(Array.from(state.memory.subarray(0x300, 0x303))).toEqual([2, 5, 4]);
    expect(state.i).toBe(0x300);
  });

  it('FX55 stores V0..VX and advances I by X+1', () => {
    const { cpu, state } = cpuWithProgram([0x6011, 0x6122, 0x6233, 0x6344, 0xA300, 0xF255]);
    steps(cpu, 6);
    expect(Array.from(state.memory.subarray(0x300, 0x304))).toEqual([0x11, 0x22, 0x33, 0x00]);
    expect(state.i).toBe(0x303);
  });

  it('FX65 loads V0..VX and advances I by X+1', () => {
    const { cpu, state } = cpuWithProgram([0xA300, 0xF165]);
    state.memory.set([0xAA, 0xBB, 0xCC], 0x300);
    state.v[2] = 0x77;
    steps(cpu, 2);
    expect(state.v[0]).toBe(0xAA);
    expect(state.v[1]).toBe(0xBB);
    expect(state.v[2]).toBe(0x77);
    expect(state.i).toBe(0x302);
  });

  it('wraps memory accesses within 4KB', () => {
    const { cpu, state } = cpuWithProgram([0x6009, 0xAFFF, 0xF033]);
    steps(cpu, 3);
    expect(state.memory[0xFFF]).toBe(0);
    expect(state.memory[0x000]).toBe(0);
    expect(state.memory[0x001]).toBe(9);
  });

  it('lets a program overwrite the font table', () => {
    const { cpu, state } = cpuWithProgram([0x6042, 0xA000, 0xF055]);
    expect(state.memory[0]).toBe(FONT[0]);
    steps(cpu, 3);
    expect(state.memory[0]).toBe(0x42);
  });
});

describe('CPU: timer registers', () => {
  it('FX15/FX18 set the timers and FX07 reads the delay timer', () => {
    const { cpu, state } = cpuWithProgram([0x6A30, 0xFA15, 0xFA18, 0xFB07]);
    steps(cpu, 4);
    expect(state.delayTimer).toBe(0x30);
    expect(state.soundTimer).toBe(0x30);
    expect(state.v[0xB]).toBe(0x30);
  });
});
