import type { MachineState } from './types';
import { createMemory, loadProgram, PROGRAM_START } from '@core/bus/memory';

export const STACK_DEPTH = 16;
export const REGISTER_COUNT = 16;
export const KEY_COUNT = 16;

export interface StateOptions {
  width: number;
  height: number;
}

// Build a complete power-on state; reset replaces the whole object rather than patching fields
export function createMachineState(rom: Uint8Array, opts: StateOptions): MachineState {
  const memory = createMemory();
  loadProgram(memory, rom);
  return {
    memory,
    v: new Uint8Array(REGISTER_COUNT),
    i: 0,
    pc: PROGRAM_START,
    stack: new Uint16Array(STACK_DEPTH),
    sp: 0,
    delayTimer: 0,
    soundTimer: 0,
    keypad: new Array<boolean>(KEY_COUNT).fill(false),
    keyWait: { kind: 'idle' },
    display: new Uint8Array(opts.width * opts.height),
    width: opts.width,
    height: opts.height,
    runState: 'running',
    debug: false,
  };
}
