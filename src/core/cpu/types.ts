export type Byte = number; // 0..255
export type Word = number; // 0..65535

export type RunState = 'running' | 'paused' | 'halted';

// FX0A sub-instruction latch: idle until a key goes down, then held until that key is released
export type KeyWaitState =
  | { kind: 'idle' }
  | { kind: 'captured'; key: number };

export interface MachineState {
  memory: Uint8Array; // 4KB
  v: Uint8Array; // V0..VF, VF doubles as the flag register
  i: Word;
  pc: Word;
  stack: Uint16Array; // 16 return addresses
  sp: number; // one past the top
  delayTimer: Byte;
  soundTimer: Byte;
  keypad: boolean[]; // 16 latches, written by the input adapter
  keyWait: KeyWaitState;
  display: Uint8Array; // width*height, 1 = lit
  width: number;
  height: number;
  runState: RunState;
  debug: boolean;
}

export interface Instruction {
  opcode: Word; // full 16-bit word
  opClass: Word; // word & 0xF000
  nnn: Word;
  nn: Byte;
  n: number;
  x: number;
  y: number;
}

export interface StepResult {
  opcode: Word;
  redraw: boolean;
}
