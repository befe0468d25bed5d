import type { Byte, Instruction, KeyWaitState, MachineState, StepResult, Word } from './types';
import { decode } from './decoder';
import { STACK_DEPTH } from './state';
import { GLYPH_BYTES, readByte, readWord, writeByte } from '@core/bus/memory';
import { StackOverflowError, StackUnderflowError, hex4, type Diagnostic } from '@core/errors';

const VF = 0xF;

export type RandomSource = () => Byte;
export type TraceHook = (pc: Word, opcode: Word) => void;
export type DiagnosticHook = (d: Diagnostic) => void;

export const defaultRandom: RandomSource = () => Math.floor(Math.random() * 256) & 0xFF;

export class Chip8CPU {
  // optional per-instruction trace callback (debug mode, CLI tracing)
  private traceHook: TraceHook | null = null;
  private diagnosticHook: DiagnosticHook | null = null;

  constructor(public state: MachineState, private random: RandomSource = defaultRandom) {}

  setTraceHook(fn: TraceHook | null) { this.traceHook = fn; }
  setDiagnosticHook(fn: DiagnosticHook | null) { this.diagnosticHook = fn; }

  // Swap in a freshly built state; hooks and the random source survive
  reset(state: MachineState) { this.state = state; }

  // Fetch, decode and execute one instruction. Stack faults throw before any state changes.
  step(): StepResult {
    const s = this.state;
    const pc = s.pc;
    const ins = decode(readWord(s.memory, pc));
    if (this.traceHook) this.traceHook(pc, ins.opcode);

    if (ins.opcode === 0x00EE && s.sp <= 0) throw new StackUnderflowError(pc);
    if (ins.opClass === 0x2000 && s.sp >= STACK_DEPTH) throw new StackOverflowError(pc, s.sp);

    s.pc = (pc + 2) & 0xFFFF;
    const redraw = this.execute(ins, pc);
    return { opcode: ins.opcode, redraw };
  }

  private execute(ins: Instruction, pc: Word): boolean {
    const s = this.state;
    const v = s.v;
    switch (ins.opClass) {
      case 0x0000:
        if (ins.opcode === 0x00E0) {
          s.display.fill(0);
          return true;
        }
        if (ins.opcode === 0x00EE) {
          s.sp--;
          s.pc = s.stack[s.sp];
          return false;
        }
        this.unknown(ins, pc);
        return false;
      case 0x1000:
        s.pc = ins.nnn;
        return false;
      case 0x2000:
        s.stack[s.sp] = s.pc;
        s.sp++;
        s.pc = ins.nnn;
        return false;
      case 0x3000:
        if (v[ins.x] === ins.nn) this.skip();
        return false;
      case 0x4000:
        if (v[ins.x] !== ins.nn) this.skip();
        return false;
      case 0x5000:
        if (v[ins.x] === v[ins.y]) this.skip();
        return false;
      case 0x6000:
        v[ins.x] = ins.nn;
        return false;
      case 0x7000:
        v[ins.x] = (v[ins.x] + ins.nn) & 0xFF;
        return false;
      case 0x8000:
        this.alu(ins, pc);
        return false;
      case 0x9000:
        if (v[ins.x] !== v[ins.y]) this.skip();
        return false;
      case 0xA000:
        s.i = ins.nnn;
        return false;
      case 0xB000:
        s.pc = (v[0] + ins.nnn) & 0xFFFF;
        return false;
      case 0xC000:
        v[ins.x] = this.random() & ins.nn;
        return false;
      case 0xD000:
        this.draw(ins);
        return true;
      case 0xE000: {
        const down = s.keypad[v[ins.x] & 0x0F];
        if (ins.nn === 0x9E) { if (down) this.skip(); }
        else if (ins.nn === 0xA1) { if (!down) this.skip(); }
        else this.unknown(ins, pc);
        return false;
      }
      default:
        this.misc(ins, pc);
        return false;
    }
  }

  private skip() { this.state.pc = (this.state.pc + 2) & 0xFFFF; }

  // VF is written last so that a flag result wins when X is VF
  private setFlag(bit: boolean | number) { this.state.v[VF] = bit ? 1 : 0; }

  private alu(ins: Instruction, pc: Word) {
    const v = this.state.v;
    const vx = v[ins.x];
    const vy = v[ins.y];
    switch (ins.n) {
      case 0x0: v[ins.x] = vy; break;
      // logic ops clobber VF
      case 0x1: v[ins.x] = vx | vy; this.setFlag(0); break;
      case 0x2: v[ins.x] = vx & vy; this.setFlag(0); break;
      case 0x3: v[ins.x] = vx ^ vy; this.setFlag(0); break;
      case 0x4: {
        const sum = vx + vy;
        v[ins.x] = sum & 0xFF;
        this.setFlag(sum > 0xFF);
        break;
      }
      case 0x5:
        v[ins.x] = (vx - vy) & 0xFF;
        this.setFlag(vy <= vx);
        break;
      // shifts take their source from VY
      case 0x6:
        v[ins.x] = vy >> 1;
        this.setFlag(vy & 1);
        break;
      case 0x7:
        v[ins.x] = (vy - vx) & 0xFF;
        this.setFlag(vx <= vy);
        break;
      case 0xE:
        v[ins.x] = (vy << 1) & 0xFF;
        this.setFlag((vy >> 7) & 1);
        break;
      default:
        this.unknown(ins, pc);
    }
  }

  // DXYN: XOR an 8xN sprite from memory[I..] at (VX, VY). Origin wraps, the sprite body clips.
  private draw(ins: Instruction) {
    const s = this.state;
    const { width, height, display } = s;
    const x0 = s.v[ins.x] % width;
    const y0 = s.v[ins.y] % height;
    s.v[VF] = 0;
    for (let row = 0; row < ins.n; row++) {
      const y = y0 + row;
      if (y >= height) break;
      const bits = readByte(s.memory, s.i + row);
      for (let col = 0; col < 8; col++) {
        const x = x0 + col;
        if (x >= width) break;
        if (((bits >> (7 - col)) & 1) === 0) continue;
        const idx = y * width + x;
        if (display[idx]) s.v[VF] = 1;
        display[idx] ^= 1;
      }
    }
  }

  private misc(ins: Instruction, pc: Word) {
    const s = this.state;
    const v = s.v;
    switch (ins.nn) {
      case 0x07: v[ins.x] = s.delayTimer; break;
      case 0x0A: this.waitKey(ins.x); break;
      case 0x15: s.delayTimer = v[ins.x]; break;
      case 0x18: s.soundTimer = v[ins.x]; break;
      case 0x1E: s.i = (s.i + v[ins.x]) & 0xFFFF; break;
      case 0x29: s.i = v[ins.x] * GLYPH_BYTES; break;
      case 0x33: {
        const val = v[ins.x];
        writeByte(s.memory, s.i, Math.floor(val / 100));
        writeByte(s.memory, s.i + 1, Math.floor(val / 10) % 10);
        writeByte(s.memory, s.i + 2, val % 10);
        break;
      }
      case 0x55:
        for (let r = 0; r <= ins.x; r++) {
          writeByte(s.memory, s.i, v[r]);
          s.i = (s.i + 1) & 0xFFFF;
        }
        break;
      case 0x65:
        for (let r = 0; r <= ins.x; r++) {
          v[r] = readByte(s.memory, s.i);
          s.i = (s.i + 1) & 0xFFFF;
        }
        break;
      default:
        this.unknown(ins, pc);
    }
  }

  // FX0A completes only on a full press and release of one key; until then the instruction repeats
  private waitKey(x: number) {
    const s = this.state;
    let wait: KeyWaitState = s.keyWait;
    if (wait.kind === 'idle') {
      const pressed = s.keypad.indexOf(true);
      if (pressed < 0) { this.rewind(); return; }
      wait = { kind: 'captured', key: pressed };
      s.keyWait = wait;
    }
    const key = wait.key;
    if (s.keypad[key]) { this.rewind(); return; }
    s.v[x] = key;
    s.keyWait = { kind: 'idle' };
  }

  private rewind() { this.state.pc = (this.state.pc - 2) & 0xFFFF; }

  private unknown(ins: Instruction, pc: Word) {
    if (!this.diagnosticHook) return;
    this.diagnosticHook({
      kind: 'unknown-opcode',
      pc,
      opcode: ins.opcode,
      message: `Unimplemented/Invalid opcode: $${hex4(ins.opcode)} at $${hex4(pc)}`,
    });
  }
}
