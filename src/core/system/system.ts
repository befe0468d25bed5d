import { Chip8CPU, defaultRandom, type RandomSource } from '@core/cpu/cpu';
import { createMachineState } from '@core/cpu/state';
import type { MachineState, Word } from '@core/cpu/types';
import { readByte, readWord } from '@core/bus/memory';
import { isSoundActive, tickTimers } from '@core/timers/timers';
import { StackOverflowError, StackUnderflowError, diagnosticFromError, type Diagnostic } from '@core/errors';
import { disasmAt } from '@utils/disasm';
import { createSeededRandom } from '@utils/prng';
import { resolveConfig, type MachineConfig } from './config';

// Only 'chip8' has semantics; the other selector states are accepted and execute the base set
export type ChipMode = 'chip8' | 'superchip' | 'xochip';
export const CHIP_MODES: readonly ChipMode[] = ['chip8', 'superchip', 'xochip'];
const MODE_LABEL: Record<ChipMode, string> = { chip8: 'CHIP-8', superchip: 'SUPERCHIP', xochip: 'XO-CHIP' };

export type FramebufferSink = (display: Uint8Array, width: number, height: number) => void;
export type AudioSink = (toneActive: boolean) => void;

export interface FrameResult {
  executed: number; // instructions run this frame
  redraw: boolean; // batch ended on CLS/DRW
  tone: boolean;
}

export interface RegisterSnapshot {
  v: number[];
  i: Word;
  pc: Word;
  sp: number;
  stack: number[];
  delayTimer: number;
  soundTimer: number;
}

export class Chip8System {
  public readonly cpu: Chip8CPU;
  public readonly config: MachineConfig;
  private rom: Uint8Array;
  private mode: ChipMode = 'chip8';
  private instructionsPerFrame: number;
  private diagnostics: Diagnostic[] = [];
  private framebufferSink: FramebufferSink | null = null;
  private audioSink: AudioSink | null = null;
  private readonly traceAll: boolean;
  private readonly logDiagnostics: boolean;

  constructor(rom: Uint8Array, config: Partial<MachineConfig> = {}, random?: RandomSource) {
    this.config = resolveConfig(config);
    // Throws RomTooLargeError before anything else is built
    const state = createMachineState(rom, this.config);
    this.rom = rom.slice();
    const rng = random ?? (this.config.seed !== undefined ? createSeededRandom(this.config.seed) : defaultRandom);
    this.cpu = new Chip8CPU(state, rng);
    this.cpu.setDiagnosticHook((d) => this.recordDiagnostic(d));
    this.instructionsPerFrame = this.config.instructionsPerFrame;
    const env = process.env;
    this.traceAll = env.CHIP8_TRACE === '1';
    this.logDiagnostics = env.CHIP8_LOG_DIAGNOSTICS === '1';
    this.updateTraceHook();
  }

  get state(): MachineState { return this.cpu.state; }
  get chipMode(): ChipMode { return this.mode; }
  get ipf(): number { return this.instructionsPerFrame; }

  connectFramebuffer(sink: FramebufferSink | null) { this.framebufferSink = sink; }
  connectAudio(sink: AudioSink | null) { this.audioSink = sink; }

  // Replace the program; on failure the running state is left as it was
  load(rom: Uint8Array) {
    const state = createMachineState(rom, this.config);
    this.rom = rom.slice();
    this.cpu.reset(state);
    this.mode = 'chip8';
    this.instructionsPerFrame = this.config.instructionsPerFrame;
    this.updateTraceHook();
  }

  reset() { this.load(this.rom); }

  setKey(key: number, down: boolean) {
    if (!Number.isInteger(key) || key < 0 || key > 0xF) throw new RangeError(`Invalid key index: ${key}`);
    this.state.keypad[key] = down;
  }

  quit() { this.state.runState = 'halted'; }

  togglePause() {
    const s = this.state;
    if (s.runState === 'running') {
      s.runState = 'paused';
      console.log('[system] PAUSED');
    } else if (s.runState === 'paused') {
      s.runState = 'running';
      console.log('[system] UNPAUSED');
    }
  }

  toggleDebug() {
    const s = this.state;
    s.debug = !s.debug;
    this.instructionsPerFrame = s.debug ? this.config.debugInstructionsPerFrame : this.config.instructionsPerFrame;
    console.log(s.debug ? '[system] DEBUG MODE ACTIVATED' : '[system] DEBUG MODE DEACTIVATED');
    this.updateTraceHook();
  }

  setMode(mode: ChipMode) {
    this.mode = mode;
    console.log(`[system] CHIP MODE: ${MODE_LABEL[mode]}`);
  }

  cycleMode(): ChipMode {
    const next = CHIP_MODES[(CHIP_MODES.indexOf(this.mode) + 1) % CHIP_MODES.length];
    this.setMode(next);
    return next;
  }

  // One output frame: run a batch, flush the framebuffer, tick timers once
  runFrame(): FrameResult {
    const s = this.state;
    if (s.runState === 'halted') return { executed: 0, redraw: false, tone: false };
    if (s.runState === 'paused') {
      this.flush();
      return { executed: 0, redraw: false, tone: isSoundActive(s) };
    }

    let executed = 0;
    let redraw = false;
    while (executed < this.instructionsPerFrame && this.state.runState === 'running') {
      const pc = this.state.pc;
      try {
        const r = this.cpu.step();
        executed++;
        if (r.redraw) { redraw = true; break; }
      } catch (e) {
        if (!(e instanceof StackOverflowError || e instanceof StackUnderflowError)) throw e;
        // Fault policy: report, step over the faulting CALL/RET, end the batch
        executed++;
        this.recordDiagnostic(diagnosticFromError(e, readWord(this.state.memory, pc)));
        this.state.pc = (pc + 2) & 0xFFFF;
        break;
      }
    }

    this.flush();
    const tone = tickTimers(this.state);
    if (this.audioSink) this.audioSink(tone);
    return { executed, redraw, tone };
  }

  getFramebuffer(): Uint8Array { return this.state.display; }

  getDiagnostics(): readonly Diagnostic[] { return this.diagnostics; }
  clearDiagnostics() { this.diagnostics = []; }

  snapshot(): RegisterSnapshot {
    const s = this.state;
    return {
      v: Array.from(s.v),
      i: s.i,
      pc: s.pc,
      sp: s.sp,
      stack: Array.from(s.stack.subarray(0, s.sp)),
      delayTimer: s.delayTimer,
      soundTimer: s.soundTimer,
    };
  }

  private flush() {
    if (this.framebufferSink) this.framebufferSink(this.state.display, this.state.width, this.state.height);
  }

  private recordDiagnostic(d: Diagnostic) {
    const max = this.config.maxDiagnostics;
    if (max > 0) {
      this.diagnostics.push(d);
      if (this.diagnostics.length > max) this.diagnostics.splice(0, this.diagnostics.length - max);
    }
    if (this.logDiagnostics || this.state.debug) console.warn(`[cpu] ${d.message}`);
  }

  private updateTraceHook() {
    if (!this.traceAll && !this.state.debug) {
      this.cpu.setTraceHook(null);
      return;
    }
    this.cpu.setTraceHook((pc, opcode) => {
      const d = disasmAt((a) => readByte(this.state.memory, a), pc);
      console.log(`[cpu] pc=$${pc.toString(16).toUpperCase().padStart(4, '0')} op=$${opcode.toString(16).toUpperCase().padStart(4, '0')} ${d.text}`);
    });
  }
}
