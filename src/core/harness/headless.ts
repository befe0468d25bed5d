import { Chip8System, type RegisterSnapshot } from '@core/system/system';
import type { MachineConfig } from '@core/system/config';
import type { Diagnostic } from '@core/errors';
import { crc32 } from '@utils/crc32';

export interface KeyEvent {
  frame: number; // applied before this frame runs
  key: number;
  down: boolean;
}

export interface RunOptions {
  frames: number;
  keys?: KeyEvent[];
  config?: Partial<MachineConfig>;
}

export interface RunResult {
  frames: number;
  instructions: number;
  framebuffer: Uint8Array;
  width: number;
  height: number;
  framebufferCrc: number;
  diagnostics: Diagnostic[];
  registers: RegisterSnapshot;
  halted: boolean;
}

export function runRom(rom: Uint8Array, opts: RunOptions): RunResult {
  const sys = new Chip8System(rom, opts.config);
  const keys = [...(opts.keys ?? [])].sort((a, b) => a.frame - b.frame);
  let k = 0;
  let instructions = 0;
  let frame = 0;
  for (; frame < opts.frames; frame++) {
    while (k < keys.length && keys[k].frame <= frame) {
      sys.setKey(keys[k].key, keys[k].down);
      k++;
    }
    if (sys.state.runState === 'halted') break;
    instructions += sys.runFrame().executed;
  }
  return {
    frames: frame,
    instructions,
    framebuffer: sys.getFramebuffer().slice(),
    width: sys.state.width,
    height: sys.state.height,
    framebufferCrc: crc32(sys.getFramebuffer()),
    diagnostics: [...sys.getDiagnostics()],
    registers: sys.snapshot(),
    halted: sys.state.runState === 'halted',
  };
}
