import type { Chip8System } from '@core/system/system';

// KeyboardEvent.code -> keypad index, laid out as
//   1 2 3 C      1 2 3 4
//   4 5 6 D  <-  Q W E R
//   7 8 9 E      A S D F
//   A 0 B F      Z X C V
export const KEY_MAP: Readonly<Record<string, number>> = {
  KeyX: 0x0, Digit1: 0x1, Digit2: 0x2, Digit3: 0x3,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyA: 0x7,
  KeyS: 0x8, KeyD: 0x9, KeyZ: 0xA, KeyC: 0xB,
  Digit4: 0xC, KeyR: 0xD, KeyF: 0xE, KeyV: 0xF,
};

export type Control = 'quit' | 'pause' | 'reset' | 'debug' | 'mode';

export const CONTROL_MAP: Readonly<Record<string, Control>> = {
  Escape: 'quit',
  KeyP: 'pause',
  KeyT: 'reset',
  KeyB: 'debug',
  Tab: 'mode',
};

export type KeyRoute = 'keypad' | 'control' | 'ignored';

// Route one host key event. Keypad keys track both edges; controls fire on key-down only.
export function applyKey(sys: Chip8System, code: string, down: boolean): KeyRoute {
  const key = KEY_MAP[code];
  if (key !== undefined) {
    sys.setKey(key, down);
    return 'keypad';
  }
  const control = CONTROL_MAP[code];
  if (control === undefined) return 'ignored';
  if (!down) return 'control';
  switch (control) {
    case 'quit': sys.quit(); break;
    case 'pause': sys.togglePause(); break;
    case 'reset': sys.reset(); break;
    case 'debug': sys.toggleDebug(); break;
    case 'mode': sys.cycleMode(); break;
  }
  return 'control';
}
