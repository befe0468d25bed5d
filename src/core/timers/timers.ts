import type { MachineState } from '@core/cpu/types';

export const TIMER_HZ = 60;

// Called once per rendered frame. Returns the tone gate for the frame: true if the sound
// timer was still running when the tick arrived.
export function tickTimers(s: MachineState): boolean {
  const tone = s.soundTimer > 0;
  if (s.delayTimer > 0) s.delayTimer--;
  if (s.soundTimer > 0) s.soundTimer--;
  return tone;
}

export function isSoundActive(s: MachineState): boolean {
  return s.soundTimer > 0;
}
