import { describe, it, expect } from 'vitest';
import { createMachineState } from '@core/cpu/state';
import { isSoundActive, tickTimers } from '@core/timers/timers';

const fresh = () => createMachineState(new Uint8Array(0), { width: 64, height: 32 });

describe('Timer ticker', () => {
  it('counts the delay timer down to zero and holds there', () => {
    const s = fresh();
    s.delayTimer = 3;
    const seen: number[] = [];
    for (let i = 0; i < 4; i++) {
      tickTimers(s);
      seen.push(s.delayTimer);
    }
    expect(seen).toEqual([2, 1, 0, 0]);
  });

  it('counts both timers independently', () => {
    const s = fresh();
    s.delayTimer = 1;
    s.soundTimer = 3;
    tickTimers(s);
    expect(s.delayTimer).toBe(0);
    expect(s.soundTimer).toBe(2);
  });

  it('gates the tone for every frame that starts with a running sound timer', () => {
    const s = fresh();
    s.soundTimer = 2;
    expect(isSoundActive(s)).toBe(true);
    expect(tickTimers(s)).toBe(true);
    expect(tickTimers(s)).toBe(true);
    expect(isSoundActive(s)).toBe(false);
    expect(tickTimers(s)).toBe(false);
    expect(s.soundTimer).toBe(0);
  });
});
