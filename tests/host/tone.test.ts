import { describe, it, expect } from 'vitest';
import { SquareTone } from '@host/tone';

describe('Square tone', () => {
  it('alternates between -volume and +volume every half period', () => {
    // 44100 / 600 = 73 samples per period (integer), 36 per half
    const tone = new SquareTone();
    const out = new Int16Array(80);
    tone.fill(out, true);
    expect(out[0]).toBe(-3000);
    expect(out[35]).toBe(-3000);
    expect(out[36]).toBe(3000);
    expect(out[71]).toBe(3000);
    expect(out[72]).toBe(-3000);
  });

  it('outputs silence when gated off and resumes the phase afterwards', () => {
    const tone = new SquareTone();
    const buf = new Int16Array(80);
    tone.fill(buf, true);
    const quiet = new Int16Array(10).fill(7);
    tone.fill(quiet, false);
    expect(Array.from(quiet)).toEqual(new Array(10).fill(0));
    const next = new Int16Array(40);
    tone.fill(next, true);
    // continues at sample 80: floor(80/36) = 2 -> low, sample 108 -> high
    expect(next[0]).toBe(-3000);
    expect(next[28]).toBe(3000);
  });

  it('accepts custom tone parameters', () => {
    const tone = new SquareTone({ frequency: 1000, sampleRate: 8000, volume: 100 });
    const out = new Int16Array(8);
    tone.fill(out, true);
    expect(Array.from(out)).toEqual([-100, -100, -100, -100, 100, 100, 100, 100]);
  });
});
