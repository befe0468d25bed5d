export interface ToneOptions {
  frequency: number;
  sampleRate: number;
  volume: number; // peak amplitude, signed 16-bit
}

export const DEFAULT_TONE: Readonly<ToneOptions> = { frequency: 600, sampleRate: 44100, volume: 3000 };

// Square wave beeper. The phase only advances while the gate is open, so a tone resumes where it stopped.
export class SquareTone {
  private sampleIndex = 0;
  private readonly halfPeriod: number;

  constructor(private readonly opts: ToneOptions = DEFAULT_TONE) {
    this.halfPeriod = Math.max(1, Math.floor(Math.floor(opts.sampleRate / opts.frequency) / 2));
  }

  get sampleRate(): number { return this.opts.sampleRate; }

  fill(out: Int16Array, active: boolean): void {
    if (!active) { out.fill(0); return; }
    const vol = this.opts.volume;
    for (let i = 0; i < out.length; i++) {
      out[i] = (Math.floor(this.sampleIndex / this.halfPeriod) % 2) ? vol : -vol;
      this.sampleIndex++;
    }
  }
}
