import type { RandomSource } from '@core/cpu/cpu';

// 32-bit xorshift; a zero seed would lock the register at zero, so it is remapped
export function createSeededRandom(seed: number): RandomSource {
  let x = (seed >>> 0) || 0x2545F491;
  return () => {
    x ^= x << 13; x >>>= 0;
    x ^= x >>> 17;
    x ^= x << 5; x >>>= 0;
    return (x >>> 24) & 0xFF;
  };
}
