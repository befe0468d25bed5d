import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig } from '@core/system/config';
import { Chip8System } from '@core/system/system';

describe('Machine configuration', () => {
  it('uses the defaults with an empty environment', () => {
    expect(resolveConfig({}, {})).toEqual({ ...DEFAULT_CONFIG });
  });

  it('reads numeric settings from the environment', () => {
    const cfg = resolveConfig({}, { CHIP8_IPF: '12', CHIP8_SEED: '0x10', CHIP8_MAX_DIAGNOSTICS: '4' });
    expect(cfg.instructionsPerFrame).toBe(12);
    expect(cfg.seed).toBe(16);
    expect(cfg.maxDiagnostics).toBe(4);
  });

  it('lets explicit overrides win over the environment', () => {
    const cfg = resolveConfig({ instructionsPerFrame: 30 }, { CHIP8_IPF: '12' });
    expect(cfg.instructionsPerFrame).toBe(30);
  });

  it('ignores malformed values and clamps the batch size to at least one', () => {
    expect(resolveConfig({}, { CHIP8_IPF: 'fast' }).instructionsPerFrame).toBe(600);
    expect(resolveConfig({ instructionsPerFrame: 0 }, {}).instructionsPerFrame).toBe(1);
  });

  it('treats overrides set to undefined as absent', () => {
    const cfg = resolveConfig({ instructionsPerFrame: undefined, width: undefined }, { CHIP8_IPF: '12' });
    expect(cfg).toEqual({ ...DEFAULT_CONFIG, instructionsPerFrame: 12 });
  });

  it('keeps the display at least one cell in each dimension', () => {
    const cfg = resolveConfig({ width: 0, height: -4 }, {});
    expect(cfg.width).toBe(1);
    expect(cfg.height).toBe(1);
  });

  it('builds a full-size machine when overrides are undefined', () => {
    const sys = new Chip8System(new Uint8Array([0x12, 0x00]), { instructionsPerFrame: undefined, width: undefined }, () => 0);
    expect(sys.config.instructionsPerFrame).toBe(DEFAULT_CONFIG.instructionsPerFrame);
    expect(sys.state.display.length).toBe(64 * 32);
    expect(sys.runFrame().executed).toBe(600);
  });
});
