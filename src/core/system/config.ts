export interface MachineConfig {
  width: number;
  height: number;
  instructionsPerFrame: number;
  debugInstructionsPerFrame: number;
  maxDiagnostics: number; // ring size for collected diagnostics
  seed?: number; // fixed RNG seed for reproducible runs
}

export const DEFAULT_CONFIG: Readonly<MachineConfig> = {
  width: 64,
  height: 32,
  instructionsPerFrame: 600,
  debugInstructionsPerFrame: 1,
  maxDiagnostics: 256,
};

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const v = raw.startsWith('0x') || raw.startsWith('0X') ? parseInt(raw, 16) : parseInt(raw, 10);
  return Number.isFinite(v) ? v : undefined;
}

// Defaults < environment (CHIP8_IPF, CHIP8_SEED, CHIP8_MAX_DIAGNOSTICS) < explicit overrides
export function resolveConfig(overrides: Partial<MachineConfig> = {}, env: Env = process.env): MachineConfig {
  const cfg: MachineConfig = { ...DEFAULT_CONFIG };
  const ipf = envInt(env, 'CHIP8_IPF');
  if (ipf !== undefined) cfg.instructionsPerFrame = ipf;
  const seed = envInt(env, 'CHIP8_SEED');
  if (seed !== undefined) cfg.seed = seed >>> 0;
  const maxDiag = envInt(env, 'CHIP8_MAX_DIAGNOSTICS');
  if (maxDiag !== undefined) cfg.maxDiagnostics = maxDiag;
  // keys present with an undefined value leave the lower layer in place
  const o = overrides;
  if (o.width !== undefined) cfg.width = o.width;
  if (o.height !== undefined) cfg.height = o.height;
  if (o.instructionsPerFrame !== undefined) cfg.instructionsPerFrame = o.instructionsPerFrame;
  if (o.debugInstructionsPerFrame !== undefined) cfg.debugInstructionsPerFrame = o.debugInstructionsPerFrame;
  if (o.maxDiagnostics !== undefined) cfg.maxDiagnostics = o.maxDiagnostics;
  if (o.seed !== undefined) cfg.seed = o.seed >>> 0;
  cfg.width = Math.max(1, cfg.width | 0);
  cfg.height = Math.max(1, cfg.height | 0);
  cfg.instructionsPerFrame = Math.max(1, cfg.instructionsPerFrame | 0);
  cfg.debugInstructionsPerFrame = Math.max(1, cfg.debugInstructionsPerFrame | 0);
  cfg.maxDiagnostics = Math.max(0, cfg.maxDiagnostics | 0);
  return cfg;
}
