/**
 * Runtime configuration, read from the environment:
 *   PORT        : HTTP port (default: 3001)
 *   CORS_ORIGIN : allowed CORS origin (default: *)
 *   CHAOS_SEED  : integer seed for the fault RNG; unset means Math.random
 */

export interface ChaosConfig {
  port: number;
  corsOrigin: string;
  seed: number | null;
}

export function parseSeed(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const seed = Number(raw);
  if (!Number.isInteger(seed)) {
    console.warn(`[config] ignoring non-integer CHAOS_SEED "${raw}"`);
    return null;
  }
  return seed;
}

export function loadChaosConfig(env: NodeJS.ProcessEnv = process.env): ChaosConfig {
  return {
    port: parseInt(env['PORT'] ?? '3001', 10),
    corsOrigin: env['CORS_ORIGIN'] ?? '*',
    seed: parseSeed(env['CHAOS_SEED']),
  };
}
