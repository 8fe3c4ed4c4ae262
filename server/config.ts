// Service configuration from env. Bad values fail at startup, not per request.

export type ServerConfig = {
  port: number;
  bodyLimit: string;
  rateLimit: { rps: number; burst: number };
  defaults: { targetLatency: number; minGranularity: number; quantum: number };
  maxProcesses: number;
  // Caps the work one request can ask for: every decision consumes at least one unit.
  maxTotalBurst: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number, opts: { integer?: boolean; min?: number } = {}): number {
  const raw = env[key];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${key}: not a number (${raw})`);
  if (opts.integer && !Number.isSafeInteger(n)) throw new ConfigError(`${key}: not an integer (${raw})`);
  if (opts.min != null && n < opts.min) throw new ConfigError(`${key}: must be >= ${opts.min} (${raw})`);
  return n;
}

export function loadServerConfig(env: Env): ServerConfig {
  return {
    port: num(env, "PORT", 8080, { integer: true, min: 0 }),
    bodyLimit: env.BODY_LIMIT ?? "64kb",
    // 20 rps, burst 40
    rateLimit: {
      rps: num(env, "RATE_LIMIT_RPS", 20, { min: 0 }),
      burst: num(env, "RATE_LIMIT_BURST", 40, { min: 1 }),
    },
    defaults: {
      targetLatency: num(env, "SIM_TARGET_LATENCY", 20, { integer: true, min: 1 }),
      minGranularity: num(env, "SIM_MIN_GRANULARITY", 1, { integer: true, min: 1 }),
      quantum: num(env, "SIM_QUANTUM", 4, { integer: true, min: 1 }),
    },
    maxProcesses: num(env, "SIM_MAX_PROCESSES", 1000, { integer: true, min: 1 }),
    maxTotalBurst: num(env, "SIM_MAX_TOTAL_BURST", 100_000, { integer: true, min: 1 }),
  };
}
