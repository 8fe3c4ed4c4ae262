// Argument and golden-file parsing for sim-run.ts.

export const GOLDEN_PATH = "sim.golden.json";

export type Mode = "run" | "golden" | "verify";

export type Params = {
  seed: number;
  tasks: number;
  latency: number;
  granularity: number;
  quantum: number;
};

export type GoldenFile = Params & { signatures: Record<string, string> };

export function parseArgs(argv: string[]): Params & { mode: Mode; trace: boolean } {
  let mode: Mode = "run";
  let trace = false;
  const p: Params = { seed: 123, tasks: 10, latency: 20, granularity: 1, quantum: 4 };

  const intArg = (a: string, name: keyof Params): boolean => {
    const prefix = `--${name}=`;
    if (!a.startsWith(prefix)) return false;
    p[name] = Number(a.slice(prefix.length));
    return true;
  };

  for (const a of argv) {
    if (a === "--golden") mode = "golden";
    else if (a === "--verify") mode = "verify";
    else if (a === "--trace") trace = true;
    else if (!(["seed", "tasks", "latency", "granularity", "quantum"] as const).some((k) => intArg(a, k))) {
      throw new Error(`[SIM] unknown argument ${a}`);
    }
  }

  for (const [k, v] of Object.entries(p)) {
    if (!Number.isSafeInteger(v) || v < 0) throw new Error(`[SIM] invalid --${k}=${v}`);
  }
  for (const k of ["latency", "granularity", "quantum"] as const) {
    if (p[k] <= 0) throw new Error(`[SIM] invalid --${k}=${p[k]}`);
  }
  return { ...p, mode, trace };
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

export function validateGoldenFile(x: unknown): GoldenFile {
  if (!isRecord(x)) throw new Error(`[SIM] ${GOLDEN_PATH}: invalid JSON root`);
  const num = (k: keyof Params): number => {
    const v = x[k];
    if (typeof v !== "number" || !Number.isInteger(v)) throw new Error(`[SIM] ${GOLDEN_PATH}: missing/invalid ${k}`);
    return v;
  };
  const sigs = x.signatures;
  if (!isRecord(sigs)) throw new Error(`[SIM] ${GOLDEN_PATH}: missing/invalid signatures`);
  const signatures: Record<string, string> = {};
  for (const [k, v] of Object.entries(sigs)) {
    if (typeof v !== "string") throw new Error(`[SIM] ${GOLDEN_PATH}: invalid signature for ${k}`);
    signatures[k] = v;
  }
  return {
    seed: num("seed"),
    tasks: num("tasks"),
    latency: num("latency"),
    granularity: num("granularity"),
    quantum: num("quantum"),
    signatures,
  };
}
