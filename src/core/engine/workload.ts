// Seeded workload generator. Rolls come from hashing `seed:index:field`,
// so the same options always give the same process list (no Math.random).

import type { ProcessDescriptor } from "../../../types/sched";
import { fnv1a32u } from "../trace/fnv";
import { InvalidConfigurationError } from "./errors";
import { MAX_NICE, MIN_NICE } from "./weights";

export type WorkloadOptions = {
  seed: number;
  count: number;
  maxArrivalTime?: number;
  maxBurstTime?: number;
  niceRange?: readonly [number, number];
};

export const DEFAULT_WORKLOAD = {
  maxArrivalTime: 100,
  maxBurstTime: 50,
  niceRange: [-10, 10] as const,
};

function roll(seed: number, index: number, field: string, lo: number, hi: number): number {
  return lo + (fnv1a32u(`${seed}:${index}:${field}`) % (hi - lo + 1));
}

function nonNegativeInt(value: number, name: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidConfigurationError("invalid_config", `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

export function generateWorkload(opts: WorkloadOptions): ProcessDescriptor[] {
  const seed = nonNegativeInt(opts.seed, "seed");
  const count = nonNegativeInt(opts.count, "count");
  const maxArrival = nonNegativeInt(opts.maxArrivalTime ?? DEFAULT_WORKLOAD.maxArrivalTime, "maxArrivalTime");
  const maxBurst = nonNegativeInt(opts.maxBurstTime ?? DEFAULT_WORKLOAD.maxBurstTime, "maxBurstTime");
  const [niceLo, niceHi] = opts.niceRange ?? DEFAULT_WORKLOAD.niceRange;

  if (maxBurst < 1) {
    throw new InvalidConfigurationError("invalid_config", "maxBurstTime must be at least 1");
  }
  if (!Number.isInteger(niceLo) || !Number.isInteger(niceHi) || niceLo > niceHi || niceLo < MIN_NICE || niceHi > MAX_NICE) {
    throw new InvalidConfigurationError("invalid_config", `invalid niceRange [${niceLo}, ${niceHi}]`);
  }

  const out: ProcessDescriptor[] = [];
  for (let i = 0; i < count; i++) {
    out.push({
      id: `P${i + 1}`,
      arrivalTime: roll(seed, i, "arrival", 0, maxArrival),
      burst: roll(seed, i, "burst", 1, maxBurst),
      nice: roll(seed, i, "nice", niceLo, niceHi),
    });
  }
  return out;
}
