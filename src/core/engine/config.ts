import { InvalidConfigurationError } from "./errors";
import { NICE_0_WEIGHT } from "./weights";

export type SchedulerConfig = {
  // Period in which every runnable process should get at least one turn.
  targetLatency: number;
  // Floor on a single timeslice.
  minGranularity: number;
  // Weight at which vruntime advances 1:1 with wall time (nice 0).
  baselineWeight: number;
};

export const DEFAULT_SCHEDULER_CONFIG: Readonly<SchedulerConfig> = Object.freeze({
  targetLatency: 20,
  minGranularity: 1,
  baselineWeight: NICE_0_WEIGHT,
});

function positiveInt(value: number, name: string): number {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidConfigurationError("invalid_config", `${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveSchedulerConfig(partial: Partial<SchedulerConfig> = {}): SchedulerConfig {
  return {
    targetLatency: positiveInt(
      partial.targetLatency ?? DEFAULT_SCHEDULER_CONFIG.targetLatency,
      "targetLatency"
    ),
    minGranularity: positiveInt(
      partial.minGranularity ?? DEFAULT_SCHEDULER_CONFIG.minGranularity,
      "minGranularity"
    ),
    baselineWeight: positiveInt(
      partial.baselineWeight ?? DEFAULT_SCHEDULER_CONFIG.baselineWeight,
      "baselineWeight"
    ),
  };
}
