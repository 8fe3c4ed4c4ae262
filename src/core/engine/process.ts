// Process: scheduling-relevant state of one simulated task.
// Static fields are readonly; only the Scheduler mutates vruntime/remainingBurst.

import type { ProcessDescriptor, ProcessId } from "../../../types/sched";
import { InvalidConfigurationError } from "./errors";
import { isValidNice, MAX_NICE, MIN_NICE, weightOf } from "./weights";

export interface SimProcess {
  readonly id: ProcessId;
  readonly nice: number;
  readonly weight: number;
  readonly burst: number;
  readonly arrivalTime: number;
  vruntime: number;
  remainingBurst: number;
}

export function validateDescriptor(d: ProcessDescriptor): void {
  if (typeof d.id !== "string" || d.id.length === 0) {
    throw new InvalidConfigurationError("invalid_id", "process id must be a non-empty string");
  }
  if (!isValidNice(d.nice)) {
    throw new InvalidConfigurationError(
      "out_of_range",
      `process ${d.id}: nice ${d.nice} outside [${MIN_NICE}, ${MAX_NICE}]`
    );
  }
  if (!Number.isSafeInteger(d.burst) || d.burst <= 0) {
    throw new InvalidConfigurationError(
      "non_positive_burst",
      `process ${d.id}: burst must be a positive safe integer, got ${d.burst}`
    );
  }
  const at = d.arrivalTime ?? 0;
  if (!Number.isSafeInteger(at) || at < 0) {
    throw new InvalidConfigurationError(
      "invalid_arrival",
      `process ${d.id}: arrivalTime must be a non-negative safe integer, got ${at}`
    );
  }
}

// Upper bound on the simulated clock: nothing can finish later than the last
// arrival plus all work. Time stays exact only while this is a safe integer.
export type WorkHorizon = { lastArrival: number; totalBurst: number };

export function extendHorizon(h: WorkHorizon, d: ProcessDescriptor): WorkHorizon {
  const next = {
    lastArrival: Math.max(h.lastArrival, d.arrivalTime ?? 0),
    totalBurst: h.totalBurst + d.burst,
  };
  if (!Number.isSafeInteger(next.lastArrival + next.totalBurst)) {
    throw new InvalidConfigurationError(
      "horizon_overflow",
      `process ${d.id}: last arrival plus total burst exceeds ${Number.MAX_SAFE_INTEGER}`
    );
  }
  return next;
}

// Validates the whole set up front so a bad entry leaves no partial state.
export function validateDescriptors(
  list: readonly ProcessDescriptor[],
  start: WorkHorizon = { lastArrival: 0, totalBurst: 0 }
): WorkHorizon {
  const seen = new Set<ProcessId>();
  let horizon = start;
  for (const d of list) {
    validateDescriptor(d);
    if (seen.has(d.id)) {
      throw new InvalidConfigurationError("duplicate_id", `duplicate process id ${d.id}`);
    }
    seen.add(d.id);
    horizon = extendHorizon(horizon, d);
  }
  return horizon;
}

export function createProcess(d: ProcessDescriptor): SimProcess {
  validateDescriptor(d);
  return {
    id: d.id,
    nice: d.nice,
    weight: weightOf(d.nice),
    burst: d.burst,
    arrivalTime: d.arrivalTime ?? 0,
    vruntime: 0,
    remainingBurst: d.burst,
  };
}

// Total order on ids, locale independent.
export function compareIds(a: ProcessId, b: ProcessId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
