// Classic single-core algorithms run over the same workload, for comparison with CFS.
// All of them jump the clock over idle gaps and emit one slice per turn.

import type {
  BaselineAlgorithm,
  ProcessDescriptor,
  ProcessId,
  TimelineSlice,
} from "../../../types/sched";
import { InvalidConfigurationError } from "./errors";
import { MinIndex, type LessFn } from "./min_index";
import { validateDescriptors } from "./process";

type Job = {
  id: ProcessId;
  arrivalTime: number;
  nice: number;
  // position in arrival order; the final tie-break
  order: number;
  remaining: number;
};

export const BASELINE_ALGORITHMS: readonly BaselineAlgorithm[] = ["FCFS", "SJF", "PRIORITY", "RR"];

export function isBaselineAlgorithm(x: string): x is BaselineAlgorithm {
  return BASELINE_ALGORITHMS.some((a) => a === x);
}

function toJobs(processes: readonly ProcessDescriptor[]): Job[] {
  validateDescriptors(processes);
  return processes
    .map((p, inputIdx) => ({ p, inputIdx }))
    .sort((a, b) => (a.p.arrivalTime ?? 0) - (b.p.arrivalTime ?? 0) || a.inputIdx - b.inputIdx)
    .map(({ p }, order) => ({
      id: p.id,
      arrivalTime: p.arrivalTime ?? 0,
      nice: p.nice,
      order,
      remaining: p.burst,
    }));
}

function checkQuantum(quantum: number): void {
  if (!Number.isSafeInteger(quantum) || quantum <= 0) {
    throw new InvalidConfigurationError("invalid_config", `quantum must be a positive integer, got ${quantum}`);
  }
}

export function fcfsSchedule(processes: readonly ProcessDescriptor[]): TimelineSlice[] {
  const slices: TimelineSlice[] = [];
  let t = 0;
  for (const job of toJobs(processes)) {
    t = Math.max(t, job.arrivalTime);
    slices.push({ processId: job.id, startTime: t, endTime: t + job.remaining });
    t += job.remaining;
  }
  return slices;
}

// Preemptive at quantum boundaries; `less` decides who runs next.
function keyedSchedule(
  processes: readonly ProcessDescriptor[],
  quantum: number,
  less: LessFn<Job>
): TimelineSlice[] {
  checkQuantum(quantum);
  const jobs = toJobs(processes);
  const ready = new MinIndex<number, Job>((j) => j.order, less);
  const slices: TimelineSlice[] = [];
  let next = 0;
  let t = 0;

  for (;;) {
    while (next < jobs.length && jobs[next].arrivalTime <= t) ready.insert(jobs[next++]);
    if (ready.isEmpty()) {
      if (next >= jobs.length) return slices;
      t = jobs[next].arrivalTime;
      continue;
    }

    const job = ready.popMin();
    const ran = Math.min(quantum, job.remaining);
    slices.push({ processId: job.id, startTime: t, endTime: t + ran });
    t += ran;
    job.remaining -= ran;
    if (job.remaining > 0) ready.insert(job);
  }
}

export function sjfSchedule(processes: readonly ProcessDescriptor[], quantum: number): TimelineSlice[] {
  return keyedSchedule(processes, quantum, (a, b) => {
    if (a.remaining !== b.remaining) return a.remaining < b.remaining;
    if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime < b.arrivalTime;
    return a.order < b.order;
  });
}

export function prioritySchedule(processes: readonly ProcessDescriptor[], quantum: number): TimelineSlice[] {
  return keyedSchedule(processes, quantum, (a, b) => {
    if (a.nice !== b.nice) return a.nice < b.nice;
    if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime < b.arrivalTime;
    return a.order < b.order;
  });
}

// A preempted job is requeued before jobs that arrived during its slice.
export function roundRobinSchedule(processes: readonly ProcessDescriptor[], quantum: number): TimelineSlice[] {
  checkQuantum(quantum);
  const jobs = toJobs(processes);
  const ready: Job[] = [];
  const slices: TimelineSlice[] = [];
  let next = 0;
  let t = 0;

  for (;;) {
    while (next < jobs.length && jobs[next].arrivalTime <= t) ready.push(jobs[next++]);
    const job = ready.shift();
    if (!job) {
      if (next >= jobs.length) return slices;
      t = jobs[next].arrivalTime;
      continue;
    }

    const ran = Math.min(quantum, job.remaining);
    slices.push({ processId: job.id, startTime: t, endTime: t + ran });
    t += ran;
    job.remaining -= ran;
    if (job.remaining > 0) ready.push(job);
  }
}

export function runBaseline(
  algorithm: BaselineAlgorithm,
  processes: readonly ProcessDescriptor[],
  quantum: number
): TimelineSlice[] {
  switch (algorithm) {
    case "FCFS":
      return fcfsSchedule(processes);
    case "SJF":
      return sjfSchedule(processes, quantum);
    case "PRIORITY":
      return prioritySchedule(processes, quantum);
    case "RR":
      return roundRobinSchedule(processes, quantum);
  }
}
