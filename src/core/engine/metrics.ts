// Per-process and aggregate statistics over any completed timeline (CFS or baseline).

import type {
  AggregateMetrics,
  ProcessDescriptor,
  ProcessId,
  ProcessMetrics,
  SimulationMetrics,
  TimelineSlice,
} from "../../../types/sched";
import { InvalidConfigurationError } from "./errors";
import { validateDescriptors } from "./process";

type Span = { first: number; last: number; ran: number };

function mean(xs: number[]): number {
  return xs.length === 0 ? 0 : xs.reduce((s, x) => s + x, 0) / xs.length;
}

// Population standard deviation.
function stdDev(xs: number[]): number {
  if (xs.length === 0) return 0;
  const m = mean(xs);
  return Math.sqrt(mean(xs.map((x) => (x - m) ** 2)));
}

export function computeMetrics(
  processes: readonly ProcessDescriptor[],
  slices: readonly TimelineSlice[]
): SimulationMetrics {
  validateDescriptors(processes);

  const spans = new Map<ProcessId, Span>();
  let busy = 0;
  let lastEnd = 0;
  for (const s of slices) {
    const len = s.endTime - s.startTime;
    busy += len;
    lastEnd = Math.max(lastEnd, s.endTime);
    const span = spans.get(s.processId);
    if (span) {
      span.first = Math.min(span.first, s.startTime);
      span.last = Math.max(span.last, s.endTime);
      span.ran += len;
    } else {
      spans.set(s.processId, { first: s.startTime, last: s.endTime, ran: len });
    }
  }

  const perProcess: ProcessMetrics[] = processes.map((p) => {
    const span = spans.get(p.id);
    if (!span || span.ran !== p.burst) {
      throw new InvalidConfigurationError(
        "incomplete_trace",
        `process ${p.id}: ran ${span?.ran ?? 0} of ${p.burst}`
      );
    }
    const arrivalTime = p.arrivalTime ?? 0;
    const turnaroundTime = span.last - arrivalTime;
    return {
      id: p.id,
      arrivalTime,
      burst: p.burst,
      nice: p.nice,
      firstRunTime: span.first,
      completionTime: span.last,
      turnaroundTime,
      waitingTime: turnaroundTime - p.burst,
      responseTime: span.first - arrivalTime,
    };
  });

  const firstArrival = perProcess.length
    ? Math.min(...perProcess.map((m) => m.arrivalTime))
    : 0;
  const makespan = perProcess.length ? lastEnd - firstArrival : 0;
  const waits = perProcess.map((m) => m.waitingTime);

  const aggregate: AggregateMetrics = {
    avgWaitingTime: mean(waits),
    avgTurnaroundTime: mean(perProcess.map((m) => m.turnaroundTime)),
    avgResponseTime: mean(perProcess.map((m) => m.responseTime)),
    waitingTimeStdDev: stdDev(waits),
    makespan,
    cpuUtilization: makespan > 0 ? busy / makespan : 0,
    throughput: makespan > 0 ? perProcess.length / makespan : 0,
  };

  return { perProcess, aggregate };
}
