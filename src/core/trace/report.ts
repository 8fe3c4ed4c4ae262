// Fixed-width text for the CLI. The engine itself never formats anything.

import type { AggregateMetrics, ProcessMetrics, SchedulingEvent } from "../../../types/sched";

function fmt(n: number, digits = 3): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(digits);
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: string[]) =>
    cells.map((c, i) => c.padStart(widths[i])).join(" | ");
  return [line(headers), widths.map((w) => "-".repeat(w)).join("-+-"), ...rows.map(line)];
}

export function formatTrace(events: readonly SchedulingEvent[]): string[] {
  return formatTable(
    ["pid", "start", "end", "vr_before", "vr_after"],
    events.map((e) => [
      e.processId,
      String(e.startTime),
      String(e.endTime),
      fmt(e.vruntimeBefore),
      fmt(e.vruntimeAfter),
    ])
  );
}

export function formatMetricsTable(rows: readonly ProcessMetrics[]): string[] {
  return formatTable(
    ["pid", "arrival", "burst", "nice", "waiting", "turnaround", "response"],
    rows.map((m) => [
      m.id,
      String(m.arrivalTime),
      String(m.burst),
      String(m.nice),
      String(m.waitingTime),
      String(m.turnaroundTime),
      String(m.responseTime),
    ])
  );
}

export function formatAggregate(label: string, a: AggregateMetrics): string {
  return (
    `${label}: avgWT=${fmt(a.avgWaitingTime)} avgTAT=${fmt(a.avgTurnaroundTime)} ` +
    `avgRT=${fmt(a.avgResponseTime)} sdWT=${fmt(a.waitingTimeStdDev)} ` +
    `makespan=${a.makespan} util=${fmt(a.cpuUtilization)} thr=${fmt(a.throughput, 4)}`
  );
}
