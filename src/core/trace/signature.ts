// Trace signature for golden checks and determinism tests.
// Only the timeline fields are hashed; vruntimes are rounded to 1e-6 so the
// signature is stable against last-digit float formatting.

import type { TimelineSlice } from "../../../types/sched";
import { canonicalJson } from "./canonical_json";
import { fnv1a32hex } from "./fnv";

type Signable = TimelineSlice & { vruntimeAfter?: number };

function q6(n: number): number {
  return Math.round(n * 1e6) / 1e6;
}

export function traceSignature(trace: readonly Signable[]): string {
  const rows = trace.map((e) => ({
    p: e.processId,
    s: e.startTime,
    e: e.endTime,
    v: e.vruntimeAfter == null ? undefined : q6(e.vruntimeAfter),
  }));
  return fnv1a32hex(canonicalJson(rows));
}
