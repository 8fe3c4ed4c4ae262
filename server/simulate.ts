// POST /simulate body handling, kept free of express so it can be tested in-process.

import { runBaseline } from "../src/core/engine/baselines";
import { InvalidConfigurationError } from "../src/core/engine/errors";
import { computeMetrics } from "../src/core/engine/metrics";
import { run } from "../src/core/engine/run";
import { canonicalJson } from "../src/core/trace/canonical_json";
import { traceSignature } from "../src/core/trace/signature";
import type { Algorithm, SchedulingEvent, SimulationMetrics, TimelineSlice } from "../types/sched";
import type { ServerConfig } from "./config";
import { validateSimulateIn, ValidationError, type SimulateIn } from "./validate";

export type SimulateOut = {
  algorithm: Algorithm;
  trace: SchedulingEvent[] | TimelineSlice[];
  metrics: SimulationMetrics;
  signature: string;
};

export type HandlerResult = {
  status: 200 | 400;
  bodyText: string;
  // for the request log line
  algorithm: Algorithm | null;
  traceLength: number;
};

export function simulate(input: SimulateIn, defaults: ServerConfig["defaults"]): SimulateOut {
  const trace =
    input.algorithm === "CFS"
      ? run(
          input.processes,
          input.targetLatency ?? defaults.targetLatency,
          input.minGranularity ?? defaults.minGranularity
        )
      : runBaseline(input.algorithm, input.processes, input.quantum ?? defaults.quantum);

  return {
    algorithm: input.algorithm,
    trace,
    metrics: computeMetrics(input.processes, trace),
    signature: traceSignature(trace),
  };
}

// Client mistakes map to 400; anything else propagates to the 500 path.
export function handleSimulate(body: unknown, cfg: ServerConfig): HandlerResult {
  try {
    const input = validateSimulateIn(body, cfg);
    const out = simulate(input, cfg.defaults);
    return {
      status: 200,
      bodyText: canonicalJson(out),
      algorithm: out.algorithm,
      traceLength: out.trace.length,
    };
  } catch (err) {
    if (err instanceof ValidationError || err instanceof InvalidConfigurationError) {
      return {
        status: 400,
        bodyText: canonicalJson({ error: "bad_request", message: err.message }),
        algorithm: null,
        traceLength: 0,
      };
    }
    throw err;
  }
}
