import type { Algorithm, ProcessDescriptor } from "../types/sched";
import type { ServerConfig } from "./config";

export type RequestLimits = Pick<ServerConfig, "maxProcesses" | "maxTotalBurst">;

export type SimulateIn = {
  algorithm: Algorithm;
  processes: ProcessDescriptor[];
  targetLatency?: number;
  minGranularity?: number;
  quantum?: number;
};

export class ValidationError extends Error {
  readonly status = 400 as const;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

const ALGORITHMS: readonly Algorithm[] = ["CFS", "FCFS", "SJF", "PRIORITY", "RR"];

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function asString(x: unknown, path: string): string {
  if (typeof x !== "string" || x.length === 0) throw new ValidationError(`invalid ${path}`);
  return x;
}

function asInteger(x: unknown, path: string): number {
  if (typeof x !== "number" || !Number.isSafeInteger(x)) throw new ValidationError(`invalid ${path}`);
  return x;
}

function optionalInteger(x: unknown, path: string): number | undefined {
  return x === undefined ? undefined : asInteger(x, path);
}

function asAlgorithm(x: unknown): Algorithm {
  if (x === undefined) return "CFS";
  const found = ALGORITHMS.find((a) => a === x);
  if (!found) throw new ValidationError("invalid algorithm");
  return found;
}

// Shape and request size only. Range rules (nice, burst > 0, unique ids) belong to the engine,
// which reports them as InvalidConfigurationError.
export function validateSimulateIn(body: unknown, limits: RequestLimits): SimulateIn {
  const { maxProcesses, maxTotalBurst } = limits;
  if (!isObject(body)) throw new ValidationError("invalid body");

  const rawList = body.processes;
  if (!Array.isArray(rawList)) throw new ValidationError("invalid processes");
  if (rawList.length === 0) throw new ValidationError("empty processes");
  if (rawList.length > maxProcesses) {
    throw new ValidationError(`too many processes (max ${maxProcesses})`);
  }

  const processes = rawList.map((raw: unknown, i): ProcessDescriptor => {
    if (!isObject(raw)) throw new ValidationError(`invalid processes[${i}]`);
    const arrivalTime = optionalInteger(raw.arrivalTime, `processes[${i}].arrivalTime`);
    return {
      id: asString(raw.id, `processes[${i}].id`),
      nice: asInteger(raw.nice, `processes[${i}].nice`),
      burst: asInteger(raw.burst, `processes[${i}].burst`),
      ...(arrivalTime === undefined ? {} : { arrivalTime }),
    };
  });

  const totalBurst = processes.reduce((sum, p) => sum + p.burst, 0);
  if (totalBurst > maxTotalBurst) {
    throw new ValidationError(`total burst ${totalBurst} exceeds ${maxTotalBurst}`);
  }

  return {
    algorithm: asAlgorithm(body.algorithm),
    processes,
    targetLatency: optionalInteger(body.targetLatency, "targetLatency"),
    minGranularity: optionalInteger(body.minGranularity, "minGranularity"),
    quantum: optionalInteger(body.quantum, "quantum"),
  };
}
