import { describe, expect, it } from "vitest";
import type { ProcessDescriptor, TimelineSlice } from "../../../types/sched";
import { fcfsSchedule, isBaselineAlgorithm, prioritySchedule, roundRobinSchedule, runBaseline, sjfSchedule } from "./baselines";
import { InvalidConfigurationError } from "./errors";

const procs: ProcessDescriptor[] = [
  { id: "P1", nice: 0, burst: 5, arrivalTime: 0 },
  { id: "P2", nice: -1, burst: 3, arrivalTime: 1 },
  { id: "P3", nice: 2, burst: 1, arrivalTime: 2 },
];

const compact = (slices: TimelineSlice[]) => slices.map((s) => `${s.processId}@${s.startTime}-${s.endTime}`);

describe("baseline schedulers", () => {
  it("FCFS runs to completion in arrival order", () => {
    expect(compact(fcfsSchedule(procs))).toEqual(["P1@0-5", "P2@5-8", "P3@8-9"]);
  });

  it("FCFS skips idle gaps", () => {
    const slices = fcfsSchedule([
      { id: "late", nice: 0, burst: 1, arrivalTime: 5 },
      { id: "early", nice: 0, burst: 2 },
    ]);
    expect(compact(slices)).toEqual(["early@0-2", "late@5-6"]);
  });

  it("SJF preempts at quantum boundaries for the shortest remaining job", () => {
    expect(compact(sjfSchedule(procs, 2))).toEqual([
      "P1@0-2",
      "P3@2-3",
      "P1@3-5",
      "P1@5-6",
      "P2@6-8",
      "P2@8-9",
    ]);
  });

  it("PRIORITY runs the lowest nice first", () => {
    expect(compact(prioritySchedule(procs, 2))).toEqual([
      "P1@0-2",
      "P2@2-4",
      "P2@4-5",
      "P1@5-7",
      "P1@7-8",
      "P3@8-9",
    ]);
  });

  it("RR requeues the preempted job ahead of later arrivals", () => {
    expect(compact(roundRobinSchedule(procs, 2))).toEqual([
      "P1@0-2",
      "P1@2-4",
      "P2@4-6",
      "P3@6-7",
      "P1@7-8",
      "P2@8-9",
    ]);
  });

  it("dispatches by algorithm name", () => {
    expect(runBaseline("RR", procs, 2)).toEqual(roundRobinSchedule(procs, 2));
    expect(runBaseline("FCFS", procs, 2)).toEqual(fcfsSchedule(procs));
    expect(isBaselineAlgorithm("SJF")).toBe(true);
    expect(isBaselineAlgorithm("CFS")).toBe(false);
  });

  it("rejects a non-positive quantum and bad processes", () => {
    expect(() => sjfSchedule(procs, 0)).toThrow(InvalidConfigurationError);
    expect(() => roundRobinSchedule([{ id: "x", nice: 0, burst: -1 }], 2)).toThrow(InvalidConfigurationError);
  });

  it("returns nothing for an empty workload", () => {
    expect(roundRobinSchedule([], 3)).toEqual([]);
    expect(prioritySchedule([], 3)).toEqual([]);
  });
});
