import { describe, expect, it } from "vitest";
import { parseArgs, validateGoldenFile } from "./sim_args";

describe("parseArgs", () => {
  it("uses defaults", () => {
    expect(parseArgs([])).toEqual({
      seed: 123,
      tasks: 10,
      latency: 20,
      granularity: 1,
      quantum: 4,
      mode: "run",
      trace: false,
    });
  });

  it("reads flags", () => {
    const args = parseArgs(["--seed=7", "--tasks=0", "--latency=48", "--trace", "--verify"]);
    expect(args.seed).toBe(7);
    expect(args.tasks).toBe(0);
    expect(args.latency).toBe(48);
    expect(args.trace).toBe(true);
    expect(args.mode).toBe("verify");
  });

  it("rejects zero tuning values up front", () => {
    expect(() => parseArgs(["--latency=0"])).toThrow("[SIM] invalid --latency=0");
    expect(() => parseArgs(["--granularity=0"])).toThrow("[SIM] invalid --granularity=0");
    expect(() => parseArgs(["--quantum=0"])).toThrow("[SIM] invalid --quantum=0");
  });

  it("rejects malformed values and unknown flags", () => {
    expect(() => parseArgs(["--seed=-1"])).toThrow("[SIM] invalid --seed=-1");
    expect(() => parseArgs(["--tasks=x"])).toThrow("[SIM] invalid --tasks=NaN");
    expect(() => parseArgs(["--ticks=5"])).toThrow("[SIM] unknown argument --ticks=5");
  });
});

describe("validateGoldenFile", () => {
  it("accepts a well-formed file", () => {
    const golden = { seed: 1, tasks: 2, latency: 20, granularity: 1, quantum: 4, signatures: { CFS: "0badcafe" } };
    expect(validateGoldenFile(golden)).toEqual(golden);
  });

  it("rejects a missing field", () => {
    expect(() => validateGoldenFile({ seed: 1, signatures: {} })).toThrow(
      "[SIM] sim.golden.json: missing/invalid tasks"
    );
  });
});
