import { describe, expect, it } from "vitest";
import { canonicalJson } from "./canonical_json";
import { fnv1a32hex, fnv1a32u } from "./fnv";
import { formatAggregate, formatTable, formatTrace } from "./report";
import { traceSignature } from "./signature";

describe("canonicalJson", () => {
  it("sorts keys and drops undefined members", () => {
    expect(canonicalJson({ b: 1, a: [true, null, "x"], c: undefined })).toBe('{"a":[true,null,"x"],"b":1}');
  });

  it("is independent of insertion order", () => {
    expect(canonicalJson({ x: { q: 1, p: 2 }, y: 0 })).toBe(canonicalJson({ y: 0, x: { p: 2, q: 1 } }));
  });

  it("normalises negative zero", () => {
    expect(canonicalJson([-0, 0.5])).toBe("[0,0.5]");
  });

  it("rejects non-finite numbers and unsupported values", () => {
    expect(() => canonicalJson(Number.NaN)).toThrow(/non-finite/);
    expect(() => canonicalJson(() => 1)).toThrow(/unsupported/);
  });
});

describe("fnv1a32", () => {
  it("matches the reference offsets", () => {
    expect(fnv1a32hex("")).toBe("811c9dc5");
    expect(fnv1a32u("a")).toBe(0xe40c292c);
  });
});

describe("traceSignature", () => {
  const base = [
    { processId: "A", startTime: 0, endTime: 2, vruntimeBefore: 0, vruntimeAfter: 2 },
    { processId: "B", startTime: 2, endTime: 4, vruntimeBefore: 0, vruntimeAfter: 2 },
  ];

  it("is an 8-digit hex string, stable across calls", () => {
    const sig = traceSignature(base);
    expect(sig).toMatch(/^[0-9a-f]{8}$/);
    expect(traceSignature(base.map((e) => ({ ...e })))).toBe(sig);
  });

  it("changes when the timeline changes", () => {
    const moved = [base[0], { ...base[1], endTime: 5 }];
    expect(traceSignature(moved)).not.toBe(traceSignature(base));
  });

  it("ignores sub-micro vruntime noise", () => {
    const noisy = [base[0], { ...base[1], vruntimeAfter: 2 + 1e-9 }];
    expect(traceSignature(noisy)).toBe(traceSignature(base));
  });

  it("accepts plain slices", () => {
    expect(traceSignature([{ processId: "A", startTime: 0, endTime: 1 }])).toMatch(/^[0-9a-f]{8}$/);
  });
});

describe("report formatting", () => {
  it("right-aligns columns", () => {
    expect(formatTable(["a", "bb"], [["1", "2"]])).toEqual(["a | bb", "--+---", "1 |  2"]);
  });

  it("prints one line per event after the header", () => {
    const lines = formatTrace([
      { processId: "A", startTime: 0, endTime: 18, vruntimeBefore: 0, vruntimeAfter: 5.89824 },
    ]);
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("  A |     0 |  18 |         0 |    5.898");
  });

  it("summarises aggregates on one line", () => {
    expect(
      formatAggregate("FCFS", {
        avgWaitingTime: 2,
        avgTurnaroundTime: 4.5,
        avgResponseTime: 1,
        waitingTimeStdDev: 0,
        makespan: 9,
        cpuUtilization: 1,
        throughput: 1 / 3,
      })
    ).toBe("FCFS: avgWT=2 avgTAT=4.500 avgRT=1 sdWT=0 makespan=9 util=1 thr=0.3333");
  });
});
