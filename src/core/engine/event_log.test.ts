import { describe, expect, it } from "vitest";
import { InvariantViolationError } from "./errors";
import { EventLog } from "./event_log";

const ev = (processId: string, startTime: number, endTime: number) => ({
  processId,
  startTime,
  endTime,
  vruntimeBefore: 0,
  vruntimeAfter: 0,
});

describe("EventLog", () => {
  it("drains in append order and empties the buffer", () => {
    const log = new EventLog();
    log.append(ev("A", 0, 2));
    log.append(ev("B", 2, 4));
    expect(log.drain().map((e) => e.processId)).toEqual(["A", "B"]);
    expect(log.length).toBe(0);
    expect(log.drain()).toEqual([]);
    expect(log.totalAppended).toBe(2);
  });

  it("snapshot leaves the buffer intact", () => {
    const log = new EventLog();
    log.append(ev("A", 0, 2));
    expect(log.snapshot()).toHaveLength(1);
    expect(log.length).toBe(1);
  });

  it("allows gaps but rejects overlap", () => {
    const log = new EventLog();
    log.append(ev("A", 0, 5));
    log.append(ev("B", 7, 8));
    expect(() => log.append(ev("C", 7, 9))).toThrow(InvariantViolationError);
    expect(log.lastEndTime).toBe(8);
  });

  it("checks ordering across drains", () => {
    const log = new EventLog();
    log.append(ev("A", 0, 5));
    log.drain();
    expect(() => log.append(ev("B", 4, 6))).toThrow(/before previous end/);
  });

  it("rejects empty intervals", () => {
    expect(() => new EventLog().append(ev("A", 3, 3))).toThrow(/empty interval/);
  });

  it("stores frozen copies", () => {
    const log = new EventLog();
    const e = ev("A", 0, 1);
    log.append(e);
    e.endTime = 99;
    const [stored] = log.drain();
    expect(stored.endTime).toBe(1);
    expect(Object.isFrozen(stored)).toBe(true);
  });
});
