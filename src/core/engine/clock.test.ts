import { describe, expect, it } from "vitest";
import { SimClock } from "./clock";
import { InvariantViolationError } from "./errors";

describe("SimClock", () => {
  it("starts at zero and advances", () => {
    const c = new SimClock();
    expect(c.now).toBe(0);
    c.advanceBy(3);
    c.advanceTo(10);
    c.advanceTo(10);
    expect(c.now).toBe(10);
  });

  it("never moves backwards", () => {
    const c = new SimClock();
    c.advanceTo(5);
    expect(() => c.advanceTo(4)).toThrow(InvariantViolationError);
    expect(() => c.advanceBy(-1)).toThrow(/clock|advanceBy/);
    expect(() => c.advanceBy(Number.NaN)).toThrow(InvariantViolationError);
    expect(c.now).toBe(5);
  });
});
