import { describe, expect, it } from "vitest";
import { InvalidConfigurationError } from "./errors";
import { MAX_NICE, MIN_NICE, NICE_0_WEIGHT, weightOf, weightTable } from "./weights";

describe("weightOf", () => {
  it("maps nice 0 to the baseline weight", () => {
    expect(weightOf(0)).toBe(NICE_0_WEIGHT);
    expect(NICE_0_WEIGHT).toBe(1024);
  });

  it("scales by 1.25 per nice step, rounded", () => {
    expect(weightOf(-1)).toBe(1280);
    expect(weightOf(1)).toBe(819);
    expect(weightOf(-5)).toBe(3125);
    expect(weightOf(5)).toBe(336);
  });

  it("is strictly decreasing across the whole range", () => {
    const table = weightTable();
    expect(table).toHaveLength(MAX_NICE - MIN_NICE + 1);
    for (let i = 1; i < table.length; i++) {
      expect(table[i]).toBeLessThan(table[i - 1]);
    }
    expect(table[table.length - 1]).toBeGreaterThan(0);
  });

  it("rejects nice values outside [-20, 19]", () => {
    expect(() => weightOf(20)).toThrow(InvalidConfigurationError);
    expect(() => weightOf(-21)).toThrow(/outside/);
    expect(() => weightOf(0.5)).toThrow(InvalidConfigurationError);
  });

  it("returns a frozen table", () => {
    expect(Object.isFrozen(weightTable())).toBe(true);
  });
});
