import { InvariantViolationError } from "./errors";

// Simulated time. Owned by one Scheduler; never reads the wall clock.
export class SimClock {
  private t = 0;

  get now(): number {
    return this.t;
  }

  advanceBy(dt: number): void {
    if (!(dt >= 0)) {
      throw new InvariantViolationError("clock_regression", `advanceBy(${dt})`);
    }
    this.t += dt;
  }

  advanceTo(t: number): void {
    if (!(t >= this.t)) {
      throw new InvariantViolationError("clock_regression", `advanceTo(${t}) from ${this.t}`);
    }
    this.t = t;
  }
}
