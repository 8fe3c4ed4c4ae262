// Append-only record of scheduling decisions; the caller drains it for reporting.

import type { SchedulingEvent } from "../../../types/sched";
import { InvariantViolationError } from "./errors";

export class EventLog {
  private buffer: SchedulingEvent[] = [];
  // Survives drain(): ordering is checked across the whole timeline.
  private lastEnd = 0;
  private appended = 0;

  get length(): number {
    return this.buffer.length;
  }

  get totalAppended(): number {
    return this.appended;
  }

  get lastEndTime(): number {
    return this.lastEnd;
  }

  append(event: SchedulingEvent): void {
    if (event.endTime <= event.startTime) {
      throw new InvariantViolationError(
        "event_order",
        `empty interval [${event.startTime}, ${event.endTime}) for ${event.processId}`
      );
    }
    if (this.appended > 0 && event.startTime < this.lastEnd) {
      throw new InvariantViolationError(
        "event_order",
        `event for ${event.processId} starts at ${event.startTime} before previous end ${this.lastEnd}`
      );
    }
    this.buffer.push(Object.freeze({ ...event }));
    this.lastEnd = event.endTime;
    this.appended++;
  }

  drain(): SchedulingEvent[] {
    const buf = this.buffer;
    if (buf.length === 0) return [];
    this.buffer = []; // atomic swap
    return buf;
  }

  snapshot(): SchedulingEvent[] {
    return [...this.buffer];
  }
}
