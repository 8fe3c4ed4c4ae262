import type { ProcessDescriptor, SchedulingEvent } from "../../../types/sched";
import { DEFAULT_SCHEDULER_CONFIG } from "./config";
import { CfsScheduler } from "./scheduler";

// One-shot entry point: validate, run to completion, return the whole trace.
export function run(
  processes: readonly ProcessDescriptor[],
  targetLatency: number = DEFAULT_SCHEDULER_CONFIG.targetLatency,
  minGranularity: number = DEFAULT_SCHEDULER_CONFIG.minGranularity
): SchedulingEvent[] {
  const scheduler = new CfsScheduler(processes, { targetLatency, minGranularity });
  scheduler.run();
  return scheduler.log.drain();
}
