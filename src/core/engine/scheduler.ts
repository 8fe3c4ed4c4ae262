// CFS decision loop: pick min-vruntime, grant a weight-proportional slice,
// charge weight-normalised vruntime, requeue or retire, admit arrivals.
// Deterministic: no I/O or wall clock, so identical input gives an identical trace.

import type {
  ProcessDescriptor,
  ProcessId,
  SchedulerState,
  SchedulingEvent,
} from "../../../types/sched";
import { SimClock } from "./clock";
import { resolveSchedulerConfig, type SchedulerConfig } from "./config";
import { InvalidConfigurationError } from "./errors";
import { EventLog } from "./event_log";
import { MinIndex } from "./min_index";
import {
  compareIds,
  createProcess,
  validateDescriptors,
  type SimProcess,
  type WorkHorizon,
} from "./process";
import { RunQueue } from "./run_queue";

export type SchedulerView = {
  readonly now: number;
  readonly decisions: number;
  readonly state: SchedulerState;
};

export type StopPredicate = (view: SchedulerView) => boolean;

export type RunOutcome = {
  decisions: number;
  state: SchedulerState;
  now: number;
};

function byArrival(a: SimProcess, b: SimProcess): boolean {
  if (a.arrivalTime !== b.arrivalTime) return a.arrivalTime < b.arrivalTime;
  return compareIds(a.id, b.id) < 0;
}

export class CfsScheduler {
  readonly config: Readonly<SchedulerConfig>;
  readonly log = new EventLog();

  private readonly queue = new RunQueue();
  private readonly clock = new SimClock();
  private readonly pending = new MinIndex<ProcessId, SimProcess>((p) => p.id, byArrival);
  private readonly knownIds = new Set<ProcessId>();
  private readonly completions = new Map<ProcessId, number>();
  private decisions = 0;
  private horizon: WorkHorizon;

  constructor(processes: readonly ProcessDescriptor[] = [], config: Partial<SchedulerConfig> = {}) {
    this.config = Object.freeze(resolveSchedulerConfig(config));
    // Whole input is checked before anything is queued.
    this.horizon = validateDescriptors(processes);
    for (const d of processes) {
      this.knownIds.add(d.id);
      this.pending.insert(createProcess(d));
    }
    this.admitArrivals();
  }

  get now(): number {
    return this.clock.now;
  }

  get decisionCount(): number {
    return this.decisions;
  }

  get state(): SchedulerState {
    if (!this.queue.isEmpty()) return "running";
    return this.pending.isEmpty() ? "finished" : "idle";
  }

  get runnableCount(): number {
    return this.queue.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  // Diagnostics only; selection always goes through step().
  peekNext(): Readonly<SimProcess> | undefined {
    return this.queue.peekMin();
  }

  queueSnapshot(): SimProcess[] {
    return this.queue.snapshot();
  }

  completionTime(id: ProcessId): number | undefined {
    return this.completions.get(id);
  }

  completedIds(): ProcessId[] {
    return [...this.completions.keys()];
  }

  // Inject an arrival mid-run. Arrivals at or before `now` are admitted at once.
  submit(d: ProcessDescriptor): void {
    if (this.knownIds.has(d.id)) {
      throw new InvalidConfigurationError("duplicate_id", `duplicate process id ${d.id}`);
    }
    // A late submission can still start no earlier than now.
    this.horizon = validateDescriptors([d], {
      lastArrival: Math.max(this.horizon.lastArrival, this.clock.now),
      totalBurst: this.horizon.totalBurst,
    });
    this.knownIds.add(d.id);
    this.pending.insert(createProcess(d));
    this.admitArrivals();
  }

  // One full scheduling decision. Returns null once finished.
  step(): SchedulingEvent | null {
    this.admitArrivals();

    if (this.queue.isEmpty()) {
      const next = this.pending.peekMin();
      if (!next) return null;
      // idle: jump to the next arrival
      this.clock.advanceTo(Math.max(this.clock.now, next.arrivalTime));
      this.admitArrivals();
    }

    const candidate = this.queue.popMin();
    const granted = this.timesliceFor(candidate);
    const startTime = this.clock.now;
    const vruntimeBefore = candidate.vruntime;

    this.clock.advanceBy(granted);
    candidate.vruntime += (granted * this.config.baselineWeight) / candidate.weight;
    candidate.remainingBurst -= granted;

    const event: SchedulingEvent = {
      processId: candidate.id,
      startTime,
      endTime: this.clock.now,
      vruntimeBefore,
      vruntimeAfter: candidate.vruntime,
    };
    this.log.append(event);

    if (candidate.remainingBurst > 0) this.queue.insert(candidate);
    else this.completions.set(candidate.id, this.clock.now);

    this.admitArrivals();
    this.decisions++;
    return event;
  }

  // The stop predicate is only consulted between decisions.
  run(stop?: StopPredicate): RunOutcome {
    const startDecisions = this.decisions;
    while (!stop?.(this.view())) {
      if (this.step() == null) break;
    }
    return { decisions: this.decisions - startDecisions, state: this.state, now: this.clock.now };
  }

  // May overshoot by at most one slice: a decision is never cut short.
  runFor(ticks: number): RunOutcome {
    const until = this.clock.now + ticks;
    return this.run((v) => v.now >= until);
  }

  runDecisions(n: number): RunOutcome {
    const until = this.decisions + n;
    return this.run((v) => v.decisions >= until);
  }

  private view(): SchedulerView {
    return { now: this.clock.now, decisions: this.decisions, state: this.state };
  }

  // `candidate` is already out of the queue, so its weight is added back.
  private timesliceFor(candidate: SimProcess): number {
    const { targetLatency, minGranularity } = this.config;
    const totalWeight = this.queue.totalWeight + candidate.weight;
    const ideal = Math.floor((targetLatency * candidate.weight) / totalWeight);
    const slice = Math.max(ideal, minGranularity);
    return Math.min(slice, candidate.remainingBurst);
  }

  // Late arrivals start at the current queue minimum so they cannot starve
  // everyone else with an artificially low vruntime.
  private admitArrivals(): void {
    for (;;) {
      const next = this.pending.peekMin();
      if (!next || next.arrivalTime > this.clock.now) return;
      const p = this.pending.popMin();
      p.vruntime = this.queue.minVruntime();
      this.queue.insert(p);
    }
  }
}
