// RunQueue: runnable processes ordered by (vruntime, id).
// Keeps the sum of queued weights so timeslice computation stays O(1).

import type { ProcessId } from "../../../types/sched";
import { MinIndex } from "./min_index";
import { compareIds, type SimProcess } from "./process";

function byVruntime(a: SimProcess, b: SimProcess): boolean {
  if (a.vruntime !== b.vruntime) return a.vruntime < b.vruntime;
  return compareIds(a.id, b.id) < 0;
}

export class RunQueue {
  private index = new MinIndex<ProcessId, SimProcess>((p) => p.id, byVruntime);
  private weightSum = 0;

  get size(): number {
    return this.index.size;
  }

  get totalWeight(): number {
    return this.weightSum;
  }

  isEmpty(): boolean {
    return this.index.isEmpty();
  }

  has(id: ProcessId): boolean {
    return this.index.has(id);
  }

  // Throws InvariantViolationError(duplicate_key) if the id is already queued.
  insert(p: SimProcess): void {
    this.index.insert(p);
    this.weightSum += p.weight;
  }

  // Throws InvariantViolationError(empty_queue); check isEmpty() first.
  popMin(): SimProcess {
    const p = this.index.popMin();
    this.weightSum -= p.weight;
    return p;
  }

  peekMin(): Readonly<SimProcess> | undefined {
    return this.index.peekMin();
  }

  minVruntime(): number {
    return this.index.peekMin()?.vruntime ?? 0;
  }

  remove(id: ProcessId): SimProcess | undefined {
    const p = this.index.remove(id);
    if (p) this.weightSum -= p.weight;
    return p;
  }

  rekey(id: ProcessId, vruntime: number): boolean {
    const p = this.index.get(id);
    if (!p) return false;
    p.vruntime = vruntime;
    this.index.update(id);
    return true;
  }

  // Copies, so callers cannot move a key behind the heap's back.
  snapshot(): SimProcess[] {
    return this.index.toSortedArray().map((p) => ({ ...p }));
  }
}
