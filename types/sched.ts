// Shared simulation types (core, CLI and service all speak these shapes).

export type ProcessId = string;

export interface ProcessDescriptor {
  id: ProcessId;
  nice: number;
  burst: number;
  // Omitted = present at start.
  arrivalTime?: number;
}

export interface SchedulingEvent {
  readonly processId: ProcessId;
  readonly startTime: number;
  readonly endTime: number;
  readonly vruntimeBefore: number;
  readonly vruntimeAfter: number;
}

// Common timeline shape for CFS and the baseline algorithms.
export interface TimelineSlice {
  readonly processId: ProcessId;
  readonly startTime: number;
  readonly endTime: number;
}

export type SchedulerState = "idle" | "running" | "finished";

export type BaselineAlgorithm = "FCFS" | "SJF" | "PRIORITY" | "RR";
export type Algorithm = "CFS" | BaselineAlgorithm;

export interface ProcessMetrics {
  id: ProcessId;
  arrivalTime: number;
  burst: number;
  nice: number;
  firstRunTime: number;
  completionTime: number;
  turnaroundTime: number;
  waitingTime: number;
  responseTime: number;
}

export interface AggregateMetrics {
  avgWaitingTime: number;
  avgTurnaroundTime: number;
  avgResponseTime: number;
  waitingTimeStdDev: number;
  makespan: number;
  cpuUtilization: number;
  throughput: number;
}

export interface SimulationMetrics {
  perProcess: ProcessMetrics[];
  aggregate: AggregateMetrics;
}
