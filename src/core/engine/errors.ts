// Error taxonomy: bad input at the boundary vs. broken internal invariants.
// There is no I/O in the core, so nothing here is retryable.

export type ConfigurationErrorCode =
  | "out_of_range"
  | "non_positive_burst"
  | "invalid_arrival"
  | "duplicate_id"
  | "invalid_id"
  | "invalid_config"
  | "horizon_overflow"
  | "incomplete_trace";

export type InvariantCode = "duplicate_key" | "empty_queue" | "event_order" | "clock_regression";

export class SchedulerError extends Error {
  constructor(
    readonly code: ConfigurationErrorCode | InvariantCode,
    message: string
  ) {
    super(message);
    this.name = "SchedulerError";
  }
}

// Raised before any simulation step runs.
export class InvalidConfigurationError extends SchedulerError {
  constructor(code: ConfigurationErrorCode, message: string) {
    super(code, message);
    this.name = "InvalidConfigurationError";
  }
}

// A bug in the scheduler's own use of its structures. Never user-facing.
export class InvariantViolationError extends SchedulerError {
  constructor(code: InvariantCode, message: string) {
    super(code, message);
    this.name = "InvariantViolationError";
  }
}
