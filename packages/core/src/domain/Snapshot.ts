import type { ErrorCategory, Phase, PhaseStatus, Severity } from "./LogEvent.js";

/** Per (phase, category) aggregate. Counts never decrease within a run. */
export interface AggregateCounter {
  readonly category: ErrorCategory;
  readonly severity: Severity; // most severe level seen
  readonly count: number;
  readonly examples: readonly string[]; // distinct, first-seen order, capped
  readonly details: readonly string[]; // distinct, capped
  readonly location?: string; // latest captured location
  readonly truncated: boolean; // more distinct examples arrived than the cap allows
  readonly firstSeen: string;
  readonly lastSeen: string;
}

export interface PhaseTally {
  readonly errors: number;
  readonly critical: number;
  readonly warnings: number;
}

export interface PhaseSnapshot {
  readonly phase: Phase;
  readonly status: PhaseStatus;
  readonly tally: PhaseTally;
  readonly counters: readonly AggregateCounter[]; // first-seen order
}

export interface AggregateSnapshot {
  readonly takenAt: string;
  readonly phases: readonly PhaseSnapshot[]; // declaration order
}
