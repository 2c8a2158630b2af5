import {
  PHASES,
  type ErrorCategory,
  type LogEvent,
  type LogLevel,
  type Phase,
  type PhaseStatus,
  type Severity,
} from "../domain/LogEvent.js";
import type { AggregateCounter, AggregateSnapshot, PhaseSnapshot, PhaseTally } from "../domain/Snapshot.js";
import type { EventLog } from "../events/EventLog.js";

export const DEFAULT_EXAMPLE_CAP = 5;

export interface AggregatorOptions {
  exampleCap?: number;
  /** Status transitions are written here as HIGHLIGHT events. */
  eventLog?: EventLog;
  clock?: () => Date;
}

interface CounterState {
  category: ErrorCategory;
  severity: Severity;
  count: number;
  examples: string[];
  details: string[];
  location?: string;
  truncated: boolean;
  firstSeen: string;
  lastSeen: string;
}

interface PhaseState {
  status: PhaseStatus;
  tally: { errors: number; critical: number; warnings: number };
  counters: Map<ErrorCategory, CounterState>; // insertion order = first-seen order
}

const SEVERITY_RANK: Record<Severity, number> = { INFO: 0, WARNING: 1, ERROR: 2, CRITICAL: 3 };
const STATUS_RANK: Record<PhaseStatus, number> = { healthy: 0, degraded: 1, failed: 2 };

/**
 * Accumulates classified events into per (phase, category) counters. Each
 * phase owns a disjoint table, so phases may be fed concurrently.
 */
export class Aggregator {
  private readonly phases = new Map<Phase, PhaseState>();
  private readonly exampleCap: number;
  private readonly eventLog?: EventLog;
  private readonly clock: () => Date;

  constructor(opts: AggregatorOptions = {}) {
    this.exampleCap = Math.max(1, opts.exampleCap ?? DEFAULT_EXAMPLE_CAP);
    this.eventLog = opts.eventLog;
    this.clock = opts.clock ?? (() => new Date());
  }

  /** Registers a phase so it is reported even when nothing is recorded. */
  openPhase(phase: Phase): void {
    this.state(phase);
  }

  /**
   * Counts the event under its (phase, category). Events without a category
   * are classification misses and are ignored. Replaying the same event
   * increments the count but never adds a duplicate example.
   */
  record(event: LogEvent): boolean {
    if (!event.category) return false;
    const state = this.state(event.phase);
    const severity = toSeverity(event.level);

    let counter = state.counters.get(event.category);
    if (!counter) {
      counter = {
        category: event.category,
        severity,
        count: 0,
        examples: [],
        details: [],
        truncated: false,
        firstSeen: event.timestamp,
        lastSeen: event.timestamp,
      };
      state.counters.set(event.category, counter);
    }

    counter.count += 1;
    counter.lastSeen = event.timestamp;
    if (SEVERITY_RANK[severity] > SEVERITY_RANK[counter.severity]) counter.severity = severity;
    if (event.location) counter.location = event.location;
    if (!counter.examples.includes(event.message)) {
      if (counter.examples.length < this.exampleCap) counter.examples.push(event.message);
      else counter.truncated = true;
    }
    if (event.detail && !counter.details.includes(event.detail) && counter.details.length < this.exampleCap) {
      counter.details.push(event.detail);
    }

    if (severity === "WARNING") state.tally.warnings += 1;
    else if (severity === "ERROR") state.tally.errors += 1;
    else if (severity === "CRITICAL") state.tally.critical += 1;

    this.transition(event.phase, state, nextStatus(state.status, severity));
    return true;
  }

  count(phase: Phase, category: ErrorCategory): number {
    return this.phases.get(phase)?.counters.get(category)?.count ?? 0;
  }

  status(phase: Phase): PhaseStatus {
    return this.phases.get(phase)?.status ?? "healthy";
  }

  /** Phases that were opened or recorded, in declaration order. */
  activePhases(): Phase[] {
    return PHASES.filter((p) => this.phases.has(p));
  }

  snapshot(phase: Phase): PhaseSnapshot {
    const state = this.phases.get(phase);
    const tally: PhaseTally = Object.freeze({ ...(state?.tally ?? { errors: 0, critical: 0, warnings: 0 }) });
    const counters = state ? [...state.counters.values()].map(freezeCounter) : [];
    return Object.freeze({
      phase,
      status: state?.status ?? "healthy",
      tally,
      counters: Object.freeze(counters),
    });
  }

  snapshotAll(): AggregateSnapshot {
    return Object.freeze({
      takenAt: this.clock().toISOString(),
      phases: Object.freeze(this.activePhases().map((p) => this.snapshot(p))),
    });
  }

  private state(phase: Phase): PhaseState {
    let state = this.phases.get(phase);
    if (!state) {
      state = { status: "healthy", tally: { errors: 0, critical: 0, warnings: 0 }, counters: new Map() };
      this.phases.set(phase, state);
    }
    return state;
  }

  private transition(phase: Phase, state: PhaseState, next: PhaseStatus): void {
    if (next === state.status) return;
    const prev = state.status;
    state.status = next;
    this.eventLog?.append(phase, { level: "HIGHLIGHT", message: `Phase ${phase} status: ${prev} -> ${next}` });
  }
}

/** failed is terminal; CRITICAL fails, the first ERROR degrades. */
export function nextStatus(current: PhaseStatus, severity: Severity): PhaseStatus {
  if (current === "failed" || severity === "CRITICAL") return "failed";
  if (severity === "ERROR") return "degraded";
  return current;
}

export function worstStatus(statuses: Iterable<PhaseStatus>): PhaseStatus {
  let worst: PhaseStatus = "healthy";
  for (const s of statuses) if (STATUS_RANK[s] > STATUS_RANK[worst]) worst = s;
  return worst;
}

function toSeverity(level: LogLevel): Severity {
  return level === "WARNING" || level === "ERROR" || level === "CRITICAL" ? level : "INFO";
}

function freezeCounter(c: CounterState): AggregateCounter {
  return Object.freeze({
    category: c.category,
    severity: c.severity,
    count: c.count,
    examples: Object.freeze([...c.examples]),
    details: Object.freeze([...c.details]),
    ...(c.location ? { location: c.location } : {}),
    truncated: c.truncated,
    firstSeen: c.firstSeen,
    lastSeen: c.lastSeen,
  });
}
