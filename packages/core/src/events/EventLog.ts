import { PHASES, type ErrorCategory, type LogEvent, type LogLevel, type Phase } from "../domain/LogEvent.js";
import type { EventSinkPort } from "../ports/index.js";

export interface EventInput {
  level: LogLevel;
  message: string;
  category?: ErrorCategory;
  detail?: string;
  location?: string;
}

export interface EventLogOptions {
  sinks?: EventSinkPort[];
  clock?: () => Date;
}

/**
 * Append-only event store partitioned by phase. Components write here
 * instead of reading each other's state; events are frozen on append.
 */
export class EventLog {
  private readonly streams = new Map<Phase, LogEvent[]>();
  private readonly sinks: EventSinkPort[];
  private readonly clock: () => Date;

  constructor(opts: EventLogOptions = {}) {
    this.sinks = opts.sinks ?? [];
    this.clock = opts.clock ?? (() => new Date());
  }

  append(phase: Phase, input: EventInput): LogEvent {
    const event: LogEvent = Object.freeze({
      timestamp: this.clock().toISOString(),
      phase,
      level: input.level,
      message: input.message,
      ...(input.category ? { category: input.category } : {}),
      ...(input.detail ? { detail: input.detail } : {}),
      ...(input.location ? { location: input.location } : {}),
    });

    let stream = this.streams.get(phase);
    if (!stream) {
      stream = [];
      this.streams.set(phase, stream);
    }
    stream.push(event);
    for (const sink of this.sinks) sink.append(event);
    return event;
  }

  events(phase: Phase): readonly LogEvent[] {
    return [...(this.streams.get(phase) ?? [])];
  }

  /** Every event, phases in declaration order, arrival order within a phase. */
  all(): readonly LogEvent[] {
    return PHASES.flatMap((phase) => this.streams.get(phase) ?? []);
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((s) => s.close?.()));
  }
}
