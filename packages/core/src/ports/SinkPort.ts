import type { LogEvent } from "../domain/LogEvent.js";
import type { RenderedReport } from "../domain/Report.js";

/** Receives finished reports. A rejected publish is a report write failure. */
export interface SinkPort {
  publish(report: RenderedReport): Promise<void>;
}

/** Mirror of the Event Log; must not reorder events within a phase. */
export interface EventSinkPort {
  append(event: LogEvent): void;
  close?(): Promise<void>;
}
