import { describe, expect, it } from "vitest";
import { Aggregator, EventLog, nextStatus, worstStatus, type ErrorCategory, type LogEvent, type LogLevel, type Phase } from "../src/index.js";

let tick = 0;
function event(phase: Phase, category: ErrorCategory | undefined, level: LogLevel, message: string): LogEvent {
  tick += 1;
  return {
    timestamp: new Date(Date.UTC(2024, 4, 1, 12, 0, tick)).toISOString(),
    phase,
    level,
    message,
    ...(category ? { category } : {}),
  };
}

describe("Aggregator", () => {
  it("doubles counts on replay without adding examples or categories", () => {
    const agg = new Aggregator();
    const events = [
      event("native-build", "TYPE_MISMATCH", "ERROR", "a"),
      event("native-build", "MISSING_SYMBOL", "ERROR", "b"),
      event("native-build", "TYPE_MISMATCH", "ERROR", "c"),
    ];
    for (const e of events) agg.record(e);
    for (const e of events) agg.record(e);

    const snap = agg.snapshot("native-build");
    expect(snap.counters.map((c) => [c.category, c.count, c.examples])).toEqual([
      ["TYPE_MISMATCH", 4, ["a", "c"]],
      ["MISSING_SYMBOL", 2, ["b"]],
    ]);
  });

  it("caps examples and flags the overflow", () => {
    const agg = new Aggregator({ exampleCap: 2 });
    for (const m of ["x1", "x2", "x3", "x2"]) agg.record(event("logs", "GENERAL", "ERROR", m));

    const [counter] = agg.snapshot("logs").counters;
    expect(counter?.count).toBe(4);
    expect(counter?.examples).toEqual(["x1", "x2"]);
    expect(counter?.truncated).toBe(true);
  });

  it("keeps first-seen and last-seen timestamps and the highest severity", () => {
    const agg = new Aggregator();
    const first = event("model-check", "PROPERTY_VIOLATION", "WARNING", "w");
    const last = event("model-check", "PROPERTY_VIOLATION", "ERROR", "e");
    agg.record(first);
    agg.record(last);

    const [counter] = agg.snapshot("model-check").counters;
    expect(counter?.firstSeen).toBe(first.timestamp);
    expect(counter?.lastSeen).toBe(last.timestamp);
    expect(counter?.severity).toBe("ERROR");
  });

  it("ignores events without a category", () => {
    const agg = new Aggregator();
    expect(agg.record(event("logs", undefined, "INFO", "chatter"))).toBe(false);
    expect(agg.snapshot("logs").counters).toEqual([]);
  });

  it("moves healthy -> degraded -> failed and logs each transition", () => {
    const log = new EventLog({ clock: () => new Date("2024-05-01T12:00:00.000Z") });
    const agg = new Aggregator({ eventLog: log });

    agg.record(event("native-build", "COMPILER_WARNING", "WARNING", "w"));
    expect(agg.status("native-build")).toBe("healthy");
    agg.record(event("native-build", "TYPE_MISMATCH", "ERROR", "e"));
    expect(agg.status("native-build")).toBe("degraded");
    agg.record(event("native-build", "TOOL_UNAVAILABLE", "CRITICAL", "c"));
    agg.record(event("native-build", "TYPE_MISMATCH", "ERROR", "e2"));
    expect(agg.status("native-build")).toBe("failed");

    expect(log.events("native-build").map((e) => [e.level, e.message])).toEqual([
      ["HIGHLIGHT", "Phase native-build status: healthy -> degraded"],
      ["HIGHLIGHT", "Phase native-build status: degraded -> failed"],
    ]);
    expect(agg.snapshot("native-build").tally).toEqual({ errors: 2, critical: 1, warnings: 1 });
  });

  it("fails a phase straight from healthy on a CRITICAL event", () => {
    const agg = new Aggregator();
    agg.record(event("model-check", "RESOURCE_MEMORY", "CRITICAL", "oom"));
    expect(agg.status("model-check")).toBe("failed");
  });

  it("reports an opened but empty phase as healthy with zero counts", () => {
    const agg = new Aggregator();
    agg.openPhase("proof-check");
    agg.openPhase("environment");

    expect(agg.activePhases()).toEqual(["environment", "proof-check"]);
    expect(agg.snapshot("proof-check")).toEqual({
      phase: "proof-check",
      status: "healthy",
      tally: { errors: 0, critical: 0, warnings: 0 },
      counters: [],
    });
  });

  it("returns frozen snapshots stamped by the clock", () => {
    const agg = new Aggregator({ clock: () => new Date("2024-05-01T12:00:00.000Z") });
    agg.record(event("logs", "GENERAL", "ERROR", "boom"));

    const all = agg.snapshotAll();
    expect(all.takenAt).toBe("2024-05-01T12:00:00.000Z");
    expect(Object.isFrozen(all.phases)).toBe(true);
    expect(Object.isFrozen(all.phases[0]?.counters[0]?.examples)).toBe(true);
    expect(agg.count("logs", "GENERAL")).toBe(1);
    expect(agg.count("logs", "PARSE_ERROR")).toBe(0);
  });
});

describe("status helpers", () => {
  it("never leaves failed", () => {
    expect(nextStatus("failed", "INFO")).toBe("failed");
    expect(nextStatus("degraded", "WARNING")).toBe("degraded");
    expect(nextStatus("healthy", "ERROR")).toBe("degraded");
  });

  it("picks the worst status", () => {
    expect(worstStatus([])).toBe("healthy");
    expect(worstStatus(["healthy", "failed", "degraded"])).toBe("failed");
  });
});
