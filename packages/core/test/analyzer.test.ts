import { describe, expect, it } from "vitest";
import { createAnalyzer, ReportWriteError, type RenderedReport, type ResourceMetricsPort, type SinkPort } from "../src/index.js";

const AT = "2024-05-01T12:00:00.000Z";
const clock = () => new Date(AT);
const BLOCKHASH_LINE = "error[E0308]: mismatched types expected u64, found [u8; 32]";

function memorySink(): SinkPort & { published: RenderedReport[] } {
  const published: RenderedReport[] = [];
  return {
    published,
    async publish(r) {
      published.push(r);
    },
  };
}

const host = (memory: number): ResourceMetricsPort => ({
  memoryUtilization: async () => memory,
  diskUtilization: async () => 20,
  cpuCount: async () => 4,
  totalMemoryGb: async () => 8,
});

describe("createAnalyzer", () => {
  it("classifies, aggregates, remediates and renders a run", async () => {
    const sink = memorySink();
    const analyzer = createAnalyzer({ sinks: [sink], clock });

    expect(await analyzer.ingestStream("native-build", [BLOCKHASH_LINE])).toBe(1);
    const result = await analyzer.finalize();

    expect(result.worst).toBe("degraded");
    expect(result.snapshot.phases[0]?.counters[0]).toMatchObject({ category: "TYPE_MISMATCH/BlockHash", count: 1 });
    expect(result.remediations.map((r) => r.category)).toEqual(["TYPE_MISMATCH/BlockHash"]);
    expect(result.remediations[0]?.fix).toContain("Fixed-size byte array / integer confusion");
    expect(sink.published.map((r) => r.fileName)).toEqual([
      "reports/native-build_analysis.txt",
      "fixes/fix_blockhash_types.sh",
      "reports/diagnostic_summary.txt",
    ]);

    expect(analyzer.events.events("native-build").map((e) => [e.level, e.message])).toEqual([
      ["ERROR", BLOCKHASH_LINE],
      ["HIGHLIGHT", "Phase native-build status: healthy -> degraded"],
    ]);
    expect(analyzer.events.events("main").map((e) => e.message)).toEqual(["Run finished: degraded"]);
  });

  it("turns a high memory reading into a remediation", async () => {
    const analyzer = createAnalyzer({ sinks: [], metrics: host(92), clock });
    await analyzer.probeResources();
    const result = await analyzer.finalize();

    expect(result.worst).toBe("healthy");
    expect(result.remediations.find((r) => r.category === "RESOURCE_MEMORY")?.fix).toBe(
      "High memory utilization (92%): close other applications or reduce concurrent load (fewer TLC workers).",
    );
    expect(result.remediations.find((r) => r.category === "RESOURCE_SIZING")?.fix).toBe(
      "Run TLC with JAVA_OPTS='-Xmx4g -Xms2g' and -workers 4.",
    );
  });

  it("records nothing for a low memory reading", async () => {
    const analyzer = createAnalyzer({ sinks: [], metrics: host(40), clock });
    await analyzer.probeResources();
    expect(analyzer.aggregator.count("resources", "RESOURCE_MEMORY")).toBe(0);
  });

  it("renders a phase without events", async () => {
    const sink = memorySink();
    const analyzer = createAnalyzer({ sinks: [sink], clock });
    await analyzer.ingestStream("proof-check", []);
    const { reports } = await analyzer.finalize();

    expect(reports[0]?.body).toContain("status: healthy\nerrors: 0\ncritical: 0\nwarnings: 0\ncategories: none\n");
  });

  it("feeds several phases concurrently", async () => {
    const analyzer = createAnalyzer({ sinks: [], clock });
    await analyzer.runPhases({
      "model-check": ["Error: Invariant TypeOK is violated."],
      "proof-check": ["[ERROR]: 1/3 obligations failed."],
    });

    expect(analyzer.aggregator.activePhases()).toEqual(["model-check", "proof-check"]);
    expect(analyzer.aggregator.count("model-check", "PROPERTY_VIOLATION")).toBe(1);
    expect(analyzer.aggregator.count("proof-check", "PROOF_OBLIGATION_FAILED")).toBe(1);
  });

  it("keeps what was read before a stream error", async () => {
    const analyzer = createAnalyzer({ sinks: [], clock });
    async function* broken() {
      yield "test rotor::tests::a ... FAILED";
      throw new Error("read failed");
    }

    expect(await analyzer.ingestStream("native-build", broken())).toBe(1);
    expect(analyzer.events.events("native-build").map((e) => e.message)).toContain("Input ended early: read failed");
    expect(analyzer.aggregator.count("native-build", "TEST_FAILURE")).toBe(1);
  });

  it("stops reading once aborted", async () => {
    const analyzer = createAnalyzer({ sinks: [], clock });
    const controller = new AbortController();
    controller.abort();

    expect(await analyzer.ingestStream("native-build", [BLOCKHASH_LINE], { signal: controller.signal })).toBe(0);
  });

  it("keeps unclassified lines in verbose mode", () => {
    const analyzer = createAnalyzer({ sinks: [], verbose: true, clock });
    expect(analyzer.ingestLine("logs", "just chatter")).toBeNull();
    expect(analyzer.events.events("logs").map((e) => [e.level, e.message])).toEqual([["INFO", "just chatter"]]);
  });

  it("appends the summarizer narrative", async () => {
    const sink = memorySink();
    const analyzer = createAnalyzer({
      sinks: [sink],
      clock,
      summarizer: { summarize: async () => "Start with the build." },
    });
    analyzer.ingestLine("native-build", BLOCKHASH_LINE);
    await analyzer.finalize();

    const consolidated = sink.published.find((r) => r.kind === "consolidated");
    expect(consolidated?.body.endsWith("--- AI summary ---\nStart with the build.\n")).toBe(true);
  });

  it("carries on without a narrative when the summarizer fails", async () => {
    const analyzer = createAnalyzer({
      sinks: [],
      clock,
      summarizer: {
        summarize: async () => {
          throw new Error("quota exceeded");
        },
      },
    });
    analyzer.ingestLine("native-build", BLOCKHASH_LINE);
    const result = await analyzer.finalize();

    expect(result.reports.at(-1)?.body).not.toContain("--- AI summary ---");
    expect(analyzer.events.events("main")[0]).toMatchObject({
      level: "WARNING",
      message: "AI summary unavailable: quota exceeded",
    });
  });

  it("propagates report write failures", async () => {
    const failing: SinkPort = {
      publish: async () => {
        throw new Error("disk full");
      },
    };
    const analyzer = createAnalyzer({ sinks: [failing], clock });
    analyzer.ingestLine("logs", "ERROR sync failed");

    await expect(analyzer.finalize()).rejects.toBeInstanceOf(ReportWriteError);
  });
});
