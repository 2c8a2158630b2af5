import { Aggregator, worstStatus } from "../aggregator/Aggregator.js";
import { classifyLine } from "../classifier/classify.js";
import { PHASES, type Classification, type LogEvent, type Phase, type PhaseStatus } from "../domain/LogEvent.js";
import type { RemediationEntry } from "../domain/Remediation.js";
import type { RenderedReport } from "../domain/Report.js";
import type { AggregateSnapshot } from "../domain/Snapshot.js";
import { ReportWriteError } from "../errors.js";
import { EventLog } from "../events/EventLog.js";
import type {
  EventSinkPort,
  KnowledgeBasePort,
  ResourceMetricsPort,
  SinkPort,
  SummarizerPort,
} from "../ports/index.js";
import { probe, type Finding, type ProbeThresholds } from "../probe/ResourceProbe.js";
import { RemediationMapper } from "../remediation/RemediationMapper.js";
import { consoleSink } from "../report/consoleSink.js";
import { buildReports, ingestLines, recordFinding, recordLine, type LineSource, type PipelineDeps } from "./pipeline.js";

export interface AnalyzerConfig {
  exampleCap?: number;
  knowledgeBase?: KnowledgeBasePort;
  summarizer?: SummarizerPort;
  sinks?: SinkPort[];
  eventSinks?: EventSinkPort[];
  metrics?: ResourceMetricsPort;
  thresholds?: ProbeThresholds;
  generateFixes?: boolean;
  defaultFixTarget?: string;
  /** Keep unclassified lines in the event log as INFO events. */
  verbose?: boolean;
  clock?: () => Date;
}

export interface RunResult {
  snapshot: AggregateSnapshot;
  remediations: RemediationEntry[];
  reports: RenderedReport[];
  worst: PhaseStatus;
}

export interface Analyzer {
  readonly events: EventLog;
  readonly aggregator: Aggregator;
  readonly remediation: RemediationMapper;
  /** Records an already-classified event. */
  ingest(event: LogEvent): void;
  ingestLine(phase: Phase, line: string): Classification | null;
  ingestStream(phase: Phase, source: LineSource, opts?: { signal?: AbortSignal }): Promise<number>;
  /** Feeds several phases concurrently; resolves once all of them finished. */
  runPhases(inputs: Partial<Record<Phase, LineSource>>, opts?: { signal?: AbortSignal }): Promise<void>;
  recordFindings(findings: readonly Finding[]): void;
  probeResources(): Promise<Finding[]>;
  /** Waits for in-flight phases, renders every report and publishes it to the sinks. */
  finalize(): Promise<RunResult>;
}

export function createAnalyzer(cfg: AnalyzerConfig = {}): Analyzer {
  const clock = cfg.clock ?? (() => new Date());
  const events = new EventLog({ sinks: cfg.eventSinks, clock });
  const aggregator = new Aggregator({ exampleCap: cfg.exampleCap, eventLog: events, clock });
  const remediation = new RemediationMapper(aggregator, {
    knowledgeBase: cfg.knowledgeBase,
    defaultFixTarget: cfg.defaultFixTarget,
    generateFixes: cfg.generateFixes,
  });
  const sinks = cfg.sinks ?? [consoleSink];
  const deps: PipelineDeps = { events, aggregator, verbose: cfg.verbose ?? false };
  const inFlight = new Set<Promise<number>>();

  const track = (p: Promise<number>) => {
    inFlight.add(p);
    return p.finally(() => inFlight.delete(p));
  };

  const analyzer: Analyzer = {
    events,
    aggregator,
    remediation,

    ingest(event) {
      aggregator.record(event);
    },

    ingestLine(phase, line) {
      aggregator.openPhase(phase);
      const classification = classifyLine(line, phase);
      recordLine(phase, { line, classification }, deps);
      return classification;
    },

    ingestStream(phase, source, opts = {}) {
      return track(ingestLines(phase, source, deps, opts.signal));
    },

    async runPhases(inputs, opts = {}) {
      const runs = PHASES.flatMap((phase) => {
        const source = inputs[phase];
        return source ? [analyzer.ingestStream(phase, source, opts)] : [];
      });
      await Promise.all(runs);
    },

    recordFindings(findings) {
      aggregator.openPhase("resources");
      for (const f of findings) recordFinding(f, deps);
    },

    async probeResources() {
      if (!cfg.metrics) return [];
      const findings = await probe(cfg.metrics, cfg.thresholds);
      analyzer.recordFindings(findings);
      return findings;
    },

    async finalize() {
      await Promise.all([...inFlight]);

      const snapshot = aggregator.snapshotAll();
      const narrative = await summarize(snapshot);
      const { remediations, reports } = buildReports(snapshot, remediation, narrative);

      await Promise.all(
        sinks.flatMap((sink) =>
          reports.map((r) =>
            sink.publish(r).catch((err: unknown) => {
              throw err instanceof ReportWriteError ? err : new ReportWriteError(r.fileName, err);
            }),
          ),
        ),
      );

      const worst = worstStatus(snapshot.phases.map((p) => p.status));
      events.append("main", { level: worst === "healthy" ? "SUCCESS" : "HIGHLIGHT", message: `Run finished: ${worst}` });
      return { snapshot, remediations, reports, worst };
    },
  };

  async function summarize(snapshot: AggregateSnapshot): Promise<string | undefined> {
    if (!cfg.summarizer) return undefined;
    // suggestFor is last-wins; buildReports recomputes the same entries.
    const advice = snapshot.phases.flatMap((p) => remediation.suggestFor(p));
    try {
      return await cfg.summarizer.summarize(snapshot, advice);
    } catch (err) {
      events.append("main", {
        level: "WARNING",
        message: `AI summary unavailable: ${err instanceof Error ? err.message : String(err)}`,
      });
      return undefined;
    }
  }

  return analyzer;
}
