import type { Aggregator } from "../aggregator/Aggregator.js";
import { LineWindow, type ClassifiedLine } from "../classifier/classify.js";
import type { Classification, LogEvent, Phase } from "../domain/LogEvent.js";
import type { RemediationEntry } from "../domain/Remediation.js";
import {
  CONSOLIDATED_REPORT_FILE,
  fixArtifactFileName,
  phaseReportFileName,
  type RenderedReport,
} from "../domain/Report.js";
import type { AggregateSnapshot } from "../domain/Snapshot.js";
import type { EventLog } from "../events/EventLog.js";
import type { Finding } from "../probe/ResourceProbe.js";
import type { RemediationMapper } from "../remediation/RemediationMapper.js";
import { renderConsolidatedReport, renderPhaseReport } from "../report/renderer.js";

export type LineSource = Iterable<string> | AsyncIterable<string>;

export interface PipelineDeps {
  events: EventLog;
  aggregator: Aggregator;
  verbose: boolean;
}

/** Event-log then aggregate one classified (or missed) line. */
export function recordLine(phase: Phase, item: ClassifiedLine, deps: PipelineDeps): LogEvent | undefined {
  const { line, classification } = item;
  if (!classification) {
    if (deps.verbose && line.trim()) deps.events.append(phase, { level: "INFO", message: line });
    return undefined;
  }
  const event = deps.events.append(phase, toEventInput(line, classification));
  deps.aggregator.record(event);
  return event;
}

/**
 * Feeds a line source through the classifier window. Stops early when the
 * signal aborts; whatever was recorded until then stays valid.
 */
export async function ingestLines(
  phase: Phase,
  source: LineSource,
  deps: PipelineDeps,
  signal?: AbortSignal,
): Promise<number> {
  deps.aggregator.openPhase(phase);
  const window = new LineWindow(phase);
  let classified = 0;
  const take = (items: ClassifiedLine[]) => {
    for (const item of items) if (recordLine(phase, item, deps)) classified++;
  };

  try {
    for await (const line of source) {
      if (signal?.aborted) break;
      take(window.push(line));
    }
  } catch (err) {
    deps.events.append(phase, {
      level: "WARNING",
      message: `Input ended early: ${err instanceof Error ? err.message : String(err)}`,
    });
  }
  take(window.flush());
  return classified;
}

export function recordFinding(finding: Finding, deps: PipelineDeps): LogEvent {
  const event = deps.events.append(finding.phase, {
    level: finding.level,
    message: finding.message,
    category: finding.category,
    detail: finding.detail,
  });
  deps.aggregator.record(event);
  return event;
}

export interface ReportSet {
  remediations: RemediationEntry[];
  reports: RenderedReport[];
}

/** Renders every phase report, fix artifact and the consolidated report. */
export function buildReports(
  snapshot: AggregateSnapshot,
  mapper: RemediationMapper,
  narrative?: string,
): ReportSet {
  const remediations = snapshot.phases.flatMap((p) => mapper.suggestFor(p));
  const reports: RenderedReport[] = [];

  for (const phase of snapshot.phases) {
    reports.push({
      kind: "phase",
      phase: phase.phase,
      fileName: phaseReportFileName(phase.phase),
      body: renderPhaseReport(phase, remediations, snapshot.takenAt),
    });
  }
  for (const entry of remediations) {
    if (entry.artifact) {
      reports.push({ kind: "fix", fileName: fixArtifactFileName(entry.artifact.name), body: entry.artifact.content });
    }
  }
  reports.push({
    kind: "consolidated",
    fileName: CONSOLIDATED_REPORT_FILE,
    body: renderConsolidatedReport(snapshot, remediations, { narrative }),
  });

  return { remediations, reports };
}

function toEventInput(line: string, c: Classification) {
  return {
    level: c.severity,
    message: line.trim(),
    category: c.category,
    ...(c.detail ? { detail: c.detail } : {}),
    ...(c.location ? { location: c.location } : {}),
  };
}
