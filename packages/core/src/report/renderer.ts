import type { Phase } from "../domain/LogEvent.js";
import type { RemediationEntry } from "../domain/Remediation.js";
import { fixArtifactFileName } from "../domain/Report.js";
import type { AggregateCounter, AggregateSnapshot, PhaseSnapshot } from "../domain/Snapshot.js";
import { worstStatus } from "../aggregator/Aggregator.js";

export interface ConsolidatedOptions {
  narrative?: string; // optional AI summary, rendered after the summary line
}

/**
 * Per-phase report. The header carries the only timestamp, so two renders of
 * the same snapshot differ in that line at most.
 */
export function renderPhaseReport(
  snapshot: PhaseSnapshot,
  remediations: readonly RemediationEntry[],
  generatedAt: string,
): string {
  return [
    `=== Phase Report: ${snapshot.phase} ===`,
    `Generated: ${generatedAt}`,
    "",
    ...renderPhaseBody(snapshot, remediations),
    "",
  ].join("\n");
}

export function renderConsolidatedReport(
  snapshot: AggregateSnapshot,
  remediations: readonly RemediationEntry[],
  opts: ConsolidatedOptions = {},
): string {
  const lines = ["=== Consolidated Diagnostic Report ===", `Generated: ${snapshot.takenAt}`];
  for (const phase of snapshot.phases) {
    lines.push("", `--- ${phase.phase} ---`, ...renderPhaseBody(phase, remediations));
  }
  lines.push("", summaryLine(snapshot));
  if (opts.narrative?.trim()) {
    lines.push("", "--- AI summary ---", opts.narrative.trim());
  }
  lines.push("");
  return lines.join("\n");
}

export function summaryLine(snapshot: AggregateSnapshot): string {
  let errors = 0;
  let critical = 0;
  let warnings = 0;
  for (const p of snapshot.phases) {
    errors += p.tally.errors;
    critical += p.tally.critical;
    warnings += p.tally.warnings;
  }
  const worst = worstStatus(snapshot.phases.map((p) => p.status));
  return `Summary: errors=${errors} critical=${critical} warnings=${warnings} worst=${worst}`;
}

export function renderPhaseBody(snapshot: PhaseSnapshot, remediations: readonly RemediationEntry[]): string[] {
  const lines = [
    `status: ${snapshot.status}`,
    `errors: ${snapshot.tally.errors}`,
    `critical: ${snapshot.tally.critical}`,
    `warnings: ${snapshot.tally.warnings}`,
  ];
  if (snapshot.counters.length === 0) {
    lines.push("categories: none");
    return lines;
  }
  for (const counter of snapshot.counters) {
    lines.push("", ...renderCounter(counter, findEntry(remediations, snapshot.phase, counter)));
  }
  return lines;
}

function renderCounter(counter: AggregateCounter, entry: RemediationEntry | undefined): string[] {
  const lines = [`[${counter.category}]`, `  severity: ${counter.severity}`, `  count: ${counter.count}`];
  if (counter.details.length) lines.push(`  details: ${counter.details.join(", ")}`);
  if (counter.location) lines.push(`  location: ${counter.location}`);
  lines.push("  examples:", ...counter.examples.map((e) => `    - ${e}`));
  if (counter.truncated) lines.push("    (further distinct examples omitted)");
  if (entry) {
    lines.push(`  remediation: ${entry.fix}`);
    if (entry.doc) lines.push(`  see: ${entry.doc}`);
    if (entry.artifact) lines.push(`  fix script: ${fixArtifactFileName(entry.artifact.name)}`);
  }
  return lines;
}

function findEntry(
  remediations: readonly RemediationEntry[],
  phase: Phase,
  counter: AggregateCounter,
): RemediationEntry | undefined {
  return remediations.find((r) => r.phase === phase && r.category === counter.category);
}
