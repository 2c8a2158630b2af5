import type { Phase } from "./LogEvent.js";

export type RenderedReport =
  | { kind: "phase"; phase: Phase; fileName: string; body: string }
  | { kind: "consolidated"; fileName: string; body: string }
  | { kind: "fix"; fileName: string; body: string };

export function phaseReportFileName(phase: Phase): string {
  return `reports/${phase}_analysis.txt`;
}

export const CONSOLIDATED_REPORT_FILE = "reports/diagnostic_summary.txt";

export function fixArtifactFileName(name: string): string {
  return `fixes/${name}`;
}
