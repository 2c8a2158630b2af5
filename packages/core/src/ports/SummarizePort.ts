import type { RemediationEntry } from "../domain/Remediation.js";
import type { AggregateSnapshot } from "../domain/Snapshot.js";

export interface SummarizerPort {
  summarize(snapshot: AggregateSnapshot, remediations: readonly RemediationEntry[]): Promise<string>;
}
