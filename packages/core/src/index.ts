export * from "./domain/LogEvent.js";
export type * from "./domain/Snapshot.js";
export type * from "./domain/Remediation.js";
export * from "./domain/Report.js";
export * from "./errors.js";
export type * from "./ports/index.js";

export { EventLog, type EventInput, type EventLogOptions } from "./events/EventLog.js";
export {
  classifyLine,
  classifyLines,
  classifyText,
  classifyWindow,
  LineWindow,
  splitLines,
  WINDOW_SIZE,
  type ClassifiedLine,
} from "./classifier/classify.js";
export { rulesFor, type ClassificationRule } from "./classifier/rules.js";
export {
  Aggregator,
  DEFAULT_EXAMPLE_CAP,
  nextStatus,
  worstStatus,
  type AggregatorOptions,
} from "./aggregator/Aggregator.js";
export {
  RemediationMapper,
  type OccurrenceCounter,
  type RemediationMapperOptions,
  type SuggestContext,
} from "./remediation/RemediationMapper.js";
export { createKnowledgeBase, DEFAULT_KB_ITEMS, fillTemplate } from "./remediation/knowledgeBase.js";
export {
  BLOCKHASH_FIX_NAME,
  BLOCKHASH_SUBSTITUTIONS,
  blockHashFixArtifact,
  DEFAULT_BLOCKHASH_TARGET,
  renderFixScript,
} from "./remediation/blockHashFix.js";
export { applyFixArtifact, substituteAll, type ApplyFixOptions, type ApplyFixResult } from "./remediation/applyFix.js";
export {
  DEFAULT_THRESHOLDS,
  heapOptions,
  probe,
  sizingAdvice,
  type Finding,
  type ProbeThresholds,
  type ResourceCategory,
} from "./probe/ResourceProbe.js";
export { makeOsMetrics, type OsMetricsOptions } from "./probe/osMetrics.js";
export { renderConsolidatedReport, renderPhaseBody, renderPhaseReport, summaryLine } from "./report/renderer.js";
export { makeFileReportSink } from "./report/fileSink.js";
export { consoleSink } from "./report/consoleSink.js";
export { createAnalyzer, type Analyzer, type AnalyzerConfig, type RunResult } from "./analyzer/createAnalyzer.js";
export { buildReports, ingestLines, type LineSource, type ReportSet } from "./analyzer/pipeline.js";
