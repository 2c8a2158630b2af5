export type { KBItem, KnowledgeBasePort } from "./KnowledgeBase.js";
export type { SummarizerPort } from "./SummarizePort.js";
export type { SinkPort, EventSinkPort } from "./SinkPort.js";
export type { ResourceMetricsPort } from "./ResourceMetrics.js";
