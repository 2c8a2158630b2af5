import type { ErrorCategory, Phase } from "../domain/LogEvent.js";

export interface KBItem {
  phase: Phase | "*"; // "*" applies to every phase without a specific row
  category: ErrorCategory;
  detailPattern?: RegExp; // row only applies when the detail matches
  fix: string; // "{detail}" is replaced by the matched detail
  doc?: string; // optional URL or note
}

export interface KnowledgeBasePort {
  lookup(phase: Phase, category: ErrorCategory, detail?: string): KBItem | undefined;
}
