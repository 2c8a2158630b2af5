export const PHASES = [
  "environment",
  "native-build",
  "model-check",
  "proof-check",
  "logs",
  "resources",
  "main",
] as const;

export type Phase = (typeof PHASES)[number];

export type LogLevel = "INFO" | "SUCCESS" | "WARNING" | "ERROR" | "CRITICAL" | "HIGHLIGHT";

/** Levels a classification may carry. */
export type Severity = Extract<LogLevel, "INFO" | "WARNING" | "ERROR" | "CRITICAL">;

export const ERROR_CATEGORIES = [
  "TYPE_MISMATCH",
  "TYPE_MISMATCH/BlockHash",
  "MISSING_SYMBOL",
  "BORROW_CONFLICT",
  "DEPENDENCY_RESOLUTION",
  "TEST_FAILURE",
  "COMPILER_WARNING",
  "PARSE_ERROR",
  "PROPERTY_VIOLATION",
  "PROOF_OBLIGATION_FAILED",
  "PROOF_TIMEOUT",
  "PROOF_BACKEND",
  "TOOL_UNAVAILABLE",
  "RESOURCE_MEMORY",
  "RESOURCE_DISK",
  "RESOURCE_SIZING",
  "GENERAL",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

/** Immutable, timestamped record; belongs to exactly one phase. */
export interface LogEvent {
  readonly timestamp: string; // ISO string
  readonly phase: Phase;
  readonly level: LogLevel;
  readonly message: string;
  readonly category?: ErrorCategory;
  readonly detail?: string;
  readonly location?: string; // e.g. "src/rotor.rs:10:5"
}

/** Outcome of classifying one line (or window); `null` means the line is ignored. */
export interface Classification {
  category: ErrorCategory;
  severity: Severity;
  detail?: string;
  location?: string;
}

export type PhaseStatus = "healthy" | "degraded" | "failed";

const PHASE_ALIASES: Readonly<Record<string, Phase>> = {
  rust: "native-build",
  tlc: "model-check",
  tlaps: "proof-check",
};

export function isPhase(value: string): value is Phase {
  return (PHASES as readonly string[]).includes(value);
}

export function isErrorCategory(value: string): value is ErrorCategory {
  return (ERROR_CATEGORIES as readonly string[]).includes(value);
}

/** Canonical phase for a name or alias; undefined when unknown. */
export function resolvePhase(name: string): Phase | undefined {
  const key = name.trim().toLowerCase();
  if (isPhase(key)) return key;
  return PHASE_ALIASES[key];
}

export function phaseOrder(phase: Phase): number {
  return PHASES.indexOf(phase);
}
