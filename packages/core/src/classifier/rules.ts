import type { ErrorCategory, Phase, Severity } from "../domain/LogEvent.js";

export interface ClassificationRule {
  id: string;
  pattern: RegExp; // tested against the head line
  within?: RegExp; // must also match the diagnostic window when set
  category: ErrorCategory;
  severity: Severity;
  detail?: (head: RegExpExecArray, window: string) => string | undefined;
}

const group =
  (n: number) =>
  (m: RegExpExecArray): string | undefined =>
    m[n];

const fixed = (value: string) => (): string => value;

// rustc / cargo. Order matters: first match wins.
export const NATIVE_BUILD_RULES: readonly ClassificationRule[] = [
  {
    id: "test-failed",
    pattern: /^\s*test\s+(\S+)\s+\.\.\.\s+FAILED/,
    category: "TEST_FAILURE",
    severity: "ERROR",
    detail: group(1),
  },
  {
    id: "blockhash-array-for-u64",
    pattern: /mismatched types/,
    within: /expected[\s\S]*?\bu64\b[\s\S]*?found[\s\S]*?\[u8; 32\]/,
    category: "TYPE_MISMATCH/BlockHash",
    severity: "ERROR",
    detail: fixed("expected u64, found [u8; 32]"),
  },
  {
    id: "blockhash-u64-for-array",
    pattern: /mismatched types/,
    within: /expected[\s\S]*?\[u8; 32\][\s\S]*?found[\s\S]*?\bu64\b/,
    category: "TYPE_MISMATCH/BlockHash",
    severity: "ERROR",
    detail: fixed("expected [u8; 32], found u64"),
  },
  { id: "mismatched-types", pattern: /mismatched types/, category: "TYPE_MISMATCH", severity: "ERROR" },
  {
    id: "cannot-find",
    pattern: /cannot find(?: \w+)?(?: `([^`]+)`)?|unresolved import(?: `([^`]+)`)?/,
    category: "MISSING_SYMBOL",
    severity: "ERROR",
    detail: (m) => m[1] ?? m[2],
  },
  {
    id: "dependency",
    pattern: /no matching package named|failed to select a version|failed to load source for dependency/,
    category: "DEPENDENCY_RESOLUTION",
    severity: "ERROR",
  },
  { id: "borrow", pattern: /borrow/, category: "BORROW_CONFLICT", severity: "ERROR" },
  { id: "rustc-error", pattern: /error\[/, category: "GENERAL", severity: "ERROR" },
  { id: "rustc-warning", pattern: /^\s*warning(?:\[\w+\])?:/, category: "COMPILER_WARNING", severity: "WARNING" },
];

// Shared by the model checker and the proof checker: both parse TLA+ first.
const PARSER_RULES: readonly ClassificationRule[] = [
  {
    id: "format-exception",
    pattern: /(?:UnknownFormatConversion|MissingFormatArgument|IllegalFormat\w*|FormatFlagsConversionMismatch)Exception/,
    category: "PARSE_ERROR",
    severity: "ERROR",
    detail: fixed("format-string"),
  },
  {
    id: "parse-error",
    pattern: /(lexical|syntax|parse|semantic) error|ParseException/i,
    category: "PARSE_ERROR",
    severity: "ERROR",
    detail: (m) => (m[1] ? `${m[1].toLowerCase()} error` : "parse exception"),
  },
];

export const MODEL_CHECK_RULES: readonly ClassificationRule[] = [
  ...PARSER_RULES,
  {
    id: "invariant-violated",
    pattern: /Invariant (\S+?) is violated/,
    category: "PROPERTY_VIOLATION",
    severity: "ERROR",
    detail: group(1),
  },
  {
    id: "temporal-violated",
    pattern: /Temporal properties were violated/,
    category: "PROPERTY_VIOLATION",
    severity: "ERROR",
    detail: fixed("temporal property"),
  },
  {
    id: "deadlock",
    pattern: /Deadlock reached/i,
    category: "PROPERTY_VIOLATION",
    severity: "ERROR",
    detail: fixed("deadlock"),
  },
  {
    id: "heap",
    pattern: /OutOfMemoryError|Java heap space|GC overhead limit/,
    category: "RESOURCE_MEMORY",
    severity: "CRITICAL",
  },
  {
    id: "unknown-operator",
    pattern: /Unknown operator(?::? `?([\w!]+)`?)?|Module .* does not exist|Could not find/,
    category: "MISSING_SYMBOL",
    severity: "ERROR",
    detail: group(1),
  },
  {
    id: "tool-missing",
    pattern: /command not found|exit code 127|cannot execute/,
    category: "TOOL_UNAVAILABLE",
    severity: "CRITICAL",
  },
  {
    id: "tlc-error",
    pattern: /^\s*Error:|exit code 255|TLC threw an unexpected exception/,
    category: "GENERAL",
    severity: "ERROR",
  },
];

export const PROOF_CHECK_RULES: readonly ClassificationRule[] = [
  ...PARSER_RULES,
  {
    id: "obligations-failed",
    pattern: /(\d+\/\d+) obligations? failed|failed to prove/i,
    category: "PROOF_OBLIGATION_FAILED",
    severity: "ERROR",
    detail: group(1),
  },
  {
    id: "backend-failed",
    pattern: /backend\b.*\bfailed/i,
    category: "PROOF_BACKEND",
    severity: "ERROR",
    detail: (m) => /\b(zenon|ls4|smt|isabelle)\b/i.exec(m.input)?.[1]?.toLowerCase(),
  },
  { id: "proof-timeout", pattern: /timeout|timed out/i, category: "PROOF_TIMEOUT", severity: "WARNING" },
  { id: "tlapm-abnormal", pattern: /tlapm ending abnormally/, category: "GENERAL", severity: "CRITICAL" },
  { id: "proof-failed", pattern: /\bfailed\b/i, category: "GENERAL", severity: "ERROR" },
];

export const ENVIRONMENT_RULES: readonly ClassificationRule[] = [
  {
    id: "tool-not-found",
    pattern: /(?:^|\s)(\S+?):? (?:command )?not found|not found in PATH|not available/,
    category: "TOOL_UNAVAILABLE",
    severity: "ERROR",
    detail: group(1),
  },
  {
    id: "tool-version",
    pattern: /too old|or later required|recommend \d+\+/i,
    category: "GENERAL",
    severity: "WARNING",
  },
];

const GENERIC_RULES: readonly ClassificationRule[] = [
  { id: "generic-error", pattern: /\b(?:error|failed|exception)\b/i, category: "GENERAL", severity: "ERROR" },
  { id: "generic-warning", pattern: /\bwarn(?:ing)?\b/i, category: "GENERAL", severity: "WARNING" },
];

// Log review sees output from every collaborator.
const REVIEW_RULES: readonly ClassificationRule[] = [
  ...NATIVE_BUILD_RULES,
  ...MODEL_CHECK_RULES,
  ...PROOF_CHECK_RULES.filter((r) => !PARSER_RULES.includes(r)),
  ...ENVIRONMENT_RULES,
  ...GENERIC_RULES,
];

const RULES_BY_PHASE: Readonly<Record<Phase, readonly ClassificationRule[]>> = {
  environment: ENVIRONMENT_RULES,
  "native-build": NATIVE_BUILD_RULES,
  "model-check": MODEL_CHECK_RULES,
  "proof-check": PROOF_CHECK_RULES,
  logs: REVIEW_RULES,
  resources: [],
  main: REVIEW_RULES,
};

export function rulesFor(phase: Phase): readonly ClassificationRule[] {
  return RULES_BY_PHASE[phase];
}
