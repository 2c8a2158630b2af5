import type { ErrorCategory, Phase } from "../domain/LogEvent.js";
import type { KBItem, KnowledgeBasePort } from "../ports/index.js";

export const DEFAULT_KB_ITEMS: readonly KBItem[] = [
  // native build
  {
    phase: "*",
    category: "TYPE_MISMATCH/BlockHash",
    fix:
      "Fixed-size byte array / integer confusion ({detail}): BlockHash is a u64 in this model. " +
      "Replace [u8; 32] literals passed to ErasureBlock::new and Shred::new_data with u64 values, " +
      "or run the generated fix script.",
  },
  {
    phase: "*",
    category: "TYPE_MISMATCH/BlockHash",
    fix: "BlockHash is a u64 in this model: replace [u8; 32] literals with u64 values, or run the generated fix script.",
  },
  {
    phase: "*",
    category: "TYPE_MISMATCH",
    fix: "Compare the expected and found types at the reported call sites and align the arguments with the signature.",
  },
  {
    phase: "native-build",
    category: "MISSING_SYMBOL",
    fix: "`{detail}` is not in scope: check `use` paths, module declarations and feature flags.",
  },
  { phase: "native-build", category: "MISSING_SYMBOL", fix: "Check imports and module declarations." },
  {
    phase: "*",
    category: "BORROW_CONFLICT",
    fix: "Review ownership and lifetime patterns: shorten the borrow, clone the value, or split the mutable access.",
  },
  {
    phase: "*",
    category: "DEPENDENCY_RESOLUTION",
    fix: "Dependency resolution failed: run `cargo clean && cargo update` and check versions in Cargo.toml.",
  },
  { phase: "*", category: "TEST_FAILURE", fix: "Review test logic and fix failing assertions in: {detail}." },
  { phase: "*", category: "TEST_FAILURE", fix: "Review test logic and fix failing assertions." },
  {
    phase: "*",
    category: "COMPILER_WARNING",
    fix: "Address compiler warnings; `cargo fix --lib` applies the mechanical ones.",
  },
  {
    phase: "native-build",
    category: "GENERAL",
    fix: "Inspect the reported error codes with `rustc --explain <code>`.",
  },

  // model checking / proofs
  {
    phase: "*",
    category: "PARSE_ERROR",
    detailPattern: /format-string/,
    fix:
      "A '%' in a specification comment, constant or printed message was read as a format specifier. " +
      "Escape it as '%%' or remove it from strings passed to Print/Assert.",
  },
  { phase: "*", category: "PARSE_ERROR", fix: "Check TLA+ syntax ({detail}) in the specification and its configuration." },
  { phase: "*", category: "PARSE_ERROR", fix: "Check TLA+ syntax in the specification and its configuration." },
  {
    phase: "*",
    category: "PROPERTY_VIOLATION",
    detailPattern: /^deadlock$/,
    fix: "Deadlock reached: add fairness conditions or review the Next action.",
  },
  {
    phase: "*",
    category: "PROPERTY_VIOLATION",
    detailPattern: /^temporal property$/,
    fix: "Temporal properties were violated: review liveness properties and fairness assumptions (WF/SF).",
  },
  {
    phase: "*",
    category: "PROPERTY_VIOLATION",
    fix: "Invariant violated ({detail}): walk the error trace and review the invariant definition and model logic.",
  },
  {
    phase: "*",
    category: "PROPERTY_VIOLATION",
    fix: "Review invariant definitions and model logic against the error trace.",
  },
  {
    phase: "model-check",
    category: "MISSING_SYMBOL",
    fix: "Missing TLA+ operator {detail}: check EXTENDS and INSTANCE lists and the library path.",
  },
  {
    phase: "*",
    category: "MISSING_SYMBOL",
    fix: "Missing module or operator: check EXTENDS and INSTANCE lists and the library path.",
  },
  {
    phase: "model-check",
    category: "RESOURCE_MEMORY",
    fix: "TLC ran out of memory: increase the Java heap (export JAVA_OPTS='-Xmx4g') or reduce model constants.",
  },
  {
    phase: "model-check",
    category: "TOOL_UNAVAILABLE",
    fix: "TLC is not executable: install the TLA+ tools or point TLC_PATH at tla2tools.jar.",
  },
  {
    phase: "model-check",
    category: "GENERAL",
    fix: "TLC general error: check specifications and configurations for duplicate sections or missing constants.",
  },
  {
    phase: "*",
    category: "PROOF_OBLIGATION_FAILED",
    fix: "Proof obligations failed ({detail}): add intermediate steps or hints (BY ... DEF ...) to the failing proofs.",
  },
  {
    phase: "*",
    category: "PROOF_OBLIGATION_FAILED",
    fix: "Add intermediate steps or hints (BY ... DEF ...) to the failing proofs.",
  },
  {
    phase: "*",
    category: "PROOF_TIMEOUT",
    fix: "Increase the prover timeout (--stretch) or split the proof into smaller steps.",
  },
  {
    phase: "*",
    category: "PROOF_BACKEND",
    fix: "The {detail} backend failed: try a different backend (zenon, ls4, smt) for the failing obligations.",
  },
  { phase: "*", category: "PROOF_BACKEND", fix: "Try a different backend (zenon, ls4, smt) for the failing obligations." },
  {
    phase: "proof-check",
    category: "GENERAL",
    fix: "The proof checker failed: check its installation (Isabelle, Zenon) and the proof module syntax.",
  },

  // environment
  { phase: "*", category: "TOOL_UNAVAILABLE", fix: "Install {detail} and make sure it is on PATH." },
  { phase: "*", category: "TOOL_UNAVAILABLE", fix: "Install the missing tool and make sure it is on PATH." },
  {
    phase: "environment",
    category: "GENERAL",
    fix: "Upgrade the reported tool to a supported version (Java 11 or later for TLC).",
  },

  // resources
  {
    phase: "*",
    category: "RESOURCE_MEMORY",
    detailPattern: /^unknown$/,
    fix: "Memory utilization could not be determined; check it manually before long model-checking runs.",
  },
  {
    phase: "*",
    category: "RESOURCE_MEMORY",
    fix: "High memory utilization ({detail}): close other applications or reduce concurrent load (fewer TLC workers).",
  },
  {
    phase: "*",
    category: "RESOURCE_MEMORY",
    fix: "High memory utilization: close other applications or reduce concurrent load (fewer TLC workers).",
  },
  {
    phase: "*",
    category: "RESOURCE_DISK",
    detailPattern: /^unknown$/,
    fix: "Disk utilization could not be determined; make sure the output directory has free space.",
  },
  {
    phase: "*",
    category: "RESOURCE_DISK",
    fix: "Low disk space ({detail} used): free up disk space or move the project to a larger drive.",
  },
  { phase: "*", category: "RESOURCE_DISK", fix: "Low disk space: free up disk space or move the project to a larger drive." },
  { phase: "*", category: "RESOURCE_SIZING", fix: "{detail}" },
  {
    phase: "*",
    category: "RESOURCE_SIZING",
    fix: "Size the model checker's heap to about half the host memory and use one worker per core.",
  },

  { phase: "*", category: "GENERAL", fix: "Review the error samples and re-run the failing stage with --verbose." },
];

/**
 * Static lookup. A phase-specific row beats a "*" row, a row whose
 * detailPattern matches beats one without, and rows that interpolate
 * {detail} are skipped when there is none.
 */
export function createKnowledgeBase(items: readonly KBItem[] = DEFAULT_KB_ITEMS): KnowledgeBasePort {
  return {
    lookup(phase: Phase, category: ErrorCategory, detail?: string) {
      let best: KBItem | undefined;
      let bestScore = -1;
      for (const item of items) {
        if (item.category !== category) continue;
        if (item.phase !== "*" && item.phase !== phase) continue;
        if (item.detailPattern && !(detail !== undefined && item.detailPattern.test(detail))) continue;
        if (!detail && item.fix.includes("{detail}")) continue;
        const score = (item.phase === "*" ? 0 : 2) + (item.detailPattern ? 1 : 0);
        if (score > bestScore) {
          best = item;
          bestScore = score;
        }
      }
      return best;
    },
  };
}

export function fillTemplate(fix: string, detail?: string): string {
  return fix.split("{detail}").join(detail ?? "");
}
