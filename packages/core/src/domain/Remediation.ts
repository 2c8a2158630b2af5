import type { ErrorCategory, Phase } from "./LogEvent.js";

export interface Substitution {
  readonly from: string;
  readonly to: string;
}

/** Executable remediation produced for exactly one known failure signature. */
export interface FixArtifact {
  readonly name: string; // e.g. "fix_blockhash_types.sh"
  readonly targetFile: string;
  readonly substitutions: readonly Substitution[];
  readonly content: string;
}

export interface RemediationEntry {
  readonly phase: Phase;
  readonly category: ErrorCategory;
  readonly fix: string;
  readonly doc?: string;
  readonly artifact?: FixArtifact;
}
