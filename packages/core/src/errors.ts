import { PHASES, resolvePhase, type Phase } from "./domain/LogEvent.js";

export type VdiagErrorCode = "REPORT_WRITE_FAILURE" | "UNKNOWN_PHASE" | "FIX_APPLY_FAILURE";

/** Base class for the few conditions the engine propagates to its caller. */
export class VdiagError extends Error {
  constructor(
    message: string,
    public readonly code: VdiagErrorCode,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "VdiagError";
  }
}

/** A report or fix artifact could not be persisted. Always fatal. */
export class ReportWriteError extends VdiagError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to write report ${path}: ${describeCause(cause)}`, "REPORT_WRITE_FAILURE", { path }, { cause });
    this.name = "ReportWriteError";
  }
}

export class UnknownPhaseError extends VdiagError {
  constructor(public readonly phaseName: string) {
    super(`Unknown phase "${phaseName}" (expected one of: ${PHASES.join(", ")}, rust, tlc, tlaps)`, "UNKNOWN_PHASE", {
      phaseName,
    });
    this.name = "UnknownPhaseError";
  }
}

export class FixApplyError extends VdiagError {
  constructor(
    public readonly targetFile: string,
    cause: unknown,
  ) {
    super(`Failed to apply fix to ${targetFile}: ${describeCause(cause)}`, "FIX_APPLY_FAILURE", { targetFile }, { cause });
    this.name = "FixApplyError";
  }
}

export function parsePhase(name: string): Phase {
  const phase = resolvePhase(name);
  if (!phase) throw new UnknownPhaseError(name);
  return phase;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
