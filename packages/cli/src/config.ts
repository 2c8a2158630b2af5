import { resolve } from "node:path";
import { parsePhase, type Phase } from "@vdiag/core";

/** Raw option values as commander hands them over. */
export interface CliFlags {
  buildLog?: string;
  testLog?: string;
  modelCheckLog?: string[];
  proofLog?: string[];
  environmentLog?: string;
  logsDir?: string;
  outputDir?: string;
  projectDir?: string;
  verbose?: boolean;
  fixes?: boolean;
  resourceCheck?: boolean;
  applyFixes?: boolean;
  aiSummary?: boolean;
}

export interface CliConfig {
  /** Phases to analyze; undefined means every phase that has input. */
  only?: Phase;
  inputs: Partial<Record<Phase, string[]>>;
  logsDir?: string;
  outputDir: string;
  projectDir: string;
  verbose: boolean;
  generateFixes: boolean;
  resourceCheck: boolean;
  applyFixes: boolean;
  aiSummary: boolean;
  gemini: { apiKey?: string; model?: string };
}

export const DEFAULT_OUTPUT_DIR = "debug_output";

/** Explicit flags win over environment variables, which win over defaults. */
export function resolveCliConfig(
  component: string | undefined,
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): CliConfig {
  const only = component && component !== "all" ? parsePhase(component) : undefined;

  const inputs: Partial<Record<Phase, string[]>> = {};
  const add = (phase: Phase, files: (string | undefined)[]) => {
    const present = files.filter((f): f is string => Boolean(f)).map((f) => resolve(cwd, f));
    if (present.length && (!only || only === phase)) inputs[phase] = present;
  };
  add("environment", [flags.environmentLog]);
  add("native-build", [flags.buildLog, flags.testLog]);
  add("model-check", flags.modelCheckLog ?? []);
  add("proof-check", flags.proofLog ?? []);

  const logsDir = flags.logsDir && (!only || only === "logs") ? resolve(cwd, flags.logsDir) : undefined;

  return {
    ...(only ? { only } : {}),
    inputs,
    ...(logsDir ? { logsDir } : {}),
    outputDir: resolve(cwd, flags.outputDir ?? env.VDIAG_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    projectDir: resolve(cwd, flags.projectDir ?? "."),
    verbose: flags.verbose ?? isTruthy(env.VDIAG_VERBOSE),
    generateFixes: flags.fixes ?? true,
    resourceCheck: flags.resourceCheck ?? true,
    applyFixes: flags.applyFixes ?? false,
    aiSummary: flags.aiSummary ?? false,
    gemini: {
      ...(env.GEMINI_API_KEY ? { apiKey: env.GEMINI_API_KEY } : {}),
      ...(env.GEMINI_MODEL ? { model: env.GEMINI_MODEL } : {}),
    },
  };
}

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}
