export { DEFAULT_OUTPUT_DIR, resolveCliConfig, type CliConfig, type CliFlags } from "./config.js";
export { findLogFiles, runDiagnostics, type RunDeps, type RunOutcome } from "./run.js";
