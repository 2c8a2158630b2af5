#!/usr/bin/env node
/**
 * vdiag - phase-aware diagnostics for verification pipeline logs
 */

import "dotenv/config";
import { Command } from "commander";
import { ReportWriteError, VdiagError } from "@vdiag/core";
import { resolveCliConfig, type CliFlags } from "./config.js";
import { runDiagnostics } from "./run.js";

const program = new Command();

program
  .name("vdiag")
  .description("Classify verification pipeline logs and write per-phase diagnostic reports")
  .argument("[component]", "phase to analyze (environment, native-build, model-check, proof-check, logs, resources, all)", "all")
  .option("--build-log <file>", "native build output")
  .option("--test-log <file>", "native test output")
  .option("--model-check-log <files...>", "model checker output")
  .option("--proof-log <files...>", "proof checker output")
  .option("--environment-log <file>", "toolchain check output")
  .option("--logs-dir <dir>", "directory of *.log files for general review")
  .option("-o, --output-dir <dir>", "where reports, fixes and event logs are written")
  .option("-p, --project-dir <dir>", "project root that fix scripts edit")
  .option("-v, --verbose", "keep unclassified lines and print debug output")
  .option("--no-fixes", "do not generate fix scripts")
  .option("--no-resource-check", "skip the memory, disk and sizing probe")
  .option("--apply-fixes", "apply generated fixes to the project after writing them")
  .option("--ai-summary", "append a Gemini narrative to the consolidated report (needs GEMINI_API_KEY)")
  .addHelpText(
    "after",
    `
Examples:
  vdiag --build-log build.log --test-log test.log
  vdiag model-check --model-check-log tlc.out
  vdiag --logs-dir logs -o out --apply-fixes
`,
  )
  .action(async (component: string, options: CliFlags) => {
    try {
      const config = resolveCliConfig(component, options);
      const { exitCode } = await runDiagnostics(config);
      process.exitCode = exitCode;
    } catch (err) {
      if (err instanceof ReportWriteError) {
        console.error(`✖ ${err.message}`);
        process.exitCode = 2;
      } else if (err instanceof VdiagError) {
        console.error(`✖ ${err.message}`);
        process.exitCode = 1;
      } else {
        throw err;
      }
    }
  });

await program.parseAsync();
