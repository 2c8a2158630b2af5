import { createReadStream } from "node:fs";
import { access, readdir } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import type winston from "winston";
import { consoleEventSink, createConsoleLogger, makeWinstonEventSink } from "@vdiag/adapter-winston";
import { makeGeminiSummarizer } from "@vdiag/adapter-gemini";
import {
  applyFixArtifact,
  createAnalyzer,
  makeFileReportSink,
  makeOsMetrics,
  PHASES,
  type ApplyFixResult,
  type LineSource,
  type Phase,
  type ResourceMetricsPort,
  type RunResult,
  type SummarizerPort,
} from "@vdiag/core";
import type { CliConfig } from "./config.js";

export interface RunDeps {
  logger?: winston.Logger;
  metrics?: ResourceMetricsPort;
  summarizer?: SummarizerPort;
  signal?: AbortSignal;
}

export interface RunOutcome {
  exitCode: number;
  result: RunResult;
  applied: ApplyFixResult[];
}

export async function runDiagnostics(config: CliConfig, deps: RunDeps = {}): Promise<RunOutcome> {
  const logger = deps.logger ?? createConsoleLogger({ verbose: config.verbose });
  const fileEvents = makeWinstonEventSink({ dir: join(config.outputDir, "logs") });

  const analyzer = createAnalyzer({
    verbose: config.verbose,
    generateFixes: config.generateFixes,
    sinks: [makeFileReportSink(config.outputDir)],
    eventSinks: [fileEvents, consoleEventSink(logger)],
    metrics: deps.metrics ?? makeOsMetrics({ diskPath: config.projectDir }),
    summarizer: deps.summarizer ?? summarizerFor(config, logger),
  });

  try {
    logger.log("highlight", `Output directory: ${config.outputDir}`);
    if (config.resourceCheck) await analyzer.probeResources();

    const sources: Partial<Record<Phase, LineSource>> = {};
    for (const [phase, files] of phaseInputs(config)) {
      logger.debug(`${phase}: ${files.join(", ")}`);
      sources[phase] = readLines(files);
    }
    if (config.logsDir) {
      const files = await findLogFiles(config.logsDir);
      logger.log("info", `Found ${files.length} log files in ${config.logsDir}`);
      sources.logs = readLines(files);
    }
    await analyzer.runPhases(sources, { signal: deps.signal });

    const result = await analyzer.finalize();
    logger.log("success", `Diagnostic report generated: ${join(config.outputDir, "reports", "diagnostic_summary.txt")}`);

    const applied: ApplyFixResult[] = [];
    for (const entry of result.remediations) {
      logger.log("info", `Fix (${entry.phase}/${entry.category}): ${entry.fix}`);
      if (!entry.artifact) continue;
      logger.log("highlight", `Fix script generated: ${join(config.outputDir, "fixes", entry.artifact.name)}`);
      if (config.applyFixes) {
        const outcome = await applyFixArtifact(entry.artifact, { baseDir: config.projectDir });
        logger.log(
          outcome.changed ? "success" : "info",
          outcome.changed
            ? `Applied ${outcome.replacements} substitutions to ${outcome.targetFile} (backup: ${outcome.backupFile})`
            : `No substitutions apply to ${outcome.targetFile}`,
        );
        applied.push(outcome);
      }
    }

    return { exitCode: result.worst === "failed" ? 1 : 0, result, applied };
  } finally {
    await analyzer.events.close();
  }
}

function phaseInputs(config: CliConfig): [Phase, string[]][] {
  return PHASES.flatMap((phase): [Phase, string[]][] => {
    const files = config.inputs[phase];
    return files?.length ? [[phase, files]] : [];
  });
}

function summarizerFor(config: CliConfig, logger: winston.Logger): SummarizerPort | undefined {
  if (!config.aiSummary) return undefined;
  if (!config.gemini.apiKey) {
    logger.log("warning", "--ai-summary needs GEMINI_API_KEY; continuing without an AI summary");
    return undefined;
  }
  return makeGeminiSummarizer({ apiKey: config.gemini.apiKey, model: config.gemini.model });
}

async function* readLines(files: readonly string[]): AsyncGenerator<string> {
  for (const file of files) {
    await access(file);
    const rl = createInterface({ input: createReadStream(file, "utf8"), crlfDelay: Infinity });
    try {
      yield* rl;
    } finally {
      rl.close();
    }
  }
}

/** `*.log` files directly under `dir`, sorted by name. */
export async function findLogFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(".log"))
    .map((e) => join(dir, e.name))
    .sort();
}
