import type { ErrorCategory, Severity } from "../domain/LogEvent.js";
import type { ResourceMetricsPort } from "../ports/index.js";

export type ResourceCategory = Extract<ErrorCategory, "RESOURCE_MEMORY" | "RESOURCE_DISK" | "RESOURCE_SIZING">;

/** Synthetic event produced by the probe; always belongs to the resources phase. */
export interface Finding {
  phase: "resources";
  category: ResourceCategory;
  level: Severity;
  message: string;
  detail: string;
}

export interface ProbeThresholds {
  memoryHighWater: number; // percent
  diskHighWater: number; // percent
}

export const DEFAULT_THRESHOLDS: ProbeThresholds = { memoryHighWater: 80, diskHighWater: 90 };

/**
 * Reads memory, disk and CPU metrics and turns them into findings. Readings
 * under the high-water marks produce nothing; unreadable metrics produce an
 * INFO "unknown" finding rather than a failure.
 */
export async function probe(
  metrics: ResourceMetricsPort,
  thresholds: ProbeThresholds = DEFAULT_THRESHOLDS,
): Promise<Finding[]> {
  const [memory, disk, cores, totalGb] = await Promise.all([
    readSafely(() => metrics.memoryUtilization()),
    readSafely(() => metrics.diskUtilization()),
    readSafely(() => metrics.cpuCount()),
    readSafely(() => metrics.totalMemoryGb()),
  ]);

  const findings: Finding[] = [];

  if (memory === undefined) {
    findings.push(unknown("RESOURCE_MEMORY", "Memory utilization unknown: metric unavailable"));
  } else if (memory > thresholds.memoryHighWater) {
    findings.push({
      phase: "resources",
      category: "RESOURCE_MEMORY",
      level: "WARNING",
      message: `High memory usage detected: ${formatPercent(memory)}`,
      detail: formatPercent(memory),
    });
  }

  if (disk === undefined) {
    findings.push(unknown("RESOURCE_DISK", "Disk utilization unknown: metric unavailable"));
  } else if (disk > thresholds.diskHighWater) {
    findings.push({
      phase: "resources",
      category: "RESOURCE_DISK",
      level: "WARNING",
      message: `Low disk space: ${formatPercent(disk)} used`,
      detail: formatPercent(disk),
    });
  }

  const advice = sizingAdvice(cores, totalGb);
  findings.push({
    phase: "resources",
    category: "RESOURCE_SIZING",
    level: "INFO",
    message: `Sizing: ${describeHost(cores, totalGb)}`,
    detail: advice,
  });

  return findings;
}

/** Heap tiers for the model checker's JVM. */
export function heapOptions(totalGb: number): string {
  if (totalGb >= 8) return "-Xmx4g -Xms2g";
  if (totalGb >= 4) return "-Xmx2g -Xms1g";
  return "-Xmx1g";
}

export function sizingAdvice(cores: number | undefined, totalGb: number | undefined): string {
  const parts: string[] = [];
  if (totalGb !== undefined) parts.push(`JAVA_OPTS='${heapOptions(totalGb)}'`);
  if (cores !== undefined) parts.push(`-workers ${cores}`);
  if (parts.length === 0) return "Core count and total memory unknown; no sizing advice.";
  return `Run TLC with ${parts.join(" and ")}.`;
}

function describeHost(cores: number | undefined, totalGb: number | undefined): string {
  const c = cores === undefined ? "unknown cores" : `${cores} cores`;
  const m = totalGb === undefined ? "unknown memory" : `${totalGb} GB memory`;
  return `${c}, ${m}`;
}

function unknown(category: ResourceCategory, message: string): Finding {
  return { phase: "resources", category, level: "INFO", message, detail: "unknown" };
}

function formatPercent(value: number): string {
  return `${Math.round(value * 10) / 10}%`;
}

async function readSafely(read: () => Promise<number | undefined>): Promise<number | undefined> {
  try {
    const value = await read();
    return value !== undefined && Number.isFinite(value) ? value : undefined;
  } catch {
    return undefined; // an unreadable metric is reported as unknown
  }
}
