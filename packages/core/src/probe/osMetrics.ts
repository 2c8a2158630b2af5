import { availableParallelism, freemem, platform, totalmem } from "node:os";
import { readFile, statfs } from "node:fs/promises";
import type { ResourceMetricsPort } from "../ports/index.js";

export interface OsMetricsOptions {
  diskPath?: string; // filesystem to measure; default "."
}

export function makeOsMetrics(opts: OsMetricsOptions = {}): ResourceMetricsPort {
  const diskPath = opts.diskPath ?? ".";

  return {
    async memoryUtilization() {
      const total = totalmem();
      if (total <= 0) return undefined;
      const available = (await linuxAvailableBytes()) ?? freemem();
      return ((total - available) * 100) / total;
    },
    async diskUtilization() {
      const s = await statfs(diskPath);
      const used = s.blocks - s.bfree;
      const usable = used + s.bavail;
      return usable > 0 ? (used * 100) / usable : undefined;
    },
    async cpuCount() {
      return availableParallelism();
    },
    async totalMemoryGb() {
      return Math.round(totalmem() / (1024 * 1024 * 1024));
    },
  };
}

// os.freemem() ignores reclaimable page cache on Linux; MemAvailable does not.
async function linuxAvailableBytes(): Promise<number | undefined> {
  if (platform() !== "linux") return undefined;
  const meminfo = await readFile("/proc/meminfo", "utf8").catch(() => "");
  const kb = /^MemAvailable:\s+(\d+) kB/m.exec(meminfo)?.[1];
  return kb ? Number(kb) * 1024 : undefined;
}
