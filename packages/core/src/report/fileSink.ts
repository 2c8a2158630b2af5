import { mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { RenderedReport } from "../domain/Report.js";
import { ReportWriteError } from "../errors.js";
import type { SinkPort } from "../ports/index.js";

/**
 * Writes each report under `outputDir`. The file only appears once fully
 * written; an existing report is replaced and keeps its mode.
 */
export function makeFileReportSink(outputDir: string): SinkPort {
  return {
    async publish(report: RenderedReport): Promise<void> {
      const path = join(outputDir, report.fileName);
      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFileAtomic(path, report.body, {
          encoding: "utf8",
          ...(report.kind === "fix" ? { mode: 0o755 } : {}),
        });
      } catch (err) {
        throw new ReportWriteError(path, err);
      }
    },
  };
}
