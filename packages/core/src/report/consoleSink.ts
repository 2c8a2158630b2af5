import type { RenderedReport } from "../domain/Report.js";
import type { SinkPort } from "../ports/index.js";

export const consoleSink: SinkPort = {
  async publish(r: RenderedReport) {
    if (r.kind !== "consolidated") return;
    const summary = r.body.split("\n").find((l) => l.startsWith("Summary:")) ?? "Summary: (none)";
    // eslint-disable-next-line no-console
    console.log(`\n🔎 ${summary}\n📄 ${r.fileName}`);
  },
};
