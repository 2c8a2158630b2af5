import type { GenerativeModel } from "@google/generative-ai";
import { describe, expect, it } from "vitest";
import { Aggregator, type AggregateSnapshot } from "@vdiag/core";
import { buildPrompt, makeGeminiSummarizer, normalizeJSON, scrubPII } from "../src/index.js";

class StubModel implements Pick<GenerativeModel, "generateContent"> {
  calls = 0;

  constructor(private readonly replies: (string | Error)[]) {}

  async generateContent() {
    const reply = this.replies[Math.min(this.calls, this.replies.length - 1)] ?? "";
    this.calls += 1;
    if (reply instanceof Error) throw reply;
    return { response: { text: () => reply, functionCall: () => undefined, functionCalls: () => undefined } };
  }
}

const replying = (...replies: (string | Error)[]) => new StubModel(replies);

function snapshot(level: "ERROR" | "CRITICAL" | "WARNING", message = "error at /home/alice/src/rotor.rs"): AggregateSnapshot {
  const agg = new Aggregator({ clock: () => new Date("2024-05-01T12:00:00.000Z") });
  agg.record({
    timestamp: "2024-05-01T12:00:00.000Z",
    phase: "native-build",
    level,
    message,
    category: "TYPE_MISMATCH",
  });
  return agg.snapshotAll();
}

const REPLY = JSON.stringify({
  title: "Build broken",
  probable_cause: "BlockHash type",
  priority: "P1",
  phases_to_check: ["native-build"],
  commands_to_run: ["cargo test"],
  fixes: [],
  confidence: 0.83,
});

describe("makeGeminiSummarizer", () => {
  it("formats the model's JSON for the report", async () => {
    const summarizer = makeGeminiSummarizer({ generativeModel: replying(REPLY) });
    expect(await summarizer.summarize(snapshot("ERROR"), [])).toBe(
      [
        "Title: Build broken",
        "Probable Cause: BlockHash type",
        "Priority: P1   Confidence: 83%",
        "Phases to Check:",
        " - native-build",
        "Commands:",
        " - cargo test",
        "Fixes: (none)",
      ].join("\n"),
    );
  });

  it("retries a transient failure", async () => {
    const model = replying(Object.assign(new Error("Service Unavailable"), { status: 503 }), REPLY);
    const summarizer = makeGeminiSummarizer({ generativeModel: model, maxRetries: 1 });

    expect(await summarizer.summarize(snapshot("ERROR"), [])).toMatch(/^Title: Build broken/);
    expect(model.calls).toBe(2);
  });

  it("explains an unknown model id", async () => {
    const model = replying(Object.assign(new Error("Not Found"), { status: 404 }));
    const summarizer = makeGeminiSummarizer({ generativeModel: model, maxRetries: 0 });

    await expect(summarizer.summarize(snapshot("ERROR"), [])).rejects.toThrow(
      "Gemini model not found: check GEMINI_MODEL (Not Found)",
    );
  });
});

describe("buildPrompt", () => {
  it("lists phases with scrubbed examples and suggested fixes", () => {
    const prompt = buildPrompt(
      snapshot("ERROR"),
      [{ phase: "native-build", category: "TYPE_MISMATCH", fix: "Align the types." }],
      3,
    );
    expect(prompt).toContain(
      [
        "## native-build [degraded] errors=1 critical=0 warnings=0",
        "- TYPE_MISMATCH x1",
        "  > error at /home/****/src/rotor.rs",
        "  suggested: Align the types.",
      ].join("\n"),
    );
  });
});

describe("normalizeJSON", () => {
  it("falls back to defaults for unparseable output", () => {
    expect(normalizeJSON("not json", snapshot("CRITICAL"))).toEqual({
      title: "Analysis",
      probable_cause: "not json",
      priority: "P0",
      phases_to_check: [],
      commands_to_run: [],
      fixes: [],
      confidence: 0.6,
    });
  });

  it("tolerates fences and trailing commas", () => {
    const parsed = normalizeJSON('```json\n{"title":"X","fixes":["a",],}\n```', snapshot("WARNING"));
    expect(parsed).toMatchObject({ title: "X", fixes: ["a"], priority: "P2" });
  });
});

describe("scrubPII", () => {
  it("masks keys, addresses and emails", () => {
    expect(scrubPII("api_key abcdefgh1234 from 10.0.0.1 mail bob@example.com")).toBe(
      "api_key **** from ***.***.***.*** mail ****@****",
    );
  });
});
