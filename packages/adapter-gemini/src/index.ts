import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";
import type { AggregateSnapshot, RemediationEntry, SummarizerPort } from "@vdiag/core";

export interface GeminiSummarizerOptions {
  apiKey?: string;            // default: process.env.GEMINI_API_KEY
  model?: string;             // default: process.env.GEMINI_MODEL || "gemini-1.5-flash"
  examplesPerCategory?: number; // default: 3
  temperature?: number;       // default: 0.2
  maxRetries?: number;        // default: 2
  timeoutMs?: number;         // default: 15000
  generativeModel?: Pick<GenerativeModel, "generateContent">; // allow DI for tests
}

export type Priority = "P0" | "P1" | "P2" | "P3";

export interface SummaryJSON {
  title: string;
  probable_cause: string;
  priority: Priority;
  phases_to_check: string[];
  commands_to_run: string[];
  fixes: string[];
  confidence: number;
}

export function makeGeminiSummarizer(opts: GeminiSummarizerOptions = {}): SummarizerPort {
  const model = opts.generativeModel ?? createModel(opts);
  const examplesPerCategory = Math.max(0, opts.examplesPerCategory ?? 3);
  const maxRetries = Math.max(0, opts.maxRetries ?? 2);
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 15000);

  return {
    async summarize(snapshot: AggregateSnapshot, remediations: readonly RemediationEntry[]): Promise<string> {
      const prompt = buildPrompt(snapshot, remediations, examplesPerCategory);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const jsonText = await withRetries(maxRetries, async () => {
          const res = await model.generateContent(
            { contents: [{ role: "user", parts: [{ text: prompt }] }] },
            { signal: controller.signal },
          );
          return res.response.text().trim();
        });

        return formatForReport(normalizeJSON(jsonText, snapshot));
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

function createModel(opts: GeminiSummarizerOptions): Pick<GenerativeModel, "generateContent"> {
  const apiKey = opts.apiKey ?? process.env.GEMINI_API_KEY;
  if (!apiKey) throw new Error("GEMINI_API_KEY not set");

  const modelId = opts.model ?? process.env.GEMINI_MODEL ?? "gemini-1.5-flash";
  return new GoogleGenerativeAI(apiKey).getGenerativeModel({
    model: modelId,
    generationConfig: { temperature: opts.temperature ?? 0.2 },
  });
}

/* ---------------- helpers ---------------- */

export function buildPrompt(
  snapshot: AggregateSnapshot,
  remediations: readonly RemediationEntry[],
  examplesPerCategory: number,
): string {
  const blocks = snapshot.phases
    .map((p) => {
      const header = `## ${p.phase} [${p.status}] errors=${p.tally.errors} critical=${p.tally.critical} warnings=${p.tally.warnings}`;
      const cats = p.counters.map((c) => {
        const fix = remediations.find((r) => r.phase === p.phase && r.category === c.category)?.fix;
        const examples = c.examples.slice(0, examplesPerCategory).map((e) => `  > ${scrubPII(e)}`);
        return [`- ${c.category} x${c.count}`, ...examples, fix ? `  suggested: ${fix}` : ""]
          .filter(Boolean)
          .join("\n");
      });
      return [header, ...cats].join("\n");
    })
    .join("\n\n");

  return `
You are a verification engineer. Read the diagnostics of a verification run (native build and tests,
model checking, proof checking) and produce a terse, actionable analysis.

Guidelines:
- Name the phase to look at first and why.
- Prefer the least risky, fastest fix; keep the suggested fixes unless they are clearly wrong.
- Include concrete commands (e.g. "cargo test --lib", "tlc -config MC.cfg Spec.tla").

Return ONLY valid JSON (no backticks). Use this exact shape:
{
  "title": string,
  "probable_cause": string,
  "priority": "P0"|"P1"|"P2"|"P3",
  "phases_to_check": string[],
  "commands_to_run": string[],
  "fixes": string[],
  "confidence": number
}

Diagnostics:
${blocks}
`;
}

function withRetries<T>(retries: number, fn: () => Promise<T>): Promise<T> {
  let attempt = 0;
  const backoff = (n: number) => new Promise((r) => setTimeout(r, 200 * Math.pow(2, n)));
  return (async function run(): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      // Retry on rate limits / 5xx / fetch
      const msg = err instanceof Error ? err.message : String(err);
      const status = statusOf(err);
      const retriable = status === 429 || status >= 500 || /fetch|timeout|ECONNRESET|ETIMEDOUT/i.test(msg);
      if (attempt < retries && retriable) {
        await backoff(attempt++);
        return run();
      }
      // Helpful hint if model id is wrong (404)
      if (status === 404) {
        throw new Error(`Gemini model not found: check GEMINI_MODEL (${msg})`);
      }
      throw err;
    }
  })();
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err) return Number(err.status) || 0;
  return 0;
}

export function scrubPII(text: string): string {
  return text
    // bearer/api keys
    .replace(/(bearer|api[-_ ]?key)\s+[a-z0-9_\-]{8,}/gi, "$1 ****")
    // emails
    .replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "****@****")
    // IPv4
    .replace(/\b\d{1,3}(?:\.\d{1,3}){3}\b/g, "***.***.***.***")
    // home directories
    .replace(/\/(home|Users)\/[^/\s]+/g, "/$1/****");
}

export function normalizeJSON(raw: string, snapshot: AggregateSnapshot): SummaryJSON {
  let obj: Record<string, unknown>;
  try {
    const start = raw.indexOf("{");
    const end = raw.lastIndexOf("}");
    const candidate = start >= 0 && end >= 0 ? raw.slice(start, end + 1) : raw;
    // Strip trailing commas which occasionally appear
    const cleaned = candidate.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
    const parsed: unknown = JSON.parse(cleaned);
    obj = isRecord(parsed) ? parsed : {};
  } catch {
    obj = { title: "Analysis", probable_cause: raw.slice(0, 200) };
  }

  return {
    title: text(obj.title) || "Analysis",
    probable_cause:
      text(obj.probable_cause) || "Insufficient details; review the phase reports and the suggested fixes.",
    priority: isPriority(obj.priority) ? obj.priority : defaultPriority(snapshot),
    phases_to_check: strings(obj.phases_to_check),
    commands_to_run: strings(obj.commands_to_run),
    fixes: strings(obj.fixes),
    confidence: typeof obj.confidence === "number" ? clamp01(obj.confidence) : 0.6,
  };
}

function defaultPriority(snapshot: AggregateSnapshot): Priority {
  const statuses = snapshot.phases.map((p) => p.status);
  if (statuses.includes("failed")) return "P0";
  if (statuses.includes("degraded")) return "P1";
  return snapshot.phases.some((p) => p.tally.warnings > 0) ? "P2" : "P3";
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isPriority(v: unknown): v is Priority {
  return v === "P0" || v === "P1" || v === "P2" || v === "P3";
}

function text(v: unknown): string {
  return typeof v === "string" ? v.trim() : "";
}

function strings(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((s): s is string => typeof s === "string") : [];
}

function clamp01(n: number) { return Math.max(0, Math.min(1, n)); }

export function formatForReport(j: SummaryJSON): string {
  const pad = (arr: string[]) => (arr.length ? `\n - ${arr.join("\n - ")}` : " (none)");
  return [
    `Title: ${j.title}`,
    `Probable Cause: ${j.probable_cause}`,
    `Priority: ${j.priority}   Confidence: ${Math.round(j.confidence * 100)}%`,
    `Phases to Check:${pad(j.phases_to_check)}`,
    `Commands:${pad(j.commands_to_run)}`,
    `Fixes:${pad(j.fixes)}`,
  ].join("\n");
}
