import type { Classification, Phase } from "../domain/LogEvent.js";
import { rulesFor, type ClassificationRule } from "./rules.js";

/** Lines considered after a head line when a rule needs context. */
export const WINDOW_SIZE = 6;

// A new diagnostic (or a blank line) ends the window of the previous one.
const DIAGNOSTIC_START = /^\s*$|^(?:error|warning)(?:\[\w+\])?:|^\s*test \S+ \.\.\. /i;
const LOCATION = /-->\s*(\S+?:\d+(?::\d+)?)/;
// Source gutter, location arrow and trailing notes of an open rustc diagnostic.
const CONTINUATION = /^\s*(?:-->|\d*\s*\||= |\.\.\.)|^\s*(?:help|note)(?:\[\w+\])?:/;

/**
 * Classify the first line of `window`, using the remaining lines only as
 * context for multi-line diagnostics. Returns null for unmatched lines.
 */
export function classifyWindow(
  window: readonly string[],
  phase: Phase,
  size: number = WINDOW_SIZE,
): Classification | null {
  const head = window[0];
  if (head === undefined || head.trim() === "") return null;

  const context = cutWindow(window, size).join("\n");
  for (const rule of rulesFor(phase)) {
    const m = rule.pattern.exec(head);
    if (!m) continue;
    if (rule.within && !rule.within.test(context)) continue;
    return toClassification(rule, m, context);
  }
  return null;
}

export function classifyLine(line: string, phase: Phase): Classification | null {
  return classifyWindow([line], phase);
}

export interface ClassifiedLine {
  line: string;
  classification: Classification | null;
}

/**
 * Sliding window over a line stream. `push` returns the heads whose window is
 * complete; `flush` drains the rest at end of input. Continuation lines of an
 * open diagnostic are passed through unclassified so one diagnostic counts once.
 */
export class LineWindow {
  private readonly buffer: string[] = [];
  private open = false;

  constructor(
    private readonly phase: Phase,
    private readonly size: number = WINDOW_SIZE,
  ) {}

  push(line: string): ClassifiedLine[] {
    this.buffer.push(line);
    return this.buffer.length >= this.size ? [this.emitHead()] : [];
  }

  flush(): ClassifiedLine[] {
    const out: ClassifiedLine[] = [];
    while (this.buffer.length > 0) out.push(this.emitHead());
    return out;
  }

  private emitHead(): ClassifiedLine {
    const line = this.buffer[0] ?? "";
    if (this.open && CONTINUATION.test(line)) {
      this.buffer.shift();
      return { line, classification: null };
    }
    const classification = classifyWindow(this.buffer, this.phase, this.size);
    this.buffer.shift();
    this.open = classification !== null || (line.trim() !== "" && DIAGNOSTIC_START.test(line));
    return { line, classification };
  }
}

export function* classifyLines(lines: Iterable<string>, phase: Phase): Generator<ClassifiedLine> {
  const window = new LineWindow(phase);
  for (const line of lines) yield* window.push(line);
  yield* window.flush();
}

export function classifyText(text: string, phase: Phase): ClassifiedLine[] {
  return [...classifyLines(splitLines(text), phase)];
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function cutWindow(window: readonly string[], size: number): string[] {
  const out = window.slice(0, 1);
  for (const line of window.slice(1, size)) {
    if (DIAGNOSTIC_START.test(line)) break;
    out.push(line);
  }
  return out;
}

function toClassification(rule: ClassificationRule, m: RegExpExecArray, context: string): Classification {
  const out: Classification = { category: rule.category, severity: rule.severity };
  const detail = rule.detail?.(m, context);
  if (detail) out.detail = detail;
  const location = LOCATION.exec(context)?.[1];
  if (location) out.location = location;
  return out;
}
