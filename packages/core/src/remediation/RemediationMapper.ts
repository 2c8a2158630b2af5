import type { ErrorCategory, Phase } from "../domain/LogEvent.js";
import type { RemediationEntry } from "../domain/Remediation.js";
import type { PhaseSnapshot } from "../domain/Snapshot.js";
import type { KnowledgeBasePort } from "../ports/index.js";
import { blockHashFixArtifact, DEFAULT_BLOCKHASH_TARGET } from "./blockHashFix.js";
import { createKnowledgeBase, fillTemplate } from "./knowledgeBase.js";

/** Read side of the Aggregator the mapper depends on. */
export interface OccurrenceCounter {
  count(phase: Phase, category: ErrorCategory): number;
}

export interface RemediationMapperOptions {
  knowledgeBase?: KnowledgeBasePort;
  /** Used for the fix script when no source location was captured. */
  defaultFixTarget?: string;
  /** Emit fix artifacts alongside advice. Default true. */
  generateFixes?: boolean;
}

export interface SuggestContext {
  location?: string; // "path:line[:col]"
}

/**
 * Maps (phase, category) to advice. Only categories that actually occurred
 * get an entry; the latest suggestion for a key replaces the previous one.
 */
export class RemediationMapper {
  private readonly active = new Map<string, RemediationEntry>();
  private readonly kb: KnowledgeBasePort;
  private readonly defaultFixTarget: string;
  private readonly generateFixes: boolean;

  constructor(
    private readonly counter: OccurrenceCounter,
    opts: RemediationMapperOptions = {},
  ) {
    this.kb = opts.knowledgeBase ?? createKnowledgeBase();
    this.defaultFixTarget = opts.defaultFixTarget ?? DEFAULT_BLOCKHASH_TARGET;
    this.generateFixes = opts.generateFixes ?? true;
  }

  suggest(phase: Phase, category: ErrorCategory, detail?: string, ctx: SuggestContext = {}): RemediationEntry | undefined {
    if (this.counter.count(phase, category) < 1) return undefined;
    const item = this.kb.lookup(phase, category, detail);
    if (!item) return undefined;

    const entry: RemediationEntry = {
      phase,
      category,
      fix: fillTemplate(item.fix, detail),
      ...(item.doc ? { doc: item.doc } : {}),
      ...(this.wantsArtifact(phase, category)
        ? { artifact: blockHashFixArtifact(fileOf(ctx.location) ?? this.defaultFixTarget) }
        : {}),
    };
    this.active.set(key(phase, category), entry);
    return entry;
  }

  /** Suggestions for every counter in the snapshot, in first-seen order. */
  suggestFor(snapshot: PhaseSnapshot): RemediationEntry[] {
    const out: RemediationEntry[] = [];
    for (const counter of snapshot.counters) {
      const detail = counter.details.length ? counter.details.join(", ") : undefined;
      const entry = this.suggest(snapshot.phase, counter.category, detail, { location: counter.location });
      if (entry) out.push(entry);
    }
    return out;
  }

  entry(phase: Phase, category: ErrorCategory): RemediationEntry | undefined {
    return this.active.get(key(phase, category));
  }

  entries(phase?: Phase): RemediationEntry[] {
    const all = [...this.active.values()];
    return phase ? all.filter((e) => e.phase === phase) : all;
  }

  private wantsArtifact(phase: Phase, category: ErrorCategory): boolean {
    return this.generateFixes && phase === "native-build" && category === "TYPE_MISMATCH/BlockHash";
  }
}

function key(phase: Phase, category: ErrorCategory): string {
  return `${phase}\u0000${category}`;
}

function fileOf(location?: string): string | undefined {
  return location?.replace(/:\d+(?::\d+)?$/, "");
}
