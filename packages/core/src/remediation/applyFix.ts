import { constants } from "node:fs";
import { copyFile, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { FixArtifact, Substitution } from "../domain/Remediation.js";
import { FixApplyError } from "../errors.js";

export interface ApplyFixOptions {
  baseDir?: string; // relative targets resolve against this
  clock?: () => Date;
}

export interface ApplyFixResult {
  targetFile: string;
  changed: boolean;
  replacements: number;
  backupFile?: string;
}

/**
 * Applies an artifact's substitutions in-process. Mirrors the generated
 * script: no match means no backup and no write; otherwise exactly one new
 * timestamped backup is made before the file is replaced in place, keeping
 * its mode.
 */
export async function applyFixArtifact(artifact: FixArtifact, opts: ApplyFixOptions = {}): Promise<ApplyFixResult> {
  const targetFile = resolve(opts.baseDir ?? process.cwd(), artifact.targetFile);

  let original: string;
  try {
    original = await readFile(targetFile, "utf8");
  } catch (err) {
    throw new FixApplyError(targetFile, err);
  }

  const { text, replacements } = substituteAll(original, artifact.substitutions);
  if (replacements === 0) return { targetFile, changed: false, replacements };

  try {
    const backupFile = await backup(targetFile, (opts.clock ?? (() => new Date()))());
    await writeFileAtomic(targetFile, text, { encoding: "utf8" });
    return { targetFile, changed: true, replacements, backupFile };
  } catch (err) {
    throw new FixApplyError(targetFile, err);
  }
}

export function substituteAll(
  input: string,
  substitutions: readonly Substitution[],
): { text: string; replacements: number } {
  let text = input;
  let replacements = 0;
  for (const { from, to } of substitutions) {
    const parts = text.split(from);
    replacements += parts.length - 1;
    text = parts.join(to);
  }
  return { text, replacements };
}

async function backup(targetFile: string, now: Date): Promise<string> {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  for (let n = 0; ; n++) {
    const candidate = `${targetFile}.backup.${stamp}${n === 0 ? "" : `.${n}`}`;
    try {
      await copyFile(targetFile, candidate, constants.COPYFILE_EXCL);
      return candidate;
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") continue;
      throw err;
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
