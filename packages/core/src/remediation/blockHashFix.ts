import type { FixArtifact, Substitution } from "../domain/Remediation.js";

export const BLOCKHASH_FIX_NAME = "fix_blockhash_types.sh";
export const DEFAULT_BLOCKHASH_TARGET = "src/rotor.rs";

// Reviewed literal edits; nothing else is ever generated into the script.
export const BLOCKHASH_SUBSTITUTIONS: readonly Substitution[] = [
  { from: "ErasureBlock::new([1u8; 32]", to: "ErasureBlock::new(1u64" },
  { from: "ErasureBlock::new([2u8; 32]", to: "ErasureBlock::new(2u64" },
  { from: "Shred::new_data([1u8; 32]", to: "Shred::new_data(1u64" },
  { from: "Shred::new_data([2u8; 32]", to: "Shred::new_data(2u64" },
];

export function blockHashFixArtifact(targetFile: string = DEFAULT_BLOCKHASH_TARGET): FixArtifact {
  return {
    name: BLOCKHASH_FIX_NAME,
    targetFile,
    substitutions: BLOCKHASH_SUBSTITUTIONS,
    content: renderFixScript(
      "BlockHash type fix: replaces [u8; 32] block hashes with u64 values",
      targetFile,
      BLOCKHASH_SUBSTITUTIONS,
    ),
  };
}

/**
 * Bash script applying literal substitutions to one file. It backs the file
 * up before the first change and exits 0 without touching anything when no
 * substitution applies, so running it again is a no-op.
 */
export function renderFixScript(title: string, targetFile: string, substitutions: readonly Substitution[]): string {
  const greps = substitutions.map((s) => `-e ${shellQuote(s.from)}`).join(" ");
  const seds = substitutions.map((s) => `  -e ${shellQuote(`s/${sedPattern(s.from)}/${sedReplacement(s.to)}/g`)}`);

  return [
    "#!/usr/bin/env bash",
    `# ${title}`,
    "# Generated by vdiag. Safe to re-run: exits without changes once nothing matches.",
    "set -euo pipefail",
    "",
    `DEFAULT_TARGET=${shellQuote(targetFile)}`,
    'TARGET="${1:-$DEFAULT_TARGET}"',
    "",
    'if [[ ! -f "$TARGET" ]]; then',
    '  echo "Target file not found: $TARGET" >&2',
    "  exit 1",
    "fi",
    "",
    `if ! grep -qF ${greps} "$TARGET"; then`,
    '  echo "No substitutions apply to $TARGET; nothing to do."',
    "  exit 0",
    "fi",
    "",
    'BACKUP="$TARGET.backup.$(date -u +%Y%m%dT%H%M%SZ).$$"',
    'cp -p "$TARGET" "$BACKUP"',
    'echo "Backed up $TARGET to $BACKUP"',
    "",
    'TMP="$(mktemp "$TARGET.tmp.XXXXXX")"',
    "sed \\",
    ...seds.map((line) => `${line} \\`),
    '  "$TARGET" > "$TMP"',
    'cat "$TMP" > "$TARGET"',
    'rm -f "$TMP"',
    'echo "Applied fixes to $TARGET"',
    "",
  ].join("\n");
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Escapes a literal for a sed basic regular expression. */
export function sedPattern(literal: string): string {
  return literal.replace(/[\\/.*[\]^$]/g, "\\$&");
}

export function sedReplacement(literal: string): string {
  return literal.replace(/[\\/&]/g, "\\$&");
}
