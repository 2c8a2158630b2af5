import { execFileSync } from "node:child_process";
import { chmod, mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyFixArtifact, blockHashFixArtifact, FixApplyError, renderFixScript, substituteAll } from "../src/index.js";
import { sedPattern, shellQuote } from "../src/remediation/blockHashFix.js";

describe("renderFixScript", () => {
  const lines = blockHashFixArtifact().content.split("\n");

  it("defaults the target and accepts an override", () => {
    expect(lines[0]).toBe("#!/usr/bin/env bash");
    expect(lines).toContain("DEFAULT_TARGET='src/rotor.rs'");
    expect(lines).toContain('TARGET="${1:-$DEFAULT_TARGET}"');
  });

  it("exits before backing up when nothing matches", () => {
    expect(lines).toContain(
      `if ! grep -qF -e 'ErasureBlock::new([1u8; 32]' -e 'ErasureBlock::new([2u8; 32]' ` +
        `-e 'Shred::new_data([1u8; 32]' -e 'Shred::new_data([2u8; 32]' "$TARGET"; then`,
    );
    const noop = lines.indexOf("  exit 0");
    const backup = lines.indexOf('cp -p "$TARGET" "$BACKUP"');
    const sed = lines.indexOf("sed \\");
    expect(noop).toBeGreaterThan(0);
    expect(backup).toBeGreaterThan(noop);
    expect(sed).toBeGreaterThan(backup);
  });

  it("escapes the literals for sed", () => {
    expect(lines).toContain("  -e 's/ErasureBlock::new(\\[1u8; 32\\]/ErasureBlock::new(1u64/g' \\");
    expect(sedPattern("a.b*[c]")).toBe("a\\.b\\*\\[c\\]");
  });

  it("quotes a target containing a single quote", () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(renderFixScript("t", "it's.rs", [])).toContain("DEFAULT_TARGET='it'\\''s.rs'");
  });
});

describe("generated fix script", () => {
  const original = "let a = ErasureBlock::new([1u8; 32], 0);\nlet b = Shred::new_data([2u8; 32], 1);\n";
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vdiag-script-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("backs up once, rewrites the target and does nothing on a second run", async () => {
    const target = join(dir, "rotor.rs");
    const script = join(dir, "fix.sh");
    await writeFile(target, original);
    await writeFile(script, blockHashFixArtifact().content);
    const backups = async () => (await readdir(dir)).filter((name) => /^rotor\.rs\.backup\./.test(name));

    execFileSync("bash", [script, target], { encoding: "utf8" });
    expect(await readFile(target, "utf8")).toBe(
      "let a = ErasureBlock::new(1u64, 0);\nlet b = Shred::new_data(2u64, 1);\n",
    );
    const [backup] = await backups();
    expect(await backups()).toHaveLength(1);
    expect(await readFile(join(dir, backup ?? ""), "utf8")).toBe(original);

    const out = execFileSync("bash", [script, target], { encoding: "utf8" });
    expect(out).toBe(`No substitutions apply to ${target}; nothing to do.\n`);
    expect(await readFile(target, "utf8")).toBe(
      "let a = ErasureBlock::new(1u64, 0);\nlet b = Shred::new_data(2u64, 1);\n",
    );
    expect(await backups()).toEqual([backup]);
    expect((await readdir(dir)).sort()).toEqual(["fix.sh", backup, "rotor.rs"].sort());
  });
});

describe("applyFixArtifact", () => {
  const clock = () => new Date("2024-05-01T12:00:00.000Z");
  const original = "let a = ErasureBlock::new([1u8; 32], 0);\nlet b = Shred::new_data([2u8; 32], 1);\n";
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vdiag-fix-"));
    await mkdir(join(dir, "src"));
    await writeFile(join(dir, "src", "rotor.rs"), original);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rewrites the target after exactly one backup and is a no-op afterwards", async () => {
    const first = await applyFixArtifact(blockHashFixArtifact(), { baseDir: dir, clock });
    expect(first).toEqual({
      targetFile: join(dir, "src", "rotor.rs"),
      changed: true,
      replacements: 2,
      backupFile: join(dir, "src", "rotor.rs.backup.20240501T120000Z"),
    });
    expect(await readFile(join(dir, "src", "rotor.rs"), "utf8")).toBe(
      "let a = ErasureBlock::new(1u64, 0);\nlet b = Shred::new_data(2u64, 1);\n",
    );
    expect(await readFile(join(dir, "src", "rotor.rs.backup.20240501T120000Z"), "utf8")).toBe(original);

    const second = await applyFixArtifact(blockHashFixArtifact(), { baseDir: dir, clock });
    expect(second).toEqual({ targetFile: join(dir, "src", "rotor.rs"), changed: false, replacements: 0 });
    expect((await readdir(join(dir, "src"))).sort()).toEqual(["rotor.rs", "rotor.rs.backup.20240501T120000Z"]);
  });

  it("keeps the target's mode", async () => {
    await chmod(join(dir, "src", "rotor.rs"), 0o600);
    await applyFixArtifact(blockHashFixArtifact(), { baseDir: dir, clock });

    expect((await stat(join(dir, "src", "rotor.rs"))).mode & 0o777).toBe(0o600);
    expect((await readdir(join(dir, "src"))).sort()).toEqual(["rotor.rs", "rotor.rs.backup.20240501T120000Z"]);
  });

  it("never overwrites an existing backup", async () => {
    await applyFixArtifact(blockHashFixArtifact(), { baseDir: dir, clock });
    await writeFile(join(dir, "src", "rotor.rs"), original);

    const again = await applyFixArtifact(blockHashFixArtifact(), { baseDir: dir, clock });
    expect(again.backupFile).toBe(join(dir, "src", "rotor.rs.backup.20240501T120000Z.1"));
  });

  it("fails with FixApplyError when the target is missing", async () => {
    await expect(
      applyFixArtifact(blockHashFixArtifact("src/missing.rs"), { baseDir: dir, clock }),
    ).rejects.toBeInstanceOf(FixApplyError);
  });
});

describe("substituteAll", () => {
  it("counts every replaced occurrence", () => {
    expect(substituteAll("x x y", [{ from: "x", to: "z" }, { from: "y", to: "w" }])).toEqual({
      text: "z z w",
      replacements: 3,
    });
  });
});
