import { afterEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { checkIntegrity } from "../src/integrity/checker.js";
import { computeSha256, digestsEqual } from "../src/integrity/checksum.js";
import type { Manifest } from "../src/types/manifest.js";
import { MAIN_TF, makeTempDir, sha256, writeFiles } from "./fixtures.js";

function manifestOf(entries: Array<[string, string]>): Manifest {
  return {
    fileName: "cdf-meta.json",
    version: "1.0",
    pattern: "p",
    files: entries.map(([p, expectedHash]) => ({ path: p, expectedHash })),
  };
}

describe("checksum", () => {
  let root: string;

  afterEach(() => {
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("hashes files larger than one read chunk", () => {
    root = makeTempDir();
    const big = Buffer.alloc(200 * 1024, 7);
    writeFiles(root, { "big.bin": big });

    expect(computeSha256(path.join(root, "big.bin"))).toBe(sha256(big));
  });

  it("compares digests case-insensitively", () => {
    const digest = sha256("x");
    expect(digestsEqual(` ${digest.toUpperCase()} `, digest)).toBe(true);
    expect(digestsEqual(sha256("y"), digest)).toBe(false);
  });
});

describe("integrity checker", () => {
  let root: string;

  afterEach(() => {
    vi.restoreAllMocks();
    if (root) fs.rmSync(root, { recursive: true, force: true });
  });

  it("accepts files whose bytes match", () => {
    root = makeTempDir();
    writeFiles(root, { "main.tf": MAIN_TF, "modules/net/vpc.tf": "vpc" });

    const outcome = checkIntegrity(
      manifestOf([
        ["main.tf", sha256(MAIN_TF)],
        ["modules/net/vpc.tf", sha256("vpc")],
      ]),
      root,
    );

    expect(outcome.findings.map((f) => f.code)).toEqual(["INTEGRITY_HASH_MATCH", "INTEGRITY_HASH_MATCH"]);
    expect(outcome.filesCounted).toBe(2);
  });

  it("reports exactly one mismatch after a one-byte change", () => {
    root = makeTempDir();
    writeFiles(root, { "main.tf": MAIN_TF, "vars.tf": "variable" });
    const manifest = manifestOf([
      ["main.tf", sha256(MAIN_TF)],
      ["vars.tf", sha256("variable")],
    ]);

    const mutated = Buffer.from(MAIN_TF);
    mutated[0] = (mutated[0] ?? 0) ^ 1;
    fs.writeFileSync(path.join(root, "main.tf"), mutated);

    const errors = checkIntegrity(manifest, root).findings.filter((f) => f.level === "error");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      code: "INTEGRITY_HASH_MISMATCH",
      path: "main.tf",
      details: { expected: sha256(MAIN_TF), actual: sha256(mutated) },
    });
  });

  it("reports missing files", () => {
    root = makeTempDir();

    const outcome = checkIntegrity(manifestOf([["gone.tf", sha256("x")]]), root);

    expect(outcome.findings[0]).toMatchObject({ level: "error", code: "INTEGRITY_FILE_MISSING", message: "File not found: gone.tf" });
    expect(outcome.filesCounted).toBe(1);
  });

  it("treats a directory at a declared path as missing", () => {
    root = makeTempDir();
    fs.mkdirSync(path.join(root, "dir.tf"));

    const outcome = checkIntegrity(manifestOf([["dir.tf", sha256("x")]]), root);
    expect(outcome.findings[0]?.code).toBe("INTEGRITY_FILE_MISSING");
  });

  it("records a file that cannot be read and checks the rest", () => {
    root = makeTempDir();
    writeFiles(root, { "main.tf": MAIN_TF });
    vi.spyOn(fs, "openSync").mockImplementation(() => {
      throw Object.assign(new Error("EACCES: permission denied, open 'main.tf'"), { code: "EACCES" });
    });

    const outcome = checkIntegrity(
      manifestOf([
        ["main.tf", sha256(MAIN_TF)],
        ["gone.tf", sha256("x")],
      ]),
      root,
    );

    expect(outcome.findings).toEqual([
      {
        stage: "integrity",
        level: "error",
        code: "INTEGRITY_FILE_UNREADABLE",
        message: "Cannot read main.tf: EACCES: permission denied, open 'main.tf'",
        path: "main.tf",
        details: { reason: "EACCES: permission denied, open 'main.tf'" },
      },
      { stage: "integrity", level: "error", code: "INTEGRITY_FILE_MISSING", message: "File not found: gone.tf", path: "gone.tf" },
    ]);
    expect(outcome.filesCounted).toBe(2);
  });

  it("warns on placeholder digests, and fails them under strict", () => {
    root = makeTempDir();
    writeFiles(root, { "main.tf": MAIN_TF });
    const manifest = manifestOf([["main.tf", "placeholder_main"]]);

    expect(checkIntegrity(manifest, root).findings[0]).toMatchObject({ level: "warn", code: "INTEGRITY_PLACEHOLDER_HASH" });
    expect(checkIntegrity(manifest, root, { level: "strict" }).findings[0]).toMatchObject({
      level: "error",
      code: "INTEGRITY_PLACEHOLDER_HASH",
    });
  });

  it("skips the manifest's own entry", () => {
    root = makeTempDir();
    writeFiles(root, { "cdf-meta.json": "{}" });

    const outcome = checkIntegrity(manifestOf([["cdf-meta.json", "anything"]]), root);

    expect(outcome.findings[0]).toMatchObject({ level: "info", code: "INTEGRITY_SELF_ENTRY_SKIPPED", path: "cdf-meta.json" });
    expect(outcome.filesCounted).toBe(1);
  });

  it("gives the same outcome on repeated runs", () => {
    root = makeTempDir();
    writeFiles(root, { "main.tf": MAIN_TF });
    const manifest = manifestOf([
      ["main.tf", sha256(MAIN_TF)],
      ["gone.tf", sha256("x")],
    ]);

    expect(checkIntegrity(manifest, root)).toEqual(checkIntegrity(manifest, root));
  });
});
