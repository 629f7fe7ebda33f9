import fs from "node:fs";
import path from "node:path";
import { errorMessage, finding } from "../core/finding.js";
import type { FileEntry, Manifest } from "../types/manifest.js";
import type { Finding, StageOutcome, ValidationLevel } from "../types/report.js";
import { computeSha256, digestsEqual } from "./checksum.js";

export const PLACEHOLDER_PREFIX = "placeholder_";

function checkEntry(entry: FileEntry, manifest: Manifest, bundleRoot: string, level: ValidationLevel): Finding {
  // The manifest cannot carry its own digest; its integrity rests on signature verification.
  if (entry.path === manifest.fileName) {
    return finding(
      "integrity",
      "info",
      "INTEGRITY_SELF_ENTRY_SKIPPED",
      `${entry.path} hash validation skipped (self-referential); validated via signature verification`,
      { path: entry.path },
    );
  }

  if (entry.expectedHash.startsWith(PLACEHOLDER_PREFIX)) {
    return finding(
      "integrity",
      level === "strict" ? "error" : "warn",
      "INTEGRITY_PLACEHOLDER_HASH",
      `Placeholder digest declared for ${entry.path}; hash not verified`,
      { path: entry.path, details: { expected: entry.expectedHash } },
    );
  }

  const target = path.join(bundleRoot, entry.path);
  if (!fs.existsSync(target)) {
    return finding("integrity", "error", "INTEGRITY_FILE_MISSING", `File not found: ${entry.path}`, { path: entry.path });
  }

  let actual: string;
  try {
    if (!fs.statSync(target).isFile()) {
      return finding("integrity", "error", "INTEGRITY_FILE_MISSING", `File not found: ${entry.path}`, { path: entry.path });
    }
    actual = computeSha256(target);
  } catch (e) {
    const reason = errorMessage(e);
    return finding("integrity", "error", "INTEGRITY_FILE_UNREADABLE", `Cannot read ${entry.path}: ${reason}`, {
      path: entry.path,
      details: { reason },
    });
  }

  if (!digestsEqual(entry.expectedHash, actual)) {
    return finding(
      "integrity",
      "error",
      "INTEGRITY_HASH_MISMATCH",
      `Hash mismatch for ${entry.path}: expected ${entry.expectedHash}, actual ${actual}`,
      { path: entry.path, details: { expected: entry.expectedHash, actual } },
    );
  }

  return finding("integrity", "info", "INTEGRITY_HASH_MATCH", `Hash matches for ${entry.path}`, { path: entry.path });
}

/**
 * Recompute the digest of every declared file and compare it to the
 * manifest. Every entry counts towards the file total whatever its outcome.
 */
export function checkIntegrity(
  manifest: Manifest,
  bundleRoot: string,
  opts: { level?: ValidationLevel } = {},
): StageOutcome {
  const level = opts.level ?? "full";
  const findings = manifest.files.map((entry) => checkEntry(entry, manifest, bundleRoot, level));
  return { stage: "integrity", ran: true, findings, filesCounted: manifest.files.length };
}
