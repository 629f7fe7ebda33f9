import { minimatch } from "minimatch";
import { finding } from "../core/finding.js";
import type { Manifest } from "../types/manifest.js";
import type { Finding, StageOutcome } from "../types/report.js";
import { listBundleFiles, unreadableDirFindings } from "./walk.js";

export type UnauthorizedScanOptions = {
  /** Globs describing the protected file class (infrastructure code). */
  protectedPatterns: readonly string[];
  failOnUnauthorized: boolean;
};

export function isProtected(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(filePath, pattern, { dot: true }));
}

/** Declared manifest paths that belong to the protected file class. */
export function authorizedSet(manifest: Manifest, patterns: readonly string[]): Set<string> {
  return new Set(manifest.files.map((f) => f.path).filter((p) => isProtected(p, patterns)));
}

/**
 * Compare the protected files physically present in the bundle with the
 * declared ones. Anything on disk that the manifest does not declare is
 * unauthorized: an error under the fail policy, a warning otherwise.
 * A directory that cannot be read leaves the scan incomplete and is an
 * error whatever the policy.
 */
export function scanUnauthorized(manifest: Manifest, bundleRoot: string, opts: UnauthorizedScanOptions): StageOutcome {
  const authorized = authorizedSet(manifest, opts.protectedPatterns);
  const listing = listBundleFiles(bundleRoot);
  const discovered = listing.files.filter((p) => isProtected(p, opts.protectedPatterns));
  const findings: Finding[] = unreadableDirFindings("unauthorized", listing.unreadable);

  for (const file of discovered) {
    if (authorized.has(file)) {
      findings.push(finding("unauthorized", "info", "AUTHORIZED_FILE", `Authorized file: ${file}`, { path: file }));
      continue;
    }
    findings.push(
      finding(
        "unauthorized",
        opts.failOnUnauthorized ? "error" : "warn",
        "UNAUTHORIZED_FILE",
        `Unauthorized file found: ${file} is not part of the signed CDF pattern`,
        { path: file },
      ),
    );
  }

  return { stage: "unauthorized", ran: true, findings, filesCounted: 0 };
}
