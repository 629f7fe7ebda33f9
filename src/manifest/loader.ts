import fs from "node:fs";
import path from "node:path";
import { errorMessage, finding } from "../core/finding.js";
import { normalizeBundlePath } from "../core/security.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { AjvError } from "../schema/ajv.js";
import type { FileEntry, Manifest } from "../types/manifest.js";
import type { Finding, StageOutcome } from "../types/report.js";

export type ManifestLoadResult = {
  /** Null when the manifest cannot feed the integrity and unauthorized-file stages. */
  manifest: Manifest | null;
  outcome: StageOutcome;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First of `names` present as a regular file in the bundle root. */
export function findManifestFile(bundleRoot: string, names: readonly string[]): string | null {
  for (const name of names) {
    const candidate = path.join(bundleRoot, name);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) return name;
  }
  return null;
}

function schemaFindings(errors: readonly AjvError[], fileName: string): Finding[] {
  const out: Finding[] = [];
  const entryProblems = new Map<number, string[]>();

  for (const err of errors) {
    const entryMatch = /^\/files\/(\d+)/.exec(err.instancePath);
    if (entryMatch) {
      const index = Number(entryMatch[1]);
      const problems = entryProblems.get(index) ?? [];
      problems.push(`${err.instancePath.slice(entryMatch[0].length) || "entry"} ${err.message ?? err.keyword}`.trim());
      entryProblems.set(index, problems);
      continue;
    }

    if (err.keyword === "required" && err.instancePath === "") {
      const field = String(err.params.missingProperty);
      out.push(
        finding("manifest", "error", "MANIFEST_MISSING_FIELD", `Missing required field in ${fileName}: ${field}`, {
          path: fileName,
          details: { field },
        }),
      );
      continue;
    }

    const field = err.instancePath.replace(/^\//, "").split("/")[0] ?? "";
    out.push(
      finding("manifest", "error", "MANIFEST_INVALID_FIELD", `Invalid field in ${fileName}: ${field} ${err.message ?? err.keyword}`, {
        path: fileName,
        details: { field },
      }),
    );
  }

  for (const [index, problems] of [...entryProblems].sort((a, b) => a[0] - b[0])) {
    out.push(
      finding("manifest", "error", "MANIFEST_INVALID_FILE_ENTRY", `Invalid file entry #${index} in ${fileName}: ${problems.join("; ")}`, {
        path: fileName,
        details: { index, problems },
      }),
    );
  }

  return out;
}

function readEntries(files: unknown[], fileName: string, findings: Finding[]): FileEntry[] {
  const entries: FileEntry[] = [];
  const seen = new Set<string>();

  for (const raw of files) {
    if (!isRecord(raw)) continue;
    const { name, sha256, signature } = raw;
    if (typeof name !== "string" || name.length === 0 || typeof sha256 !== "string" || sha256.length === 0) continue;

    const entryPath = normalizeBundlePath(name);
    if (entryPath === null) {
      findings.push(
        finding("manifest", "error", "MANIFEST_PATH_ESCAPES_BUNDLE", `Manifest path escapes bundle: ${name}`, { path: name }),
      );
      continue;
    }

    if (seen.has(entryPath)) {
      findings.push(
        finding("manifest", "error", "MANIFEST_DUPLICATE_ENTRY", `Duplicate file entry in ${fileName}: ${entryPath}`, {
          path: entryPath,
        }),
      );
      continue;
    }
    seen.add(entryPath);

    entries.push({
      path: entryPath,
      expectedHash: sha256,
      signatureRef: typeof signature === "string" && signature.length > 0 ? signature : undefined,
    });
  }

  return entries;
}

/**
 * Load and structurally validate the bundle manifest. Never throws for
 * bundle content problems: every problem becomes a finding and the
 * remaining fields are still checked.
 */
export function loadManifest(
  bundleRoot: string,
  opts: { manifestNames: readonly string[]; registry?: SchemaRegistry },
): ManifestLoadResult {
  const findings: Finding[] = [];
  const done = (manifest: Manifest | null): ManifestLoadResult => ({
    manifest,
    outcome: { stage: "manifest", ran: true, findings, filesCounted: 0 },
  });

  const fileName = findManifestFile(bundleRoot, opts.manifestNames);
  if (!fileName) {
    const expected = opts.manifestNames[0] ?? "cdf-meta.json";
    findings.push(finding("manifest", "error", "MANIFEST_NOT_FOUND", `Required file missing: ${expected}`, { path: expected }));
    return done(null);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path.join(bundleRoot, fileName), "utf8"));
  } catch (e) {
    findings.push(
      finding("manifest", "error", "MANIFEST_MALFORMED_JSON", `Invalid JSON in ${fileName}: ${errorMessage(e)}`, {
        path: fileName,
      }),
    );
    return done(null);
  }

  if (!isRecord(raw)) {
    findings.push(
      finding("manifest", "error", "MANIFEST_MALFORMED_JSON", `Invalid JSON in ${fileName}: top level must be an object`, {
        path: fileName,
      }),
    );
    return done(null);
  }

  const registry = opts.registry ?? defaultRegistry();
  const check = registry.check("cdf-meta", raw);
  if (!check.valid) findings.push(...schemaFindings(check.errors, fileName));

  if (!Array.isArray(raw.files)) return done(null);

  const files = readEntries(raw.files, fileName, findings);
  const version = typeof raw.cdf_version === "string" ? raw.cdf_version : "";
  const pattern = typeof raw.pattern === "string" ? raw.pattern : "";

  findings.push(
    finding(
      "manifest",
      "info",
      "MANIFEST_LOADED",
      `Loaded ${fileName} (cdf_version ${version || "?"}, pattern ${pattern || "?"}, ${files.length} file(s))`,
      { path: fileName },
    ),
  );

  return done({ fileName, version, pattern, files });
}
