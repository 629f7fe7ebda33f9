import fs from "node:fs";
import path from "node:path";
import { errorMessage, finding } from "../core/finding.js";
import { listBundleFiles, unreadableDirFindings, type BundleListing } from "../scanner/walk.js";
import { defaultRegistry, type SchemaRegistry } from "../schema/registry.js";
import { REQUIRED_ATTESTATION_FIELDS } from "../types/attestation.js";
import type { Finding, StageOutcome, ValidationLevel } from "../types/report.js";

export const DEFAULT_ATTESTATION_SUFFIX = ".attestation.json";

export type AttestationOptions = {
  suffix?: string;
  level?: ValidationLevel;
  registry?: SchemaRegistry;
};

export type AttestationCheck = {
  findings: Finding[];
  /** False when the document could not be parsed at all. */
  parsed: boolean;
};

/** `x.attestation.json` → `x.attestation.sig` / `x.attestation.cert`. */
export function siblingArtifact(documentPath: string, extension: ".sig" | ".cert"): string {
  return documentPath.replace(/\.json$/, "") + extension;
}

export function discoverAttestations(bundleRoot: string, suffix = DEFAULT_ATTESTATION_SUFFIX): BundleListing {
  const listing = listBundleFiles(bundleRoot);
  return { files: listing.files.filter((p) => p.endsWith(suffix)), unreadable: listing.unreadable };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Structural checks for one attestation document. Missing fields are
 * reported one by one; the companion signature and certificate are
 * expected next to the document whichever trust material verification
 * later uses.
 */
export function validateAttestation(bundleRoot: string, documentPath: string, opts: AttestationOptions = {}): AttestationCheck {
  const findings: Finding[] = [];
  const abs = path.join(bundleRoot, documentPath);

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(abs, "utf8"));
  } catch (e) {
    findings.push(
      finding("attestation", "error", "ATTESTATION_INVALID_JSON", `Invalid JSON in attestation ${documentPath}: ${errorMessage(e)}`, {
        path: documentPath,
      }),
    );
    return { findings, parsed: false };
  }

  if (!isRecord(doc)) {
    findings.push(
      finding("attestation", "error", "ATTESTATION_INVALID_JSON", `Invalid JSON in attestation ${documentPath}: top level must be an object`, {
        path: documentPath,
      }),
    );
    return { findings, parsed: false };
  }

  for (const field of REQUIRED_ATTESTATION_FIELDS) {
    if (!Object.hasOwn(doc, field)) {
      findings.push(
        finding("attestation", "error", "ATTESTATION_MISSING_FIELD", `Missing required attestation field: ${field} in ${documentPath}`, {
          path: documentPath,
          details: { field },
        }),
      );
    }
  }

  if (opts.level === "strict") {
    const registry = opts.registry ?? defaultRegistry();
    const check = registry.check("attestation", doc);
    if (!check.valid) {
      for (const err of check.errors) {
        // Absent top-level fields are already reported above.
        if (err.keyword === "required" && err.instancePath === "") continue;
        findings.push(
          finding(
            "attestation",
            "error",
            "ATTESTATION_SHAPE_INVALID",
            `Attestation ${documentPath} does not match the provenance statement shape: ${err.instancePath || "/"} ${err.message ?? err.keyword}`,
            { path: documentPath, details: { instancePath: err.instancePath, keyword: err.keyword } },
          ),
        );
      }
    }
  }

  const sig = siblingArtifact(documentPath, ".sig");
  if (!fs.existsSync(path.join(bundleRoot, sig))) {
    findings.push(
      finding("attestation", "error", "ATTESTATION_SIGNATURE_MISSING", `Signature file not found: ${sig}`, {
        path: documentPath,
        details: { signature: sig },
      }),
    );
  }

  const cert = siblingArtifact(documentPath, ".cert");
  if (!fs.existsSync(path.join(bundleRoot, cert))) {
    findings.push(
      finding("attestation", "error", "ATTESTATION_CERTIFICATE_MISSING", `Certificate file not found: ${cert}`, {
        path: documentPath,
        details: { certificate: cert },
      }),
    );
  }

  if (!findings.some((f) => f.level === "error")) {
    findings.push(finding("attestation", "info", "ATTESTATION_VALID", `Attestation structure valid: ${documentPath}`, { path: documentPath }));
  }

  return { findings, parsed: true };
}

/** Validate every attestation document in the bundle, in path order. */
export function validateAttestations(bundleRoot: string, opts: AttestationOptions = {}): StageOutcome {
  const { files: documents, unreadable } = discoverAttestations(bundleRoot, opts.suffix);
  const findings: Finding[] = unreadableDirFindings("attestation", unreadable);
  let filesCounted = 0;

  if (documents.length === 0) {
    findings.push(
      finding("attestation", opts.level === "strict" ? "error" : "warn", "ATTESTATION_NONE_FOUND", "No attestation files found"),
    );
  }

  for (const doc of documents) {
    const check = validateAttestation(bundleRoot, doc, opts);
    findings.push(...check.findings);
    if (check.parsed) filesCounted++;
  }

  return { stage: "attestation", ran: true, findings, filesCounted };
}
