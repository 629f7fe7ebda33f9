import fs from "node:fs";
import path from "node:path";
import { errorMessage, finding } from "../core/finding.js";
import { redactSensitiveInfo } from "../core/security.js";
import { DEFAULT_ATTESTATION_SUFFIX } from "../attestation/validator.js";
import { listBundleFiles, unreadableDirFindings, type UnreadableDir } from "../scanner/walk.js";
import type { SignatureArtifact } from "../types/attestation.js";
import type { Finding, StageOutcome } from "../types/report.js";
import type { SignatureVerifier, TrustMaterial, VerifyOutcome, VerifyRequest } from "./verifier.js";

export type SignatureStageOptions = {
  verifier: SignatureVerifier;
  trust: TrustMaterial;
  attestationSuffix?: string;
};

/** Signature artifacts next to attestations: `x.attestation.sig` → `x.attestation.json` / `.cert`. */
export function discoverSignatures(
  bundleRoot: string,
  attestationSuffix = DEFAULT_ATTESTATION_SUFFIX,
): { artifacts: SignatureArtifact[]; unreadable: UnreadableDir[] } {
  const sigSuffix = attestationSuffix.replace(/\.json$/, "") + ".sig";
  const listing = listBundleFiles(bundleRoot);
  const artifacts = listing.files
    .filter((p) => p.endsWith(sigSuffix))
    .map((signaturePath) => {
      const base = signaturePath.replace(/\.sig$/, "");
      const certificatePath = `${base}.cert`;
      return {
        signaturePath,
        attestationPath: `${base}.json`,
        certificatePath: fs.existsSync(path.join(bundleRoot, certificatePath)) ? certificatePath : undefined,
      };
    });
  return { artifacts, unreadable: listing.unreadable };
}

async function callVerifier(verifier: SignatureVerifier, req: VerifyRequest): Promise<VerifyOutcome> {
  try {
    return await verifier.verifySignature(req);
  } catch (e) {
    return { ok: false, reason: "unavailable", detail: redactSensitiveInfo(errorMessage(e)) };
  }
}

/**
 * Verify one artifact. A supplied public key takes precedence; otherwise
 * the sibling certificate is used under the configured identity policy.
 */
export async function verifyArtifact(
  bundleRoot: string,
  artifact: SignatureArtifact,
  opts: Pick<SignatureStageOptions, "verifier" | "trust">,
): Promise<Finding> {
  const docPath = artifact.attestationPath;
  const abs = (p: string) => path.join(bundleRoot, p);

  if (!fs.existsSync(abs(docPath))) {
    return finding("signature", "error", "SIGNATURE_ATTESTATION_MISSING", `Attestation file not found: ${docPath}`, {
      path: artifact.signaturePath,
    });
  }

  let req: VerifyRequest;
  let modeLabel: string;
  if (opts.trust.publicKeyPem) {
    req = {
      documentPath: abs(docPath),
      signaturePath: abs(artifact.signaturePath),
      mode: { kind: "key", publicKeyPem: opts.trust.publicKeyPem },
    };
    modeLabel = "public key";
  } else if (!artifact.certificatePath) {
    return finding(
      "signature",
      "error",
      "SIGNATURE_CERTIFICATE_MISSING",
      `No public key configured and certificate file not found for ${docPath}`,
      { path: docPath },
    );
  } else if (!opts.trust.identity) {
    return finding(
      "signature",
      "error",
      "SIGNATURE_IDENTITY_POLICY_MISSING",
      `Certificate verification of ${docPath} needs certificate.identity_regexp and certificate.issuer_regexp`,
      { path: docPath },
    );
  } else {
    req = {
      documentPath: abs(docPath),
      signaturePath: abs(artifact.signaturePath),
      mode: { kind: "certificate", certificatePath: abs(artifact.certificatePath), identity: opts.trust.identity },
    };
    modeLabel = "certificate";
  }

  const outcome = await callVerifier(opts.verifier, req);
  if (outcome.ok) {
    return finding("signature", "info", "SIGNATURE_VERIFIED", `${opts.verifier.name} verification passed (${modeLabel}): ${docPath}`, {
      path: docPath,
      details: { mode: req.mode.kind },
    });
  }
  if (outcome.reason === "unavailable") {
    return finding(
      "signature",
      "error",
      "SIGNATURE_VERIFIER_UNAVAILABLE",
      `Signature verifier unavailable for ${docPath}: ${outcome.detail}`,
      { path: docPath, details: { mode: req.mode.kind, verifier: opts.verifier.name } },
    );
  }
  return finding(
    "signature",
    "error",
    "SIGNATURE_INVALID",
    `${opts.verifier.name} verification failed (${modeLabel}): ${docPath}: ${outcome.detail}`,
    { path: docPath, details: { mode: req.mode.kind, verifier: opts.verifier.name } },
  );
}

/** Verify every signature artifact in path order, one verifier call at a time. */
export async function verifySignatures(bundleRoot: string, opts: SignatureStageOptions): Promise<StageOutcome> {
  const { artifacts, unreadable } = discoverSignatures(bundleRoot, opts.attestationSuffix);
  const findings: Finding[] = unreadableDirFindings("signature", unreadable);

  if (artifacts.length === 0) {
    findings.push(finding("signature", "warn", "SIGNATURE_NONE_FOUND", "No signature files found"));
  }

  const usesCertificates = !opts.trust.publicKeyPem && artifacts.some((a) => a.certificatePath !== undefined);
  if (usesCertificates && opts.trust.identity?.insecure) {
    findings.push(
      finding(
        "signature",
        "warn",
        "SIGNATURE_INSECURE_IDENTITY_POLICY",
        `Certificate verification accepts identity /${opts.trust.identity.identityRegexp}/ from issuer /${opts.trust.identity.issuerRegexp}/ (allow_any_identity is enabled)`,
        { details: { identityRegexp: opts.trust.identity.identityRegexp, issuerRegexp: opts.trust.identity.issuerRegexp } },
      ),
    );
  }

  for (const artifact of artifacts) {
    findings.push(await verifyArtifact(bundleRoot, artifact, opts));
  }

  return { stage: "signature", ran: true, findings, filesCounted: 0 };
}
