import fs from "node:fs";
import path from "node:path";
import { validateAttestations } from "../attestation/validator.js";
import { checkIntegrity } from "../integrity/checker.js";
import { loadManifest } from "../manifest/loader.js";
import { aggregate } from "../report/aggregator.js";
import { scanUnauthorized } from "../scanner/unauthorized.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { verifySignatures } from "../signature/stage.js";
import type { SignatureVerifier, TrustMaterial } from "../signature/verifier.js";
import type { Manifest } from "../types/manifest.js";
import type { StageId, StageOutcome, ValidationLevel, ValidationReport } from "../types/report.js";
import { errorMessage, skippedStage } from "./finding.js";
import { silentLogger, type Logger } from "./logger.js";
import { STAGE_DESCRIPTIONS, planStages } from "./stages.js";

export type PipelineOptions = {
  bundleRoot: string;
  /** Bundle path as shown in reports; defaults to `bundleRoot`. */
  displayPath?: string;
  validationLevel: ValidationLevel;
  failOnUnauthorizedFiles: boolean;
  skipSignatureValidation: boolean;
  manifestNames: readonly string[];
  protectedPatterns: readonly string[];
  attestationSuffix: string;
  trust: TrustMaterial;
  verifier: SignatureVerifier;
  registry?: SchemaRegistry;
  logger?: Logger;
};

export type PipelineResult =
  | { ok: true; report: ValidationReport }
  | { ok: false; error: { code: "BUNDLE_INACCESSIBLE"; message: string } };

function bundleAccessError(bundleRoot: string): string | null {
  try {
    if (!fs.statSync(bundleRoot).isDirectory()) return `Cannot access CDF path: ${bundleRoot} is not a directory`;
    fs.readdirSync(bundleRoot);
    return null;
  } catch (e) {
    return `Cannot access CDF path: ${bundleRoot}: ${errorMessage(e)}`;
  }
}

/**
 * Run the validation stages in their fixed order and aggregate the
 * verdict. Only an inaccessible bundle root aborts the run; every other
 * problem is recorded and the remaining checks still run.
 */
export async function runValidation(opts: PipelineOptions): Promise<PipelineResult> {
  const bundleRoot = path.resolve(opts.bundleRoot);
  const logger = opts.logger ?? silentLogger;

  const accessError = bundleAccessError(bundleRoot);
  if (accessError) return { ok: false, error: { code: "BUNDLE_INACCESSIBLE", message: accessError } };

  const outcomes: StageOutcome[] = [];
  let manifest: Manifest | null = null;

  const runStage = async (stage: StageId): Promise<StageOutcome> => {
    switch (stage) {
      case "manifest": {
        const loaded = loadManifest(bundleRoot, { manifestNames: opts.manifestNames, registry: opts.registry });
        manifest = loaded.manifest;
        return loaded.outcome;
      }
      case "integrity":
        return manifest
          ? checkIntegrity(manifest, bundleRoot, { level: opts.validationLevel })
          : skippedStage(stage, "manifest unavailable");
      case "unauthorized":
        return manifest
          ? scanUnauthorized(manifest, bundleRoot, {
              protectedPatterns: opts.protectedPatterns,
              failOnUnauthorized: opts.failOnUnauthorizedFiles,
            })
          : skippedStage(stage, "manifest unavailable");
      case "attestation":
        return validateAttestations(bundleRoot, {
          suffix: opts.attestationSuffix,
          level: opts.validationLevel,
          registry: opts.registry,
        });
      case "signature":
        return verifySignatures(bundleRoot, {
          verifier: opts.verifier,
          trust: opts.trust,
          attestationSuffix: opts.attestationSuffix,
        });
    }
  };

  const plan = planStages(opts.validationLevel, opts.skipSignatureValidation);
  for (const [index, { stage, skipReason }] of plan.entries()) {
    if (skipReason) {
      logger.info(`Step ${index + 1}: ${STAGE_DESCRIPTIONS[stage]} skipped (${skipReason})`);
      outcomes.push(skippedStage(stage, skipReason));
      continue;
    }

    logger.stage(stage, index + 1, STAGE_DESCRIPTIONS[stage]);
    const outcome = await runStage(stage);
    if (!outcome.ran) logger.info(`${STAGE_DESCRIPTIONS[stage]} skipped (${outcome.skipReason ?? "not run"})`);
    for (const f of outcome.findings) logger.finding(f);
    outcomes.push(outcome);
  }

  const report = aggregate(outcomes, {
    validationLevel: opts.validationLevel,
    bundlePath: opts.displayPath ?? opts.bundleRoot,
    signatureValidationSkipped: opts.skipSignatureValidation,
  });

  return { ok: true, report };
}
