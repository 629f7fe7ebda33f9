import path from "node:path";
import { locateBundle } from "../bundle/locate.js";
import { deepMerge, loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../core/finding.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { runValidation } from "../core/pipeline.js";
import { writeReports } from "../report/writer.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { CosignVerifier } from "../signature/cosign.js";
import { NodeCryptoVerifier } from "../signature/node-crypto.js";
import { resolveTrustMaterial } from "../signature/trust.js";
import type { SignatureVerifier } from "../signature/verifier.js";
import type { CdfConfig } from "../types/config.js";
import type { ValidationReport } from "../types/report.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ValidateCommandOptions = {
  cdfPath?: string;
  configFile?: string;
  validationLevel?: string;
  failOnUnauthorizedFiles?: boolean;
  skipSignatureValidation?: boolean;
  publicKey?: string;
  certIdentityRegexp?: string;
  certIssuerRegexp?: string;
  allowAnyIdentity?: boolean;
  insecureIgnoreTlog?: boolean;
  trustBundleKey?: boolean;
  verifier?: string;
  resultsFile?: string;
  summaryFile?: string;
  junitFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  registry?: SchemaRegistry;
  /** Replaces the configured verifier (tests). */
  signatureVerifier?: SignatureVerifier;
};

export type ValidateCommandError = {
  code: "CONFIG_INVALID" | "BUNDLE_NOT_FOUND" | "BUNDLE_INACCESSIBLE";
  message: string;
};

export type ValidateCommandResult =
  | { ok: true; exitCode: ExitCode; report: ValidationReport; written: string[] }
  | { ok: false; exitCode: ExitCode; error: ValidateCommandError };

/** CLI flags as a config layer; unset flags leave lower layers alone. */
function flagOverrides(opts: ValidateCommandOptions): Record<string, unknown> {
  return {
    validation_level: opts.validationLevel,
    fail_on_unauthorized_files: opts.failOnUnauthorizedFiles,
    skip_signature_validation: opts.skipSignatureValidation,
    signature: {
      verifier: opts.verifier,
      insecure_ignore_tlog: opts.insecureIgnoreTlog,
      trust_bundle_key: opts.trustBundleKey,
    },
    certificate: {
      identity_regexp: opts.certIdentityRegexp,
      issuer_regexp: opts.certIssuerRegexp,
      allow_any_identity: opts.allowAnyIdentity,
    },
    output: {
      results_file: opts.resultsFile,
      summary_file: opts.summaryFile,
      junit_file: opts.junitFile,
    },
  };
}

export function resolveConfig(
  opts: ValidateCommandOptions,
): { ok: true; config: CdfConfig } | { ok: false; error: ValidateCommandError } {
  let merged: Record<string, unknown>;
  try {
    merged = deepMerge(loadConfig({ configFile: opts.configFile, env: opts.env }), flagOverrides(opts));
  } catch (e) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Failed to load config: ${errorMessage(e)}` } };
  }

  const checked = validateConfig(merged);
  if (!checked.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${checked.errors}` } };
  }
  return { ok: true, config: checked.config };
}

export function createVerifier(config: CdfConfig): SignatureVerifier {
  if (config.signature.verifier === "builtin") return new NodeCryptoVerifier();
  return new CosignVerifier({
    cosignPath: config.signature.cosign_path,
    timeoutMs: config.signature.timeout_ms,
    insecureIgnoreTlog: config.signature.insecure_ignore_tlog,
  });
}

/**
 * Resolve config and trust material, locate the bundle, run every
 * stage and write the configured reports.
 */
export async function validateBundle(opts: ValidateCommandOptions): Promise<ValidateCommandResult> {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const logger = opts.logger ?? silentLogger;

  const resolved = resolveConfig({ ...opts, env });
  if (!resolved.ok) return { ok: false, exitCode: EXIT.INVALID_ARGS, error: resolved.error };
  const config = resolved.config;

  const explicit = opts.cdfPath ? path.resolve(cwd, opts.cdfPath) : undefined;
  const located = locateBundle(explicit, cwd, config.manifest_names);
  if (!located) {
    const message = opts.cdfPath
      ? `CDF path not found: ${opts.cdfPath}`
      : `No CDF bundle found under ${cwd} (looked for ${config.manifest_names.join(", ")})`;
    return { ok: false, exitCode: EXIT.INVALID_ARGS, error: { code: "BUNDLE_NOT_FOUND", message } };
  }
  const bundleRoot = path.relative(cwd, located) || ".";
  logger.info(`Validating CDF at: ${bundleRoot}`);

  const trust = resolveTrustMaterial({
    publicKey: opts.publicKey,
    publicKeyFile: config.signature.public_key_file,
    certificate: config.certificate,
    env,
    cwd,
    bundleRoot: located,
    trustBundleKey: config.signature.trust_bundle_key,
  });
  if (!trust.ok) return { ok: false, exitCode: EXIT.INVALID_ARGS, error: { code: "CONFIG_INVALID", message: trust.error } };
  for (const warning of trust.warnings) logger.warn(warning);
  if (trust.keySource) logger.info(`Using public key from ${trust.keySource}`);

  const result = await runValidation({
    bundleRoot: located,
    displayPath: bundleRoot,
    validationLevel: config.validation_level,
    failOnUnauthorizedFiles: config.fail_on_unauthorized_files,
    skipSignatureValidation: config.skip_signature_validation,
    manifestNames: config.manifest_names,
    protectedPatterns: config.protected_patterns,
    attestationSuffix: config.attestation_suffix,
    trust: trust.trust,
    verifier: opts.signatureVerifier ?? createVerifier(config),
    registry: opts.registry,
    logger,
  });
  if (!result.ok) return { ok: false, exitCode: EXIT.BUNDLE_INACCESSIBLE, error: result.error };

  const report = result.report;
  const fromCwd = (file: string | undefined) => (file ? path.resolve(cwd, file) : undefined);
  const written = writeReports(report, {
    resultsFile: fromCwd(config.output?.results_file),
    summaryFile: fromCwd(config.output?.summary_file) ?? env.GITHUB_STEP_SUMMARY,
    junitFile: fromCwd(config.output?.junit_file),
    ciOutputFile: env.GITHUB_OUTPUT,
  });

  return {
    ok: true,
    exitCode: report.status === "passed" ? EXIT.SUCCESS : EXIT.VALIDATION_FAILED,
    report,
    written,
  };
}
