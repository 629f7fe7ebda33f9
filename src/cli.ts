#!/usr/bin/env node

import { Command } from "commander";
import { validateBundle } from "./commands/validate.js";
import { locate } from "./commands/locate.js";
import { EXIT } from "./commands/exit-codes.js";
import { createLogger, type OutputFormat } from "./core/logger.js";
import { redactSensitiveInfo } from "./core/security.js";

type ValidateFlags = {
  cdfPath?: string;
  config?: string;
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
  junit?: string;
  format: OutputFormat;
};

const program = new Command();

program
  .name("cdfctl")
  .description("Verify Composition Definition File bundles before deployment")
  .version("0.1.0");

program
  .command("validate")
  .description("Validate a CDF bundle: structure, integrity, unauthorized files, attestations, signatures")
  .option("--cdf-path <path>", "Bundle directory or manifest file (default: search the working directory)")
  .option("--config <file>", "YAML config file layered over the shipped defaults")
  .option("--validation-level <level>", "basic|full|strict")
  .option("--fail-on-unauthorized-files", "Treat undeclared protected files as errors")
  .option("--no-fail-on-unauthorized-files", "Report undeclared protected files as warnings")
  .option("--skip-signature-validation", "Skip attestation and signature stages")
  .option("--public-key <pem-or-path>", "Public key (PEM content or file) for signature verification")
  .option("--cert-identity-regexp <regexp>", "Accepted certificate identity")
  .option("--cert-issuer-regexp <regexp>", "Accepted certificate OIDC issuer")
  .option("--allow-any-identity", "Accept any certificate identity and issuer (insecure)")
  .option("--insecure-ignore-tlog", "Skip transparency log verification")
  .option("--trust-bundle-key", "Accept the public key shipped inside the bundle (insecure)")
  .option("--verifier <kind>", "cosign|builtin")
  .option("--results-file <path>", "Write results JSON")
  .option("--summary-file <path>", "Append the Markdown summary (default: $GITHUB_STEP_SUMMARY)")
  .option("--junit <path>", "Write JUnit XML")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: ValidateFlags) => {
    const logger = createLogger(opts.format);
    const res = await validateBundle({
      cdfPath: opts.cdfPath,
      configFile: opts.config,
      validationLevel: opts.validationLevel,
      failOnUnauthorizedFiles: opts.failOnUnauthorizedFiles,
      skipSignatureValidation: opts.skipSignatureValidation,
      publicKey: opts.publicKey,
      certIdentityRegexp: opts.certIdentityRegexp,
      certIssuerRegexp: opts.certIssuerRegexp,
      allowAnyIdentity: opts.allowAnyIdentity,
      insecureIgnoreTlog: opts.insecureIgnoreTlog,
      trustBundleKey: opts.trustBundleKey,
      verifier: opts.verifier,
      resultsFile: opts.resultsFile,
      summaryFile: opts.summaryFile,
      junitFile: opts.junit,
      logger,
    });

    if (!res.ok) {
      const message = redactSensitiveInfo(res.error.message);
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message }) + "\n");
      } else {
        console.error(`❌ ${message}`);
      }
      process.exit(res.exitCode);
    }

    const { report } = res;
    if (opts.format === "jsonl") {
      process.stdout.write(
        JSON.stringify({
          level: "info",
          code: "RESULT",
          status: report.status,
          error_count: report.errorCount,
          file_count: report.fileCount,
        }) + "\n",
      );
    } else {
      process.stdout.write(report.summaryText);
    }
    process.exitCode = res.exitCode;
  });

program
  .command("locate")
  .description("Show which bundle and manifest validate would use")
  .option("--cdf-path <path>", "Bundle directory or manifest file")
  .option("--config <file>", "YAML config file layered over the shipped defaults")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: { cdfPath?: string; config?: string; format: OutputFormat }) => {
    const res = locate({ cdfPath: opts.cdfPath, configFile: opts.config });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", code: res.error.code, message: res.error.message }) + "\n");
      } else {
        console.error(res.error.message);
      }
      process.exit(EXIT.INVALID_ARGS);
    }

    if (opts.format === "jsonl") {
      process.stdout.write(
        JSON.stringify({ level: "info", code: "OK", bundle: res.bundleRoot, manifest: res.manifestFile }) + "\n",
      );
    } else {
      console.log(res.manifestFile ? `${res.bundleRoot} (${res.manifestFile})` : `${res.bundleRoot} (no manifest)`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: redactSensitiveInfo(message) }) + "\n");
  process.exit(EXIT.VALIDATION_FAILED);
});
