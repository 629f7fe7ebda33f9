import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { CdfConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "validation_level",
    "fail_on_unauthorized_files",
    "skip_signature_validation",
    "manifest_names",
    "protected_patterns",
    "attestation_suffix",
    "signature",
    "certificate",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    validation_level: { type: "string", enum: ["basic", "full", "strict"] },
    fail_on_unauthorized_files: { type: "boolean" },
    skip_signature_validation: { type: "boolean" },
    manifest_names: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
    protected_patterns: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
    attestation_suffix: { type: "string", pattern: "\\.json$" },
    signature: {
      type: "object",
      required: ["verifier", "cosign_path", "timeout_ms", "insecure_ignore_tlog", "trust_bundle_key"],
      properties: {
        verifier: { type: "string", enum: ["cosign", "builtin"] },
        cosign_path: { type: "string", minLength: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
        insecure_ignore_tlog: { type: "boolean" },
        public_key_file: { type: "string" },
        trust_bundle_key: { type: "boolean" },
      },
    },
    certificate: {
      type: "object",
      required: ["allow_any_identity"],
      properties: {
        identity_regexp: { type: "string" },
        issuer_regexp: { type: "string" },
        allow_any_identity: { type: "boolean" },
      },
    },
    output: {
      type: "object",
      properties: {
        results_file: { type: "string" },
        summary_file: { type: "string" },
        junit_file: { type: "string" },
      },
    },
  },
};

export type ConfigValidationResult = { valid: true; config: CdfConfig } | { valid: false; errors: string };

let compiled: { validate: AjvValidateFn; errorsText: (errors: AjvValidateFn["errors"]) => string } | null = null;

function configValidator() {
  if (!compiled) {
    const ajv = loadAjv();
    compiled = { validate: ajv.compile(CONFIG_SCHEMA), errorsText: (errors) => ajv.errorsText(errors) };
  }
  return compiled;
}

function isCdfConfig(config: unknown, validate: AjvValidateFn): config is CdfConfig {
  return validate(config);
}

/** Validate a loaded config against the config schema. */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { validate, errorsText } = configValidator();
  if (isCdfConfig(config, validate)) return { valid: true, config };
  return { valid: false, errors: errorsText(validate.errors) };
}
