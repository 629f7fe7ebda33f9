/** Configuration types for the layered config system (base.yaml ← user file ← env ← flags). */
import type { ValidationLevel } from "./report.js";

export type VerifierKind = "cosign" | "builtin";

export type SignatureConfig = {
  verifier: VerifierKind;
  cosign_path: string;
  timeout_ms: number;
  insecure_ignore_tlog: boolean;
  public_key_file?: string;
  /** Accept `.github/keys/cosign.pub` shipped inside the bundle as trust material. */
  trust_bundle_key: boolean;
};

export type CertificatePolicyConfig = {
  identity_regexp?: string;
  issuer_regexp?: string;
  allow_any_identity: boolean;
};

export type OutputConfig = {
  results_file?: string;
  summary_file?: string;
  junit_file?: string;
};

export type CdfConfig = {
  schema_version: string;
  validation_level: ValidationLevel;
  fail_on_unauthorized_files: boolean;
  skip_signature_validation: boolean;
  manifest_names: string[];
  protected_patterns: string[];
  attestation_suffix: string;
  signature: SignatureConfig;
  certificate: CertificatePolicyConfig;
  output?: OutputConfig;
};
