/** Findings, stage outcomes and the terminal validation report. */

export type FindingLevel = "error" | "warn" | "info";

export type ManifestFindingCode =
  | "MANIFEST_NOT_FOUND"
  | "MANIFEST_MALFORMED_JSON"
  | "MANIFEST_MISSING_FIELD"
  | "MANIFEST_INVALID_FIELD"
  | "MANIFEST_INVALID_FILE_ENTRY"
  | "MANIFEST_DUPLICATE_ENTRY"
  | "MANIFEST_PATH_ESCAPES_BUNDLE"
  | "MANIFEST_LOADED";

export type IntegrityFindingCode =
  | "INTEGRITY_FILE_MISSING"
  | "INTEGRITY_FILE_UNREADABLE"
  | "INTEGRITY_HASH_MISMATCH"
  | "INTEGRITY_PLACEHOLDER_HASH"
  | "INTEGRITY_SELF_ENTRY_SKIPPED"
  | "INTEGRITY_HASH_MATCH";

export type UnauthorizedFindingCode = "UNAUTHORIZED_FILE" | "AUTHORIZED_FILE";

export type AttestationFindingCode =
  | "ATTESTATION_INVALID_JSON"
  | "ATTESTATION_MISSING_FIELD"
  | "ATTESTATION_SIGNATURE_MISSING"
  | "ATTESTATION_CERTIFICATE_MISSING"
  | "ATTESTATION_SHAPE_INVALID"
  | "ATTESTATION_NONE_FOUND"
  | "ATTESTATION_VALID";

export type SignatureFindingCode =
  | "SIGNATURE_INVALID"
  | "SIGNATURE_CERTIFICATE_MISSING"
  | "SIGNATURE_VERIFIER_UNAVAILABLE"
  | "SIGNATURE_ATTESTATION_MISSING"
  | "SIGNATURE_IDENTITY_POLICY_MISSING"
  | "SIGNATURE_INSECURE_IDENTITY_POLICY"
  | "SIGNATURE_NONE_FOUND"
  | "SIGNATURE_VERIFIED";

/** Reported by every stage that walks the bundle tree. */
export type BundleFindingCode = "BUNDLE_DIRECTORY_UNREADABLE";

export type FindingCode =
  | BundleFindingCode
  | ManifestFindingCode
  | IntegrityFindingCode
  | UnauthorizedFindingCode
  | AttestationFindingCode
  | SignatureFindingCode;

export const STAGES = ["manifest", "integrity", "unauthorized", "attestation", "signature"] as const;

export type StageId = (typeof STAGES)[number];

export type Finding = {
  level: FindingLevel;
  code: FindingCode;
  stage: StageId;
  message: string;
  /** Bundle-relative path (POSIX separators) the finding is about. */
  path?: string;
  details?: Record<string, unknown>;
};

export type StageOutcome = {
  stage: StageId;
  ran: boolean;
  skipReason?: string;
  findings: Finding[];
  filesCounted: number;
};

export type ValidationStatus = "passed" | "failed";

export type ValidationLevel = "basic" | "full" | "strict";

export type StageSummary = {
  stage: StageId;
  ran: boolean;
  skipReason?: string;
  errors: number;
  warnings: number;
};

export type ValidationReport = {
  status: ValidationStatus;
  errorCount: number;
  warningCount: number;
  fileCount: number;
  validationLevel: ValidationLevel;
  bundlePath: string;
  signatureValidationSkipped: boolean;
  stages: StageSummary[];
  findings: Finding[];
  summaryText: string;
};
