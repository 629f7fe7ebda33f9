import { STAGES, type StageId, type ValidationLevel } from "../types/report.js";

export const STAGE_DESCRIPTIONS: Record<StageId, string> = {
  manifest: "Validating CDF structure",
  integrity: "Validating file integrity",
  unauthorized: "Checking for unauthorized files",
  attestation: "Validating attestations",
  signature: "Verifying signatures",
};

/** Stages each validation level leaves out, with the reason shown in reports. */
const LEVEL_SKIPS: Record<ValidationLevel, Partial<Record<StageId, string>>> = {
  basic: {
    attestation: "validation level basic",
    signature: "validation level basic",
  },
  full: {},
  strict: {},
};

export type StagePlan = Array<{ stage: StageId; skipReason: string | null }>;

/** Fixed stage order with the skip decision for each stage. */
export function planStages(level: ValidationLevel, skipSignatureValidation: boolean): StagePlan {
  return STAGES.map((stage) => {
    const levelSkip = LEVEL_SKIPS[level][stage];
    if (levelSkip) return { stage, skipReason: levelSkip };
    if (skipSignatureValidation && (stage === "attestation" || stage === "signature")) {
      return { stage, skipReason: "signature validation disabled" };
    }
    return { stage, skipReason: null };
  });
}
