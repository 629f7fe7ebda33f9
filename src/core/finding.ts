import type { Finding, FindingCode, FindingLevel, StageId, StageOutcome } from "../types/report.js";

export function finding(
  stage: StageId,
  level: FindingLevel,
  code: FindingCode,
  message: string,
  extra?: Pick<Finding, "path" | "details">,
): Finding {
  return { stage, level, code, message, ...extra };
}

export function skippedStage(stage: StageId, reason: string): StageOutcome {
  return { stage, ran: false, skipReason: reason, findings: [], filesCounted: 0 };
}

export function countLevel(findings: readonly Finding[], level: FindingLevel): number {
  return findings.filter((f) => f.level === level).length;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
