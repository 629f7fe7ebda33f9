import { countLevel } from "../core/finding.js";
import { STAGES, type StageOutcome, type StageSummary, type ValidationLevel, type ValidationReport } from "../types/report.js";
import { renderSummary } from "./summary.js";

export type AggregateContext = {
  validationLevel: ValidationLevel;
  bundlePath: string;
  signatureValidationSkipped: boolean;
};

/**
 * Fold stage outcomes into the run verdict. Any error-level finding fails
 * the run; the unauthorized-file policy acts through the level it assigns.
 */
export function aggregate(outcomes: readonly StageOutcome[], ctx: AggregateContext): ValidationReport {
  const ordered = [...outcomes].sort((a, b) => STAGES.indexOf(a.stage) - STAGES.indexOf(b.stage));
  const findings = ordered.flatMap((o) => o.findings);

  const errorCount = countLevel(findings, "error");
  const warningCount = countLevel(findings, "warn");
  const fileCount = ordered.reduce((sum, o) => sum + o.filesCounted, 0);

  const stages: StageSummary[] = ordered.map((o) => ({
    stage: o.stage,
    ran: o.ran,
    skipReason: o.skipReason,
    errors: countLevel(o.findings, "error"),
    warnings: countLevel(o.findings, "warn"),
  }));

  const report: Omit<ValidationReport, "summaryText"> = {
    status: errorCount > 0 ? "failed" : "passed",
    errorCount,
    warningCount,
    fileCount,
    validationLevel: ctx.validationLevel,
    bundlePath: ctx.bundlePath,
    signatureValidationSkipped: ctx.signatureValidationSkipped,
    stages,
    findings,
  };

  return { ...report, summaryText: renderSummary(report) };
}
