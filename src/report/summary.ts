import type { StageId, StageSummary, ValidationReport } from "../types/report.js";

const STAGE_TITLES: Record<StageId, string> = {
  manifest: "CDF structure validation",
  integrity: "File integrity checks",
  unauthorized: "Unauthorized file detection",
  attestation: "Attestation structure validation",
  signature: "Signature verification",
};

function stageLine(s: StageSummary): string {
  const title = STAGE_TITLES[s.stage];
  if (!s.ran) return `- ⏭️ ${title} skipped (${s.skipReason ?? "not run"})`;
  const mark = s.errors > 0 ? "❌" : "✅";
  const counts = s.errors > 0 || s.warnings > 0 ? ` (${s.errors} error(s), ${s.warnings} warning(s))` : "";
  return `- ${mark} ${title}${counts}`;
}

/** Markdown summary for CI job logs. Deterministic for a given report. */
export function renderSummary(report: Omit<ValidationReport, "summaryText">): string {
  const lines = [
    "## CDF Validation Summary",
    "",
    `**Status**: ${report.status}`,
    `**Validation Level**: ${report.validationLevel}`,
    `**CDF Path**: ${report.bundlePath}`,
    `**Files Validated**: ${report.fileCount}`,
    `**Errors Found**: ${report.errorCount}`,
    `**Warnings**: ${report.warningCount}`,
    "",
    "### Validation Results",
  ];

  for (const stage of report.stages) {
    if (report.signatureValidationSkipped && (stage.stage === "attestation" || stage.stage === "signature")) continue;
    lines.push(stageLine(stage));
  }
  if (report.signatureValidationSkipped) lines.push("- ⏭️ Signature validation skipped");

  return lines.join("\n") + "\n";
}
