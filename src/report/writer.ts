import fs from "node:fs";
import path from "node:path";
import type { Finding, ValidationReport } from "../types/report.js";
import { renderJunit } from "./junit.js";

/** On-disk results document; snake_case keys as CI steps read them. */
export type ResultsDocument = {
  status: ValidationReport["status"];
  error_count: number;
  warning_count: number;
  file_count: number;
  validation_level: ValidationReport["validationLevel"];
  cdf_path: string;
  summary: string;
  findings: Finding[];
};

export type ReportTargets = {
  resultsFile?: string;
  summaryFile?: string;
  junitFile?: string;
  /** File receiving `key=value` CI outputs. */
  ciOutputFile?: string;
};

export function toResultsDocument(report: ValidationReport): ResultsDocument {
  return {
    status: report.status,
    error_count: report.errorCount,
    warning_count: report.warningCount,
    file_count: report.fileCount,
    validation_level: report.validationLevel,
    cdf_path: report.bundlePath,
    summary: report.summaryText,
    findings: report.findings,
  };
}

function ensureParent(file: string): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
}

export function writeResultsFile(file: string, report: ValidationReport): void {
  ensureParent(file);
  fs.writeFileSync(file, JSON.stringify(toResultsDocument(report), null, 2) + "\n", "utf8");
}

/** Appends, since the step summary file is shared by every step of a job. */
export function appendStepSummary(file: string, report: ValidationReport): void {
  ensureParent(file);
  fs.appendFileSync(file, report.summaryText, "utf8");
}

export function appendCiOutputs(file: string, report: ValidationReport): void {
  const lines = [
    `validation_status=${report.status}`,
    `error_count=${report.errorCount}`,
    `file_count=${report.fileCount}`,
  ];
  ensureParent(file);
  fs.appendFileSync(file, lines.join("\n") + "\n", "utf8");
}

/**
 * Write every configured report. Runs only after aggregation, so an
 * aborted run leaves no partial files. Returns the paths written.
 */
export function writeReports(report: ValidationReport, targets: ReportTargets): string[] {
  const written: string[] = [];
  if (targets.resultsFile) {
    writeResultsFile(targets.resultsFile, report);
    written.push(targets.resultsFile);
  }
  if (targets.summaryFile) {
    appendStepSummary(targets.summaryFile, report);
    written.push(targets.summaryFile);
  }
  if (targets.junitFile) {
    ensureParent(targets.junitFile);
    fs.writeFileSync(targets.junitFile, renderJunit(report), "utf8");
    written.push(targets.junitFile);
  }
  if (targets.ciOutputFile) {
    appendCiOutputs(targets.ciOutputFile, report);
    written.push(targets.ciOutputFile);
  }
  return written;
}
