import { XMLBuilder } from "fast-xml-parser";
import { STAGE_DESCRIPTIONS } from "../core/stages.js";
import type { Finding, StageSummary, ValidationReport } from "../types/report.js";

type XmlNode = Record<string, unknown>;

function testcase(stage: string, f: Finding): XmlNode {
  const node: XmlNode = { "@_classname": stage, "@_name": f.path ?? f.code };
  if (f.level === "error") node.failure = { "@_type": f.code, "@_message": f.message };
  else if (f.level === "warn") node["system-out"] = f.message;
  return node;
}

function testsuite(summary: StageSummary, findings: readonly Finding[]): XmlNode {
  const name = STAGE_DESCRIPTIONS[summary.stage];
  if (!summary.ran) {
    return {
      "@_name": name,
      "@_tests": 1,
      "@_failures": 0,
      "@_errors": 0,
      "@_skipped": 1,
      testcase: [{ "@_classname": summary.stage, "@_name": summary.stage, skipped: { "@_message": summary.skipReason ?? "" } }],
    };
  }

  const own = findings.filter((f) => f.stage === summary.stage);
  const cases = own.length > 0 ? own.map((f) => testcase(summary.stage, f)) : [{ "@_classname": summary.stage, "@_name": summary.stage }];
  return {
    "@_name": name,
    "@_tests": cases.length,
    "@_failures": summary.errors,
    "@_errors": 0,
    "@_skipped": 0,
    testcase: cases,
  };
}

/** JUnit XML view of a report: one testsuite per stage, error findings as failures. */
export function renderJunit(report: ValidationReport): string {
  const suites = report.stages.map((s) => testsuite(s, report.findings));
  const totals = suites.reduce<{ tests: number; failures: number; skipped: number }>(
    (acc, s) => ({
      tests: acc.tests + Number(s["@_tests"]),
      failures: acc.failures + Number(s["@_failures"]),
      skipped: acc.skipped + Number(s["@_skipped"]),
    }),
    { tests: 0, failures: 0, skipped: 0 },
  );

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });

  const body = builder.build({
    testsuites: {
      "@_name": "cdfctl",
      "@_tests": totals.tests,
      "@_failures": totals.failures,
      "@_errors": 0,
      "@_skipped": totals.skipped,
      testsuite: suites,
    },
  });

  return `<?xml version="1.0" encoding="UTF-8"?>\n${body}`;
}
