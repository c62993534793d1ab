// packages/report/src/aggregate.ts
import {
  deepFreeze,
  type ComplianceReport,
  type Finding,
  type InputIdentity,
  type ReportSummary,
  type ReportWarning,
  type RuleLoadError,
  type RuleSetIdentity,
  type Severity,
  type StatusCounts,
} from "../../model/src/index.js";

export type ReportContext = {
  tool: { name: string; version: string };
  inputs: readonly InputIdentity[];
  ruleSet: RuleSetIdentity;
  warnings?: readonly ReportWarning[];
  ruleErrors?: readonly RuleLoadError[];
  /** Defaults to now. */
  generatedAt?: Date | string;
};

function zeroCounts(): StatusCounts {
  return { pass: 0, fail: 0, not_applicable: 0, error: 0 };
}

export function summarize(findings: readonly Finding[]): ReportSummary {
  const by_status = zeroCounts();
  const by_severity: Record<Severity, StatusCounts> = { info: zeroCounts(), warning: zeroCounts(), violation: zeroCounts() };
  for (const f of findings) {
    by_status[f.status]++;
    by_severity[f.severity][f.status]++;
  }
  return { total: findings.length, by_status, by_severity };
}

/** Findings keep the order given, which is rule-load order. */
export function aggregateReport(findings: readonly Finding[], context: ReportContext): ComplianceReport {
  const generated = context.generatedAt ?? new Date();
  return deepFreeze({
    metadata: {
      tool: { ...context.tool },
      generated_at: typeof generated === "string" ? generated : generated.toISOString(),
      inputs: context.inputs.map((i) => ({ ...i })),
      rule_set: context.ruleSet,
    },
    summary: summarize(findings),
    findings: findings.map((f) => ({ ...f })),
    warnings: [...(context.warnings ?? [])],
    rule_errors: (context.ruleErrors ?? []).map((e) => ({ rule_id: e.ruleId, source: e.source, reason: e.reason })),
  });
}

/** Violation failures. */
export function blockingFindings(report: ComplianceReport): Finding[] {
  return report.findings.filter((f) => f.status === "fail" && f.severity === "violation");
}

/** 1 when any violation fails, else 0. Errors and warnings alone never fail a run. */
export function exitCodeFor(report: ComplianceReport): 0 | 1 {
  return blockingFindings(report).length > 0 ? 1 : 0;
}
