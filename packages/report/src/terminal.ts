// packages/report/src/terminal.ts
import type { ComplianceReport, FindingStatus } from "../../model/src/index.js";

import { blockingFindings } from "./aggregate.js";

const LABEL: Record<FindingStatus, string> = { pass: "PASS", fail: "FAIL", not_applicable: "SKIP", error: "ERROR" };

/** Plain-text run summary: one line per finding, then the counts. */
export function renderTerminalSummary(report: ComplianceReport): string {
  const lines = report.findings.map((f) => {
    const at = f.entity_ref ? ` @ ${f.entity_ref.type} ${f.entity_ref.id}` : "";
    return `  ${LABEL[f.status].padEnd(5)}  ${f.rule_id}  ${f.rule_name}${at}`;
  });
  const c = report.summary.by_status;
  lines.push("", `  ${c.pass} passed, ${c.fail} failed, ${c.not_applicable} not applicable, ${c.error} errors`);

  const blocking = blockingFindings(report);
  if (blocking.length > 0) {
    lines.push("", `  ${blocking.length} violation failure(s) must be resolved before submission.`);
    for (const f of blocking) lines.push(`    ${f.rule_id}: ${f.message}`);
  }
  if (report.rule_errors.length > 0) lines.push("", `  ${report.rule_errors.length} rule(s) could not be loaded.`);
  return lines.join("\n");
}
