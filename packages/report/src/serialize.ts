// packages/report/src/serialize.ts
import { sha256Hex, stableStringify, type ComplianceReport } from "../../model/src/index.js";

/** Sorted keys, two-space indent, trailing newline. */
export function serializeReport(report: ComplianceReport): string {
  return `${stableStringify(report, 2)}\n`;
}

/** sha256 of the canonical report without `generated_at`; equal inputs give equal hashes. */
export function hashReport(report: ComplianceReport): string {
  const { generated_at: _omitted, ...metadata } = report.metadata;
  return sha256Hex(stableStringify({ ...report, metadata }));
}
