// packages/model/src/finding.ts
import type { EntityRef } from "./entity.js";
import type { SequenceItem } from "./value.js";

export type Severity = "info" | "warning" | "violation";
export const SEVERITIES: readonly Severity[] = ["info", "warning", "violation"];

export type FindingStatus = "pass" | "fail" | "not_applicable" | "error";
export const FINDING_STATUSES: readonly FindingStatus[] = ["pass", "fail", "not_applicable", "error"];

export type Binding = {
  name: string;
  value: number | string | boolean | SequenceItem[] | null;
};

export type Finding = {
  rule_id: string;
  rule_name: string;
  citation: string;
  citation_url: string | null;
  category: string | null;
  severity: Severity;
  status: FindingStatus;
  message: string;
  entity_ref: EntityRef | null;
  bindings: Binding[];
};

export type InputIdentity = {
  name: string;
  kind: string;
  bytes: number;
  sha256: string;
};

export type RuleSetIdentity = {
  documents: Array<{ id: string; version: string; source: string }>;
  rule_count: number;
  sha256: string;
};

export type ReportWarning = {
  source: string;
  message: string;
  line?: number;
  entity?: string;
};

export type RuleLoadFailure = {
  rule_id: string;
  source: string;
  reason: string;
};

export type StatusCounts = Record<FindingStatus, number>;

export type ReportSummary = {
  total: number;
  by_status: StatusCounts;
  by_severity: Record<Severity, StatusCounts>;
};

export type ComplianceReport = {
  metadata: {
    tool: { name: string; version: string };
    generated_at: string;
    inputs: InputIdentity[];
    rule_set: RuleSetIdentity;
  };
  summary: ReportSummary;
  findings: Finding[];
  warnings: ReportWarning[];
  rule_errors: RuleLoadFailure[];
};
