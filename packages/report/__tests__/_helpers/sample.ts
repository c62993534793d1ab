// packages/report/__tests__/_helpers/sample.ts
import { RuleLoadError, type Finding } from "../../../model/src/index.js";
import { aggregateReport, type ReportContext } from "../../src/index.js";

function finding(partial: Partial<Finding> & Pick<Finding, "rule_id" | "status" | "severity">): Finding {
  return {
    rule_name: partial.rule_id,
    citation: "Test citation",
    citation_url: null,
    category: null,
    message: "checked",
    entity_ref: null,
    bindings: [],
    ...partial,
  };
}

export const MANN_PASS = finding({
  rule_id: "FEMA-MANN-001",
  rule_name: "Channel roughness",
  category: "MANN",
  severity: "violation",
  status: "pass",
  message: "Channel Manning's n is 0.04; expected 0.020 to 0.150",
  citation_url: "https://example.test/mann",
  entity_ref: { type: "cross_section", id: "Mill Creek/Upper/5000" },
  bindings: [{ name: "manning_n_channel", value: 0.04 }],
});

export const FW_FAIL = finding({
  rule_id: "TX-FW-001",
  rule_name: "Zero-rise floodway",
  category: "FW",
  severity: "violation",
  status: "fail",
  citation: "Texas Water Code §16.3145",
  message: "Floodway target surcharge is 1 ft; a zero-rise floodway is required",
  entity_ref: { type: "plan", id: "p01" },
});

export const COEF_ERROR = finding({
  rule_id: "FEMA-COEF-001",
  category: "COEF",
  severity: "warning",
  status: "error",
  message: "contraction is not defined",
  entity_ref: { type: "cross_section", id: "Mill Creek/Upper/4800" },
});

export const LOCAL_NA = finding({
  rule_id: "LOCAL1",
  severity: "info",
  status: "not_applicable",
  message: "no boundary entity matches",
});

export const ZED_FAIL = finding({
  rule_id: "X-ZED-001",
  category: "ZED",
  severity: "warning",
  status: "fail",
  message: "a | b",
});

export const ALL = [MANN_PASS, FW_FAIL, COEF_ERROR, LOCAL_NA, ZED_FAIL];

export function context(overrides: Partial<ReportContext> = {}): ReportContext {
  return {
    tool: { name: "hydrocheck", version: "0.0.0-test" },
    generatedAt: "2024-05-01T12:00:00.000Z",
    inputs: [
      { name: "Creek.prj", kind: "project", bytes: 120, sha256: "a".repeat(64) },
      { name: "Creek.g01", kind: "geometry", bytes: 900, sha256: "b".repeat(64) },
    ],
    ruleSet: {
      documents: [
        { id: "fema-baseline", version: "2024.1", source: "fema.yaml" },
        { id: "texas-overlay", version: "2024.1", source: "texas.yaml" },
      ],
      rule_count: 13,
      sha256: "c".repeat(64),
    },
    warnings: [{ source: "Creek.g01", line: 5, entity: "cross_section:Mill Creek/Upper/100", message: "MALFORMED_NUMBER: bad n" }],
    ruleErrors: [new RuleLoadError({ ruleId: "LOC-FW-001", source: "local.yaml", reason: "missing citation" })],
    ...overrides,
  };
}

export function sampleReport(findings: readonly Finding[] = ALL, overrides: Partial<ReportContext> = {}) {
  return aggregateReport(findings, context(overrides));
}
