// packages/report/src/schema.ts
// Shape of a serialized report, for reading one back from disk or the archive.
import { z } from "zod";

import { errorMessage, isEntityType, type ComplianceReport, type EntityType } from "../../model/src/index.js";

const Severity = z.enum(["info", "warning", "violation"]);
const Status = z.enum(["pass", "fail", "not_applicable", "error"]);

const StatusCounts = z.object({
  pass: z.number().int().nonnegative(),
  fail: z.number().int().nonnegative(),
  not_applicable: z.number().int().nonnegative(),
  error: z.number().int().nonnegative(),
});

const EntityRef = z.object({
  type: z.custom<EntityType>((v) => typeof v === "string" && isEntityType(v), "unknown entity type"),
  id: z.string(),
});

const Item = z.union([z.number(), z.string()]);

export const FindingSchema = z.object({
  rule_id: z.string(),
  rule_name: z.string(),
  citation: z.string().min(1),
  citation_url: z.string().nullable(),
  category: z.string().nullable(),
  severity: Severity,
  status: Status,
  message: z.string(),
  entity_ref: EntityRef.nullable(),
  bindings: z.array(
    z.object({
      name: z.string(),
      value: z.union([z.number(), z.string(), z.boolean(), z.array(Item), z.null()]),
    })
  ),
});

export const ComplianceReportSchema = z.object({
  metadata: z.object({
    tool: z.object({ name: z.string(), version: z.string() }),
    generated_at: z.string(),
    inputs: z.array(z.object({ name: z.string(), kind: z.string(), bytes: z.number().int(), sha256: z.string() })),
    rule_set: z.object({
      documents: z.array(z.object({ id: z.string(), version: z.string(), source: z.string() })),
      rule_count: z.number().int(),
      sha256: z.string(),
    }),
  }),
  summary: z.object({
    total: z.number().int(),
    by_status: StatusCounts,
    by_severity: z.object({ info: StatusCounts, warning: StatusCounts, violation: StatusCounts }),
  }),
  findings: z.array(FindingSchema),
  warnings: z.array(
    z.object({ source: z.string(), message: z.string(), line: z.number().int().optional(), entity: z.string().optional() })
  ),
  rule_errors: z.array(z.object({ rule_id: z.string(), source: z.string(), reason: z.string() })),
});

export type ReportParse = { ok: true; report: ComplianceReport } | { ok: false; code: "JSON_INVALID" | "SCHEMA_INVALID"; message: string };

export function parseReportJson(text: string): ReportParse {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return { ok: false, code: "JSON_INVALID", message: errorMessage(e) };
  }
  const parsed = ComplianceReportSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.map(String).join(".")}: ` : "";
    return { ok: false, code: "SCHEMA_INVALID", message: `${where}${first?.message ?? "invalid report"}` };
  }
  return { ok: true, report: parsed.data };
}
