// packages/report/src/markdown.ts
import type { ComplianceReport, Finding, FindingStatus } from "../../model/src/index.js";

import { blockingFindings } from "./aggregate.js";

/** Display order of rule categories; unknown ones follow alphabetically, then uncategorized rules. */
export const CATEGORY_ORDER = ["MANN", "COEF", "FW", "EVENT", "BRG", "BC", "FB"] as const;

const CATEGORY_TITLES: Readonly<Record<string, string>> = {
  MANN: "Manning's n",
  COEF: "Expansion and contraction coefficients",
  FW: "Floodway and surcharge",
  EVENT: "Required flood events",
  BRG: "Bridges and culverts",
  BC: "Boundary conditions",
  FB: "Freeboard",
};

const STATUS_LABEL: Record<FindingStatus, string> = {
  pass: "PASS",
  fail: "FAIL",
  not_applicable: "N/A",
  error: "ERROR",
};

function cell(text: string): string {
  return text.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

function entityLabel(f: Finding): string {
  return f.entity_ref ? `${f.entity_ref.type} ${f.entity_ref.id}` : "(all)";
}

function citation(f: Finding): string {
  return f.citation_url ? `[${cell(f.citation)}](${f.citation_url})` : cell(f.citation);
}

function rank(category: string | null): [number, string] {
  if (category === null) return [CATEGORY_ORDER.length + 1, ""];
  const known = CATEGORY_ORDER.findIndex((c) => c === category);
  return known === -1 ? [CATEGORY_ORDER.length, category] : [known, ""];
}

/** Findings grouped by category in display order; rule-load order within a group. */
export function groupByCategory(findings: readonly Finding[]): Array<{ category: string | null; findings: Finding[] }> {
  const groups = new Map<string | null, Finding[]>();
  for (const f of findings) {
    const list = groups.get(f.category);
    if (list) list.push(f);
    else groups.set(f.category, [f]);
  }
  return [...groups]
    .map(([category, list]) => ({ category, findings: list }))
    .sort((a, b) => {
      const [ra, na] = rank(a.category);
      const [rb, nb] = rank(b.category);
      return ra !== rb ? ra - rb : na < nb ? -1 : na > nb ? 1 : 0;
    });
}

export function categoryTitle(category: string | null): string {
  if (category === null) return "Uncategorized";
  const title = CATEGORY_TITLES[category];
  return title ? `${title} (${category})` : category;
}

export function renderMarkdown(report: ComplianceReport): string {
  const { metadata, summary } = report;
  const lines: string[] = [];
  const projects = metadata.inputs.filter((i) => i.kind === "project").map((i) => `\`${i.name}\``);
  const ruleSets = metadata.rule_set.documents.map((d) => `${d.id} ${d.version}`);

  lines.push("# Compliance report", "");
  lines.push("| Field | Value |", "|:--|:--|");
  lines.push(`| Project | ${projects.length > 0 ? projects.join(", ") : "(none)"} |`);
  lines.push(`| Generated | ${metadata.generated_at} |`);
  lines.push(`| Tool | ${metadata.tool.name} ${metadata.tool.version} |`);
  lines.push(`| Rule sets | ${ruleSets.length > 0 ? ruleSets.join(", ") : "(none)"} |`);
  lines.push(`| Rule set sha256 | \`${metadata.rule_set.sha256}\` |`, "");

  lines.push("## Summary", "");
  lines.push("| Status | Count |", "|:--|--:|");
  for (const status of ["pass", "fail", "not_applicable", "error"] as const) {
    lines.push(`| ${STATUS_LABEL[status]} | ${summary.by_status[status]} |`);
  }
  lines.push(`| **Total** | **${summary.total}** |`, "");

  const blocking = blockingFindings(report);
  const review = summary.by_status.fail + summary.by_status.error - blocking.length;
  if (blocking.length > 0) lines.push(`> **${blocking.length} violation failure(s)** must be resolved before submission.`);
  else if (review > 0) lines.push(`> No violation failures; ${review} finding(s) need review.`);
  else lines.push("> All applicable checks passed.");
  lines.push("");

  if (blocking.length > 0) {
    lines.push("## Violations", "");
    for (const f of blocking) lines.push(`- **${f.rule_id}** ${cell(f.rule_name)}, ${entityLabel(f)}: ${cell(f.message)}`);
    lines.push("");
  }

  lines.push("## Findings", "");
  if (report.findings.length === 0) lines.push("No rules were evaluated.", "");
  for (const group of groupByCategory(report.findings)) {
    lines.push(`### ${categoryTitle(group.category)}`, "");
    lines.push("| Status | Rule | Entity | Message | Citation |", "|:--|:--|:--|:--|:--|");
    for (const f of group.findings) {
      lines.push(
        `| ${STATUS_LABEL[f.status]} | ${f.rule_id} ${cell(f.rule_name)} | ${cell(entityLabel(f))} | ${cell(f.message)} | ${citation(f)} |`
      );
    }
    lines.push("");
  }

  if (report.warnings.length > 0) {
    lines.push("## Warnings", "");
    for (const w of report.warnings) {
      const at = w.line === undefined ? w.source : `${w.source}:${w.line}`;
      lines.push(`- \`${at}\` ${w.message}${w.entity ? ` (${w.entity})` : ""}`);
    }
    lines.push("");
  }

  if (report.rule_errors.length > 0) {
    lines.push("## Rule errors", "");
    for (const e of report.rule_errors) lines.push(`- \`${e.rule_id}\` (${e.source}): ${e.reason}`);
    lines.push("");
  }

  return lines.join("\n");
}
