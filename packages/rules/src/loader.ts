// packages/rules/src/loader.ts
import { basename } from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import {
  errorMessage,
  isEntityType,
  readFileBounded,
  RuleLoadError,
  sha256Hex,
  stableStringify,
  type EntityType,
  type RuleSetIdentity,
  type RuleSpec,
} from "../../model/src/index.js";

import type { CompiledRule } from "./engine.js";
import { parseExpression, type Expr } from "./parser.js";

/* ---- Schemas ---- */

const EntityTypeSchema = z.custom<EntityType>((v) => typeof v === "string" && isEntityType(v), "unknown entity type");

const EntityListSchema = z.union([EntityTypeSchema.transform((t) => [t]), z.array(EntityTypeSchema).min(1)]);

const SelectorSchema = z.union([
  EntityListSchema.transform((entity) => ({ entity, where: undefined, aggregate: undefined })),
  z
    .object({
      entity: EntityListSchema,
      where: z.string().trim().min(1).optional(),
      aggregate: z.boolean().optional(),
    })
    .strict(),
]);

export const RuleSchema = z
  .object({
    id: z.string().trim().min(1),
    name: z.string().trim().min(1).optional(),
    citation: z.string().trim().min(1),
    citation_url: z.url().optional(),
    severity: z.enum(["info", "warning", "violation"]),
    category: z.string().trim().min(1).optional(),
    selector: SelectorSchema,
    condition: z.string().trim().min(1),
    message: z.string().trim().min(1).optional(),
  })
  .strict();

export const RuleDocumentSchema = z.object({
  ruleset: z.object({
    id: z.string().trim().min(1),
    version: z.union([z.string(), z.number()]).transform(String),
    name: z.string().optional(),
  }),
  supersedes: z.array(z.string()).default([]),
  rules: z.array(z.unknown()),
});

export type RuleDocument = z.infer<typeof RuleDocumentSchema>;

/* ---- Types ---- */

/** A document's text, or why it could not be read. */
export type RuleSource = { source: string; text: string } | { source: string; unreadable: string };

export type LoadedRuleSet = {
  rules: CompiledRule[];
  /** One per rejected rule or unreadable document; the rest still load. */
  errors: RuleLoadError[];
  warnings: string[];
  identity: RuleSetIdentity;
};

type Compiled = { ok: true; rule: CompiledRule } | { ok: false; error: RuleLoadError };

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.map(String).join(".") : "rule"}: ${i.message}`).join("; ");
}

/** "FEMA-MANN-001" → "MANN"; ids without a middle segment have no category. */
export function categoryOf(id: string): string | null {
  const parts = id.split("-");
  return parts.length >= 3 ? (parts[1] ?? null) : null;
}

/* ---- Compilation ---- */

export function compileRule(raw: unknown, source: string, position: number): Compiled {
  const record: Record<string, unknown> = isRecord(raw) ? raw : {};
  const rawId = record["id"];
  const ruleId = typeof rawId === "string" && rawId.trim() !== "" ? rawId.trim() : `${source}#${position}`;
  const reject = (reason: string): Compiled => ({ ok: false, error: new RuleLoadError({ ruleId, source, reason }) });

  if (!isRecord(raw)) return reject("rule is not a mapping");
  const citation = record["citation"];
  if (typeof citation !== "string" || citation.trim() === "") return reject("missing citation");

  const parsed = RuleSchema.safeParse(raw);
  if (!parsed.success) return reject(formatIssues(parsed.error));
  const r = parsed.data;

  const condition = parseExpression(r.condition);
  if (!condition.ok) return reject(`condition: ${condition.message}`);

  let where: Expr | null = null;
  if (r.selector.where !== undefined) {
    const w = parseExpression(r.selector.where);
    if (!w.ok) return reject(`selector.where: ${w.message}`);
    where = w.expr;
  }

  const spec: RuleSpec = {
    id: r.id,
    name: r.name ?? r.id,
    citation: r.citation,
    citation_url: r.citation_url ?? null,
    severity: r.severity,
    category: r.category ?? categoryOf(r.id),
    selector: { entity: r.selector.entity, where: r.selector.where ?? null, aggregate: r.selector.aggregate ?? false },
    condition: r.condition,
    message: r.message ?? null,
    source,
  };
  return { ok: true, rule: { spec, condition: condition.expr, where } };
}

/**
 * Compile rule documents in order. A later document's `supersedes` drops
 * earlier rules by id before its own rules load; a repeated id is rejected.
 */
export function compileRuleDocuments(sources: readonly RuleSource[]): LoadedRuleSet {
  const rules: CompiledRule[] = [];
  const errors: RuleLoadError[] = [];
  const warnings: string[] = [];
  const documents: RuleSetIdentity["documents"] = [];
  const canonical: unknown[] = [];

  for (const src of sources) {
    const { source } = src;
    if ("unreadable" in src) {
      errors.push(new RuleLoadError({ ruleId: "*", source, reason: `cannot read: ${src.unreadable}` }));
      continue;
    }
    let raw: unknown;
    try {
      raw = parseYaml(src.text);
    } catch (e) {
      errors.push(new RuleLoadError({ ruleId: "*", source, reason: `not valid YAML: ${errorMessage(e)}` }));
      continue;
    }
    const doc = RuleDocumentSchema.safeParse(raw);
    if (!doc.success) {
      errors.push(new RuleLoadError({ ruleId: "*", source, reason: formatIssues(doc.error) }));
      continue;
    }
    documents.push({ id: doc.data.ruleset.id, version: doc.data.ruleset.version, source });
    canonical.push(raw);

    for (const id of doc.data.supersedes) {
      const at = rules.findIndex((r) => r.spec.id === id);
      if (at === -1) warnings.push(`${source}: supersedes ${id}, which is not loaded`);
      else rules.splice(at, 1);
    }

    doc.data.rules.forEach((entry, i) => {
      const compiled = compileRule(entry, source, i + 1);
      if (!compiled.ok) {
        errors.push(compiled.error);
        return;
      }
      const earlier = rules.find((r) => r.spec.id === compiled.rule.spec.id);
      if (earlier) {
        errors.push(
          new RuleLoadError({
            ruleId: compiled.rule.spec.id,
            source,
            reason: `duplicate rule id (first defined in ${earlier.spec.source})`,
          })
        );
        return;
      }
      rules.push(compiled.rule);
    });
  }

  return {
    rules,
    errors,
    warnings,
    identity: { documents, rule_count: rules.length, sha256: sha256Hex(stableStringify(canonical)) },
  };
}

export type LoadOptions = { readTimeoutMs?: number };

/**
 * Read and compile rule documents from disk, in the order given. A document
 * that cannot be read is reported like one that does not parse.
 */
export async function loadRuleDocuments(paths: readonly string[], options: LoadOptions = {}): Promise<LoadedRuleSet> {
  const timeout = options.readTimeoutMs ?? 30_000;
  const settled = await Promise.allSettled(paths.map((p) => readFileBounded(p, timeout)));
  const sources = settled.map((r, i): RuleSource => {
    const source = basename(paths[i] ?? "");
    return r.status === "fulfilled" ? { source, text: r.value.toString("utf8") } : { source, unreadable: errorMessage(r.reason) };
  });
  return compileRuleDocuments(sources);
}
