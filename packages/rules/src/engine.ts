// packages/rules/src/engine.ts
import {
  errorMessage,
  formatValue,
  refOf,
  RuleEvaluationError,
  type Binding,
  type Entity,
  type Finding,
  type FindingStatus,
  type HydraulicModel,
  type RuleSpec,
} from "../../model/src/index.js";

import { evaluate, type EvalResult, type Scope } from "./evaluate.js";
import type { Expr } from "./parser.js";
import { aggregateScope, entityScope, RecordingScope } from "./scope.js";

export type CompiledRule = {
  spec: RuleSpec;
  condition: Expr;
  where: Expr | null;
};

export type Selection =
  | { entity: Entity; matched: true }
  | { entity: Entity; matched: false; error: string };

/**
 * Entities of the selector's types in canonical model order, filtered by
 * `where`. A filter that cannot be decided for an entity is kept as an error.
 */
export function selectEntities(rule: CompiledRule, model: HydraulicModel): Selection[] {
  const types = new Set(rule.spec.selector.entity);
  const out: Selection[] = [];
  for (const entity of model.entities) {
    if (!types.has(entity.type)) continue;
    if (!rule.where) {
      out.push({ entity, matched: true });
      continue;
    }
    const r = evaluate(rule.where, entityScope(entity));
    if (r.ok && r.value.kind === "boolean") {
      if (r.value.value) out.push({ entity, matched: true });
      continue;
    }
    out.push({ entity, matched: false, error: `selector filter: ${outcomeProblem(r)}` });
  }
  return out;
}

/** Why a result is not a usable boolean. */
function outcomeProblem(r: EvalResult): string {
  if (!r.ok) return r.message;
  if (r.value.kind === "missing") return r.value.reason ?? "value is missing";
  return `expected true or false, got ${r.value.kind} ${formatValue(r.value)}`;
}

function fillTemplate(template: string, scope: Scope): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_.]*)\}/g, (hole, name: string) => {
    const v = scope.lookup(name);
    if (v === undefined) return hole;
    return v.kind === "string" ? v.value : formatValue(v);
  });
}

function describeBindings(bindings: readonly Binding[]): string {
  if (bindings.length === 0) return "";
  const parts = bindings.map((b) => `${b.name} = ${b.value === null ? "missing" : JSON.stringify(b.value)}`);
  return ` (${parts.join(", ")})`;
}

function finding(rule: RuleSpec, status: FindingStatus, message: string, entity: Entity | null, bindings: Binding[] = []): Finding {
  return {
    rule_id: rule.id,
    rule_name: rule.name,
    citation: rule.citation,
    citation_url: rule.citation_url,
    category: rule.category,
    severity: rule.severity,
    status,
    message,
    entity_ref: entity ? refOf(entity) : null,
    bindings,
  };
}

function conclude(rule: CompiledRule, scope: Scope, subject: Entity | null): Finding {
  const { spec } = rule;
  const recording = new RecordingScope(scope);
  let r: EvalResult;
  try {
    r = evaluate(rule.condition, recording);
  } catch (e) {
    const err = new RuleEvaluationError(spec.id, errorMessage(e));
    return finding(spec, "error", err.message, subject, recording.bindings());
  }
  const bindings = recording.bindings();

  if (r.ok && r.value.kind === "boolean") {
    const status: FindingStatus = r.value.value ? "pass" : "fail";
    const message = spec.message
      ? fillTemplate(spec.message, scope)
      : `${spec.condition} ${status === "pass" ? "holds" : "does not hold"}${describeBindings(bindings)}`;
    return finding(spec, status, message, subject, bindings);
  }
  return finding(spec, "error", outcomeProblem(r), subject, bindings);
}

/** One rule against the model; pure. */
export function evaluateRule(rule: CompiledRule, model: HydraulicModel): Finding[] {
  const { spec } = rule;
  const selection = selectEntities(rule, model);
  const findings: Finding[] = [];
  const matched: Entity[] = [];

  for (const s of selection) {
    if (!s.matched) {
      findings.push(finding(spec, "error", s.error, s.entity));
      continue;
    }
    matched.push(s.entity);
    if (!spec.selector.aggregate) findings.push(conclude(rule, entityScope(s.entity), s.entity));
  }

  if (spec.selector.aggregate && matched.length > 0) findings.push(conclude(rule, aggregateScope(matched), null));

  if (findings.length === 0) {
    const filter = spec.selector.where ? ` where ${spec.selector.where}` : "";
    findings.push(finding(spec, "not_applicable", `no ${spec.selector.entity.join(" or ")} entity matches${filter}`, null));
  }
  return findings;
}

/** Findings of every rule, in rule order; within a rule, in canonical entity order. */
export function evaluateRules(rules: readonly CompiledRule[], model: HydraulicModel): Finding[] {
  return rules.flatMap((rule) => evaluateRule(rule, model));
}
