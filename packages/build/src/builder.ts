// packages/build/src/builder.ts
import {
  bool,
  compareBinary,
  deepFreeze,
  entityKey,
  formatValue,
  HydrocheckError,
  missing,
  ModelConsistencyError,
  num,
  seq,
  str,
  valuesEqual,
  type Entity,
  type EntityRef,
  type HydraulicModel,
  type ModelWarning,
  type Relation,
  type ResultSource,
  type TextFileKind,
  type TextSource,
  type Value,
} from "../../model/src/index.js";
import { interpretResults, type CrossSectionResult, type ResultFacts } from "../../results/src/interpret.js";
import type { ResultLayoutRegistry } from "../../results/src/layouts.js";

import { contributionsOf, reachId, stationId, type Contribution } from "./contributions.js";
import { checkModelInvariants, compareEntities } from "./invariants.js";
import { resultsOverrideDesign, type MergePolicy } from "./policy.js";

export type BuildInputs = {
  texts: readonly TextSource[];
  results: readonly ResultSource[];
};

export type BuildOptions = {
  mergePolicy?: MergePolicy;
  resultLayouts?: ResultLayoutRegistry;
};

const KIND_ORDER: readonly TextFileKind[] = ["project", "geometry", "plan", "steady_flow", "unsteady_flow", "quasi_flow"];

/** Canonical source order: file kind, then file name. Arrival order never matters. */
export function canonicalTexts(texts: readonly TextSource[]): TextSource[] {
  return [...texts].sort(
    (a, b) => KIND_ORDER.indexOf(a.kind) - KIND_ORDER.indexOf(b.kind) || compareBinary(a.source, b.source)
  );
}

/* ---- Active plan ---- */

export type ActivePlan = {
  /** Plan key, e.g. "p01"; null when no plan can be singled out. */
  plan: string | null;
  /** Text files the active plan references, itself included. */
  sources: ReadonlySet<string>;
};

const rootString = (src: TextSource, field: string): string => {
  const v = src.records[0]?.fields[field];
  return typeof v === "string" ? v.trim().toLowerCase() : "";
};

/** The project's Current Plan when it was read, else the only plan, else none. */
export function activePlan(texts: readonly TextSource[]): ActivePlan {
  const plans = texts.filter((t) => t.kind === "plan");
  const project = texts.find((t) => t.kind === "project");
  const current = project ? rootString(project, "current_plan") : "";
  const plan = plans.find((p) => p.key === current) ?? (plans.length === 1 ? plans[0] : undefined);
  if (!plan) return { plan: null, sources: new Set() };

  const keys = new Set([plan.key, rootString(plan, "geom_file"), rootString(plan, "flow_file")]);
  return { plan: plan.key, sources: new Set(texts.filter((t) => keys.has(t.key)).map((t) => t.source)) };
}

/* ---- Drafts ---- */

type Slot = { value: Value; source: string };

type Draft = {
  ref: EntityRef;
  slots: Map<string, Slot>;
  /** Text values per attribute, in canonical source order, until resolved. */
  candidates: Map<string, Slot[]>;
  /** Values contributed by result containers, for result-to-result comparison. */
  resultSlots: Map<string, Slot>;
  design: Record<string, Value>;
  relations: Relation[];
  sources: Set<string>;
  warnings: string[];
};

class ModelDraft {
  private readonly drafts = new Map<string, Draft>();
  readonly warnings: ModelWarning[] = [];

  constructor(
    private readonly policy: MergePolicy,
    private readonly active: ActivePlan
  ) {}

  all(): Draft[] {
    return [...this.drafts.values()];
  }

  private ensure(ref: EntityRef, resultOnly: boolean): Draft {
    const key = entityKey(ref);
    let d = this.drafts.get(key);
    if (!d) {
      d = {
        ref,
        slots: new Map([["result_only", { value: bool(resultOnly), source: "" }]]),
        candidates: new Map(),
        resultSlots: new Map(),
        design: {},
        relations: [],
        sources: new Set(),
        warnings: [],
      };
      this.drafts.set(key, d);
    }
    return d;
  }

  warn(w: ModelWarning, entity?: Draft): void {
    this.warnings.push(w);
    if (entity) entity.warnings.push(w.line === undefined ? `${w.source}: ${w.message}` : `${w.source}:${w.line}: ${w.message}`);
  }

  addRelations(d: Draft, relations: readonly Relation[]): void {
    for (const r of relations) {
      const dup = d.relations.some((x) => x.kind === r.kind && entityKey(x.target) === entityKey(r.target));
      if (!dup) d.relations.push(r);
    }
  }

  /** Records a text value; conflicts are settled by `resolveTexts` once every text is in. */
  addText(c: Contribution, source: string): Draft {
    const d = this.ensure(c.ref, false);
    d.sources.add(source);
    this.addRelations(d, c.relations);

    for (const [name, value] of Object.entries(c.attributes)) {
      const candidates = d.candidates.get(name);
      if (!candidates) {
        d.candidates.set(name, [{ value, source }]);
        continue;
      }
      const same = candidates.find((x) => x.source === source);
      if (same) {
        if (!valuesEqual(same.value, value)) {
          this.warn(
            {
              source,
              entity: c.ref,
              message: `${entityKey(c.ref)} is declared twice; "${name}" ${formatValue(value)} ignored, keeping ${formatValue(same.value)}`,
            },
            d
          );
        }
        continue;
      }
      candidates.push({ value, source });
    }
    return d;
  }

  /**
   * One value per text attribute. Agreeing sources merge; otherwise a source
   * the active plan references wins and the rest become warnings. Unlinked
   * sources that disagree, or linked ones that disagree, are an error.
   */
  resolveTexts(): void {
    for (const d of this.drafts.values()) {
      for (const [name, candidates] of d.candidates) {
        const winner = this.pick(d, name, candidates);
        d.slots.set(name, winner);
        for (const loser of candidates) {
          if (valuesEqual(loser.value, winner.value)) continue;
          this.warn(
            {
              source: loser.source,
              entity: d.ref,
              message:
                `${entityKey(d.ref)} "${name}": ${formatValue(loser.value)} ignored; ` +
                `${winner.source} (${formatValue(winner.value)}) is referenced by plan ${this.active.plan ?? "?"}`,
            },
            d
          );
        }
      }
      d.candidates.clear();
    }
  }

  private pick(d: Draft, name: string, candidates: readonly Slot[]): Slot {
    const [first, ...rest] = candidates;
    if (rest.every((x) => valuesEqual(x.value, first.value))) return first;

    const linked = candidates.filter((x) => this.active.sources.has(x.source));
    const [chosen, ...others] = linked;
    if (chosen && others.every((x) => valuesEqual(x.value, chosen.value))) return chosen;

    const pool = linked.length > 0 ? linked : candidates;
    throw new ModelConsistencyError({
      entity: entityKey(d.ref),
      attribute: name,
      sources: pool.map((x) => ({ source: x.source, value: formatValue(x.value) })),
      ...(linked.length > 0 && this.active.plan !== null ? { plan: this.active.plan } : {}),
    });
  }

  addResult(ref: EntityRef, attributes: Record<string, Value>, source: string, relations: readonly Relation[] = []): Draft {
    const d = this.ensure(ref, true);
    const key = entityKey(ref);
    d.sources.add(source);
    this.addRelations(d, relations);

    for (const [name, value] of Object.entries(attributes)) {
      const earlier = d.resultSlots.get(name);
      if (earlier) {
        if (!valuesEqual(earlier.value, value)) {
          this.warn(
            {
              source,
              entity: ref,
              message: `${key} "${name}": ${formatValue(value)} ignored; keeping ${formatValue(earlier.value)} from ${earlier.source}`,
            },
            d
          );
        }
        continue;
      }
      d.resultSlots.set(name, { value, source });

      const slot = d.slots.get(name);
      if (!slot) {
        d.slots.set(name, { value, source });
        continue;
      }
      if (valuesEqual(slot.value, value)) continue;
      const outcome = this.policy.resolve(name, slot.value, value);
      d.slots.set(name, { value: outcome.effective, source: valuesEqual(outcome.effective, value) ? source : slot.source });
      if (outcome.displaced) d.design[name] = outcome.displaced;
    }
    return d;
  }

  /** Computed attributes; set without conflict checks. */
  derive(d: Draft, attributes: Record<string, Value>): void {
    for (const [name, value] of Object.entries(attributes)) d.slots.set(name, { value, source: "" });
  }
}

/* ---- Build ---- */

function attachTexts(draft: ModelDraft, texts: readonly TextSource[]): void {
  for (const src of texts) {
    const owners = new Map<object, Draft>();
    for (const c of contributionsOf(src)) {
      const d = draft.addText(c, src.source);
      if (c.record) owners.set(c.record, d);
    }
    for (const r of src.records) {
      const owner = owners.get(r);
      for (const w of r.warnings) {
        draft.warn({ source: src.source, line: w.line, entity: owner?.ref, message: `${w.code}: ${w.message}` }, owner);
      }
    }
  }
}

function perProfile(facts: ResultFacts, profiles: CrossSectionResult["profiles"]): Record<string, Value> {
  const variables = new Set<string>();
  for (const row of Object.values(profiles)) for (const v of Object.keys(row)) variables.add(v);
  const out: Record<string, Value> = {};
  for (const variable of [...variables].sort(compareBinary)) {
    const values = facts.profiles.map((p) => profiles[p]?.[variable]);
    const present = values.filter((v): v is number => typeof v === "number");
    out[variable] = present.length === values.length ? seq(present) : missing(`${variable} not reported for every profile`);
  }
  return out;
}

function attachResults(draft: ModelDraft, results: readonly ResultSource[], active: ActivePlan, registry?: ResultLayoutRegistry): void {
  // Without an active plan, the lowest plan key with results stands in for it.
  const merged = active.plan ?? [...results.map((r) => r.plan)].sort(compareBinary)[0];
  for (const rs of [...results].sort((a, b) => compareBinary(a.source, b.source))) {
    if (rs.plan !== merged) {
      const why = active.plan !== null ? `the active plan is ${active.plan}` : `no plan is active, so only ${merged} results are used`;
      draft.warn({ source: rs.source, message: `results for plan ${rs.plan} not merged; ${why}` });
      continue;
    }
    const facts = interpretResults(rs, registry);
    for (const w of facts.warnings) draft.warn({ source: rs.source, message: w });

    draft.addResult(
      { type: "plan", id: rs.plan },
      { has_results: bool(true), result_version: str(facts.version), result_layout: str(facts.layout) },
      rs.source
    );
    for (const name of facts.profiles) {
      draft.addResult({ type: "profile", id: name }, { name: str(name), in_results: bool(true) }, rs.source);
    }
    for (const xs of facts.cross_sections) {
      const attributes: Record<string, Value> = {
        river: str(xs.river),
        reach: str(xs.reach),
        station: str(xs.station),
        result_profiles: seq(facts.profiles),
        ...perProfile(facts, xs.profiles),
      };
      for (const [column, v] of Object.entries(xs.as_run)) attributes[column] = num(v);
      draft.addResult({ type: "cross_section", id: stationId(xs.river, xs.reach, xs.station) }, attributes, rs.source, [
        { kind: "belongs_to", target: { type: "reach", id: reachId(xs.river, xs.reach) } },
      ]);
    }
  }
}

const slotNumber = (d: Draft, name: string): number | undefined => {
  const v = d.slots.get(name)?.value;
  return v?.kind === "number" ? v.value : undefined;
};

const slotString = (d: Draft, name: string): string | undefined => {
  const v = d.slots.get(name)?.value;
  return v?.kind === "string" ? v.value.trim().toLowerCase() : undefined;
};

function deriveModelLevel(draft: ModelDraft, texts: readonly TextSource[]): void {
  const drafts = draft.all();
  const ofType = (t: EntityRef["type"]) => drafts.filter((d) => d.ref.type === t);

  for (const xs of ofType("cross_section")) {
    const left = slotNumber(xs, "bank_left");
    const right = slotNumber(xs, "bank_right");
    if (left !== undefined && right !== undefined) draft.derive(xs, { channel_width: num(right - left) });
  }

  for (const reach of ofType("reach")) {
    const key = entityKey(reach.ref);
    const members = (t: EntityRef["type"]) =>
      ofType(t).filter((d) => d.relations.some((r) => r.kind === "belongs_to" && entityKey(r.target) === key)).length;
    draft.derive(reach, { cross_section_count: num(members("cross_section")), structure_count: num(members("structure")) });
  }

  const flows = texts.filter((t) => t.kind === "steady_flow" || t.kind === "unsteady_flow" || t.kind === "quasi_flow");
  const title = (src: TextSource): Value => {
    const v = src.records[0]?.fields["title"];
    return typeof v === "string" ? str(v.trim()) : missing("no title");
  };
  for (const plan of ofType("plan")) {
    const geometry = texts.find((t) => t.kind === "geometry" && t.key === slotString(plan, "geom_file"));
    if (geometry) draft.derive(plan, { geometry_title: title(geometry) });

    const flowKey = slotString(plan, "flow_file");
    if (flowKey === undefined) continue;
    const flow = flows.find((f) => f.key === flowKey);
    if (!flow) {
      const source = [...plan.sources].sort(compareBinary)[0] ?? plan.ref.id;
      draft.warn({ source, entity: plan.ref, message: `plan ${plan.ref.id} references flow file ${flowKey}, which was not read` }, plan);
      continue;
    }
    const names = flow.records[0]?.fields["profile_names"];
    draft.derive(plan, {
      flow_kind: str(flow.kind),
      flow_title: title(flow),
      profile_count: num(Array.isArray(names) ? names.length : 0),
      boundary_count: num(flow.records.filter((r) => r.section === "SteadyBoundary" || r.section === "UnsteadyBoundary").length),
    });
  }

  for (const profile of ofType("profile")) {
    const files = flows
      .filter((f) => {
        const names = f.records[0]?.fields["profile_names"];
        return Array.isArray(names) && names.some((n) => typeof n === "string" && n.trim() === profile.ref.id);
      })
      .map((f) => f.key);
    draft.derive(profile, { flow_files: seq(files) });
  }

  const plans = ofType("plan").map((p) => p.ref.id).sort(compareBinary);
  for (const project of ofType("project")) {
    draft.derive(project, { plan_count: num(plans.length) });
    draft.addRelations(project, plans.map((id) => ({ kind: "uses", target: { type: "plan", id } })));
  }
}

function finish(draft: ModelDraft, sources: readonly string[]): HydraulicModel {
  const drafts = draft.all();
  const keys = new Set(drafts.map((d) => entityKey(d.ref)));

  const entities: Entity[] = drafts.map((d) => {
    const relations = d.relations.filter((r) => {
      if (keys.has(entityKey(r.target))) return true;
      draft.warn(
        { source: [...d.sources].sort(compareBinary)[0] ?? "", entity: d.ref, message: `${entityKey(d.ref)}: ${r.kind} ${entityKey(r.target)} dropped; no such entity` },
        d
      );
      return false;
    });
    const attributes: Record<string, Value> = {};
    for (const [name, slot] of d.slots) attributes[name] = slot.value;
    return {
      type: d.ref.type,
      id: d.ref.id,
      attributes,
      design_values: d.design,
      relations,
      sources: [...d.sources].sort(compareBinary),
      warnings: d.warnings,
    };
  });
  entities.sort(compareEntities);

  const model: HydraulicModel = { entities, sources: [...sources].sort(compareBinary), warnings: draft.warnings };
  const violations = checkModelInvariants(model);
  if (violations.length > 0) {
    throw new HydrocheckError("MODEL_CONSISTENCY_ERROR", violations.map((v) => v.message).join("; "), { violations });
  }
  return deepFreeze(model);
}

/**
 * Merge parsed text records and result datasets into one frozen model.
 * Throws ModelConsistencyError when two sources disagree on a design value
 * and no plan settles which one is in use.
 */
export function buildModel(inputs: BuildInputs, options: BuildOptions = {}): HydraulicModel {
  const texts = canonicalTexts(inputs.texts);
  const active = activePlan(texts);
  const draft = new ModelDraft(options.mergePolicy ?? resultsOverrideDesign, active);

  const project = texts.find((t) => t.kind === "project");
  const current = project ? rootString(project, "current_plan") : "";
  if (project && current !== "" && active.plan !== current) {
    draft.warn({ source: project.source, message: `current plan ${current} was not read` });
  }

  attachTexts(draft, texts);
  draft.resolveTexts();
  attachResults(draft, inputs.results, active, options.resultLayouts);
  deriveModelLevel(draft, texts);
  return finish(draft, [...texts.map((t) => t.source), ...inputs.results.map((r) => r.source)]);
}
