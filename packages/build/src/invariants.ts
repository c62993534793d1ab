// packages/build/src/invariants.ts
import { ENTITY_TYPES, entityKey, type HydraulicModel } from "../../model/src/index.js";

export type ModelViolationCode = "DUPLICATE_KEY" | "MISSING_RELATION_TARGET" | "NOT_CANONICAL";

export type ModelViolation = {
  code: ModelViolationCode;
  message: string;
  /** Entity key, e.g. "cross_section:Mill Creek/Upper/5280". */
  entity: string;
};

export function checkModelInvariants(model: HydraulicModel): ModelViolation[] {
  const v: ModelViolation[] = [];
  const keys = new Set<string>();

  // ---- Unique (type, id)
  for (const e of model.entities) {
    const key = entityKey(e);
    if (keys.has(key)) v.push({ code: "DUPLICATE_KEY", message: `Entity key '${key}' appears more than once`, entity: key });
    keys.add(key);
  }

  // ---- Relations must resolve
  for (const e of model.entities) {
    for (const r of e.relations) {
      const target = entityKey(r.target);
      if (!keys.has(target)) {
        v.push({
          code: "MISSING_RELATION_TARGET",
          message: `Relation ${r.kind} references missing entity '${target}'`,
          entity: entityKey(e),
        });
      }
    }
  }

  // ---- Canonical order: type order, then id by code unit
  for (let i = 1; i < model.entities.length; i++) {
    const a = model.entities[i - 1];
    const b = model.entities[i];
    if (a && b && compareEntities(a, b) > 0) {
      v.push({ code: "NOT_CANONICAL", message: `Entity '${entityKey(b)}' sorts before '${entityKey(a)}'`, entity: entityKey(b) });
    }
  }

  return v;
}

export function compareEntities(a: { type: string; id: string }, b: { type: string; id: string }): number {
  const ta = ENTITY_TYPES.findIndex((t) => t === a.type);
  const tb = ENTITY_TYPES.findIndex((t) => t === b.type);
  if (ta !== tb) return ta - tb;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
