// packages/model/src/entity.ts
import type { Value } from "./value.js";

export type EntityType =
  | "project"
  | "plan"
  | "reach"
  | "cross_section"
  | "structure"
  | "profile"
  | "flow_change"
  | "boundary";

export const ENTITY_TYPES: readonly EntityType[] = [
  "project",
  "plan",
  "reach",
  "cross_section",
  "structure",
  "profile",
  "flow_change",
  "boundary",
];

export function isEntityType(s: string): s is EntityType {
  return ENTITY_TYPES.some((t) => t === s);
}

export type EntityRef = { type: EntityType; id: string };

export type RelationKind = "belongs_to" | "located_at" | "uses";

export type Relation = { kind: RelationKind; target: EntityRef };

export type Entity = {
  type: EntityType;
  id: string;
  attributes: Readonly<Record<string, Value>>;
  /** Text-declared values displaced by a result value under the merge policy. */
  design_values: Readonly<Record<string, Value>>;
  relations: readonly Relation[];
  /** Source file names, sorted. */
  sources: readonly string[];
  warnings: readonly string[];
};

export type ModelWarning = {
  source: string;
  message: string;
  entity?: EntityRef;
  line?: number;
};

export type HydraulicModel = {
  /** Canonical order: entity type order of ENTITY_TYPES, then id (binary compare). */
  entities: readonly Entity[];
  sources: readonly string[];
  warnings: readonly ModelWarning[];
};

export function entityKey(ref: EntityRef): string {
  return `${ref.type}:${ref.id}`;
}

export function refOf(e: Pick<Entity, "type" | "id">): EntityRef {
  return { type: e.type, id: e.id };
}

export function findEntity(model: HydraulicModel, ref: EntityRef): Entity | undefined {
  return model.entities.find((e) => e.type === ref.type && e.id === ref.id);
}

export function entitiesOfType(model: HydraulicModel, type: EntityType): Entity[] {
  return model.entities.filter((e) => e.type === type);
}
