// packages/cli/src/summary.ts
import {
  entitiesOfType,
  ENTITY_TYPES,
  formatValue,
  type Entity,
  type HydraulicModel,
  type Value,
} from "../../model/src/index.js";
import type { LoadedProject } from "../../pipeline/src/index.js";

function text(e: Entity, name: string): string | null {
  const v: Value | undefined = e.attributes[name];
  if (!v || v.kind === "missing") return null;
  return v.kind === "string" ? v.value : formatValue(v);
}

function flag(e: Entity, name: string): boolean {
  const v = e.attributes[name];
  return v?.kind === "boolean" && v.value;
}

function range(model: HydraulicModel, name: string): string | null {
  const xs: number[] = [];
  for (const e of entitiesOfType(model, "cross_section")) {
    const v = e.attributes[name];
    if (v?.kind === "number") xs.push(v.value);
  }
  if (xs.length === 0) return null;
  const lo = xs.reduce((m, x) => (x < m ? x : m));
  const hi = xs.reduce((m, x) => (x > m ? x : m));
  return `${lo} to ${hi}`;
}

function planLine(plan: Entity): string {
  const traits = [flag(plan, "is_steady") ? "steady" : text(plan, "plan_type_name")];
  if (flag(plan, "is_floodway")) traits.push(`floodway, target surcharge ${text(plan, "target_surcharge") ?? "?"}`);
  if (flag(plan, "has_results")) traits.push("results read");
  const title = text(plan, "title");
  const detail = traits.filter((t): t is string => t !== null).join(", ");
  return `  Plan ${plan.id}: ${title ?? "(untitled)"}${detail ? ` (${detail})` : ""}`;
}

/** Overview of a loaded project without evaluating rules. */
export function renderModelSummary(loaded: LoadedProject): string {
  const { model } = loaded;
  const lines = ["Model summary"];

  const project = entitiesOfType(model, "project")[0];
  lines.push(`  Project:  ${project ? project.id : "(none)"}`);
  lines.push(`  Files:    ${loaded.inputs.map((i) => i.name).join(", ")}`);

  const counts = ENTITY_TYPES.map((t) => [t, entitiesOfType(model, t).length] as const).filter(([, n]) => n > 0);
  lines.push(`  Entities: ${counts.map(([t, n]) => `${n} ${t}`).join(", ")}`);

  for (const plan of entitiesOfType(model, "plan")) lines.push(planLine(plan));

  const profiles = entitiesOfType(model, "profile").map((p) => p.id);
  if (profiles.length > 0) lines.push(`  Profiles: ${profiles.join(", ")}`);

  const stations = range(model, "station_value");
  if (stations) lines.push(`  Stations: ${stations}`);
  const channelN = range(model, "manning_n_channel");
  if (channelN) lines.push(`  Channel n: ${channelN}`);

  const warnings = loaded.warnings.length + model.warnings.length;
  lines.push(`  Warnings: ${warnings}`);
  return lines.join("\n");
}
