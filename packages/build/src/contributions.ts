// packages/build/src/contributions.ts
// What each parsed record says about which entity.
import {
  bool,
  isNumberList,
  isStringList,
  missing,
  num,
  str,
  type EntityRef,
  type FieldValue,
  type RawRecord,
  type Relation,
  type SequenceItem,
  type TextSource,
  type Value,
  seq,
} from "../../model/src/index.js";
import { normalizeStation } from "../../results/src/interpret.js";

import {
  BOUNDARY_TYPES,
  codeName,
  deckChords,
  ENCROACHMENT_METHODS,
  floodway,
  FRICTION_SLOPE_METHODS,
  manningZones,
  pierWidthAt,
  PLAN_TYPES,
  stationElevationExtents,
} from "./derive.js";

export type Contribution = {
  ref: EntityRef;
  attributes: Record<string, Value>;
  relations: Relation[];
  /** The record this entity came from one-to-one; its warnings belong to the entity. */
  record?: RawRecord;
};

type Fields = RawRecord["fields"];

/* ---- Field access ---- */

export function fieldValue(v: FieldValue): Value {
  if (v === null) return missing("value could not be parsed");
  if (typeof v === "number") return num(v);
  if (typeof v === "string") return str(v);
  const items: SequenceItem[] = [];
  for (const x of v) {
    if (x === null) return missing("table contains values that could not be parsed");
    items.push(x);
  }
  return seq(items);
}

const numberOf = (f: Fields, name: string): number | undefined => {
  const v = f[name];
  return typeof v === "number" ? v : undefined;
};

const stringOf = (f: Fields, name: string): string => {
  const v = f[name];
  return typeof v === "string" ? v.trim() : "";
};

const cellsOf = (f: Fields, name: string): readonly (number | null)[] | undefined => {
  const v = f[name];
  return v !== undefined && isNumberList(v) ? v : undefined;
};

const stringsOf = (f: Fields, name: string): readonly string[] => {
  const v = f[name];
  return v !== undefined && isStringList(v) ? v.map((s) => s.trim()) : [];
};

/** Every record field as a Value, minus the named ones. */
function copyFields(f: Fields, exclude: readonly string[] = []): Record<string, Value> {
  const out: Record<string, Value> = {};
  for (const [k, v] of Object.entries(f)) {
    if (!exclude.includes(k)) out[k] = fieldValue(v);
  }
  return out;
}

const FLAG_FIELDS = [
  "paused",
  "critical_always",
  "split_flow",
  "check_data",
  "run_htab",
  "run_post_process",
  "run_sediment",
  "run_unet",
  "run_ras_mapper",
  "use_restart",
  "use_dss",
] as const;

function applyFlags(f: Fields, attrs: Record<string, Value>): void {
  for (const name of FLAG_FIELDS) {
    const v = numberOf(f, name);
    if (v !== undefined) attrs[name] = bool(v !== 0);
  }
}

export const reachId = (river: string, reach: string) => `${river}/${reach}`;
export const stationId = (river: string, reach: string, station: string) => `${river}/${reach}/${normalizeStation(station)}`;

export function fileStem(source: string): string {
  return source.replace(/^.*[\\/]/, "").replace(/\.[^.]+$/, "");
}

/* ---- Per file kind ---- */

function projectContributions(src: TextSource): Contribution[] {
  const root = src.records[0];
  if (!root) return [];
  const ref: EntityRef = { type: "project", id: stringOf(root.fields, "title") || fileStem(src.source) };
  const attributes = copyFields(root.fields);
  const description = src.records.find((r) => r.section === "Description")?.fields["text"];
  if (typeof description === "string") attributes["description"] = str(description);
  return [{ ref, attributes, relations: [], record: root }];
}

function nodeLocation(f: Fields): { river: string; reach: string; station: string } {
  return { river: stringOf(f, "river"), reach: stringOf(f, "reach"), station: normalizeStation(stringOf(f, "station")) };
}

function crossSection(r: RawRecord): Contribution {
  const loc = nodeLocation(r.fields);
  const attributes = copyFields(r.fields, ["node_type"]);
  attributes["station"] = str(loc.station);
  const stationValue = Number(loc.station);
  if (loc.station !== "" && Number.isFinite(stationValue)) attributes["station_value"] = num(stationValue);

  const zones = manningZones(cellsOf(r.fields, "mann"), numberOf(r.fields, "bank_left"));
  attributes["manning_n_left"] = zones.left;
  attributes["manning_n_channel"] = zones.channel;
  attributes["manning_n_right"] = zones.right;

  const extents = stationElevationExtents(cellsOf(r.fields, "sta_elev"));
  if (extents) for (const [k, v] of Object.entries(extents)) attributes[k] = num(v);

  return {
    ref: { type: "cross_section", id: stationId(loc.river, loc.reach, loc.station) },
    attributes,
    relations: [{ kind: "belongs_to", target: { type: "reach", id: reachId(loc.river, loc.reach) } }],
    record: r,
  };
}

function pierTables(f: Fields): (readonly (number | null)[])[] {
  const out: (readonly (number | null)[])[] = [];
  for (let i = 1; ; i++) {
    const t = cellsOf(f, `pier_elev_${i}`);
    if (!t) return out;
    out.push(t);
  }
}

function bridge(r: RawRecord): Contribution {
  const loc = nodeLocation(r.fields);
  const attributes = copyFields(r.fields, ["node_type"]);
  attributes["structure_type"] = str("bridge");
  attributes["station"] = str(loc.station);

  const chords = deckChords(cellsOf(r.fields, "deck"));
  if (chords) {
    attributes["min_low_chord"] = num(chords.min_low_chord);
    attributes["max_high_chord"] = num(chords.max_high_chord);
  } else {
    attributes["min_low_chord"] = missing("no usable deck/roadway table");
  }

  const left = numberOf(r.fields, "us_boundary_left");
  const right = numberOf(r.fields, "us_boundary_right");
  if (left !== undefined && right !== undefined) attributes["opening_width"] = num(Math.abs(right - left));

  const piers = pierTables(r.fields);
  attributes["pier_tables"] = num(piers.length);
  attributes["total_pier_width"] = chords
    ? num(piers.reduce((sum, t) => sum + pierWidthAt(t, chords.min_low_chord), 0))
    : missing("no low chord to evaluate pier widths at");

  return {
    ref: { type: "structure", id: stationId(loc.river, loc.reach, loc.station) },
    attributes,
    relations: [{ kind: "belongs_to", target: { type: "reach", id: reachId(loc.river, loc.reach) } }],
    record: r,
  };
}

function otherNode(r: RawRecord): Contribution {
  const loc = nodeLocation(r.fields);
  const attributes = copyFields(r.fields);
  attributes["structure_type"] = str("other");
  attributes["station"] = str(loc.station);
  return {
    ref: { type: "structure", id: stationId(loc.river, loc.reach, loc.station) },
    attributes,
    relations: [{ kind: "belongs_to", target: { type: "reach", id: reachId(loc.river, loc.reach) } }],
    record: r,
  };
}

function geometryContributions(src: TextSource): Contribution[] {
  const out: Contribution[] = [];
  for (const r of src.records) {
    if (r.section === "Reach") {
      const river = stringOf(r.fields, "river");
      const reach = stringOf(r.fields, "reach");
      out.push({
        ref: { type: "reach", id: reachId(river, reach) },
        attributes: { ...copyFields(r.fields, ["reach_xy"]), river: str(river), reach: str(reach) },
        relations: [],
        record: r,
      });
    } else if (r.section === "CrossSection") out.push(crossSection(r));
    else if (r.section === "Bridge") out.push(bridge(r));
    else if (r.section === "Node") out.push(otherNode(r));
  }
  return out;
}

function planContributions(src: TextSource): Contribution[] {
  const root = src.records[0];
  if (!root) return [];
  const f = root.fields;
  const attributes = copyFields(f);
  applyFlags(f, attributes);

  const planType = numberOf(f, "plan_type");
  if (planType !== undefined) {
    attributes["plan_type_name"] = str(codeName(PLAN_TYPES, planType));
    attributes["is_steady"] = bool(planType === 1);
  }
  const friction = numberOf(f, "friction_slope_method");
  if (friction !== undefined) attributes["friction_slope_method_name"] = str(codeName(FRICTION_SLOPE_METHODS, friction));

  const method = numberOf(f, "encroach_method");
  const fw = floodway(cellsOf(f, "encroach_param"), method, f["encroach_val_1"] === null ? null : numberOf(f, "encroach_val_1"));
  attributes["encroachment_enabled"] = bool(fw.encroachment_enabled);
  attributes["is_floodway"] = bool(fw.is_floodway);
  attributes["target_surcharge"] = fw.target_surcharge;
  if (fw.encroachment_enabled && method !== undefined) {
    attributes["encroachment_method_name"] = str(codeName(ENCROACHMENT_METHODS, method));
  }

  return [{ ref: { type: "plan", id: src.key }, attributes, relations: [], record: root }];
}

function steadyFlowContributions(src: TextSource): Contribution[] {
  const root = src.records[0];
  const names = root ? stringsOf(root.fields, "profile_names") : [];
  const out: Contribution[] = names.map((name) => ({
    ref: { type: "profile", id: name },
    attributes: { name: str(name) },
    relations: [],
  }));

  for (const r of src.records) {
    if (r.section === "FlowChange") {
      const loc = nodeLocation(r.fields);
      const attributes = copyFields(r.fields);
      attributes["station"] = str(loc.station);
      const flows = (cellsOf(r.fields, "flows") ?? []).filter((x): x is number => x !== null);
      if (flows.length > 0) {
        attributes["max_flow"] = num(Math.max(...flows));
        attributes["min_flow"] = num(Math.min(...flows));
      }
      attributes["flow_profiles"] = seq(names);
      out.push({
        ref: { type: "flow_change", id: stationId(loc.river, loc.reach, loc.station) },
        attributes,
        relations: [{ kind: "located_at", target: { type: "cross_section", id: stationId(loc.river, loc.reach, loc.station) } }],
        record: r,
      });
    } else if (r.section === "SteadyBoundary") {
      const river = stringOf(r.fields, "river");
      const reach = stringOf(r.fields, "reach");
      const profileNumber = numberOf(r.fields, "profile_number");
      const attributes = copyFields(r.fields);
      attributes["boundary_kind"] = str("steady");
      for (const end of ["upstream", "downstream"] as const) {
        const code = numberOf(r.fields, `${end}_type`);
        if (code !== undefined) attributes[`${end}_type_name`] = str(codeName(BOUNDARY_TYPES, code));
      }
      const relations: Relation[] = [];
      const profile = profileNumber === undefined ? undefined : names[profileNumber - 1];
      if (profile !== undefined) {
        attributes["profile"] = str(profile);
        relations.push({ kind: "uses", target: { type: "profile", id: profile } });
      }
      out.push({
        ref: { type: "boundary", id: `${reachId(river, reach)}/profile ${profileNumber ?? "?"}` },
        attributes,
        relations,
        record: r,
      });
    }
  }
  return out;
}

const HYDROGRAPHS = [
  "flow_hydrograph",
  "stage_hydrograph",
  "lateral_inflow_hydrograph",
  "uniform_lateral_inflow_hydrograph",
  "rating_curve",
  "gate_openings",
  "friction_slope",
] as const;

function unsteadyBoundaryId(f: Fields): string {
  const river = stringOf(f, "river");
  if (river !== "") {
    return [river, stringOf(f, "reach"), normalizeStation(stringOf(f, "station")), stringOf(f, "structure_station")]
      .filter((s) => s !== "")
      .join("/");
  }
  const storage = stringOf(f, "storage_area");
  if (storage !== "") return storage;
  return [stringOf(f, "area_2d"), stringOf(f, "bc_line")].filter((s) => s !== "").join("/");
}

function unsteadyFlowContributions(src: TextSource): Contribution[] {
  const out: Contribution[] = [];
  for (const r of src.records) {
    if (r.section !== "UnsteadyBoundary") continue;
    const attributes = copyFields(r.fields);
    applyFlags(r.fields, attributes);
    attributes["boundary_kind"] = str("unsteady");
    const condition = HYDROGRAPHS.find((h) => r.fields[h] !== undefined);
    attributes["condition_type"] = condition ? str(condition) : missing("no boundary condition data");
    const station = stringOf(r.fields, "station");
    if (station !== "") attributes["station"] = str(normalizeStation(station));
    out.push({ ref: { type: "boundary", id: unsteadyBoundaryId(r.fields) }, attributes, relations: [], record: r });
  }
  return out;
}

/** Entity contributions of one text source, in record order. */
export function contributionsOf(src: TextSource): Contribution[] {
  switch (src.kind) {
    case "project":
      return projectContributions(src);
    case "geometry":
      return geometryContributions(src);
    case "plan":
      return planContributions(src);
    case "steady_flow":
      return steadyFlowContributions(src);
    case "unsteady_flow":
      return unsteadyFlowContributions(src);
    case "quasi_flow":
      return [];
  }
}
