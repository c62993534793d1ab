// packages/results/src/interpret.ts
import { ResultReadError, type DatasetScalar, type RawDataset, type ResultSource } from "../../model/src/index.js";

import { defaultResultLayoutRegistry, type ResultLayoutRegistry } from "./layouts.js";

export type CrossSectionResult = {
  river: string;
  reach: string;
  station: string;
  /** profile name → variable → value */
  profiles: Record<string, Record<string, number>>;
  as_run: Record<string, number>;
};

export type ResultFacts = {
  source: string;
  plan: string;
  layout: string;
  version: string;
  plan_information: Record<string, DatasetScalar>;
  profiles: string[];
  cross_sections: CrossSectionResult[];
  warnings: string[];
};

/** River stations compare numerically when they are numbers ("5280.0" and "5280" agree). */
export function normalizeStation(s: string): string {
  const t = s.trim();
  if (t === "") return t;
  const n = Number(t);
  return Number.isFinite(n) ? String(n) : t;
}

function stringsOf(ds: RawDataset | undefined): string[] | undefined {
  if (!ds) return undefined;
  return ds.values.map((v) => (typeof v === "string" ? v.trim() : String(v)));
}

/** Shape of a complete 2-D dataset, or null. */
function matrixShape(ds: RawDataset): { rows: number; cols: number } | null {
  const [rows, cols] = ds.shape;
  if (ds.shape.length !== 2 || rows === undefined || cols === undefined || ds.values.length !== rows * cols) return null;
  return { rows, cols };
}

/**
 * Lift the datasets of one result container into per-cross-section facts
 * using the paths its layout names. Absent optional datasets are skipped;
 * datasets of the wrong shape are skipped with a warning.
 */
export function interpretResults(
  source: ResultSource,
  registry: ResultLayoutRegistry = defaultResultLayoutRegistry()
): ResultFacts {
  const layout = registry.layouts.find((l) => l.id === source.layout);
  if (!layout) throw new ResultReadError({ file: source.source, reason: `unknown result layout ${source.layout}` });

  const byPath = new Map(source.datasets.map((d) => [d.path, d]));
  const warnings: string[] = [];
  const { paths } = layout;

  const plan_information = { ...(byPath.get(paths.planInformation)?.attributes ?? {}) };
  const profiles = stringsOf(byPath.get(paths.profileNames)) ?? [];

  const rivers = stringsOf(byPath.get(paths.crossSections.river));
  const reaches = stringsOf(byPath.get(paths.crossSections.reach));
  const stations = stringsOf(byPath.get(paths.crossSections.station));

  const facts: ResultFacts = {
    source: source.source,
    plan: source.plan,
    layout: source.layout,
    version: source.version,
    plan_information,
    profiles,
    cross_sections: [],
    warnings,
  };

  if (!rivers || !reaches || !stations) {
    if (rivers || reaches || stations) warnings.push("cross-section identifiers are incomplete; result values not attached");
    return facts;
  }

  const count = Math.min(rivers.length, reaches.length, stations.length);
  if (rivers.length !== count || reaches.length !== count || stations.length !== count) {
    warnings.push(
      `cross-section identifier lengths differ (${rivers.length}/${reaches.length}/${stations.length}); ` +
        `results attached to the first ${count} cross sections only`
    );
  }

  const sections: CrossSectionResult[] = [];
  for (let i = 0; i < count; i++) {
    sections.push({
      river: rivers[i] ?? "",
      reach: reaches[i] ?? "",
      station: normalizeStation(stations[i] ?? ""),
      profiles: {},
      as_run: {},
    });
  }

  for (const [variable, path] of Object.entries(paths.profileVariables)) {
    const ds = byPath.get(path);
    if (!ds) continue;
    // Columns past `count` belong to cross sections without a full identifier.
    const shape = matrixShape(ds);
    if (!shape || shape.rows !== profiles.length || shape.cols < count) {
      warnings.push(`${path}: shape [${ds.shape.join(", ")}] does not fit ${profiles.length} profiles x ${count} cross sections`);
      continue;
    }
    const width = shape.cols;
    profiles.forEach((profile, p) => {
      sections.forEach((xs, x) => {
        const v = ds.values[p * width + x];
        if (typeof v !== "number") return;
        const row = (xs.profiles[profile] ??= {});
        row[variable] = v;
      });
    });
  }

  for (const { path, columns } of paths.asRun) {
    const ds = byPath.get(path);
    if (!ds) continue;
    const shape = matrixShape(ds);
    if (!shape || shape.rows < count || shape.cols !== columns.length) {
      warnings.push(`${path}: shape [${ds.shape.join(", ")}] does not fit ${count} cross sections x ${columns.length} columns`);
      continue;
    }
    sections.forEach((xs, x) => {
      columns.forEach((column, c) => {
        const v = ds.values[x * columns.length + c];
        if (typeof v === "number") xs.as_run[column] = v;
      });
    });
  }

  facts.cross_sections = sections;
  return facts;
}
