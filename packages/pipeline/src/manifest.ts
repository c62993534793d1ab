// packages/pipeline/src/manifest.ts
import { stat } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { isStringList, type TextSource } from "../../model/src/index.js";
import { detectFileKind } from "../../parse/src/index.js";

export type ResultInput = { path: string; plan: string };

export type Manifest = {
  project: string;
  /** Text model files the project references and that exist, in reference order. */
  texts: string[];
  /** `<stem>.<plan>.hdf` beside the project, for each referenced plan that has one. */
  results: ResultInput[];
  /** Referenced files that do not exist. */
  missing: string[];
};

const LIST_FIELDS = ["geom_files", "plan_files", "steady_files", "unsteady_files", "quasi_files"] as const;

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (e) {
    if (e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR")) return false;
    throw e;
  }
}

/** Extension keys a parsed project file refers to, e.g. ["g01", "p01", "f01"]. */
export function referencedKeys(project: TextSource): { all: string[]; plans: string[] } {
  const root = project.records[0];
  const all: string[] = [];
  const plans: string[] = [];
  for (const field of LIST_FIELDS) {
    const v = root?.fields[field];
    const keys = v !== undefined && isStringList(v) ? v : typeof v === "string" ? [v] : [];
    for (const raw of keys) {
      const key = raw.trim().toLowerCase();
      if (key === "" || all.includes(key)) continue;
      all.push(key);
      if (field === "plan_files") plans.push(key);
    }
  }
  return { all, plans };
}

/** Files of a project, resolved beside the project file. */
export async function discoverInputs(projectPath: string, project: TextSource): Promise<Manifest> {
  const dir = dirname(projectPath);
  const stem = detectFileKind(basename(projectPath))?.stem ?? basename(projectPath);
  const { all, plans } = referencedKeys(project);

  const manifest: Manifest = { project: projectPath, texts: [], results: [], missing: [] };
  for (const key of all) {
    const path = join(dir, `${stem}.${key}`);
    if (await isFile(path)) manifest.texts.push(path);
    else manifest.missing.push(path);
  }
  for (const plan of plans) {
    const path = join(dir, `${stem}.${plan}.hdf`);
    if (await isFile(path)) manifest.results.push({ path, plan });
  }
  return manifest;
}
