// packages/results/src/layouts.ts
import { readFileSync } from "node:fs";
import { z } from "zod";

/* ---- Result layouts ---- */

const NodePath = z.string().min(1).regex(/^[^/]/, "paths carry no leading slash");
const FieldName = z.string().regex(/^[a-z][a-z0-9_]*$/, "field names are snake_case");

const Pattern = z.string().refine((s) => {
  try {
    new RegExp(s);
    return true;
  } catch {
    return false;
  }
}, "versionPattern is not a valid regular expression");

const ResultLayoutSchema = z.object({
  id: z.string().min(1),
  fileType: z.string().min(1),
  versionPattern: Pattern,
  paths: z.object({
    planInformation: NodePath,
    profileNames: NodePath,
    crossSections: z.object({ river: NodePath, reach: NodePath, station: NodePath }),
    profileVariables: z.record(FieldName, NodePath),
    asRun: z.array(z.object({ path: NodePath, columns: z.array(FieldName).min(1) })),
  }),
});

const ResultLayoutDocumentSchema = z.object({
  format: z.string(),
  layouts: z.array(ResultLayoutSchema).min(1),
});

export type ResultLayout = z.infer<typeof ResultLayoutSchema>;
export type ResultLayoutRegistry = { format: string; layouts: readonly ResultLayout[] };

/* ---- Loading ---- */

const DEFAULT_RESULT_LAYOUTS = new URL("../layouts/ras-results.json", import.meta.url);

export function parseResultLayoutDocument(input: unknown): ResultLayoutRegistry {
  const doc = ResultLayoutDocumentSchema.parse(input);
  const seen = new Set<string>();
  for (const l of doc.layouts) {
    if (seen.has(l.id)) throw new Error(`duplicate result layout id ${l.id}`);
    seen.add(l.id);
  }
  return { format: doc.format, layouts: doc.layouts };
}

let cached: ResultLayoutRegistry | undefined;

export function defaultResultLayoutRegistry(): ResultLayoutRegistry {
  if (!cached) cached = parseResultLayoutDocument(JSON.parse(readFileSync(DEFAULT_RESULT_LAYOUTS, "utf8")));
  return cached;
}

/** First registered layout whose file type matches exactly and whose pattern matches the version. */
export function selectResultLayout(
  registry: ResultLayoutRegistry,
  fileType: string,
  version: string
): ResultLayout | undefined {
  return registry.layouts.find((l) => l.fileType === fileType && new RegExp(l.versionPattern).test(version));
}
