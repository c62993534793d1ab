// packages/parse/src/layouts.ts
import { readFileSync } from "node:fs";
import { z } from "zod";

import type { TextFileKind } from "../../model/src/index.js";

/* ------------------------------------------------------------------ */
/*                            Field layouts                           */
/* ------------------------------------------------------------------ */

const Key = z.string().min(1);
const FieldName = z.string().regex(/^[a-z][a-z0-9_]*$/, "field names are snake_case");

const ScalarField = z.object({
  kind: z.literal("scalar"),
  key: Key,
  field: FieldName,
  type: z.enum(["number", "string"]),
  // a repeated numeric key accumulates into a list instead of overwriting
  repeatable: z.boolean().optional(),
});

const ListField = z.object({
  kind: z.literal("list"),
  key: Key,
  fields: z.array(FieldName).min(1),
});

const NumbersField = z.object({ kind: z.literal("numbers"), key: Key, field: FieldName });
const StringsField = z.object({ kind: z.literal("strings"), key: Key, field: FieldName });
const RepeatField = z.object({ kind: z.literal("repeat"), key: Key, field: FieldName });

const TableField = z.object({
  kind: z.literal("table"),
  key: Key,
  field: FieldName,
  perEntry: z.number().int().positive(),
  width: z.number().int().positive().default(8),
  perLine: z.number().int().positive().default(10),
  // the first header token is always the entry count
  headerFields: z.array(FieldName).min(1).optional(),
  repeatable: z.boolean().optional(),
});

const TextField = z.object({ kind: z.literal("text"), block: Key, field: FieldName });

const BareField = z.object({
  kind: z.literal("bare"),
  field: FieldName,
  values: z.record(z.string(), z.string()),
});

const FieldLayoutSchema = z.discriminatedUnion("kind", [
  ScalarField,
  ListField,
  NumbersField,
  StringsField,
  RepeatField,
  TableField,
  TextField,
  BareField,
]);

/* ------------------------------------------------------------------ */
/*                           Section layouts                          */
/* ------------------------------------------------------------------ */

const KeyedOpener = z
  .object({
    key: Key,
    fields: z.array(FieldName).min(1),
    types: z.array(z.enum(["number", "string"])).min(1),
    when: z.object({ field: FieldName, equals: z.union([z.number(), z.string()]) }).optional(),
  })
  .refine((o) => o.fields.length === o.types.length, "opener fields and types differ in length");

const BeginOpener = z.object({ begin: Key });

const SectionLayoutSchema = z.object({
  name: z.string().regex(/^[A-Z][A-Za-z0-9]*$/),
  opener: z.union([KeyedOpener, BeginOpener]),
  inherit: z.object({ section: z.string(), fields: z.array(FieldName).min(1) }).optional(),
  closeOn: z.array(Key).optional(),
  rows: z.object({ field: FieldName, countFrom: FieldName }).optional(),
  body: z.literal("text").optional(),
  fields: z.array(FieldLayoutSchema),
});

const VariantSchema = z
  .object({
    id: z.string().min(1),
    kind: z.enum(["project", "geometry", "plan", "steady_flow", "unsteady_flow", "quasi_flow"]),
    minVersion: z.number().min(0),
    root: z.string().optional(),
    rootFields: z.array(FieldLayoutSchema).optional(),
    sections: z.array(SectionLayoutSchema).optional(),
    extends: z.string().optional(),
    extraFields: z.record(z.string(), z.array(FieldLayoutSchema)).optional(),
  })
  .refine(
    (v) => v.extends !== undefined || (v.root !== undefined && v.rootFields !== undefined && v.sections !== undefined),
    "a variant either extends another or declares root, rootFields and sections"
  );

const LayoutDocumentSchema = z.object({
  format: z.string(),
  variants: z.array(VariantSchema).min(1),
});

export type FieldLayout = z.infer<typeof FieldLayoutSchema>;
export type TableLayout = z.infer<typeof TableField>;
export type KeyedOpenerLayout = z.infer<typeof KeyedOpener>;
export type SectionLayout = z.infer<typeof SectionLayoutSchema>;

/** A variant with its `extends` chain already applied. */
export type Variant = {
  id: string;
  kind: TextFileKind;
  minVersion: number;
  root: string;
  rootFields: readonly FieldLayout[];
  sections: readonly SectionLayout[];
};

export type LayoutRegistry = {
  format: string;
  variants: readonly Variant[];
};

export function isKeyedOpener(o: SectionLayout["opener"]): o is KeyedOpenerLayout {
  return "key" in o;
}

/* ------------------------------------------------------------------ */
/*                               Loading                              */
/* ------------------------------------------------------------------ */

const DEFAULT_LAYOUTS = new URL("../layouts/ras-text.json", import.meta.url);

export function parseLayoutDocument(input: unknown): LayoutRegistry {
  const doc = LayoutDocumentSchema.parse(input);
  const byId = new Map(doc.variants.map((v) => [v.id, v]));
  const resolved = new Map<string, Variant>();

  const resolve = (id: string, seen: readonly string[]): Variant => {
    const done = resolved.get(id);
    if (done) return done;
    if (seen.includes(id)) throw new Error(`layout variant ${id} extends itself`);
    const raw = byId.get(id);
    if (!raw) throw new Error(`layout variant ${seen[seen.length - 1] ?? id} extends unknown variant ${id}`);

    let out: Variant;
    if (raw.extends !== undefined) {
      const base = resolve(raw.extends, [...seen, id]);
      if (base.kind !== raw.kind) throw new Error(`layout variant ${id} extends a ${base.kind} variant`);
      const extra = raw.extraFields ?? {};
      for (const name of Object.keys(extra)) {
        if (name !== base.root && !base.sections.some((s) => s.name === name)) {
          throw new Error(`layout variant ${id} adds fields to unknown section ${name}`);
        }
      }
      out = {
        id,
        kind: raw.kind,
        minVersion: raw.minVersion,
        root: raw.root ?? base.root,
        rootFields: [...base.rootFields, ...(extra[base.root] ?? [])],
        sections: base.sections.map((s) => ({ ...s, fields: [...s.fields, ...(extra[s.name] ?? [])] })),
      };
    } else {
      out = {
        id,
        kind: raw.kind,
        minVersion: raw.minVersion,
        root: raw.root ?? "",
        rootFields: raw.rootFields ?? [],
        sections: raw.sections ?? [],
      };
    }
    resolved.set(id, out);
    return out;
  };

  const variants = doc.variants.map((v) => resolve(v.id, []));
  return { format: doc.format, variants };
}

let cached: LayoutRegistry | undefined;

/** The bundled descriptor set, read once per process. */
export function defaultLayoutRegistry(): LayoutRegistry {
  if (!cached) cached = parseLayoutDocument(JSON.parse(readFileSync(DEFAULT_LAYOUTS, "utf8")));
  return cached;
}

/**
 * Newest variant of `kind` whose minimum version is at or below `version`.
 * `null` (no marker in the file) selects the lowest variant.
 */
export function selectVariant(registry: LayoutRegistry, kind: TextFileKind, version: number | null): Variant | undefined {
  const candidates = registry.variants
    .filter((v) => v.kind === kind)
    .sort((a, b) => a.minVersion - b.minVersion);
  if (candidates.length === 0) return undefined;
  if (version === null) return candidates[0];
  let chosen = candidates[0];
  for (const v of candidates) if (v.minVersion <= version) chosen = v;
  return chosen;
}

export function findVariant(registry: LayoutRegistry, id: string): Variant | undefined {
  return registry.variants.find((v) => v.id === id);
}
