// packages/parse/src/serializer.ts
// Writes records back in the keyword grammar they were read from.

import { isNumberList, isStringList, type FieldValue, type RawRecord } from "../../model/src/index.js";

import { isKeyedOpener, type FieldLayout, type SectionLayout, type Variant } from "./layouts.js";
import { formatNumber, formatRows } from "./tokens.js";

export function serializeSections(records: readonly RawRecord[], variant: Variant): string {
  const out: string[] = [];
  const sorted = [...records].sort((a, b) => a.ordinal - b.ordinal);

  for (const rec of sorted) {
    if (rec.ordinal === 0 && rec.section === variant.root) {
      writeFields(out, variant.rootFields, rec.fields, new Set());
      out.push(...rec.opaque);
      continue;
    }

    const layout = variant.sections.find((s) => s.name === rec.section);
    if (!layout) {
      out.push(`BEGIN ${rec.section}:`, ...rec.opaque, `END ${rec.section}:`);
      continue;
    }
    writeSection(out, layout, rec);
  }

  return out.length === 0 ? "" : `${out.join("\n")}\n`;
}

function writeSection(out: string[], layout: SectionLayout, rec: RawRecord): void {
  const opener = layout.opener;

  if (!isKeyedOpener(opener)) {
    out.push(`BEGIN ${opener.begin}:`);
    const text = rec.fields["text"];
    if (layout.body === "text" && typeof text === "string" && text !== "") out.push(...text.split("\n"));
    writeFields(out, layout.fields, rec.fields, new Set());
    out.push(...rec.opaque);
    out.push(`END ${opener.begin}:`);
    return;
  }

  const tokens = opener.fields.map((name) => scalarText(rec.fields[name]));
  while (tokens.length > 0 && tokens[tokens.length - 1] === "") tokens.pop();
  out.push(`${opener.key}=${tokens.join(",")}`);

  if (layout.rows) {
    const rows = rec.fields[layout.rows.field];
    if (rows !== undefined && isNumberList(rows)) out.push(...formatRows(rows, 8, 10));
  }

  const skip = new Set<string>([...opener.fields, ...(layout.inherit?.fields ?? [])]);
  if (layout.rows) skip.add(layout.rows.field);
  writeFields(out, layout.fields, rec.fields, skip);
  out.push(...rec.opaque);
}

function writeFields(
  out: string[],
  layouts: readonly FieldLayout[],
  fields: Readonly<Record<string, FieldValue>>,
  skip: ReadonlySet<string>
): void {
  for (const f of layouts) {
    switch (f.kind) {
      case "scalar": {
        if (skip.has(f.field)) break;
        const v = fields[f.field];
        if (v === undefined || v === null) break;
        if (f.repeatable && isNumberList(v)) {
          for (const n of v) if (n !== null) out.push(`${f.key}=${formatNumber(n)}`);
        } else {
          out.push(`${f.key}=${scalarText(v)}`);
        }
        break;
      }
      case "list": {
        const tokens = f.fields.map((name) => scalarText(fields[name]));
        if (tokens.every((t) => t === "")) break;
        while (tokens[tokens.length - 1] === "") tokens.pop();
        out.push(`${f.key}=${tokens.join(",")}`);
        break;
      }
      case "numbers":
      case "strings": {
        const v = fields[f.field];
        if (v === undefined || !Array.isArray(v)) break;
        out.push(`${f.key}=${listText(v)}`);
        break;
      }
      case "repeat": {
        const v = fields[f.field];
        if (v !== undefined && isStringList(v)) for (const s of v) out.push(`${f.key}=${s}`);
        break;
      }
      case "table": {
        if (f.repeatable) {
          for (let k = 1; fields[`${f.field}_${k}`] !== undefined; k++) writeTable(out, f, fields, `_${k}`);
        } else if (fields[f.field] !== undefined) {
          writeTable(out, f, fields, "");
        }
        break;
      }
      case "text": {
        const v = fields[f.field];
        if (typeof v !== "string") break;
        out.push(`BEGIN ${f.block}:`);
        if (v !== "") out.push(...v.split("\n"));
        out.push(`END ${f.block}:`);
        break;
      }
      case "bare": {
        const v = fields[f.field];
        const line = Object.keys(f.values).find((k) => f.values[k] === v);
        if (line !== undefined) out.push(line);
        break;
      }
    }
  }
}

function writeTable(
  out: string[],
  f: Extract<FieldLayout, { kind: "table" }>,
  fields: Readonly<Record<string, FieldValue>>,
  suffix: string
): void {
  const raw = fields[`${f.field}${suffix}`];
  const values = raw !== undefined && isNumberList(raw) ? raw : [];
  const header = f.headerFields
    ? f.headerFields.map((name) => scalarText(fields[`${name}${suffix}`]))
    : [formatNumber(Math.floor(values.length / f.perEntry))];
  out.push(`${f.key}=${header.join(",")}`);
  out.push(...formatRows(values, f.width, f.perLine));
}

function scalarText(v: FieldValue | undefined): string {
  if (v === undefined || v === null) return "";
  if (typeof v === "number") return formatNumber(v);
  if (typeof v === "string") return v;
  return listText(v);
}

function listText(v: readonly (number | string | null)[]): string {
  return v.map((x) => (x === null ? "" : String(x))).join(",");
}
