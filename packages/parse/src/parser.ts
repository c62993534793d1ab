// packages/parse/src/parser.ts
// Line-oriented section parser. Two states: OUTSIDE_SECTION feeds the file's
// root record, INSIDE_SECTION feeds the open section record.

import {
  ParseError,
  deepFreeze,
  type FieldValue,
  type ParseWarning,
  type ParseWarningCode,
  type RawRecord,
  type TextFileKind,
} from "../../model/src/index.js";

import {
  defaultLayoutRegistry,
  isKeyedOpener,
  selectVariant,
  type FieldLayout,
  type KeyedOpenerLayout,
  type LayoutRegistry,
  type SectionLayout,
  type TableLayout,
  type Variant,
} from "./layouts.js";
import { coerceNumber, rowTokens, splitCommas, splitKeyValue } from "./tokens.js";

export type ParseOptions = {
  kind: TextFileKind;
  /** File name used in warnings and errors. */
  source?: string;
  /** Unknown keywords, malformed numbers and unterminated sections become ParseErrors. */
  strict?: boolean;
  registry?: LayoutRegistry;
};

export type ParsedText = {
  kind: TextFileKind;
  variant: string;
  /** Raw `Program Version=` marker, when the file has one. */
  version: string | null;
  records: readonly RawRecord[];
};

type State = "OUTSIDE_SECTION" | "INSIDE_SECTION";

type Draft = {
  section: string;
  ordinal: number;
  line: number;
  fields: Record<string, FieldValue>;
  opaque: string[];
  warnings: ParseWarning[];
  layout: SectionLayout | null;
  /** Block name when the section is closed by `END <name>`. */
  terminator: string | null;
  /** Collected lines of a text-bodied or unrecognised terminated section. */
  body: string[] | null;
  unknownKeys: string[];
  occurrences: Map<string, number>;
};

const BLOCK_RE = /^(BEGIN|END)\s+(.+?)\s*:?\s*$/;
const VERSION_RE = /^Program Version\s*=(.*)$/;

const FATAL_WHEN_STRICT: ReadonlySet<ParseWarningCode> = new Set<ParseWarningCode>([
  "MALFORMED_NUMBER",
  "UNKNOWN_KEYWORD",
  "TRUNCATED_SECTION",
  "UNTERMINATED_SECTION",
]);

export function parseSections(text: string, options: ParseOptions): ParsedText {
  const file = options.source ?? `<${options.kind}>`;
  if (text.includes("\u0000")) {
    throw new ParseError({ file, line: 0, reason: "file is not text (NUL bytes present)" });
  }

  const registry = options.registry ?? defaultLayoutRegistry();
  const lines = text.split(/\r?\n/);
  const marker = findVersionMarker(lines);
  const variant = selectVariant(registry, options.kind, marker.version);
  if (!variant) {
    throw new ParseError({ file, line: 0, reason: `no layout registered for ${options.kind} files` });
  }

  const machine = new SectionMachine(variant, lines, file, options.strict ?? false);
  if (marker.raw !== null && marker.version === null) {
    machine.warnRoot(marker.line, "UNKNOWN_VERSION", `unrecognised Program Version "${marker.raw}"; using layout ${variant.id}`);
  }

  return {
    kind: options.kind,
    variant: variant.id,
    version: marker.raw,
    records: machine.run(),
  };
}

function findVersionMarker(lines: readonly string[]): { raw: string | null; version: number | null; line: number } {
  for (let i = 0; i < lines.length; i++) {
    const m = VERSION_RE.exec((lines[i] ?? "").trim());
    if (!m) continue;
    const raw = (m[1] ?? "").trim();
    const lead = /^\d+(?:\.\d+)?/.exec(raw);
    return { raw, version: lead ? Number(lead[0]) : null, line: i + 1 };
  }
  return { raw: null, version: null, line: 0 };
}

class SectionMachine {
  private state: State = "OUTSIDE_SECTION";
  private i = 0;
  private readonly root: Draft;
  private readonly drafts: Draft[] = [];
  private current: Draft | null = null;
  private readonly latest = new Map<string, Draft>();

  constructor(
    private readonly variant: Variant,
    private readonly lines: readonly string[],
    private readonly file: string,
    private readonly strict: boolean
  ) {
    this.root = this.newDraft(variant.root, 0, 0, null, null);
  }

  warnRoot(line: number, code: ParseWarningCode, message: string): void {
    this.warn(this.root, line, code, message);
  }

  run(): RawRecord[] {
    while (this.i < this.lines.length) {
      const raw = this.lines[this.i] ?? "";
      const lineNo = this.i + 1;
      this.i++;
      this.step(raw, lineNo);
    }

    const open = this.current;
    if (this.state === "INSIDE_SECTION" && open && open.terminator !== null) {
      this.warn(open, this.lines.length, "TRUNCATED_SECTION", `end of file inside ${open.section} opened at line ${open.line}`);
    }
    this.close();

    return [this.root, ...this.drafts].map(finish);
  }

  /* ---------------------------------------------------------------- */

  private step(raw: string, lineNo: number): void {
    const trimmed = raw.trim();
    const cur = this.current;

    if (cur && cur.body !== null) {
      const blk = BLOCK_RE.exec(trimmed);
      if (blk && blk[1] === "END" && sameBlock(blk[2] ?? "", cur.terminator ?? "")) {
        this.close();
        return;
      }
      if (!this.opensSection(trimmed)) {
        if (trimmed !== "" || cur.body.length > 0) cur.body.push(raw.replace(/\s+$/, ""));
        return;
      }
      this.warn(cur, lineNo, "UNTERMINATED_SECTION", `${cur.section} opened at line ${cur.line} has no END before line ${lineNo}`);
      this.close();
    }

    if (trimmed === "") return;

    const blk = BLOCK_RE.exec(trimmed);
    if (blk) {
      const name = blk[2] ?? "";
      if (blk[1] === "BEGIN") this.begin(name, raw, lineNo);
      else this.end(name, lineNo);
      return;
    }

    const kv = splitKeyValue(trimmed);
    if (kv) {
      this.keyed(kv.key, kv.value, raw, lineNo);
      return;
    }

    this.bareLine(trimmed, raw, lineNo);
  }

  private begin(name: string, raw: string, lineNo: number): void {
    const cur = this.current;

    const ownText = cur?.layout ? findTextField(cur.layout.fields, name) : undefined;
    if (cur && ownText) {
      this.captureText(cur, ownText.field, name, lineNo);
      return;
    }
    if (!cur) {
      const rootText = findTextField(this.variant.rootFields, name);
      if (rootText) {
        this.captureText(this.root, rootText.field, name, lineNo);
        return;
      }
    }

    if (cur && cur.terminator !== null) {
      this.warn(cur, lineNo, "UNTERMINATED_SECTION", `${cur.section} opened at line ${cur.line} has no END before line ${lineNo}`);
    }

    const layout = this.variant.sections.find((s) => !isKeyedOpener(s.opener) && sameBlock(s.opener.begin, name));
    if (layout) {
      this.open(layout.name, lineNo, layout, name);
      return;
    }

    if (cur && cur.terminator === null) {
      this.captureOpaque(cur, name, raw, lineNo);
      return;
    }

    const opaque = this.open(name, lineNo, null, name);
    this.warn(opaque, lineNo, "UNKNOWN_SECTION", `no layout for section BEGIN ${name}; kept verbatim`);
  }

  /** An unrecognised block nested in a keyed section stays with that section, verbatim. */
  private captureOpaque(target: Draft, block: string, raw: string, lineNo: number): void {
    this.warn(target, lineNo, "UNKNOWN_SECTION", `no layout for block BEGIN ${block} in ${target.section}; kept verbatim`);
    target.opaque.push(raw.replace(/\s+$/, ""));
    while (this.i < this.lines.length) {
      const line = (this.lines[this.i] ?? "").replace(/\s+$/, "");
      this.i++;
      target.opaque.push(line);
      const blk = BLOCK_RE.exec(line.trim());
      if (blk && blk[1] === "END" && sameBlock(blk[2] ?? "", block)) return;
    }
    this.warn(target, lineNo, "TRUNCATED_SECTION", `end of file inside BEGIN ${block} at line ${lineNo}`);
  }

  private end(name: string, lineNo: number): void {
    const cur = this.current;
    if (cur && cur.terminator !== null && sameBlock(cur.terminator, name)) {
      this.close();
      return;
    }
    this.warn(cur ?? this.root, lineNo, "STRAY_END", `END ${name} without a matching BEGIN`);
  }

  private keyed(key: string, value: string, raw: string, lineNo: number): void {
    const openers = this.variant.sections.filter(
      (s): s is SectionLayout & { opener: KeyedOpenerLayout } => isKeyedOpener(s.opener) && s.opener.key === key
    );
    if (openers.length > 0) {
      const cur = this.current;
      if (cur && cur.terminator !== null) {
        this.warn(cur, lineNo, "UNTERMINATED_SECTION", `${cur.section} opened at line ${cur.line} has no END before line ${lineNo}`);
      }
      this.openKeyed(openers, value, lineNo);
      return;
    }

    let cur = this.current;
    if (cur?.layout?.closeOn?.includes(key)) {
      this.close();
      cur = null;
    }

    if (cur) {
      const own = cur.layout ? findKeyedField(cur.layout.fields, key) : undefined;
      if (own) {
        this.apply(cur, own, value, lineNo);
        return;
      }
      const rootField = cur.terminator === null ? findKeyedField(this.variant.rootFields, key) : undefined;
      if (rootField) {
        this.close();
        this.apply(this.root, rootField, value, lineNo);
        return;
      }
      this.unknown(cur, key, raw, lineNo);
      return;
    }

    const rootField = findKeyedField(this.variant.rootFields, key);
    if (rootField) this.apply(this.root, rootField, value, lineNo);
    else this.unknown(this.root, key, raw, lineNo);
  }

  private bareLine(trimmed: string, raw: string, lineNo: number): void {
    const target = this.current ?? this.root;
    const fields = target.layout ? target.layout.fields : target === this.root ? this.variant.rootFields : [];
    for (const f of fields) {
      if (f.kind !== "bare") continue;
      const mapped = f.values[trimmed];
      if (mapped !== undefined) {
        target.fields[f.field] = mapped;
        return;
      }
    }
    this.unknown(target, trimmed, raw, lineNo);
  }

  /* ---------------------------------------------------------------- */

  private openKeyed(candidates: readonly (SectionLayout & { opener: KeyedOpenerLayout })[], value: string, lineNo: number): void {
    const tokens = splitCommas(value);
    let chosen = candidates[candidates.length - 1];
    for (const c of candidates) {
      const when = c.opener.when;
      if (!when) {
        chosen = c;
        break;
      }
      const at = c.opener.fields.indexOf(when.field);
      const token = tokens[at] ?? "";
      const actual = c.opener.types[at] === "number" ? coerceNumber(token) : token;
      if (actual === when.equals) {
        chosen = c;
        break;
      }
    }
    if (!chosen) return;

    const draft = this.open(chosen.name, lineNo, chosen, null);
    const { fields, types } = chosen.opener;
    fields.forEach((name, j) => {
      const token = tokens[j] ?? "";
      if (types[j] === "number") this.setNumber(draft, name, token, chosen.opener.key, lineNo);
      else if (token !== "") draft.fields[name] = token;
    });
    const extra = tokens.slice(fields.length).filter((t) => t !== "");
    if (extra.length > 0) {
      this.warn(draft, lineNo, "TABLE_OVERFLOW", `${chosen.opener.key}: ${extra.length} value(s) beyond ${fields.length} ignored`);
    }

    if (chosen.inherit) {
      const from = this.latest.get(chosen.inherit.section);
      if (from) {
        for (const name of chosen.inherit.fields) {
          const v = from.fields[name];
          if (v !== undefined) draft.fields[name] = v;
        }
      }
    }

    if (chosen.rows) {
      const count = this.root.fields[chosen.rows.countFrom];
      const expected = typeof count === "number" ? count : null;
      draft.fields[chosen.rows.field] = this.readRows(draft, chosen.opener.key, expected, 8, lineNo);
    }
  }

  private open(section: string, lineNo: number, layout: SectionLayout | null, terminator: string | null): Draft {
    this.close();
    const bodied = terminator !== null && (layout === null || layout.body === "text");
    const draft = this.newDraft(section, this.drafts.length + 1, lineNo, layout, terminator);
    if (bodied) draft.body = [];
    this.drafts.push(draft);
    this.current = draft;
    this.state = "INSIDE_SECTION";
    return draft;
  }

  private close(): void {
    const cur = this.current;
    if (!cur) return;
    if (cur.body !== null) {
      const body = trimTrailingBlank(cur.body);
      if (cur.layout) cur.fields["text"] = body.join("\n");
      else cur.opaque.push(...body);
      cur.body = null;
    }
    this.latest.set(cur.section, cur);
    this.current = null;
    this.state = "OUTSIDE_SECTION";
  }

  private opensSection(trimmed: string): boolean {
    const blk = BLOCK_RE.exec(trimmed);
    if (blk) {
      return blk[1] === "BEGIN" && this.variant.sections.some((s) => !isKeyedOpener(s.opener) && sameBlock(s.opener.begin, blk[2] ?? ""));
    }
    const kv = splitKeyValue(trimmed);
    return kv !== null && this.variant.sections.some((s) => isKeyedOpener(s.opener) && s.opener.key === kv.key);
  }

  /* ---------------------------------------------------------------- */

  private apply(target: Draft, layout: FieldLayout, value: string, lineNo: number): void {
    switch (layout.kind) {
      case "scalar": {
        if (layout.type === "string") {
          target.fields[layout.field] = value.trim();
          return;
        }
        if (!layout.repeatable) {
          this.setNumber(target, layout.field, value, layout.key, lineNo);
          return;
        }
        const n = this.number(target, value, layout.key, lineNo);
        if (n === undefined) return;
        const prev = target.fields[layout.field];
        target.fields[layout.field] = [...(Array.isArray(prev) ? numbersOf(prev) : []), n];
        return;
      }
      case "list": {
        const tokens = splitCommas(value);
        layout.fields.forEach((name, j) => this.setNumber(target, name, tokens[j] ?? "", layout.key, lineNo));
        const extra = tokens.slice(layout.fields.length).filter((t) => t !== "");
        if (extra.length > 0) {
          this.warn(target, lineNo, "TABLE_OVERFLOW", `${layout.key}: ${extra.length} value(s) beyond ${layout.fields.length} ignored`);
        }
        return;
      }
      case "numbers": {
        const out: (number | null)[] = [];
        for (const t of splitCommas(value)) {
          const n = this.number(target, t, layout.key, lineNo);
          if (n !== undefined) out.push(n);
        }
        target.fields[layout.field] = out;
        return;
      }
      case "strings":
        target.fields[layout.field] = splitCommas(value).filter((t) => t !== "");
        return;
      case "repeat": {
        const v = value.trim();
        if (v === "") return;
        const prev = target.fields[layout.field];
        target.fields[layout.field] = [...(Array.isArray(prev) ? stringsOf(prev) : []), v];
        return;
      }
      case "table":
        this.applyTable(target, layout, value, lineNo);
        return;
      case "text":
      case "bare":
        // reached through begin() and bareLine()
        return;
    }
  }

  private applyTable(target: Draft, layout: TableLayout, value: string, lineNo: number): void {
    let suffix = "";
    if (layout.repeatable) {
      const k = (target.occurrences.get(layout.field) ?? 0) + 1;
      target.occurrences.set(layout.field, k);
      suffix = `_${k}`;
    }

    const header = splitCommas(value);
    (layout.headerFields ?? []).forEach((name, j) => this.setNumber(target, `${name}${suffix}`, header[j] ?? "", layout.key, lineNo));
    const count = coerceNumber(header[0] ?? "");
    const expected = typeof count === "number" ? count * layout.perEntry : null;
    if (count === null) {
      this.warn(target, lineNo, "MALFORMED_NUMBER", `${layout.key}: entry count "${header[0] ?? ""}" is not a number`);
    }

    target.fields[`${layout.field}${suffix}`] = this.readRows(target, layout.key, expected, layout.width, lineNo);
  }

  /**
   * Consume table rows following a header line. With a known size, reading
   * stops once it is filled; otherwise at the first line that is not a row.
   */
  private readRows(
    target: Draft,
    key: string,
    expected: number | null,
    width: number,
    lineNo: number
  ): (number | null)[] {
    const out: (number | null)[] = [];
    let overflow = 0;
    while (this.i < this.lines.length && (expected === null || out.length < expected)) {
      const raw = this.lines[this.i] ?? "";
      if (!this.isRowLine(target, raw)) break;
      this.i++;
      for (const token of rowTokens(raw, width)) {
        if (expected !== null && out.length >= expected) {
          overflow++;
          continue;
        }
        const n = coerceNumber(token);
        if (n === null) {
          this.warn(target, this.i, "MALFORMED_NUMBER", `${key}: "${token}" is not a number`);
        }
        out.push(n ?? null);
      }
    }

    if (expected !== null && out.length < expected) {
      this.warn(target, lineNo, "SHORT_TABLE", `${key}: expected ${expected} values, found ${out.length}`);
    }
    if (overflow > 0) {
      this.warn(target, lineNo, "TABLE_OVERFLOW", `${key}: ${overflow} value(s) beyond the declared ${expected ?? 0} ignored`);
    }
    return out;
  }

  private isRowLine(target: Draft, raw: string): boolean {
    const t = raw.trim();
    if (t === "" || t.includes("=") || BLOCK_RE.test(t)) return false;
    const fields = target.layout ? target.layout.fields : this.variant.rootFields;
    return !fields.some((f) => f.kind === "bare" && f.values[t] !== undefined);
  }

  private captureText(target: Draft, field: string, block: string, lineNo: number): void {
    const body: string[] = [];
    while (this.i < this.lines.length) {
      const raw = this.lines[this.i] ?? "";
      const t = raw.trim();
      const blk = BLOCK_RE.exec(t);
      if (blk && blk[1] === "END" && sameBlock(blk[2] ?? "", block)) {
        this.i++;
        target.fields[field] = joinText(body);
        return;
      }
      if (this.opensSection(t)) {
        this.warn(target, lineNo, "UNTERMINATED_SECTION", `BEGIN ${block} at line ${lineNo} has no END before line ${this.i + 1}`);
        target.fields[field] = joinText(body);
        return;
      }
      body.push(raw.replace(/\s+$/, ""));
      this.i++;
    }
    this.warn(target, lineNo, "TRUNCATED_SECTION", `end of file inside BEGIN ${block} at line ${lineNo}`);
    target.fields[field] = joinText(body);
  }

  /* ---------------------------------------------------------------- */

  private number(target: Draft, token: string, key: string, lineNo: number): number | null | undefined {
    const n = coerceNumber(token);
    if (n === null) this.warn(target, lineNo, "MALFORMED_NUMBER", `${key}: "${token.trim()}" is not a number`);
    return n;
  }

  private setNumber(target: Draft, field: string, token: string, key: string, lineNo: number): void {
    const n = this.number(target, token, key, lineNo);
    if (n !== undefined) target.fields[field] = n;
  }

  private unknown(target: Draft, key: string, raw: string, lineNo: number): void {
    if (this.strict) {
      throw new ParseError({ file: this.file, line: lineNo, reason: `unknown keyword "${key}" in ${target.section}` });
    }
    target.opaque.push(raw.replace(/\s+$/, ""));
    if (target.unknownKeys.length === 0) target.warnings.push({ line: lineNo, code: "UNKNOWN_KEYWORD", message: "" });
    if (!target.unknownKeys.includes(key)) target.unknownKeys.push(key);
  }

  private warn(target: Draft, line: number, code: ParseWarningCode, message: string): void {
    if (this.strict && FATAL_WHEN_STRICT.has(code)) {
      throw new ParseError({ file: this.file, line, reason: message });
    }
    target.warnings.push({ line, code, message });
  }

  private newDraft(
    section: string,
    ordinal: number,
    line: number,
    layout: SectionLayout | null,
    terminator: string | null
  ): Draft {
    return {
      section,
      ordinal,
      line,
      fields: {},
      opaque: [],
      warnings: [],
      layout,
      terminator,
      body: null,
      unknownKeys: [],
      occurrences: new Map(),
    };
  }
}

function finish(d: Draft): RawRecord {
  const warnings = d.warnings.map((w) =>
    w.code === "UNKNOWN_KEYWORD"
      ? { ...w, message: `unrecognised keyword(s) kept verbatim: ${d.unknownKeys.map((k) => JSON.stringify(k)).join(", ")}` }
      : w
  );
  return deepFreeze({
    section: d.section,
    ordinal: d.ordinal,
    line: d.line,
    fields: { ...d.fields },
    opaque: [...d.opaque],
    warnings,
  });
}

function findKeyedField(fields: readonly FieldLayout[], key: string): FieldLayout | undefined {
  return fields.find((f) => f.kind !== "text" && f.kind !== "bare" && f.key === key);
}

function findTextField(fields: readonly FieldLayout[], block: string): Extract<FieldLayout, { kind: "text" }> | undefined {
  for (const f of fields) if (f.kind === "text" && sameBlock(f.block, block)) return f;
  return undefined;
}

function sameBlock(a: string, b: string): boolean {
  return a.replace(/:$/, "").trim().toUpperCase() === b.replace(/:$/, "").trim().toUpperCase();
}

function joinText(lines: readonly string[]): string {
  return lines.join("\n").trim();
}

function trimTrailingBlank(lines: readonly string[]): string[] {
  const out = [...lines];
  while (out.length > 0 && (out[out.length - 1] ?? "").trim() === "") out.pop();
  return out;
}

function numbersOf(v: readonly unknown[]): (number | null)[] {
  return v.filter((x): x is number | null => x === null || typeof x === "number");
}

function stringsOf(v: readonly unknown[]): string[] {
  return v.filter((x): x is string => typeof x === "string");
}
