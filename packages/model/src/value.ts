// packages/model/src/value.ts
// Tagged attribute values shared by the model builder and the rule evaluator.

export type SequenceItem = number | string;

export type Value =
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "sequence"; items: readonly SequenceItem[] }
  | { kind: "missing"; reason?: string };

export type ValueKind = Value["kind"];

export const num = (value: number): Value => ({ kind: "number", value });
export const str = (value: string): Value => ({ kind: "string", value });
export const bool = (value: boolean): Value => ({ kind: "boolean", value });
export const seq = (items: readonly SequenceItem[]): Value => ({ kind: "sequence", items: [...items] });
export const missing = (reason?: string): Value =>
  reason === undefined ? { kind: "missing" } : { kind: "missing", reason };

export function isMissing(v: Value): v is { kind: "missing"; reason?: string } {
  return v.kind === "missing";
}

/**
 * Lift a plain JS value into a Value. Non-finite numbers and nullish input
 * become `missing`, and so does an array with any member that is not a
 * finite number or a string.
 */
export function toValue(raw: unknown): Value {
  if (raw === null || raw === undefined) return missing();
  if (typeof raw === "number") return Number.isFinite(raw) ? num(raw) : missing("non-finite number");
  if (typeof raw === "string") return str(raw);
  if (typeof raw === "boolean") return bool(raw);
  if (Array.isArray(raw)) {
    const items: SequenceItem[] = [];
    for (const [i, x] of raw.entries()) {
      if ((typeof x === "number" && Number.isFinite(x)) || typeof x === "string") items.push(x);
      else return missing(`sequence member ${i} is not a finite number or string`);
    }
    return seq(items);
  }
  return missing("unsupported value");
}

/** Structural equality; numbers compare exactly (design data is never rounded). */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "number":
      return b.kind === "number" && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "sequence":
      return (
        b.kind === "sequence" &&
        a.items.length === b.items.length &&
        a.items.every((x, i) => x === b.items[i])
      );
    case "missing":
      return b.kind === "missing";
  }
}

/** Render a value for finding messages. Deterministic, no locale formatting. */
export function formatValue(v: Value): string {
  switch (v.kind) {
    case "number":
      return String(v.value);
    case "string":
      return JSON.stringify(v.value);
    case "boolean":
      return v.value ? "true" : "false";
    case "sequence":
      return `[${v.items.map((x) => (typeof x === "string" ? JSON.stringify(x) : String(x))).join(", ")}]`;
    case "missing":
      return "missing";
  }
}

/** Plain JSON form used in serialized reports. */
export function valueToJson(v: Value): number | string | boolean | SequenceItem[] | null {
  switch (v.kind) {
    case "number":
    case "string":
    case "boolean":
      return v.value;
    case "sequence":
      return [...v.items];
    case "missing":
      return null;
  }
}
