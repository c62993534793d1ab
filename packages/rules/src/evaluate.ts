// packages/rules/src/evaluate.ts
// Total evaluator: every operator and function has a defined outcome for every
// pair of value kinds, including missing. Failures are values, never throws.
import { bool, compareBinary, missing, num, seq, str, type SequenceItem, type Value } from "../../model/src/index.js";

import type { ArithmeticOp, ComparisonOp, Expr, FunctionName } from "./parser.js";

export type EvalErrorCode = "MISSING_VALUE" | "TYPE_MISMATCH" | "DIVISION_BY_ZERO" | "INDEX_OUT_OF_RANGE";

export type EvalFailure = { ok: false; code: EvalErrorCode; message: string };
export type EvalResult = { ok: true; value: Value } | EvalFailure;

/** Where identifiers come from; `undefined` means the name is not defined at all. */
export interface Scope {
  lookup(name: string): Value | undefined;
}

const ok = (value: Value): EvalResult => ({ ok: true, value });
const fail = (code: EvalErrorCode, message: string): EvalFailure => ({ ok: false, code, message });

/** A missing operand is reported with the reason it carries. */
function missingFailure(v: Value & { kind: "missing" }): EvalFailure {
  return fail("MISSING_VALUE", v.reason ?? "value is missing");
}

function mismatch(what: string, ...values: Value[]): EvalFailure {
  return fail("TYPE_MISMATCH", `${what} cannot take ${values.map((v) => v.kind).join(" and ")}`);
}

/* ---- Operators ---- */

function arithmetic(op: ArithmeticOp, a: Value, b: Value): EvalResult {
  if (a.kind === "missing") return missingFailure(a);
  if (b.kind === "missing") return missingFailure(b);
  if (op === "+" && a.kind === "string" && b.kind === "string") return ok(str(a.value + b.value));
  if (a.kind !== "number" || b.kind !== "number") return mismatch(`"${op}"`, a, b);
  switch (op) {
    case "+":
      return ok(num(a.value + b.value));
    case "-":
      return ok(num(a.value - b.value));
    case "*":
      return ok(num(a.value * b.value));
    case "/":
      return b.value === 0 ? fail("DIVISION_BY_ZERO", `division by zero (${a.value} / 0)`) : ok(num(a.value / b.value));
    case "%":
      return b.value === 0 ? fail("DIVISION_BY_ZERO", `division by zero (${a.value} % 0)`) : ok(num(a.value % b.value));
  }
}

function sameItems(a: readonly SequenceItem[], b: readonly SequenceItem[]): boolean {
  return a.length === b.length && a.every((x, i) => x === b[i]);
}

function compare(op: ComparisonOp, a: Value, b: Value): EvalResult {
  if (a.kind === "missing") return missingFailure(a);
  if (b.kind === "missing") return missingFailure(b);

  if (op === "==" || op === "!=") {
    let equal: boolean;
    if (a.kind === "sequence" && b.kind === "sequence") equal = sameItems(a.items, b.items);
    else if (a.kind === "sequence" || b.kind === "sequence") equal = false;
    else equal = a.kind === b.kind && a.value === b.value;
    return ok(bool(op === "==" ? equal : !equal));
  }

  let order: number;
  if (a.kind === "number" && b.kind === "number") order = a.value - b.value;
  else if (a.kind === "string" && b.kind === "string") order = compareBinary(a.value, b.value);
  else return mismatch(`"${op}"`, a, b);

  switch (op) {
    case "<":
      return ok(bool(order < 0));
    case "<=":
      return ok(bool(order <= 0));
    case ">":
      return ok(bool(order > 0));
    case ">=":
      return ok(bool(order >= 0));
  }
}

function asBoolean(what: string, r: EvalResult): { ok: true; value: boolean } | EvalFailure {
  if (!r.ok) return r;
  if (r.value.kind === "missing") return missingFailure(r.value);
  if (r.value.kind !== "boolean") return mismatch(what, r.value);
  return { ok: true, value: r.value.value };
}

function index(target: Value, at: Value): EvalResult {
  if (target.kind === "missing") return missingFailure(target);
  if (at.kind === "missing") return missingFailure(at);
  if (target.kind !== "sequence" || at.kind !== "number" || !Number.isInteger(at.value)) return mismatch("indexing", target, at);
  const item = target.items[at.value];
  if (at.value < 0 || item === undefined) {
    return fail("INDEX_OUT_OF_RANGE", `index ${at.value} is outside a sequence of ${target.items.length}`);
  }
  return ok(typeof item === "number" ? num(item) : str(item));
}

/* ---- Functions ---- */

/** Numbers from the arguments; a single sequence argument is spread. */
function numbersOf(name: string, args: readonly Value[]): { ok: true; values: number[] } | EvalFailure {
  const first = args[0];
  const items: Value[] =
    args.length === 1 && first?.kind === "sequence" ? first.items.map((x) => (typeof x === "number" ? num(x) : str(x))) : [...args];
  const values: number[] = [];
  for (const v of items) {
    if (v.kind === "missing") return missingFailure(v);
    if (v.kind !== "number") return mismatch(name, v);
    values.push(v.value);
  }
  return { ok: true, values };
}

function mapStrings(name: string, v: Value, f: (s: string) => string): EvalResult {
  if (v.kind === "missing") return missingFailure(v);
  if (v.kind === "string") return ok(str(f(v.value)));
  if (v.kind === "sequence") return ok(seq(v.items.map((x) => (typeof x === "string" ? f(x) : x))));
  return mismatch(name, v);
}

function contains(haystack: Value, needle: Value): EvalResult {
  if (haystack.kind === "missing") return missingFailure(haystack);
  if (needle.kind === "missing") return missingFailure(needle);
  if (haystack.kind === "string" && needle.kind === "string") return ok(bool(haystack.value.includes(needle.value)));
  if (haystack.kind !== "sequence") return mismatch("contains", haystack, needle);
  if (needle.kind === "sequence") return ok(bool(needle.items.some((x) => haystack.items.includes(x))));
  if (needle.kind === "number" || needle.kind === "string") return ok(bool(haystack.items.includes(needle.value)));
  return mismatch("contains", haystack, needle);
}

function call(name: FunctionName, args: readonly Value[]): EvalResult {
  const [a, b, c] = args;
  switch (name) {
    case "exists":
      return ok(bool(a !== undefined && a.kind !== "missing"));
    case "coalesce":
      return ok(args.find((v) => v.kind !== "missing") ?? missing("every coalesce argument is missing"));
    case "abs":
      if (!a) return mismatch(name);
      if (a.kind === "missing") return missingFailure(a);
      return a.kind === "number" ? ok(num(Math.abs(a.value))) : mismatch(name, a);
    case "round": {
      if (!a) return mismatch(name);
      if (a.kind === "missing") return missingFailure(a);
      if (b?.kind === "missing") return missingFailure(b);
      if (a.kind !== "number" || (b !== undefined && b.kind !== "number")) return mismatch(name, ...args);
      const scale = 10 ** (b?.kind === "number" ? Math.trunc(b.value) : 0);
      return ok(num(Math.round(a.value * scale) / scale));
    }
    case "min":
    case "max":
    case "sum":
    case "avg": {
      const r = numbersOf(name, args);
      if (!r.ok) return r;
      const xs = r.values;
      if (name === "sum") return ok(num(xs.reduce((s, x) => s + x, 0)));
      if (xs.length === 0) return ok(missing(`${name} of no values`));
      if (name === "min") return ok(num(xs.reduce((m, x) => (x < m ? x : m))));
      if (name === "max") return ok(num(xs.reduce((m, x) => (x > m ? x : m))));
      return ok(num(xs.reduce((s, x) => s + x, 0) / xs.length));
    }
    case "count":
      if (!a || a.kind === "missing") return ok(num(0));
      return ok(num(a.kind === "sequence" ? a.items.length : 1));
    case "len":
      if (!a) return mismatch(name);
      if (a.kind === "missing") return missingFailure(a);
      if (a.kind === "sequence") return ok(num(a.items.length));
      if (a.kind === "string") return ok(num(a.value.length));
      return mismatch(name, a);
    case "contains":
      return a && b ? contains(a, b) : mismatch(name);
    case "lower":
      return a ? mapStrings(name, a, (s) => s.toLowerCase()) : mismatch(name);
    case "upper":
      return a ? mapStrings(name, a, (s) => s.toUpperCase()) : mismatch(name);
    case "between": {
      if (!a || !b || !c) return mismatch(name);
      for (const v of [a, b, c]) if (v.kind === "missing") return missingFailure(v);
      if (a.kind !== "number" || b.kind !== "number" || c.kind !== "number") return mismatch(name, a, b, c);
      return ok(bool(a.value >= b.value && a.value <= c.value));
    }
    case "all":
    case "any": {
      for (const v of args) {
        if (v.kind === "missing") return missingFailure(v);
        if (v.kind !== "boolean") return mismatch(name, v);
      }
      const flags = args.map((v) => v.kind === "boolean" && v.value);
      return ok(bool(name === "all" ? flags.every(Boolean) : flags.some(Boolean)));
    }
  }
}

/* ---- Expressions ---- */

function lookup(name: string, scope: Scope): Value {
  const v = scope.lookup(name);
  if (v === undefined) return missing(`${name} is not defined`);
  if (v.kind === "missing") return missing(v.reason ? `${name} is missing: ${v.reason}` : `${name} is missing`);
  return v;
}

export function evaluate(expr: Expr, scope: Scope): EvalResult {
  switch (expr.kind) {
    case "literal":
      return ok(expr.value);
    case "ident":
      return ok(lookup(expr.name, scope));
    case "list": {
      const items: SequenceItem[] = [];
      for (const e of expr.items) {
        const r = evaluate(e, scope);
        if (!r.ok) return r;
        if (r.value.kind === "missing") return missingFailure(r.value);
        if (r.value.kind !== "number" && r.value.kind !== "string") return mismatch("a list item", r.value);
        items.push(r.value.value);
      }
      return ok(seq(items));
    }
    case "negate": {
      const r = evaluate(expr.operand, scope);
      if (!r.ok) return r;
      if (r.value.kind === "missing") return missingFailure(r.value);
      return r.value.kind === "number" ? ok(num(-r.value.value)) : mismatch('unary "-"', r.value);
    }
    case "not": {
      const r = asBoolean('"not"', evaluate(expr.operand, scope));
      return r.ok ? ok(bool(!r.value)) : r;
    }
    case "logical": {
      const left = asBoolean(`"${expr.op}"`, evaluate(expr.left, scope));
      if (!left.ok) return left;
      if (expr.op === "and" && !left.value) return ok(bool(false));
      if (expr.op === "or" && left.value) return ok(bool(true));
      const right = asBoolean(`"${expr.op}"`, evaluate(expr.right, scope));
      return right.ok ? ok(bool(right.value)) : right;
    }
    case "arithmetic":
    case "compare":
    case "index": {
      const l = evaluate(expr.kind === "index" ? expr.target : expr.left, scope);
      if (!l.ok) return l;
      const r = evaluate(expr.kind === "index" ? expr.index : expr.right, scope);
      if (!r.ok) return r;
      if (expr.kind === "index") return index(l.value, r.value);
      return expr.kind === "arithmetic" ? arithmetic(expr.op, l.value, r.value) : compare(expr.op, l.value, r.value);
    }
    case "call": {
      const args: Value[] = [];
      for (const e of expr.args) {
        const r = evaluate(e, scope);
        if (!r.ok) return r;
        args.push(r.value);
      }
      return call(expr.name, args);
    }
  }
}
