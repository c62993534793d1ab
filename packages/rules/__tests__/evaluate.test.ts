// packages/rules/__tests__/evaluate.test.ts
import { describe, expect, test } from "vitest";

import { bool, missing, num, seq, str, type Value } from "../../model/src/index.js";
import { evaluate, parseExpression, type EvalResult } from "../src/index.js";

const VARS: Record<string, Value> = {
  n: num(0.035),
  unparsed: missing("Manning's n value could not be parsed"),
  flows: seq([1200, 2500, 3400]),
  names: seq(["10YR", "500yr"]),
  river: str("Mill Creek"),
};

function run(src: string): EvalResult {
  const parsed = parseExpression(src);
  if (!parsed.ok) throw new Error(parsed.message);
  return evaluate(parsed.expr, { lookup: (name) => VARS[name] });
}

const value = (v: Value): EvalResult => ({ ok: true, value: v });

describe("arithmetic and comparison", () => {
  test("numbers and string concatenation", () => {
    expect(run("1 + 2 * 3")).toEqual(value(num(7)));
    expect(run("7 % 4 - 1")).toEqual(value(num(2)));
    expect(run("'a' + 'b'")).toEqual(value(str("ab")));
    expect(run("n * 2 < 0.1")).toEqual(value(bool(true)));
    expect(run("'a' < 'b'")).toEqual(value(bool(true)));
  });

  test("type mismatches are failures, not exceptions", () => {
    expect(run("1 + 'a'")).toEqual({ ok: false, code: "TYPE_MISMATCH", message: '"+" cannot take number and string' });
    expect(run("river < 1")).toEqual({ ok: false, code: "TYPE_MISMATCH", message: '"<" cannot take string and number' });
    expect(run("-river")).toEqual({ ok: false, code: "TYPE_MISMATCH", message: 'unary "-" cannot take string' });
  });

  test("division by zero", () => {
    expect(run("1 / 0")).toEqual({ ok: false, code: "DIVISION_BY_ZERO", message: "division by zero (1 / 0)" });
  });

  test("equality across kinds is false rather than an error", () => {
    expect(run("1 == '1'")).toEqual(value(bool(false)));
    expect(run("flows == [1200, 2500, 3400]")).toEqual(value(bool(true)));
    expect(run("flows != 1200")).toEqual(value(bool(true)));
  });
});

describe("missing values", () => {
  test("a missing attribute is named with its reason", () => {
    expect(run("unparsed > 0.02")).toEqual({
      ok: false,
      code: "MISSING_VALUE",
      message: "unparsed is missing: Manning's n value could not be parsed",
    });
    expect(run("nowhere + 1")).toEqual({ ok: false, code: "MISSING_VALUE", message: "nowhere is not defined" });
    expect(run("[unparsed]")).toEqual({
      ok: false,
      code: "MISSING_VALUE",
      message: "unparsed is missing: Manning's n value could not be parsed",
    });
  });

  test("exists and coalesce look at missing values without failing", () => {
    expect(run("exists(unparsed)")).toEqual(value(bool(false)));
    expect(run("exists(n)")).toEqual(value(bool(true)));
    expect(run("coalesce(unparsed, nowhere, 5)")).toEqual(value(num(5)));
    expect(run("count(unparsed)")).toEqual(value(num(0)));
  });
});

describe("logic", () => {
  test("and/or short-circuit", () => {
    expect(run("false and unparsed > 1")).toEqual(value(bool(false)));
    expect(run("true or 1 / 0 > 1")).toEqual(value(bool(true)));
  });

  test("operands must be booleans", () => {
    expect(run("1 and true")).toEqual({ ok: false, code: "TYPE_MISMATCH", message: '"and" cannot take number' });
    expect(run("not unparsed")).toEqual({
      ok: false,
      code: "MISSING_VALUE",
      message: "unparsed is missing: Manning's n value could not be parsed",
    });
  });
});

describe("functions", () => {
  test("aggregates over a sequence or over arguments", () => {
    expect(run("max(flows)")).toEqual(value(num(3400)));
    expect(run("avg(1, 2, 3)")).toEqual(value(num(2)));
    expect(run("sum([])")).toEqual(value(num(0)));
    expect(run("min([])")).toEqual(value(missing("min of no values")));
    expect(run("count(flows)")).toEqual(value(num(3)));
    expect(run("max(names)")).toEqual({ ok: false, code: "TYPE_MISMATCH", message: "max cannot take string" });
  });

  test("min and max over a long sequence", () => {
    const parsed = parseExpression("max(levels) - min(levels)");
    if (!parsed.ok) throw new Error(parsed.message);
    const levels = seq(Array.from({ length: 500_000 }, (_, i) => (i % 2 === 0 ? i : -i)));
    expect(evaluate(parsed.expr, { lookup: (name) => (name === "levels" ? levels : undefined) })).toEqual(
      value(num(499_998 + 499_999))
    );
  });

  test("indexing", () => {
    expect(run("flows[2]")).toEqual(value(num(3400)));
    expect(run("flows[3]")).toEqual({ ok: false, code: "INDEX_OUT_OF_RANGE", message: "index 3 is outside a sequence of 3" });
  });

  test("strings and sequences", () => {
    expect(run("len(river)")).toEqual(value(num(10)));
    expect(run("lower(names)")).toEqual(value(seq(["10yr", "500yr"])));
    expect(run("upper(river)")).toEqual(value(str("MILL CREEK")));
    expect(run("contains(['10yr', '100yr'], lower(names))")).toEqual(value(bool(true)));
    expect(run("contains(['100yr'], lower(names))")).toEqual(value(bool(false)));
    expect(run("contains(river, 'Creek')")).toEqual(value(bool(true)));
    expect(run("contains(flows, 2500)")).toEqual(value(bool(true)));
  });

  test("numeric helpers", () => {
    expect(run("abs(-2)")).toEqual(value(num(2)));
    expect(run("round(2.5)")).toEqual(value(num(3)));
    expect(run("between(n, 0.020, 0.150)")).toEqual(value(bool(true)));
    expect(run("all(true, n > 0)")).toEqual(value(bool(true)));
    expect(run("any(false, n > 1)")).toEqual(value(bool(false)));
  });
});
