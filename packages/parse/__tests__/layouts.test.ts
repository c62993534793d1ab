// packages/parse/__tests__/layouts.test.ts
import { describe, expect, test } from "vitest";

import { defaultLayoutRegistry, detectFileKind, parseLayoutDocument, selectVariant } from "../src/index.js";

describe("layout registry", () => {
  const registry = defaultLayoutRegistry();

  test("picks the newest variant at or below the version marker", () => {
    expect(selectVariant(registry, "geometry", 5.07)?.id).toBe("geometry-v5");
    expect(selectVariant(registry, "geometry", 4.1)?.id).toBe("geometry-v4");
    expect(selectVariant(registry, "geometry", null)?.id).toBe("geometry-v4");
    expect(selectVariant(registry, "plan", 6.3)?.id).toBe("plan-v4");
  });

  test("extended variants inherit the base sections and add fields", () => {
    const v5 = selectVariant(registry, "geometry", 5);
    const xs = v5?.sections.find((s) => s.name === "CrossSection");
    const keys = xs?.fields.map((f) => ("key" in f ? f.key : f.field));
    expect(keys).toContain("#Mann");
    expect(keys).toContain("Node Last Edited Time");
  });

  test("rejects a variant extending an unknown base", () => {
    expect(() =>
      parseLayoutDocument({
        format: "test",
        variants: [{ id: "child", kind: "plan", minVersion: 5, extends: "missing" }],
      })
    ).toThrow("layout variant child extends unknown variant missing");
  });

  test("rejects malformed descriptors", () => {
    expect(() =>
      parseLayoutDocument({
        format: "test",
        variants: [{ id: "bad", kind: "plan", minVersion: 0, root: "Plan", rootFields: [{ kind: "scalar", key: "X" }], sections: [] }],
      })
    ).toThrow();
  });
});

describe("detectFileKind", () => {
  test("maps numbered suffixes to text kinds", () => {
    expect(detectFileKind("Creek.g01")).toEqual({ kind: "geometry", key: "g01", stem: "Creek" });
    expect(detectFileKind("models/Creek.f02")).toEqual({ kind: "steady_flow", key: "f02", stem: "Creek" });
    expect(detectFileKind("Creek.U03")?.kind).toBe("unsteady_flow");
    expect(detectFileKind("CREEK.PRJ")).toEqual({ kind: "project", key: "prj", stem: "CREEK" });
  });

  test("binary result containers carry their plan key", () => {
    expect(detectFileKind("Creek.p01.hdf")).toEqual({ kind: "results", key: "p01", stem: "Creek" });
    expect(detectFileKind("Creek.h5")).toEqual({ kind: "results", key: "Creek", stem: "Creek" });
  });

  test("anything else is not a model file", () => {
    expect(detectFileKind("notes.txt")).toBeNull();
    expect(detectFileKind("Creek.g1")).toBeNull();
  });
});
