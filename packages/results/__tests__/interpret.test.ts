// packages/results/__tests__/interpret.test.ts
import { describe, expect, test } from "vitest";

import type { ResultSource } from "../../model/src/index.js";
import { interpretResults, normalizeStation } from "../src/interpret.js";
import { readResultDatasets } from "../src/reader.js";
import { creekContainer } from "./_helpers/creek-container.js";

function creekSource(): ResultSource {
  return { source: "Creek.p01.hdf", plan: "p01", ...readResultDatasets(creekContainer()) };
}

describe("interpretResults", () => {
  test("lifts per-profile matrices onto cross sections", () => {
    const facts = interpretResults(creekSource());
    expect(facts.profiles).toEqual(["10yr", "100yr", "500yr"]);
    expect(facts.warnings).toEqual([]);
    expect(facts.cross_sections.map((x) => [x.river, x.reach, x.station])).toEqual([
      ["Mill Creek", "Upper", "5280"],
      ["Mill Creek", "Upper", "5000"],
      ["Mill Creek", "Upper", "4800"],
    ]);
    expect(facts.cross_sections[0]?.profiles["10yr"]).toEqual({ water_surface: 96.1, flow: 1200 });
    expect(facts.cross_sections[1]?.profiles["100yr"]).toEqual({ water_surface: 92.8, flow: 2500 });
    expect(facts.cross_sections[2]?.profiles["500yr"]).toEqual({ water_surface: 92.0, flow: 3400 });
  });

  test("as-run columns are read per cross section", () => {
    const facts = interpretResults(creekSource());
    expect(facts.cross_sections[0]?.as_run).toEqual({
      bank_left: 52,
      bank_right: 150,
      length_left: 500,
      length_channel: 520,
      length_right: 510,
    });
    expect(facts.cross_sections[2]?.as_run).toEqual({
      bank_left: 10,
      bank_right: 90,
      length_left: 0,
      length_channel: 0,
      length_right: 0,
    });
  });

  test("plan information attributes are carried", () => {
    expect(interpretResults(creekSource()).plan_information["Plan ShortID"]).toBe("Existing");
  });

  test("a matrix of the wrong shape is skipped with a warning", () => {
    const base = creekSource();
    const source: ResultSource = {
      ...base,
      datasets: base.datasets.map((d) => (d.path.endsWith("/Water Surface") ? { ...d, shape: [2, 3] } : d)),
    };
    const facts = interpretResults(source);
    expect(facts.cross_sections[0]?.profiles["10yr"]).toEqual({ flow: 1200 });
    expect(facts.warnings).toEqual([
      "Results/Steady/Output/Output Blocks/Base Output/Steady Profiles/Cross Sections/Water Surface: " +
        "shape [2, 3] does not fit 3 profiles x 3 cross sections",
    ]);
  });

  test("short identifier lists attach results to the cross sections they name", () => {
    const base = creekSource();
    const source: ResultSource = {
      ...base,
      datasets: base.datasets.map((d) =>
        d.path.endsWith("/River Stations") ? { ...d, shape: [2], values: ["5280.0", "5000"] } : d
      ),
    };
    const facts = interpretResults(source);
    expect(facts.warnings).toEqual([
      "cross-section identifier lengths differ (3/3/2); results attached to the first 2 cross sections only",
    ]);
    expect(facts.cross_sections.map((x) => x.station)).toEqual(["5280", "5000"]);
    expect(facts.cross_sections[1]?.profiles["100yr"]).toEqual({ water_surface: 92.8, flow: 2500 });
    expect(facts.cross_sections[1]?.as_run["bank_right"]).toBe(120);
  });

  test("an unknown layout id is a read error", () => {
    expect(() => interpretResults({ ...creekSource(), layout: "ras-results-v9" })).toThrow(
      "Creek.p01.hdf: unknown result layout ras-results-v9"
    );
  });
});

describe("normalizeStation", () => {
  test("numeric stations compare by value", () => {
    expect(normalizeStation("5280.0")).toBe("5280");
    expect(normalizeStation(" 12.50 ")).toBe("12.5");
    expect(normalizeStation("5100*")).toBe("5100*");
  });
});
