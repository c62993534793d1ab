// packages/report/__tests__/markdown.test.ts
import { describe, expect, test } from "vitest";

import { categoryTitle, groupByCategory, renderMarkdown, renderTerminalSummary } from "../src/index.js";
import { ALL, MANN_PASS, sampleReport } from "./_helpers/sample.js";

describe("renderMarkdown", () => {
  const lines = renderMarkdown(sampleReport()).split("\n");

  test("header names the inputs and the rule sets", () => {
    expect(lines.slice(0, 9)).toEqual([
      "# Compliance report",
      "",
      "| Field | Value |",
      "|:--|:--|",
      "| Project | `Creek.prj` |",
      "| Generated | 2024-05-01T12:00:00.000Z |",
      "| Tool | hydrocheck 0.0.0-test |",
      "| Rule sets | fema-baseline 2024.1, texas-overlay 2024.1 |",
      `| Rule set sha256 | \`${"c".repeat(64)}\` |`,
    ]);
  });

  test("summary and verdict", () => {
    expect(lines).toContain("| FAIL | 2 |");
    expect(lines).toContain("| **Total** | **5** |");
    expect(lines).toContain("> **1 violation failure(s)** must be resolved before submission.");
    expect(lines).toContain(
      "- **TX-FW-001** Zero-rise floodway, plan p01: Floodway target surcharge is 1 ft; a zero-rise floodway is required"
    );
  });

  test("categories appear in a fixed order", () => {
    expect(lines.filter((l) => l.startsWith("### "))).toEqual([
      "### Manning's n (MANN)",
      "### Expansion and contraction coefficients (COEF)",
      "### Floodway and surcharge (FW)",
      "### ZED",
      "### Uncategorized",
    ]);
  });

  test("rows carry status, entity, message and citation", () => {
    expect(lines).toContain(
      "| PASS | FEMA-MANN-001 Channel roughness | cross_section Mill Creek/Upper/5000 | Channel Manning's n is 0.04; expected 0.020 to 0.150 | [Test citation](https://example.test/mann) |"
    );
    expect(lines).toContain("| N/A | LOCAL1 LOCAL1 | (all) | no boundary entity matches | Test citation |");
    expect(lines).toContain("| FAIL | X-ZED-001 X-ZED-001 | (all) | a \\| b | Test citation |");
  });

  test("warnings and rule errors are listed", () => {
    expect(lines).toContain("- `Creek.g01:5` MALFORMED_NUMBER: bad n (cross_section:Mill Creek/Upper/100)");
    expect(lines).toContain("- `LOC-FW-001` (local.yaml): missing citation");
  });

  test("a clean run says so", () => {
    const clean = renderMarkdown(sampleReport([MANN_PASS], { warnings: [], ruleErrors: [] })).split("\n");
    expect(clean).toContain("> All applicable checks passed.");
    expect(clean).not.toContain("## Violations");
    expect(clean).not.toContain("## Warnings");
  });
});

describe("grouping", () => {
  test("known categories first, then others alphabetically, then none", () => {
    expect(groupByCategory(ALL).map((g) => g.category)).toEqual(["MANN", "COEF", "FW", "ZED", null]);
    expect(categoryTitle("BC")).toBe("Boundary conditions (BC)");
  });
});

describe("renderTerminalSummary", () => {
  test("one line per finding and the counts", () => {
    expect(renderTerminalSummary(sampleReport()).split("\n")).toEqual([
      "  PASS   FEMA-MANN-001  Channel roughness @ cross_section Mill Creek/Upper/5000",
      "  FAIL   TX-FW-001  Zero-rise floodway @ plan p01",
      "  ERROR  FEMA-COEF-001  FEMA-COEF-001 @ cross_section Mill Creek/Upper/4800",
      "  SKIP   LOCAL1  LOCAL1",
      "  FAIL   X-ZED-001  X-ZED-001",
      "",
      "  1 passed, 2 failed, 1 not applicable, 1 errors",
      "",
      "  1 violation failure(s) must be resolved before submission.",
      "    TX-FW-001: Floodway target surcharge is 1 ft; a zero-rise floodway is required",
      "",
      "  1 rule(s) could not be loaded.",
    ]);
  });
});
