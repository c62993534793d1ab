// packages/pipeline/__tests__/run.test.ts
import { copyFile, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, describe, expect, test } from "vitest";

import { hashReport } from "../../report/src/index.js";
import { checkProject, loadProject, readResultInput, readTextInput, rulePathsFor, type ProgressEvent } from "../src/index.js";

const FIXTURES = fileURLToPath(new URL("../../parse/__tests__/fixtures/", import.meta.url));
const CREEK = join(FIXTURES, "Creek.prj");
const TOOL = { name: "hydrocheck", version: "0.0.0-test" };
const NOW = () => new Date(Date.UTC(2024, 4, 1));

describe("checkProject", () => {
  test("the Mill Creek study passes the federal baseline", async () => {
    const { report, model } = await checkProject(CREEK, { tool: TOOL, now: NOW });

    expect(report.summary.total).toBe(12);
    expect(report.summary.by_status.pass).toBe(12);
    expect(report.rule_errors).toEqual([]);
    expect(report.metadata.generated_at).toBe("2024-05-01T00:00:00.000Z");
    expect(report.metadata.inputs.map((i) => [i.name, i.kind])).toEqual([
      ["Creek.f01", "steady_flow"],
      ["Creek.g01", "geometry"],
      ["Creek.p01", "plan"],
      ["Creek.prj", "project"],
    ]);
    expect(model.sources).toEqual(["Creek.f01", "Creek.g01", "Creek.p01", "Creek.prj"]);
  });

  test("the Texas overlay fails the floodway surcharge", async () => {
    const { report } = await checkProject(CREEK, { tool: TOOL, now: NOW, state: "TX" });
    const fw = report.findings.filter((f) => f.category === "FW");
    expect(fw.map((f) => [f.rule_id, f.status])).toEqual([["TX-FW-001", "fail"]]);
    expect(report.metadata.rule_set.documents.map((d) => d.id)).toEqual(["fema-baseline", "texas-overlay"]);
  });

  test("identical runs hash identically", async () => {
    const a = await checkProject(CREEK, { tool: TOOL, now: () => new Date(0) });
    const b = await checkProject(CREEK, { tool: TOOL, now: NOW });
    expect(hashReport(a.report)).toBe(hashReport(b.report));
  });

  test("stages are reported in order", async () => {
    const events: ProgressEvent[] = [];
    await checkProject(CREEK, { tool: TOOL, onProgress: (e) => events.push(e) });
    const stages = events.flatMap((e) => (e.type === "warning" ? [] : [`${e.type}:${e.stage}`]));
    expect(stages).toEqual(
      ["discover", "parse", "build", "rules", "evaluate", "report"].flatMap((s) => [`stage_started:${s}`, `stage_completed:${s}`])
    );
  });

  test("a failing listener does not interrupt the run", async () => {
    const { report } = await checkProject(CREEK, {
      tool: TOOL,
      onProgress: () => {
        throw new Error("boom");
      },
    });
    expect(report.summary.total).toBe(12);
    expect(report.warnings).toContainEqual({ source: "pipeline", message: "progress listener failed: boom" });
  });
});

describe("rulePathsFor", () => {
  test("bundled documents come first", () => {
    const paths = rulePathsFor({ state: "maine", rulePaths: ["local.yaml"] });
    expect(paths.map((p) => p.split(/[\\/]/).pop())).toEqual(["fema.yaml", "maine.yaml", "local.yaml"]);
    expect(rulePathsFor({ bundled: false, rulePaths: ["local.yaml"] })).toEqual(["local.yaml"]);
  });
});

describe("loadProject with damaged inputs", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  test("missing and unreadable files become warnings", async () => {
    dir = await mkdtemp(join(tmpdir(), "hydrocheck-"));
    await writeFile(
      join(dir, "Temp.prj"),
      ["Proj Title=Temp", "Current Plan=p01", "Geom File=g01", "Geom File=g02", "Plan File=p01"].join("\n")
    );
    await writeFile(join(dir, "Temp.g01"), "Geom Title=x\u0000\n");
    await copyFile(join(FIXTURES, "Creek.p01"), join(dir, "Temp.p01"));
    await writeFile(join(dir, "Temp.p01.hdf"), "not a container");

    const loaded = await loadProject(join(dir, "Temp.prj"));

    expect(loaded.manifest.texts).toEqual([join(dir, "Temp.g01"), join(dir, "Temp.p01")]);
    expect(loaded.manifest.missing).toEqual([join(dir, "Temp.g02")]);
    expect(loaded.manifest.results).toEqual([{ path: join(dir, "Temp.p01.hdf"), plan: "p01" }]);
    expect(loaded.warnings).toEqual([
      { source: "Temp.prj", message: "references Temp.g02, which was not found" },
      { source: "Temp.g01", message: "PARSE_ERROR: Temp.g01:0: file is not text (NUL bytes present)" },
      {
        source: "Temp.p01.hdf",
        message: `RESULT_READ_ERROR: ${join(dir, "Temp.p01.hdf")}: not a result container (signature missing)`,
      },
    ]);
    expect(loaded.inputs.map((i) => i.name)).toEqual(["Temp.p01", "Temp.prj"]);
    expect(loaded.model.entities.map((e) => `${e.type}:${e.id}`)).toEqual(["project:Temp", "plan:p01"]);
  });

  test("an OS error reading one file becomes that file's warning", async () => {
    dir = await mkdtemp(join(tmpdir(), "hydrocheck-"));
    await mkdir(join(dir, "Temp.g01"));
    await mkdir(join(dir, "Temp.p01.hdf"));

    const text = await readTextInput(join(dir, "Temp.g01"));
    expect(text.ok).toBe(false);
    if (text.ok) return;
    expect(text.warning.source).toBe("Temp.g01");
    expect(text.warning.message).toMatch(/^PARSE_ERROR: Temp\.g01:0: cannot read file: EISDIR/);

    const results = await readResultInput(join(dir, "Temp.p01.hdf"), "p01");
    expect(results.ok).toBe(false);
    if (results.ok) return;
    expect(results.warning.source).toBe("Temp.p01.hdf");
    expect(results.warning.message.startsWith(`RESULT_READ_ERROR: ${join(dir, "Temp.p01.hdf")}: cannot read file: EISDIR`)).toBe(true);
  });
});
