// packages/cli/__tests__/cli.test.ts
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { parseReportJson } from "../../report/src/index.js";
import { runCli, type CliIo } from "../src/commands.js";

const FIXTURES = fileURLToPath(new URL("../../parse/__tests__/fixtures/", import.meta.url));
const CREEK = join(FIXTURES, "Creek.prj");

let dir = "";

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "hydrocheck-cli-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function harness() {
  const out: string[] = [];
  const err: string[] = [];
  const logs: string[] = [];
  const io: CliIo = {
    stdout: (t) => void out.push(t),
    stderr: (t) => void err.push(t),
    cwd: dir,
    env: {},
    logDestination: { write: (s: string) => void logs.push(s) },
    now: () => new Date(Date.UTC(2024, 4, 1)),
  };
  return { io, stdout: () => out.join(""), stderr: () => err.join(""), logs };
}

describe("hydrocheck run", () => {
  test("a passing project exits 0 and prints the summary", async () => {
    const h = harness();
    expect(await runCli(["run", CREEK], h.io)).toBe(0);
    expect(h.stdout()).toContain("  12 passed, 0 failed, 0 not applicable, 0 errors");
    expect(h.stdout()).not.toContain("must be resolved");
  });

  test("a violation failure exits 1", async () => {
    const h = harness();
    expect(await runCli(["run", CREEK, "--state", "TX"], h.io)).toBe(1);
    expect(h.stdout()).toContain("  FAIL   TX-FW-001  ");
    expect(h.stdout()).toContain("violation failure(s) must be resolved before submission.");
  });

  test("--json - writes only the report to stdout", async () => {
    const h = harness();
    expect(await runCli(["run", CREEK, "--json", "-"], h.io)).toBe(0);
    const parsed = parseReportJson(h.stdout());
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.report.summary.total).toBe(12);
    expect(parsed.report.metadata.tool).toEqual({ name: "hydrocheck", version: "0.4.0" });
    expect(parsed.report.metadata.generated_at).toBe("2024-05-01T00:00:00.000Z");
  });

  test("report files and the archive are written, and the archive verifies", async () => {
    const h = harness();
    const code = await runCli(
      ["run", CREEK, "--json", "report.json", "--markdown", "report.md", "--archive", "reports.db", "--log-level", "info"],
      h.io
    );
    expect(code).toBe(0);

    const json = parseReportJson(await readFile(join(dir, "report.json"), "utf8"));
    expect(json.ok).toBe(true);
    const markdown = await readFile(join(dir, "report.md"), "utf8");
    expect(markdown.split("\n")[0]).toBe("# Compliance report");
    expect(markdown).toContain("> All applicable checks passed.");

    const messages = h.logs.map((l): unknown => JSON.parse(l));
    expect(messages).toContainEqual(expect.objectContaining({ level: "info", msg: "stage completed", stage: "evaluate" }));
    expect(messages).toContainEqual(expect.objectContaining({ msg: "report archived", inserted: true }));

    const again = harness();
    expect(await runCli(["archive", "reports.db", "--verify"], again.io)).toBe(0);
    expect(again.stdout()).toContain("  Creek.prj  exit 0  0/12 failed");
    expect(again.stderr()).toBe("");
  });

  test("a missing project file is fatal", async () => {
    const h = harness();
    expect(await runCli(["run", join(dir, "Nowhere.prj")], h.io)).toBe(2);
    expect(h.stderr()).toMatch(/^hydrocheck: /);
  });

  test("a missing --config file is a configuration error", async () => {
    const h = harness();
    expect(await runCli(["run", CREEK, "--config", "absent.yaml"], h.io)).toBe(2);
    expect(h.stderr()).toBe(`hydrocheck: configuration error: config file not found: ${join(dir, "absent.yaml")}\n`);
  });
});

describe("hydrocheck list-rules", () => {
  test("bundled rules in load order", async () => {
    const h = harness();
    expect(await runCli(["list-rules", "--state", "maine"], h.io)).toBe(0);
    const lines = h.stdout().split("\n");
    expect(lines[0]).toMatch(/^Rule sets: fema-baseline \S+, maine-overlay \S+$/);
    expect(lines[1]).toMatch(/^ {2}FEMA-/);
    expect(lines).toContain("  11 rules total");
  });

  test("--no-bundled without rule files lists nothing", async () => {
    const h = harness();
    expect(await runCli(["list-rules", "--no-bundled"], h.io)).toBe(0);
    expect(h.stdout()).toBe("Rule sets: (none)\n\n  0 rules total\n");
  });
});

describe("hydrocheck summary", () => {
  test("entity counts without evaluating rules", async () => {
    const h = harness();
    expect(await runCli(["summary", CREEK], h.io)).toBe(0);
    const lines = h.stdout().split("\n");
    expect(lines.slice(0, 2)).toEqual(["Model summary", "  Project:  Mill Creek Study"]);
    expect(lines).toContain("  Files:    Creek.f01, Creek.g01, Creek.p01, Creek.prj");
    expect(lines).toContain(
      "  Entities: 1 project, 1 plan, 1 reach, 2 cross_section, 1 structure, 3 profile, 1 flow_change, 3 boundary"
    );
    expect(lines).toContain("  Profiles: 100yr, 10yr, 500yr");
  });
});

describe("usage", () => {
  test("help exits 0 and unknown options exit 2", async () => {
    const help = harness();
    expect(await runCli(["--help"], help.io)).toBe(0);
    expect(help.stdout()).toContain("Usage: hydrocheck");

    const bad = harness();
    expect(await runCli(["run", CREEK, "--frobnicate"], bad.io)).toBe(2);
    expect(bad.stderr()).toContain("unknown option '--frobnicate'");
  });
});
