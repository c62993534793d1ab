// packages/report/__tests__/archive.test.ts
import Database from "better-sqlite3";
import { describe, expect, test } from "vitest";

import { hashReport, SqliteReportArchive } from "../src/index.js";
import { MANN_PASS, sampleReport } from "./_helpers/sample.js";

function archive() {
  const db = new Database(":memory:");
  let tick = 0;
  const store = new SqliteReportArchive(db, { now: () => new Date(Date.UTC(2024, 5, 1, 0, 0, tick++)) });
  return { db, store };
}

describe("SqliteReportArchive", () => {
  test("stores, lists and verifies a report", () => {
    const { store } = archive();
    const report = sampleReport();
    const first = store.store(report);
    expect(first).toEqual({ report_hash: hashReport(report), inserted: true });

    expect(store.list()).toEqual([
      {
        report_hash: first.report_hash,
        project: "Creek.prj",
        generated_at: "2024-05-01T12:00:00.000Z",
        exit_code: 1,
        finding_count: 5,
        fail_count: 2,
        archived_at: "2024-06-01T00:00:00.000Z",
      },
    ]);

    const v = store.verify(first.report_hash);
    expect(v.ok).toBe(true);
    if (v.ok) expect(v.report).toEqual(report);
  });

  test("storing the same report again is a no-op", () => {
    const { store } = archive();
    store.store(sampleReport());
    expect(store.store(sampleReport([...sampleReport().findings], { generatedAt: "2031-01-01T00:00:00.000Z" })).inserted).toBe(false);
    expect(store.list()).toHaveLength(1);
  });

  test("lists by project, oldest first", () => {
    const { store } = archive();
    const a = store.store(sampleReport());
    const b = store.store(sampleReport([MANN_PASS]));
    const other = sampleReport([MANN_PASS], { inputs: [{ name: "Other.prj", kind: "project", bytes: 1, sha256: "d".repeat(64) }] });
    store.store(other);

    expect(store.list("Creek.prj").map((e) => e.report_hash)).toEqual([a.report_hash, b.report_hash]);
    expect(store.list("Other.prj").map((e) => e.exit_code)).toEqual([0]);
  });

  test("detects an edited report", () => {
    const { db, store } = archive();
    const { report_hash } = store.store(sampleReport());
    const stored = store.load(report_hash);
    expect(stored?.summary.total).toBe(5);

    db.prepare(`UPDATE compliance_reports SET report_json=replace(report_json, '"status":"fail"', '"status":"pass"') WHERE report_hash=?`).run(
      report_hash
    );

    const v = store.verify(report_hash);
    expect(v.ok).toBe(false);
    if (!v.ok) expect(v.code).toBe("TAMPERED");
    expect(store.load(report_hash)).toBeNull();
    expect(store.verifyAll().map((f) => [f.report_hash, f.code])).toEqual([[report_hash, "TAMPERED"]]);
  });

  test("reports rows that no longer parse", () => {
    const { db, store } = archive();
    const { report_hash } = store.store(sampleReport());
    db.prepare(`UPDATE compliance_reports SET report_json='{"findings":' WHERE report_hash=?`).run(report_hash);
    const broken = store.verify(report_hash);
    expect(broken.ok ? null : broken.code).toBe("JSON_INVALID");

    db.prepare(`UPDATE compliance_reports SET report_json='{"findings":[]}' WHERE report_hash=?`).run(report_hash);
    const partial = store.verify(report_hash);
    expect(partial.ok ? null : partial.code).toBe("SCHEMA_INVALID");
  });

  test("an unknown hash is not found", () => {
    const { store } = archive();
    expect(store.verify("0".repeat(64))).toEqual({ ok: false, code: "NOT_FOUND", message: `no archived report ${"0".repeat(64)}` });
  });
});
