// packages/report/src/archive.ts
import type Database from "better-sqlite3";
import { z } from "zod";

import { stableStringify, type ComplianceReport } from "../../model/src/index.js";

import { exitCodeFor } from "./aggregate.js";
import { parseReportJson } from "./schema.js";
import { hashReport } from "./serialize.js";

export function ensureArchiveTables(db: Database.Database): void {
  db.prepare(`
    CREATE TABLE IF NOT EXISTS compliance_reports (
      report_hash TEXT PRIMARY KEY,
      project TEXT NOT NULL,
      generated_at TEXT NOT NULL,
      exit_code INTEGER NOT NULL,
      finding_count INTEGER NOT NULL,
      fail_count INTEGER NOT NULL,
      report_json TEXT NOT NULL,
      archived_at TEXT NOT NULL
    );
  `).run();

  db.prepare(`
    CREATE INDEX IF NOT EXISTS idx_compliance_reports_project
    ON compliance_reports(project, archived_at);
  `).run();
}

const EntryRow = z.object({
  report_hash: z.string(),
  project: z.string(),
  generated_at: z.string(),
  exit_code: z.number().int(),
  finding_count: z.number().int(),
  fail_count: z.number().int(),
  archived_at: z.string(),
});

export type ArchiveEntry = z.infer<typeof EntryRow>;

const StoredRow = z.object({ report_hash: z.string(), report_json: z.string() });

export type ArchiveVerification =
  | { ok: true; report_hash: string; report: ComplianceReport }
  | { ok: false; code: "NOT_FOUND" | "JSON_INVALID" | "SCHEMA_INVALID" | "TAMPERED"; message: string };

export type ArchiveOptions = { now?: () => Date };

const ENTRY_COLUMNS = "report_hash, project, generated_at, exit_code, finding_count, fail_count, archived_at";

/** Project input name, or the first input's name when there is no project file. */
function projectOf(report: ComplianceReport): string {
  const inputs = report.metadata.inputs;
  return (inputs.find((i) => i.kind === "project") ?? inputs[0])?.name ?? "";
}

/**
 * Reports keyed by their hash. Storing the same report twice is a no-op; the
 * stored JSON is re-hashed on every read so an edited row is detected.
 */
export class SqliteReportArchive {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: ArchiveOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    ensureArchiveTables(db);
  }

  store(report: ComplianceReport): { report_hash: string; inserted: boolean } {
    const report_hash = hashReport(report);
    const info = this.db
      .prepare(`
        INSERT OR IGNORE INTO compliance_reports(
          report_hash, project, generated_at, exit_code, finding_count, fail_count, report_json, archived_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        report_hash,
        projectOf(report),
        report.metadata.generated_at,
        exitCodeFor(report),
        report.summary.total,
        report.summary.by_status.fail,
        stableStringify(report),
        this.now().toISOString()
      );
    return { report_hash, inserted: info.changes > 0 };
  }

  /** Oldest first. */
  list(project?: string): ArchiveEntry[] {
    const rows =
      project === undefined
        ? this.db.prepare(`SELECT ${ENTRY_COLUMNS} FROM compliance_reports ORDER BY archived_at, report_hash`).all()
        : this.db
            .prepare(`SELECT ${ENTRY_COLUMNS} FROM compliance_reports WHERE project=? ORDER BY archived_at, report_hash`)
            .all(project);
    return rows.map((r) => EntryRow.parse(r));
  }

  verify(reportHash: string): ArchiveVerification {
    const row = this.db
      .prepare(`SELECT report_hash, report_json FROM compliance_reports WHERE report_hash=? LIMIT 1`)
      .get(reportHash);
    if (row === undefined) return { ok: false, code: "NOT_FOUND", message: `no archived report ${reportHash}` };

    const stored = StoredRow.parse(row);
    const parsed = parseReportJson(stored.report_json);
    if (!parsed.ok) return parsed;

    const computed = hashReport(parsed.report);
    if (computed !== stored.report_hash) {
      return { ok: false, code: "TAMPERED", message: `stored=${stored.report_hash} computed=${computed}` };
    }
    return { ok: true, report_hash: computed, report: parsed.report };
  }

  /** Every archived report that fails verification. */
  verifyAll(): Array<{ report_hash: string; code: string; message: string }> {
    const out: Array<{ report_hash: string; code: string; message: string }> = [];
    for (const entry of this.list()) {
      const v = this.verify(entry.report_hash);
      if (!v.ok) out.push({ report_hash: entry.report_hash, code: v.code, message: v.message });
    }
    return out;
  }

  load(reportHash: string): ComplianceReport | null {
    const v = this.verify(reportHash);
    return v.ok ? v.report : null;
  }
}
