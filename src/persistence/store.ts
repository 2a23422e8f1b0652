import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { MissionStatus } from "../executor/phases.js";

export type RunRecord = {
  runId: string;
  missionPath: string;
  status: MissionStatus;
  cancelled: boolean;
  startedAt: string;
  finishedAt: string;
  durationSec: number;
  failedOrBlocked: string[];
  reportPath: string | null;
};

type RunRow = {
  run_id: string;
  mission_path: string;
  status: string;
  cancelled: number;
  started_at: string;
  finished_at: string;
  duration_sec: number;
  failed_or_blocked: string;
  report_path: string | null;
};

const StatusSchema = z.enum(["succeeded", "failed"]);
const IdListSchema = z.array(z.string());

/** Run history, one row per finished mission run. Pass ":memory:" in tests. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id            TEXT PRIMARY KEY,
        mission_path      TEXT NOT NULL,
        status            TEXT NOT NULL,
        cancelled         INTEGER NOT NULL DEFAULT 0,
        started_at        TEXT NOT NULL,
        finished_at       TEXT NOT NULL,
        duration_sec      REAL NOT NULL,
        failed_or_blocked TEXT NOT NULL DEFAULT '[]',
        report_path       TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(run: RunRecord): void {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO runs
          (run_id, mission_path, status, cancelled, started_at, finished_at, duration_sec, failed_or_blocked, report_path)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        run.runId,
        run.missionPath,
        run.status,
        run.cancelled ? 1 : 0,
        run.startedAt,
        run.finishedAt,
        run.durationSec,
        JSON.stringify(run.failedOrBlocked),
        run.reportPath,
      );
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRecord(row) : undefined;
  }

  /** Most recent first. */
  list(limit = 20): RunRecord[] {
    const rows = this.db
      .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?")
      .all(limit);
    return rows.map(rowToRecord);
  }

  /** Delete runs that started before an ISO timestamp. Returns the count removed. */
  deleteOlderThan(isoTimestamp: string): number {
    return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(isoTimestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    missionPath: row.mission_path,
    status: StatusSchema.parse(row.status),
    cancelled: row.cancelled === 1,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationSec: row.duration_sec,
    failedOrBlocked: IdListSchema.parse(JSON.parse(row.failed_or_blocked)),
    reportPath: row.report_path,
  };
}
