// src/db/taskState.ts
import type Database from "better-sqlite3";

export type TaskStateRow = {
  taskName: string;
  watermark: number;
  suspended: boolean;
  lastRunAt: string | null;
  lastMessage: string | null;
};

type RawTaskState = {
  task_name: string;
  watermark: number;
  suspended: number;
  last_run_at: string | null;
  last_message: string | null;
};

function ensureTask(db: Database.Database, taskName: string) {
  db.prepare(`INSERT OR IGNORE INTO task_state (task_name) VALUES (?)`).run(taskName);
}

export function getTaskState(db: Database.Database, taskName: string): TaskStateRow {
  ensureTask(db, taskName);
  const row = db.prepare<[string], RawTaskState>(`SELECT * FROM task_state WHERE task_name = ?`).get(taskName);
  return {
    taskName,
    watermark: row?.watermark ?? 0,
    suspended: row?.suspended === 1,
    lastRunAt: row?.last_run_at ?? null,
    lastMessage: row?.last_message ?? null,
  };
}

/** Highest change_log sequence written by the bronze-table triggers. */
export function latestChangeSeq(db: Database.Database): number {
  const row = db.prepare<[], { seq: number | null }>(`SELECT MAX(seq) AS seq FROM change_log`).get();
  return row?.seq ?? 0;
}

export function hasPendingChanges(db: Database.Database, taskName: string): boolean {
  return latestChangeSeq(db) > getTaskState(db, taskName).watermark;
}

export function advanceWatermark(db: Database.Database, taskName: string, seq: number) {
  ensureTask(db, taskName);
  db.prepare(`UPDATE task_state SET watermark = MAX(watermark, ?) WHERE task_name = ?`).run(seq, taskName);
}

export function recordTaskRun(db: Database.Database, taskName: string, runAt: string, message: string) {
  ensureTask(db, taskName);
  db.prepare(`UPDATE task_state SET last_run_at = ?, last_message = ? WHERE task_name = ?`).run(
    runAt,
    message,
    taskName
  );
}

export function setSuspended(db: Database.Database, taskName: string, suspended: boolean) {
  ensureTask(db, taskName);
  db.prepare(`UPDATE task_state SET suspended = ? WHERE task_name = ?`).run(suspended ? 1 : 0, taskName);
}
