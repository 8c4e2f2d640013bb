import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { RunOutcome } from "../types/reconciliation.js";
import { logger as defaultLogger } from "../utils/logger.js";
import {
  advanceWatermark,
  getTaskState,
  hasPendingChanges,
  latestChangeSeq,
  recordTaskRun,
  setSuspended,
} from "../db/taskState.js";
import { runItemReconciliation, runTotalsReconciliation } from "./reconcile.js";
import { detectAnomalies, type AnomalyOutcome } from "./anomalyDetection.js";
import { nowIso } from "./values.js";

export const RECONCILE_TASK_NAME = "reconcile";

export interface ReconcileTaskConfig {
  db: Database.Database;
  intervalMs?: number;
  reportUnavailableFields?: boolean;
  anomalyDetection?: { enabled: boolean; zThreshold: number };
  logger?: Logger;
  clock?: () => Date;
}

export type TaskRunResult =
  | { skipped: true; reason: "suspended" | "no_changes" }
  | {
      skipped: false;
      items: RunOutcome;
      totals: RunOutcome;
      anomalies: AnomalyOutcome | null;
      watermarkAdvanced: boolean;
    };

/**
 * Periodic reconciliation. A tick only does work when the bronze tables have
 * changed since the last successful run; runs are synchronous on the single
 * connection, so ticks cannot overlap. The watermark only moves when both
 * passes succeed, which makes a failed run retry on the next tick.
 */
export class ReconcileTask {
  private readonly db: Database.Database;
  private readonly intervalMs: number;
  private readonly reportUnavailableFields: boolean;
  private readonly anomalyDetection: { enabled: boolean; zThreshold: number };
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(config: ReconcileTaskConfig) {
    this.db = config.db;
    this.intervalMs = config.intervalMs ?? 180_000; // 3 minutes
    this.reportUnavailableFields = config.reportUnavailableFields ?? true;
    this.anomalyDetection = config.anomalyDetection ?? { enabled: false, zThreshold: 2 };
    this.logger = config.logger ?? defaultLogger;
    this.clock = config.clock ?? (() => new Date());
  }

  execute(opts: { force?: boolean } = {}): TaskRunResult {
    const state = getTaskState(this.db, RECONCILE_TASK_NAME);

    if (!opts.force && state.suspended) return { skipped: true, reason: "suspended" };
    if (!opts.force && !hasPendingChanges(this.db, RECONCILE_TASK_NAME)) {
      this.logger.debug({ event: "reconcile_task.idle" }, "No upstream changes since last run");
      return { skipped: true, reason: "no_changes" };
    }

    const seq = latestChangeSeq(this.db);
    const now = this.clock();

    const items = runItemReconciliation(this.db, { now, logger: this.logger });
    const totals = runTotalsReconciliation(this.db, {
      now,
      logger: this.logger,
      reportUnavailableFields: this.reportUnavailableFields,
    });

    const watermarkAdvanced = items.ok && totals.ok;
    if (watermarkAdvanced) advanceWatermark(this.db, RECONCILE_TASK_NAME, seq);

    const anomalies = this.anomalyDetection.enabled
      ? detectAnomalies(this.db, { zThreshold: this.anomalyDetection.zThreshold, now, logger: this.logger })
      : null;

    recordTaskRun(this.db, RECONCILE_TASK_NAME, nowIso(now), `${items.message} ${totals.message}`);

    this.logger.info(
      {
        event: "reconcile_task.complete",
        itemsOk: items.ok,
        totalsOk: totals.ok,
        anomaliesOk: anomalies?.ok ?? null,
        watermark: watermarkAdvanced ? seq : state.watermark,
      },
      watermarkAdvanced ? "Reconciliation task complete" : "Reconciliation task failed; will retry on next tick"
    );

    return { skipped: false, items, totals, anomalies, watermarkAdvanced };
  }

  start(): void {
    if (this.timer) return;
    this.logger.info(
      { event: "reconcile_task.started", intervalMs: this.intervalMs },
      `Reconciliation task started (interval: ${this.intervalMs}ms)`
    );
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /** One scheduled run. Errors are logged and the next tick retries. */
  private tick(): void {
    try {
      this.execute();
    } catch (err) {
      this.logger.error({ event: "reconcile_task.error", err }, "Reconciliation tick failed; will retry on next tick");
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ event: "reconcile_task.stopped" }, "Reconciliation task stopped");
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  suspend(): void {
    setSuspended(this.db, RECONCILE_TASK_NAME, true);
    this.logger.info({ event: "reconcile_task.suspended" }, "Reconciliation task suspended");
  }

  resume(): void {
    setSuspended(this.db, RECONCILE_TASK_NAME, false);
    this.logger.info({ event: "reconcile_task.resumed" }, "Reconciliation task resumed");
  }
}
