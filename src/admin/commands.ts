import path from "node:path";
import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { Config } from "../config.js";
import {
  REVIEW_STATUSES,
  VALIDATION_STATUSES,
  type ReconcileKind,
  type ValidationStatus,
} from "../types/reconciliation.js";
import type { CliArgs } from "../utils/args.js";
import { getArg, hasFlag } from "../utils/args.js";
import { loadSeedData, seedDatabase } from "../adapters/loadSeedData.js";
import { createReconcileStore } from "../db/reconcileStore.js";
import { getValidationStats, getReconciliationMetrics, listCurrentStatus } from "../db/statusViews.js";
import { getAnomalies } from "../db/anomalyResults.js";
import { ReconcileTask, type TaskRunResult } from "../engine/reconcileTask.js";
import { validateInvoice, type ValidationOutcome } from "../engine/validateInvoice.js";
import { markReviewed, type ReviewOutcome } from "../engine/reviewResult.js";
import { detectAnomalies } from "../engine/anomalyDetection.js";

export type CommandContext = {
  db: Database.Database;
  config: Config;
  logger: Logger;
};

/** What a command hands back to the CLI: something to print, and whether it failed. */
export type CommandResult = { ok: boolean; output: unknown };

function parseKind(raw: string | undefined): ReconcileKind {
  if (raw === undefined || raw === "totals") return "totals";
  if (raw === "items") return "items";
  throw new Error(`--kind must be "totals" or "items" (got "${raw}")`);
}

function parseAmount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--total must be a number (got "${raw}")`);
  return n;
}

function parseVersion(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new Error(`--expected-version must be a non-negative integer`);
  return n;
}

function isOneOf<T extends string>(values: readonly T[], v: string): v is T {
  return values.some((x) => x === v);
}

function parseValidationStatus(raw: string | undefined): ValidationStatus | undefined {
  if (raw === undefined) return undefined;
  const v = raw.toUpperCase();
  if (!isOneOf(VALIDATION_STATUSES, v)) {
    throw new Error(`--status must be one of ${VALIDATION_STATUSES.join(", ")}`);
  }
  return v;
}

export function createTask(ctx: CommandContext) {
  return new ReconcileTask({
    db: ctx.db,
    intervalMs: ctx.config.reconcileIntervalMs,
    reportUnavailableFields: ctx.config.reportUnavailableFields,
    anomalyDetection: {
      enabled: ctx.config.anomalyDetectionEnabled,
      zThreshold: ctx.config.anomalyZThreshold,
    },
    logger: ctx.logger,
  });
}

export function seedCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const file = getArg(args, "file", path.join(process.cwd(), "data", "seed.json"));
  const counts = seedDatabase(ctx.db, loadSeedData(file));
  return { ok: true, output: { seeded: counts, file } };
}

export function reconcileCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const result: TaskRunResult = createTask(ctx).execute({ force: hasFlag(args, "force") });
  if (result.skipped) return { ok: true, output: { skipped: result.reason } };
  return {
    ok: result.items.ok && result.totals.ok,
    output: {
      items: result.items.message,
      totals: result.totals.message,
      anomalies: result.anomalies?.message ?? null,
    },
  };
}

export function validateCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const outcome: ValidationOutcome = validateInvoice(
    ctx.db,
    {
      invoiceNo: getArg(args, "invoice", ""),
      fileName: getArg(args, "file", ""),
      validatedBy: getArg(args, "by", ""),
      overrides: {
        customerNo: getArg(args, "customer"),
        invoiceDate: getArg(args, "date"),
        totalAmount: parseAmount(getArg(args, "total")),
        costCenter: getArg(args, "cost-center"),
      },
      notes: getArg(args, "notes"),
      status: parseValidationStatus(getArg(args, "status")),
      expectedVersion: parseVersion(getArg(args, "expected-version")),
    },
    { logger: ctx.logger }
  );
  return { ok: outcome.status === "validated", output: outcome };
}

export function reviewCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const outcome: ReviewOutcome = markReviewed(
    ctx.db,
    {
      kind: parseKind(getArg(args, "kind")),
      invoiceId: getArg(args, "invoice", ""),
      reviewedBy: getArg(args, "by", ""),
      notes: getArg(args, "notes"),
    },
    { logger: ctx.logger }
  );
  return { ok: outcome.status === "reviewed", output: outcome };
}

export function resultsCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const store = createReconcileStore(ctx.db, parseKind(getArg(args, "kind")));
  const status = getArg(args, "status", "Pending Review");

  if (status === "All") return { ok: true, output: store.getAll() };
  if (!isOneOf(REVIEW_STATUSES, status)) {
    throw new Error(`--status must be one of ${[...REVIEW_STATUSES, "All"].join(", ")}`);
  }
  return { ok: true, output: store.listByStatus(status) };
}

export function statusCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  const status = parseValidationStatus(getArg(args, "status"));
  return { ok: true, output: listCurrentStatus(ctx.db, { invoiceNo: getArg(args, "invoice"), status }) };
}

export function statsCommand(ctx: CommandContext): CommandResult {
  return { ok: true, output: getValidationStats(ctx.db) };
}

export function metricsCommand(ctx: CommandContext): CommandResult {
  return { ok: true, output: getReconciliationMetrics(ctx.db) };
}

export function anomaliesCommand(ctx: CommandContext, args: CliArgs): CommandResult {
  if (hasFlag(args, "scan")) {
    const outcome = detectAnomalies(ctx.db, { zThreshold: ctx.config.anomalyZThreshold, logger: ctx.logger });
    return { ok: outcome.ok, output: outcome };
  }
  return { ok: true, output: getAnomalies(ctx.db, getArg(args, "batch")) };
}
