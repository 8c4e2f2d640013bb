import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type {
  ReconcileFinding,
  ReconcileKind,
  ReconcileResult,
  ReconcileRunSummary,
  RunOutcome,
} from "../types/reconciliation.js";
import { createReconcileStore } from "../db/reconcileStore.js";
import { getAllExtractedInvoices } from "../db/extractionStore.js";
import { getAllLedgerTotals, getDistinctItemInvoiceIds } from "../db/ledgerStore.js";
import { logAuditEvent } from "../db/auditEvents.js";
import { errorMessage } from "../utils/errors.js";
import { mergeStatus } from "./mergeStatus.js";
import { computeTotalsFindings } from "./totalsDiff.js";
import { promoteAutoReconciled } from "./promoteGold.js";
import { nowIso } from "./values.js";

export const ITEM_MISMATCH_TEXT =
  "Items exist in TRANSACT_ITEMS but no corresponding extracted item data available";

/**
 * One reconciliation pipeline: where findings come from, which results table
 * they merge into, and what happens once the merge is done.
 */
export interface ReconcileSource {
  kind: ReconcileKind;
  label: string;
  successMessage: string;
  findings(db: Database.Database): ReconcileFinding[];
  afterMerge?(db: Database.Database, results: ReconcileResult[], runAt: string, logger?: Logger): string[];
}

export type ReconcileOptions = {
  now?: Date;
  logger?: Logger;
};

export const itemsSource: ReconcileSource = {
  kind: "items",
  label: "item",
  successMessage:
    "Item reconciliation executed. All items marked as Pending Review due to lack of extracted item-level data.",
  findings(db) {
    // No extracted line items exist to compare against, so nothing can auto-reconcile.
    return getDistinctItemInvoiceIds(db).map((invoiceId): ReconcileFinding => ({
      invoiceId,
      mismatchDetails: ITEM_MISMATCH_TEXT,
      availabilityNotes: null,
      reviewStatus: "Pending Review",
    }));
  },
};

export function createTotalsSource(opts: { reportUnavailableFields: boolean }): ReconcileSource {
  return {
    kind: "totals",
    label: "totals",
    successMessage:
      "Totals reconciliation executed. Discrepancies and auto-reconciled invoices merged into reconcile_results_totals. " +
      "Fully auto-reconciled invoices merged into gold_invoice_totals.",
    findings(db) {
      return computeTotalsFindings(getAllLedgerTotals(db), getAllExtractedInvoices(db), opts);
    },
    afterMerge: promoteAutoReconciled,
  };
}

/**
 * Merge a source's findings into its results table and run its follow-up,
 * all in one transaction. Failures come back as an error outcome.
 */
export function runReconciliation(
  db: Database.Database,
  source: ReconcileSource,
  opts: ReconcileOptions = {}
): RunOutcome {
  const { logger } = opts;
  const runAt = nowIso(opts.now);

  try {
    const run = db.transaction((): ReconcileRunSummary => {
      const store = createReconcileStore(db, source.kind);
      const summary: ReconcileRunSummary = {
        kind: source.kind,
        runAt,
        inserted: 0,
        updated: 0,
        removed: 0,
        autoReconciled: 0,
        pendingReview: 0,
        reviewed: 0,
        promoted: [],
      };

      const merged: ReconcileResult[] = [];
      for (const finding of source.findings(db)) {
        const existing = store.get(finding.invoiceId);
        const next = mergeStatus(existing, finding, runAt);
        store.upsert(next);
        merged.push(next);

        if (existing) summary.updated++;
        else summary.inserted++;

        if (next.reviewStatus === "Auto-reconciled") summary.autoReconciled++;
        else if (next.reviewStatus === "Reviewed") summary.reviewed++;
        else summary.pendingReview++;
      }

      // invoices gone from every feed have no result any more
      summary.removed = store.deleteExcept(merged.map((r) => r.invoiceId));

      if (source.afterMerge) {
        summary.promoted = source.afterMerge(db, merged, runAt, logger);
      }

      logAuditEvent(db, {
        eventType: "RECONCILIATION_RUN",
        entityType: `reconcile_results_${source.kind}`,
        meta: { ...summary, promoted: summary.promoted.length },
        now: new Date(runAt),
      });

      return summary;
    });

    const summary = run();
    logger?.info(
      {
        event: `reconcile.${source.kind}.complete`,
        inserted: summary.inserted,
        updated: summary.updated,
        removed: summary.removed,
        autoReconciled: summary.autoReconciled,
        pendingReview: summary.pendingReview,
        reviewed: summary.reviewed,
        promoted: summary.promoted.length,
      },
      `${source.label} reconciliation complete`
    );
    return { ok: true, message: source.successMessage, summary };
  } catch (err) {
    logger?.error({ event: `reconcile.${source.kind}.error`, err }, `${source.label} reconciliation failed`);
    return { ok: false, message: `Error during ${source.label} reconciliation: ${errorMessage(err)}` };
  }
}

export function runItemReconciliation(db: Database.Database, opts: ReconcileOptions = {}): RunOutcome {
  return runReconciliation(db, itemsSource, opts);
}

export function runTotalsReconciliation(
  db: Database.Database,
  opts: ReconcileOptions & { reportUnavailableFields?: boolean } = {}
): RunOutcome {
  const source = createTotalsSource({ reportUnavailableFields: opts.reportUnavailableFields ?? true });
  return runReconciliation(db, source, opts);
}
