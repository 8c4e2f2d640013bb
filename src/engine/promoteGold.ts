import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { GoldTotals, ReconcileResult } from "../types/reconciliation.js";
import { getLedgerTotalsFor } from "../db/ledgerStore.js";
import { replaceGoldTotals } from "../db/goldStore.js";
import { logAuditEvent } from "../db/auditEvents.js";

export const AUTO_RECONCILED_REVIEWER = "Auto-reconciled";

/**
 * Rebuild gold totals from the ledger for every invoice currently
 * Auto-reconciled. Gold is a derived cache: rows for invoices that are no
 * longer auto-reconciled are dropped along the way.
 */
export function promoteAutoReconciled(
  db: Database.Database,
  results: ReconcileResult[],
  runAt: string,
  logger?: Logger
): string[] {
  const ids = results.filter((r) => r.reviewStatus === "Auto-reconciled").map((r) => r.invoiceId);

  const rows: GoldTotals[] = getLedgerTotalsFor(db, ids).map((t) => ({
    ...t,
    reviewedBy: AUTO_RECONCILED_REVIEWER,
    reviewedAt: runAt,
    notes: null,
  }));

  const { removed, inserted } = replaceGoldTotals(db, rows);
  const promoted = rows.map((r) => r.invoiceId);

  logAuditEvent(db, {
    eventType: "GOLD_PROMOTED",
    entityType: "gold_invoice_totals",
    meta: { removed, inserted, invoiceIds: promoted },
    now: new Date(runAt),
  });

  logger?.debug({ event: "gold.promoted", removed, inserted }, `Gold totals rebuilt (${inserted} rows)`);
  return promoted;
}
