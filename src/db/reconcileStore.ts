// src/db/reconcileStore.ts
import type Database from "better-sqlite3";
import type { ReconcileKind, ReconcileResult, ReviewStatus } from "../types/reconciliation.js";

const TABLES = {
  totals: "reconcile_results_totals",
  items: "reconcile_results_items",
} as const satisfies Record<ReconcileKind, string>;

type ReconcileRow = {
  invoice_id: string;
  mismatch_details: string;
  availability_notes: string | null;
  review_status: ReviewStatus;
  last_reconciled_at: string;
  reviewed_by: string | null;
  reviewed_at: string | null;
  notes: string | null;
};

function fromRow(row: ReconcileRow): ReconcileResult {
  return {
    invoiceId: row.invoice_id,
    mismatchDetails: row.mismatch_details,
    availabilityNotes: row.availability_notes,
    reviewStatus: row.review_status,
    lastReconciledAt: row.last_reconciled_at,
    reviewedBy: row.reviewed_by,
    reviewedAt: row.reviewed_at,
    notes: row.notes,
  };
}

/**
 * Read/write access to one reconciliation results table. Items and totals
 * share the row shape, so both are served by the same store.
 */
export interface ReconcileStore {
  readonly kind: ReconcileKind;
  get(invoiceId: string): ReconcileResult | undefined;
  getAll(): ReconcileResult[];
  listByStatus(status: ReviewStatus): ReconcileResult[];
  upsert(result: ReconcileResult): void;
  markReviewed(args: { invoiceId: string; reviewedBy: string; reviewedAt: string; notes: string | null }): number;
  /** Drop results whose invoice is no longer in any feed. Returns the number removed. */
  deleteExcept(invoiceIds: string[]): number;
}

export function createReconcileStore(db: Database.Database, kind: ReconcileKind): ReconcileStore {
  const table = TABLES[kind];

  const getStmt = db.prepare<[string], ReconcileRow>(`SELECT * FROM ${table} WHERE invoice_id = ?`);
  const allStmt = db.prepare<[], ReconcileRow>(`SELECT * FROM ${table} ORDER BY invoice_id`);
  const byStatusStmt = db.prepare<[string], ReconcileRow>(
    `SELECT * FROM ${table} WHERE review_status = ? ORDER BY invoice_id`
  );
  const upsertStmt = db.prepare(`
    INSERT INTO ${table}
      (invoice_id, mismatch_details, availability_notes, review_status, last_reconciled_at, reviewed_by, reviewed_at, notes)
    VALUES
      (@invoiceId, @mismatchDetails, @availabilityNotes, @reviewStatus, @lastReconciledAt, @reviewedBy, @reviewedAt, @notes)
    ON CONFLICT(invoice_id) DO UPDATE SET
      mismatch_details=excluded.mismatch_details,
      availability_notes=excluded.availability_notes,
      review_status=excluded.review_status,
      last_reconciled_at=excluded.last_reconciled_at,
      reviewed_by=excluded.reviewed_by,
      reviewed_at=excluded.reviewed_at,
      notes=excluded.notes
  `);
  const reviewStmt = db.prepare(`
    UPDATE ${table}
    SET review_status = 'Reviewed', reviewed_by = @reviewedBy, reviewed_at = @reviewedAt, notes = @notes
    WHERE invoice_id = @invoiceId
  `);
  const pruneStmt = db.prepare<[string]>(
    `DELETE FROM ${table} WHERE invoice_id NOT IN (SELECT value FROM json_each(?))`
  );

  return {
    kind,
    get(invoiceId) {
      const row = getStmt.get(invoiceId);
      return row ? fromRow(row) : undefined;
    },
    getAll() {
      return allStmt.all().map(fromRow);
    },
    listByStatus(status) {
      return byStatusStmt.all(status).map(fromRow);
    },
    upsert(result) {
      upsertStmt.run(result);
    },
    markReviewed(args) {
      return reviewStmt.run(args).changes;
    },
    deleteExcept(invoiceIds) {
      return pruneStmt.run(JSON.stringify(invoiceIds)).changes;
    },
  };
}
