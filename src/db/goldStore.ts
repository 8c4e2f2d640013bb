// src/db/goldStore.ts
import type Database from "better-sqlite3";
import type { GoldTotals } from "../types/reconciliation.js";

type GoldTotalsRow = {
  invoice_id: string;
  invoice_date: string;
  subtotal: number | null;
  tax: number | null;
  total: number;
  reviewed_by: string;
  reviewed_at: string;
  notes: string | null;
};

function fromRow(row: GoldTotalsRow): GoldTotals {
  return {
    invoiceId: row.invoice_id,
    invoiceDate: row.invoice_date,
    subtotal: row.subtotal,
    tax: row.tax,
    total: row.total,
    reviewedBy: row.reviewed_by,
    reviewedAt: row.reviewed_at,
    notes: row.notes,
  };
}

export function getGoldTotals(db: Database.Database): GoldTotals[] {
  return db.prepare<[], GoldTotalsRow>(`SELECT * FROM gold_invoice_totals ORDER BY invoice_id`).all().map(fromRow);
}

export function getGoldTotalsFor(db: Database.Database, invoiceId: string): GoldTotals | undefined {
  const row = db
    .prepare<[string], GoldTotalsRow>(`SELECT * FROM gold_invoice_totals WHERE invoice_id = ?`)
    .get(invoiceId);
  return row ? fromRow(row) : undefined;
}

/**
 * Replace the whole gold totals set. Callers run this inside the
 * reconciliation transaction so readers never see the emptied table.
 */
export function replaceGoldTotals(db: Database.Database, rows: GoldTotals[]) {
  const removed = db.prepare(`DELETE FROM gold_invoice_totals`).run().changes;

  const insert = db.prepare(`
    INSERT INTO gold_invoice_totals (invoice_id, invoice_date, subtotal, tax, total, reviewed_by, reviewed_at, notes)
    VALUES (@invoiceId, @invoiceDate, @subtotal, @tax, @total, @reviewedBy, @reviewedAt, @notes)
  `);
  for (const row of rows) insert.run(row);

  return { removed, inserted: rows.length };
}
