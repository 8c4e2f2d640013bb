// src/db/ledgerStore.ts
import type Database from "better-sqlite3";
import type { LedgerItem, LedgerTotals } from "../types/reconciliation.js";

type TotalsRow = {
  invoice_id: string;
  invoice_date: string;
  subtotal: number | null;
  tax: number | null;
  total: number;
};

function totalsFromRow(row: TotalsRow): LedgerTotals {
  return {
    invoiceId: row.invoice_id,
    invoiceDate: row.invoice_date,
    subtotal: row.subtotal,
    tax: row.tax,
    total: row.total,
  };
}

export function getAllLedgerTotals(db: Database.Database): LedgerTotals[] {
  return db
    .prepare<[], TotalsRow>(`SELECT * FROM transact_totals ORDER BY invoice_id`)
    .all()
    .map(totalsFromRow);
}

export function getLedgerTotalsFor(db: Database.Database, invoiceIds: string[]): LedgerTotals[] {
  if (invoiceIds.length === 0) return [];
  const stmt = db.prepare<[string], TotalsRow>(`SELECT * FROM transact_totals WHERE invoice_id = ?`);
  const out: LedgerTotals[] = [];
  for (const id of invoiceIds) {
    const row = stmt.get(id);
    if (row) out.push(totalsFromRow(row));
  }
  return out;
}

export function getDistinctItemInvoiceIds(db: Database.Database): string[] {
  return db
    .prepare<[], { invoice_id: string }>(
      `SELECT DISTINCT invoice_id FROM transact_items ORDER BY invoice_id`
    )
    .all()
    .map((r) => r.invoice_id);
}

/** Ingestion-side writers; the reconciliation core never calls these. */
export function insertLedgerTotals(db: Database.Database, t: LedgerTotals) {
  db.prepare(`
    INSERT INTO transact_totals (invoice_id, invoice_date, subtotal, tax, total)
    VALUES (@invoiceId, @invoiceDate, @subtotal, @tax, @total)
    ON CONFLICT(invoice_id) DO UPDATE SET
      invoice_date=excluded.invoice_date,
      subtotal=excluded.subtotal,
      tax=excluded.tax,
      total=excluded.total
  `).run(t);
}

export function insertLedgerItem(db: Database.Database, item: LedgerItem) {
  db.prepare(`
    INSERT INTO transact_items (invoice_id, line, product_name, quantity, unit_price, total_price)
    VALUES (@invoiceId, @line, @productName, @quantity, @unitPrice, @totalPrice)
    ON CONFLICT(invoice_id, line) DO UPDATE SET
      product_name=excluded.product_name,
      quantity=excluded.quantity,
      unit_price=excluded.unit_price,
      total_price=excluded.total_price
  `).run(item);
}
