// src/db/extractionStore.ts
import type Database from "better-sqlite3";
import type { ExtractedInvoice } from "../types/reconciliation.js";

type InvoiceInfoRow = {
  invoice_no: string;
  file_name: string;
  customer_no: string | null;
  invoice_date: string | null;
  total_amount: number | null;
  cost_center: string | null;
  file_size: number | null;
  last_modified: string | null;
  file_url: string | null;
};

function fromRow(row: InvoiceInfoRow): ExtractedInvoice {
  return {
    invoiceNo: row.invoice_no,
    fileName: row.file_name,
    customerNo: row.customer_no,
    invoiceDate: row.invoice_date,
    totalAmount: row.total_amount,
    costCenter: row.cost_center,
    fileSize: row.file_size,
    lastModified: row.last_modified,
    fileUrl: row.file_url,
  };
}

export function getExtractedInvoice(
  db: Database.Database,
  invoiceNo: string,
  fileName: string
): ExtractedInvoice | undefined {
  const row = db
    .prepare<[string, string], InvoiceInfoRow>(
      `SELECT * FROM invoice_info WHERE invoice_no = ? AND file_name = ?`
    )
    .get(invoiceNo, fileName);
  return row ? fromRow(row) : undefined;
}

export function getAllExtractedInvoices(db: Database.Database): ExtractedInvoice[] {
  return db
    .prepare<[], InvoiceInfoRow>(`SELECT * FROM invoice_info ORDER BY invoice_no, file_name`)
    .all()
    .map(fromRow);
}

/** Ingestion-side writer; the reconciliation core never calls this. */
export function insertExtractedInvoice(db: Database.Database, inv: ExtractedInvoice) {
  db.prepare(`
    INSERT INTO invoice_info
      (invoice_no, file_name, customer_no, invoice_date, total_amount, cost_center, file_size, last_modified, file_url)
    VALUES
      (@invoiceNo, @fileName, @customerNo, @invoiceDate, @totalAmount, @costCenter, @fileSize, @lastModified, @fileUrl)
    ON CONFLICT(invoice_no, file_name) DO UPDATE SET
      customer_no=excluded.customer_no,
      invoice_date=excluded.invoice_date,
      total_amount=excluded.total_amount,
      cost_center=excluded.cost_center,
      file_size=excluded.file_size,
      last_modified=excluded.last_modified,
      file_url=excluded.file_url
  `).run(inv);
}
