// src/db/validationStore.ts
import type Database from "better-sqlite3";
import { z } from "zod";
import type { OverridableFields, ValidatedInvoice, ValidationStatus } from "../types/reconciliation.js";

const originalValuesSchema = z.object({
  customer_no: z.string().nullable(),
  invoice_date: z.string().nullable(),
  total_amount: z.number().nullable(),
  cost_center: z.string().nullable(),
});

type SilverRow = {
  invoice_no: string;
  file_name: string;
  customer_no: string | null;
  invoice_date: string | null;
  total_amount: number | null;
  cost_center: string | null;
  file_size: number | null;
  last_modified: string | null;
  file_url: string | null;
  validation_status: ValidationStatus;
  validated_by: string;
  validated_at: string;
  changes_made: number;
  original_values: string;
  change_summary: string;
  validation_notes: string | null;
  created_at: string;
  updated_at: string;
  version: number;
};

export function serializeOriginalValues(v: OverridableFields) {
  return JSON.stringify({
    customer_no: v.customerNo,
    invoice_date: v.invoiceDate,
    total_amount: v.totalAmount,
    cost_center: v.costCenter,
  });
}

export function parseOriginalValues(json: string): OverridableFields {
  const parsed = originalValuesSchema.parse(JSON.parse(json));
  return {
    customerNo: parsed.customer_no,
    invoiceDate: parsed.invoice_date,
    totalAmount: parsed.total_amount,
    costCenter: parsed.cost_center,
  };
}

function fromRow(row: SilverRow): ValidatedInvoice {
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
    validationStatus: row.validation_status,
    validatedBy: row.validated_by,
    validatedAt: row.validated_at,
    changesMade: row.changes_made === 1,
    originalValues: parseOriginalValues(row.original_values),
    changeSummary: row.change_summary,
    notes: row.validation_notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    version: row.version,
  };
}

export function getValidatedInvoice(
  db: Database.Database,
  invoiceNo: string,
  fileName: string
): ValidatedInvoice | undefined {
  const row = db
    .prepare<[string, string], SilverRow>(
      `SELECT * FROM silver_validated_invoices WHERE invoice_no = ? AND file_name = ?`
    )
    .get(invoiceNo, fileName);
  return row ? fromRow(row) : undefined;
}

export function countValidatedRecords(db: Database.Database, invoiceNo: string, fileName: string): number {
  const row = db
    .prepare<[string, string], { n: number }>(
      `SELECT COUNT(*) AS n FROM silver_validated_invoices WHERE invoice_no = ? AND file_name = ?`
    )
    .get(invoiceNo, fileName);
  return row?.n ?? 0;
}

/**
 * Delete-then-insert by (invoice_no, file_name). Not transactional on its
 * own: the validation tracker wraps it together with its reads.
 */
export function replaceValidatedInvoice(db: Database.Database, rec: ValidatedInvoice) {
  db.prepare(`DELETE FROM silver_validated_invoices WHERE invoice_no = ? AND file_name = ?`).run(
    rec.invoiceNo,
    rec.fileName
  );

  db.prepare(`
    INSERT INTO silver_validated_invoices (
      invoice_no, file_name, customer_no, invoice_date, total_amount, cost_center,
      file_size, last_modified, file_url,
      validation_status, validated_by, validated_at,
      changes_made, original_values, change_summary, validation_notes,
      created_at, updated_at, version
    ) VALUES (
      @invoiceNo, @fileName, @customerNo, @invoiceDate, @totalAmount, @costCenter,
      @fileSize, @lastModified, @fileUrl,
      @validationStatus, @validatedBy, @validatedAt,
      @changesMade, @originalValues, @changeSummary, @notes,
      @createdAt, @updatedAt, @version
    )
  `).run({
    ...rec,
    changesMade: rec.changesMade ? 1 : 0,
    originalValues: serializeOriginalValues(rec.originalValues),
  });
}
