// src/db/statusViews.ts
import type Database from "better-sqlite3";
import type { ValidationStatus } from "../types/reconciliation.js";

export type CurrentStatusRow = {
  invoiceNo: string;
  fileName: string;
  customerNo: string | null;
  invoiceDate: string | null;
  totalAmount: number | null;
  costCenter: string | null;
  fileSize: number | null;
  lastModified: string | null;
  fileUrl: string | null;
  currentStatus: ValidationStatus;
  validatedBy: string | null;
  validatedAt: string | null;
  changeSummary: string | null;
};

export type ValidationStats = {
  totalInvoices: number;
  validatedCount: number;
  rejectedCount: number;
  pendingCount: number;
  validationRate: number;
  correctionsMade: number;
};

export type ReconciliationMetrics = {
  totalInvoiceCount: number;
  autoReconciledCount: number;
  grandTotalAmount: number;
  totalReconciledAmount: number;
  reconciledAmountRatio: number;
};

const CURRENT_STATUS_COLUMNS = `
  invoice_no AS invoiceNo, file_name AS fileName, customer_no AS customerNo,
  invoice_date AS invoiceDate, total_amount AS totalAmount, cost_center AS costCenter,
  file_size AS fileSize, last_modified AS lastModified, file_url AS fileUrl,
  current_status AS currentStatus, validated_by AS validatedBy, validated_at AS validatedAt,
  change_summary AS changeSummary
`;

export function listCurrentStatus(
  db: Database.Database,
  filter: { invoiceNo?: string; status?: ValidationStatus } = {}
): CurrentStatusRow[] {
  return db
    .prepare<{ invoiceNo: string | null; status: string | null }, CurrentStatusRow>(`
      SELECT ${CURRENT_STATUS_COLUMNS}
      FROM vw_pending_validations
      WHERE (@invoiceNo IS NULL OR invoice_no = @invoiceNo)
        AND (@status IS NULL OR current_status = @status)
      ORDER BY last_modified DESC, invoice_no, file_name
    `)
    .all({ invoiceNo: filter.invoiceNo ?? null, status: filter.status ?? null });
}

export function getValidationStats(db: Database.Database): ValidationStats {
  const row = db
    .prepare<[], ValidationStats>(`
      SELECT
        total_invoices AS totalInvoices,
        validated_count AS validatedCount,
        rejected_count AS rejectedCount,
        pending_count AS pendingCount,
        validation_rate AS validationRate,
        corrections_made AS correctionsMade
      FROM vw_validation_stats
    `)
    .get();

  // an aggregate without GROUP BY always yields one row
  return (
    row ?? {
      totalInvoices: 0,
      validatedCount: 0,
      rejectedCount: 0,
      pendingCount: 0,
      validationRate: 0,
      correctionsMade: 0,
    }
  );
}

export function getReconciliationMetrics(db: Database.Database): ReconciliationMetrics {
  const row = db
    .prepare<[], Omit<ReconciliationMetrics, "reconciledAmountRatio">>(`
      SELECT
        (SELECT COUNT(*) FROM transact_totals) AS totalInvoiceCount,
        (SELECT COUNT(*) FROM reconcile_results_totals WHERE review_status = 'Auto-reconciled') AS autoReconciledCount,
        (SELECT COALESCE(SUM(total), 0) FROM transact_totals) AS grandTotalAmount,
        (SELECT COALESCE(SUM(total), 0) FROM gold_invoice_totals) AS totalReconciledAmount
    `)
    .get();

  const totalInvoiceCount = row?.totalInvoiceCount ?? 0;
  const grandTotalAmount = row?.grandTotalAmount ?? 0;
  const totalReconciledAmount = row?.totalReconciledAmount ?? 0;

  return {
    totalInvoiceCount,
    autoReconciledCount: row?.autoReconciledCount ?? 0,
    grandTotalAmount,
    totalReconciledAmount,
    reconciledAmountRatio: grandTotalAmount === 0 ? 0 : totalReconciledAmount / grandTotalAmount,
  };
}
