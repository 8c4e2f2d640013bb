export type ReviewStatus = "Auto-reconciled" | "Pending Review" | "Reviewed";

export const REVIEW_STATUSES = ["Auto-reconciled", "Pending Review", "Reviewed"] as const satisfies readonly ReviewStatus[];

export type ValidationStatus = "PENDING" | "VALIDATED" | "REJECTED";

export const VALIDATION_STATUSES = ["PENDING", "VALIDATED", "REJECTED"] as const satisfies readonly ValidationStatus[];

/** Which reconciliation results table a run or review targets. */
export type ReconcileKind = "totals" | "items";

export type ExtractedInvoice = {
  invoiceNo: string;
  fileName: string;
  customerNo: string | null;
  invoiceDate: string | null; // as extracted, not normalised
  totalAmount: number | null;
  costCenter: string | null;
  fileSize: number | null;
  lastModified: string | null;
  fileUrl: string | null;
};

export type LedgerTotals = {
  invoiceId: string;
  invoiceDate: string; // YYYY-MM-DD
  subtotal: number | null;
  tax: number | null;
  total: number;
};

export type LedgerItem = {
  invoiceId: string;
  line: number;
  productName: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
};

export type ReconcileResult = {
  invoiceId: string;
  mismatchDetails: string;
  availabilityNotes: string | null;
  reviewStatus: ReviewStatus;
  lastReconciledAt: string;
  reviewedBy: string | null;
  reviewedAt: string | null;
  notes: string | null;
};

/** What a single detector pass computed for one invoice, before merging. */
export type ReconcileFinding = {
  invoiceId: string;
  mismatchDetails: string;
  availabilityNotes: string | null;
  reviewStatus: Exclude<ReviewStatus, "Reviewed">;
};

export type GoldTotals = LedgerTotals & {
  reviewedBy: string;
  reviewedAt: string;
  notes: string | null;
};

export type OverridableFields = {
  customerNo: string | null;
  invoiceDate: string | null;
  totalAmount: number | null;
  costCenter: string | null;
};

export type ValidatedInvoice = ExtractedInvoice & {
  validationStatus: ValidationStatus;
  validatedBy: string;
  validatedAt: string;
  changesMade: boolean;
  originalValues: OverridableFields;
  changeSummary: string;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
  version: number;
};

export type ReconcileRunSummary = {
  kind: ReconcileKind;
  runAt: string;
  inserted: number;
  updated: number;
  removed: number;
  autoReconciled: number;
  pendingReview: number;
  reviewed: number;
  promoted: string[];
};

export type RunOutcome =
  | { ok: true; message: string; summary: ReconcileRunSummary }
  | { ok: false; message: string };
