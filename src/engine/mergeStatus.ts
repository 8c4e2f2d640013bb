import type { ReconcileFinding, ReconcileResult } from "../types/reconciliation.js";

/**
 * Merge a freshly computed finding into the stored reconciliation result.
 *
 * - no stored row: take the computed status
 * - computed Auto-reconciled: always wins, manual review fields are cleared
 * - stored Reviewed: status and reviewer fields are kept
 * - otherwise: Pending Review with reviewer fields cleared
 *
 * Mismatch text, availability notes and the run timestamp always move forward.
 */
export function mergeStatus(
  existing: ReconcileResult | undefined,
  computed: ReconcileFinding,
  runAt: string
): ReconcileResult {
  const base = {
    invoiceId: computed.invoiceId,
    mismatchDetails: computed.mismatchDetails,
    availabilityNotes: computed.availabilityNotes,
    lastReconciledAt: runAt,
  };
  const cleared = { reviewedBy: null, reviewedAt: null, notes: null };

  if (!existing) return { ...base, reviewStatus: computed.reviewStatus, ...cleared };

  if (computed.reviewStatus === "Auto-reconciled") {
    return { ...base, reviewStatus: "Auto-reconciled", ...cleared };
  }

  if (existing.reviewStatus === "Reviewed") {
    return {
      ...base,
      reviewStatus: "Reviewed",
      reviewedBy: existing.reviewedBy,
      reviewedAt: existing.reviewedAt,
      notes: existing.notes,
    };
  }

  return { ...base, reviewStatus: "Pending Review", ...cleared };
}
