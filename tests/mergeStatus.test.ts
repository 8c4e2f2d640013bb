import { describe, it, expect } from "vitest";
import { mergeStatus } from "../src/engine/mergeStatus.js";
import type { ReconcileFinding, ReconcileResult } from "../src/types/reconciliation.js";

const RUN_AT = "2025-05-02T00:00:00.000Z";

const reviewed: ReconcileResult = {
  invoiceId: "2004",
  mismatchDetails: "2004: Total_Diff(309.73 vs 209.73);",
  availabilityNotes: null,
  reviewStatus: "Reviewed",
  lastReconciledAt: "2025-05-01T00:00:00.000Z",
  reviewedBy: "analyst@example.com",
  reviewedAt: "2025-05-01T12:00:00.000Z",
  notes: "confirmed with supplier",
};

const pendingFinding: ReconcileFinding = {
  invoiceId: "2004",
  mismatchDetails: "2004: Total_Diff(309.73 vs 209.73);",
  availabilityNotes: null,
  reviewStatus: "Pending Review",
};

const autoFinding: ReconcileFinding = {
  invoiceId: "2004",
  mismatchDetails: "",
  availabilityNotes: "Tax_NotAvailable_In_Extraction;",
  reviewStatus: "Auto-reconciled",
};

describe("mergeStatus", () => {
  it("should insert a new row with the computed status and no reviewer fields", () => {
    expect(mergeStatus(undefined, pendingFinding, RUN_AT)).toEqual({
      invoiceId: "2004",
      mismatchDetails: "2004: Total_Diff(309.73 vs 209.73);",
      availabilityNotes: null,
      reviewStatus: "Pending Review",
      lastReconciledAt: RUN_AT,
      reviewedBy: null,
      reviewedAt: null,
      notes: null,
    });
  });

  it("should keep Reviewed status and reviewer fields when the re-run is still pending", () => {
    const merged = mergeStatus(reviewed, pendingFinding, RUN_AT);

    expect(merged.reviewStatus).toBe("Reviewed");
    expect(merged.reviewedBy).toBe("analyst@example.com");
    expect(merged.reviewedAt).toBe("2025-05-01T12:00:00.000Z");
    expect(merged.notes).toBe("confirmed with supplier");
    expect(merged.lastReconciledAt).toBe(RUN_AT);
  });

  it("should let Auto-reconciled override a Reviewed row and clear reviewer fields", () => {
    const merged = mergeStatus(reviewed, autoFinding, RUN_AT);

    expect(merged).toEqual({
      invoiceId: "2004",
      mismatchDetails: "",
      availabilityNotes: "Tax_NotAvailable_In_Extraction;",
      reviewStatus: "Auto-reconciled",
      lastReconciledAt: RUN_AT,
      reviewedBy: null,
      reviewedAt: null,
      notes: null,
    });
  });

  it("should reset a previously auto-reconciled row to Pending Review", () => {
    const previous: ReconcileResult = { ...reviewed, reviewStatus: "Auto-reconciled", reviewedBy: null, reviewedAt: null, notes: null };
    expect(mergeStatus(previous, pendingFinding, RUN_AT).reviewStatus).toBe("Pending Review");
  });

  it("should clear stray reviewer fields on a pending row", () => {
    const stale: ReconcileResult = { ...reviewed, reviewStatus: "Pending Review" };
    const merged = mergeStatus(stale, pendingFinding, RUN_AT);

    expect(merged.reviewStatus).toBe("Pending Review");
    expect(merged.reviewedBy).toBeNull();
    expect(merged.notes).toBeNull();
  });
});
