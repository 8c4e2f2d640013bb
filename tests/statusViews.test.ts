import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import { getReconciliationMetrics, getValidationStats, listCurrentStatus } from "../src/db/statusViews.js";
import { validateInvoice } from "../src/engine/validateInvoice.js";
import { runTotalsReconciliation } from "../src/engine/reconcile.js";
import { addExtracted, addLedger, createTestDb, extracted, ledger, silentLogger } from "./helpers.js";

describe("status views", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it("should report zeroes for an empty feed", () => {
    expect(getValidationStats(db)).toEqual({
      totalInvoices: 0,
      validatedCount: 0,
      rejectedCount: 0,
      pendingCount: 0,
      validationRate: 0,
      correctionsMade: 0,
    });
    expect(getReconciliationMetrics(db)).toEqual({
      totalInvoiceCount: 0,
      autoReconciledCount: 0,
      grandTotalAmount: 0,
      totalReconciledAmount: 0,
      reconciledAmountRatio: 0,
    });
  });

  it("should default unvalidated invoices to PENDING, newest first", () => {
    addExtracted(
      db,
      extracted({ invoiceNo: "6001", lastModified: "2025-05-01T08:00:00.000Z" }),
      extracted({ invoiceNo: "6002", lastModified: "2025-05-03T08:00:00.000Z" }),
      extracted({ invoiceNo: "6003", lastModified: "2025-05-02T08:00:00.000Z" })
    );
    validateInvoice(db, {
      invoiceNo: "6003",
      fileName: "invoice_6003.pdf",
      validatedBy: "clerk",
      overrides: { costCenter: "CC777" },
    });

    const rows = listCurrentStatus(db);
    expect(rows.map((r) => [r.invoiceNo, r.currentStatus])).toEqual([
      ["6002", "PENDING"],
      ["6003", "VALIDATED"],
      ["6001", "PENDING"],
    ]);
    // the view shows extraction values, not the overrides
    expect(rows[1]).toMatchObject({
      costCenter: "CC001",
      validatedBy: "clerk",
      changeSummary: "Cost Center: CC001 → CC777; ",
    });

    expect(listCurrentStatus(db, { status: "PENDING" }).map((r) => r.invoiceNo)).toEqual(["6002", "6001"]);
    expect(listCurrentStatus(db, { invoiceNo: "6001" })).toHaveLength(1);
  });

  it("should compute validation stats with a rounded rate", () => {
    addExtracted(db, extracted({ invoiceNo: "6001" }), extracted({ invoiceNo: "6002" }), extracted({ invoiceNo: "6003" }));
    validateInvoice(db, {
      invoiceNo: "6001",
      fileName: "invoice_6001.pdf",
      validatedBy: "clerk",
      overrides: { totalAmount: 101 },
    });

    expect(getValidationStats(db)).toEqual({
      totalInvoices: 3,
      validatedCount: 1,
      rejectedCount: 0,
      pendingCount: 2,
      validationRate: 33.33,
      correctionsMade: 1,
    });
  });

  it("should measure the share of ledger value that reached gold", () => {
    addLedger(db, ledger({ invoiceId: "2004", total: 300 }), ledger({ invoiceId: "2010", total: 100 }));
    addExtracted(db, extracted({ invoiceNo: "2004", totalAmount: 250 }), extracted({ invoiceNo: "2010", totalAmount: 100 }));
    runTotalsReconciliation(db, { logger: silentLogger });

    expect(getReconciliationMetrics(db)).toEqual({
      totalInvoiceCount: 2,
      autoReconciledCount: 1,
      grandTotalAmount: 400,
      totalReconciledAmount: 100,
      reconciledAmountRatio: 0.25,
    });
  });
});
