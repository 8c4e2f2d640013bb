import { describe, it, expect } from "vitest";
import { computeTotalsFindings } from "../src/engine/totalsDiff.js";
import { normalizeInvoiceDate, sameAmount } from "../src/engine/values.js";
import { extracted, ledger } from "./helpers.js";

const noNotes = { reportUnavailableFields: false };

describe("computeTotalsFindings", () => {
  it("should auto-reconcile a matched invoice with equal date and total", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "2010", invoiceDate: "2025-04-25", total: 124.31 })],
      [extracted({ invoiceNo: "2010", invoiceDate: "2025-04-25", totalAmount: 124.31 })],
      noNotes
    );

    expect(finding).toEqual({
      invoiceId: "2010",
      mismatchDetails: "",
      availabilityNotes: null,
      reviewStatus: "Auto-reconciled",
    });
  });

  it("should describe a total mismatch with ledger value first", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "2004", invoiceDate: "2025-04-19", total: 309.73 })],
      [extracted({ invoiceNo: "2004", invoiceDate: "2025-04-19", totalAmount: 209.73 })],
      noNotes
    );

    expect(finding.mismatchDetails).toBe("2004: Total_Diff(309.73 vs 209.73);");
    expect(finding.reviewStatus).toBe("Pending Review");
  });

  it("should report date and total differences together", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "3001", invoiceDate: "2025-04-19", total: 10 })],
      [extracted({ invoiceNo: "3001", invoiceDate: "2025-04-20", totalAmount: 12.5 })],
      noNotes
    );

    expect(finding.mismatchDetails).toBe("3001: Date_Diff(2025-04-19 vs 2025-04-20); Total_Diff(10.00 vs 12.50);");
  });

  it("should compare dates after normalising the extracted text", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "3002", invoiceDate: "2025-04-19", total: 50 })],
      [extracted({ invoiceNo: "3002", invoiceDate: "04/19/2025", totalAmount: 50 })],
      noNotes
    );

    expect(finding.reviewStatus).toBe("Auto-reconciled");
  });

  it("should flag an unreadable extracted date", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "3003", invoiceDate: "2025-04-19", total: 50 })],
      [extracted({ invoiceNo: "3003", invoiceDate: "soon", totalAmount: 50 })],
      noNotes
    );

    expect(finding.mismatchDetails).toBe("3003: Date_Diff(2025-04-19 vs null);");
  });

  it("should classify one-sided invoices", () => {
    const findings = computeTotalsFindings(
      [ledger({ invoiceId: "4001" })],
      [extracted({ invoiceNo: "4002" })],
      noNotes
    );

    expect(findings.map((f) => [f.invoiceId, f.mismatchDetails, f.reviewStatus])).toEqual([
      ["4001", "4001: In TRANSACT_TOTALS Only", "Pending Review"],
      ["4002", "4002: In INVOICE_INFO Only", "Pending Review"],
    ]);
  });

  it("should keep unavailable subtotal and tax as notes without affecting status", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "2010", subtotal: 113.01, tax: 11.3, total: 124.31 })],
      [extracted({ invoiceNo: "2010", totalAmount: 124.31 })],
      { reportUnavailableFields: true }
    );

    expect(finding.mismatchDetails).toBe("");
    expect(finding.availabilityNotes).toBe("Subtotal_NotAvailable_In_Extraction; Tax_NotAvailable_In_Extraction;");
    expect(finding.reviewStatus).toBe("Auto-reconciled");
  });

  it("should compare every extracted file carrying the same invoice number", () => {
    const [finding] = computeTotalsFindings(
      [ledger({ invoiceId: "5001", total: 100 })],
      [
        extracted({ invoiceNo: "5001", fileName: "a.pdf", totalAmount: 100 }),
        extracted({ invoiceNo: "5001", fileName: "b.pdf", totalAmount: 90 }),
        extracted({ invoiceNo: "5001", fileName: "c.pdf", totalAmount: 90 }),
      ],
      noNotes
    );

    expect(finding.mismatchDetails).toBe("5001: Total_Diff(100.00 vs 90.00);");
  });
});

describe("value helpers", () => {
  it("should normalise supported date formats", () => {
    expect(normalizeInvoiceDate("2025-04-19")).toBe("2025-04-19");
    expect(normalizeInvoiceDate("2025-04-19T08:30:00Z")).toBe("2025-04-19");
    expect(normalizeInvoiceDate(" 4/9/2025 ")).toBe("2025-04-09");
    expect(normalizeInvoiceDate("2025-02-30")).toBeNull();
    expect(normalizeInvoiceDate(null)).toBeNull();
  });

  it("should compare amounts at cent precision", () => {
    expect(sameAmount(124.31, 124.31000001)).toBe(true);
    expect(sameAmount(0.1 + 0.2, 0.3)).toBe(true);
    expect(sameAmount(10, 10.01)).toBe(false);
    expect(sameAmount(null, null)).toBe(true);
    expect(sameAmount(null, 0)).toBe(false);
  });
});
