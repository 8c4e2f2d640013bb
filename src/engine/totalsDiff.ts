import type { ExtractedInvoice, LedgerTotals, ReconcileFinding } from "../types/reconciliation.js";
import { formatAmount, normalizeInvoiceDate, sameAmount } from "./values.js";

export type TotalsDiffOptions = {
  reportUnavailableFields: boolean;
};

function diffOne(ledger: LedgerTotals, extracted: ExtractedInvoice): string[] {
  const out: string[] = [];

  const a = normalizeInvoiceDate(ledger.invoiceDate);
  const b = normalizeInvoiceDate(extracted.invoiceDate);
  if (a === null || a !== b) out.push(`Date_Diff(${a ?? "null"} vs ${b ?? "null"});`);

  if (!sameAmount(ledger.total, extracted.totalAmount)) {
    out.push(`Total_Diff(${formatAmount(ledger.total)} vs ${formatAmount(extracted.totalAmount)});`);
  }

  return out;
}

function unavailableFields(ledger: LedgerTotals): string | null {
  const notes: string[] = [];
  if (ledger.subtotal !== null) notes.push("Subtotal_NotAvailable_In_Extraction;");
  if (ledger.tax !== null) notes.push("Tax_NotAvailable_In_Extraction;");
  return notes.length ? notes.join(" ") : null;
}

/**
 * Full outer comparison of ledger totals against extracted invoices, one
 * finding per invoice id present on either side.
 */
export function computeTotalsFindings(
  ledger: LedgerTotals[],
  extracted: ExtractedInvoice[],
  opts: TotalsDiffOptions
): ReconcileFinding[] {
  const ledgerById = new Map(ledger.map((t) => [t.invoiceId, t]));

  // one invoice number may arrive in several files
  const extractedById = new Map<string, ExtractedInvoice[]>();
  for (const inv of extracted) {
    const list = extractedById.get(inv.invoiceNo) ?? [];
    list.push(inv);
    extractedById.set(inv.invoiceNo, list);
  }

  const ids = [...new Set([...ledgerById.keys(), ...extractedById.keys()])].sort();

  return ids.map((invoiceId): ReconcileFinding => {
    const a = ledgerById.get(invoiceId);
    const files = extractedById.get(invoiceId);

    let mismatchDetails = "";
    let availabilityNotes: string | null = null;

    if (a && files) {
      const diffs = new Set(files.flatMap((f) => diffOne(a, f)));
      if (diffs.size) mismatchDetails = `${invoiceId}: ${[...diffs].join(" ")}`;
      if (opts.reportUnavailableFields) availabilityNotes = unavailableFields(a);
    } else if (a) {
      mismatchDetails = `${invoiceId}: In TRANSACT_TOTALS Only`;
    } else {
      mismatchDetails = `${invoiceId}: In INVOICE_INFO Only`;
    }

    return {
      invoiceId,
      mismatchDetails,
      availabilityNotes,
      reviewStatus: mismatchDetails === "" ? "Auto-reconciled" : "Pending Review",
    };
  });
}
