import type { ExtractedInvoice, OverridableFields } from "../types/reconciliation.js";
import { formatAmount, round2, sameAmount } from "./values.js";

export type Overrides = {
  customerNo?: string | null;
  invoiceDate?: string | null;
  totalAmount?: number | null;
  costCenter?: string | null;
};

export type FieldChange = {
  field: keyof OverridableFields;
  label: string;
  from: string;
  to: string;
};

export const NO_CHANGES = "No changes made";

export function pickOverridable(inv: ExtractedInvoice): OverridableFields {
  return {
    customerNo: inv.customerNo,
    invoiceDate: inv.invoiceDate,
    totalAmount: inv.totalAmount,
    costCenter: inv.costCenter,
  };
}

function textChanged(original: string | null, override: string | null | undefined): override is string {
  return override !== null && override !== undefined && override !== original;
}

function amountChanged(original: number | null, override: number | null | undefined): override is number {
  return override !== null && override !== undefined && !sameAmount(original, override);
}

/**
 * Apply human overrides to the extracted values. An override only counts
 * when it is supplied and differs from what extraction produced; otherwise
 * the extracted value stands. Changes are listed in a fixed field order.
 */
export function applyOverrides(
  original: OverridableFields,
  overrides: Overrides
): { effective: OverridableFields; changes: FieldChange[] } {
  const effective: OverridableFields = { ...original };
  const changes: FieldChange[] = [];

  if (textChanged(original.customerNo, overrides.customerNo)) {
    effective.customerNo = overrides.customerNo;
    changes.push({
      field: "customerNo",
      label: "Customer No",
      from: original.customerNo ?? "NULL",
      to: overrides.customerNo,
    });
  }

  if (textChanged(original.invoiceDate, overrides.invoiceDate)) {
    effective.invoiceDate = overrides.invoiceDate;
    changes.push({
      field: "invoiceDate",
      label: "Invoice Date",
      from: original.invoiceDate ?? "NULL",
      to: overrides.invoiceDate,
    });
  }

  if (amountChanged(original.totalAmount, overrides.totalAmount)) {
    effective.totalAmount = round2(overrides.totalAmount);
    changes.push({
      field: "totalAmount",
      label: "Total Amount",
      from: formatAmount(original.totalAmount, "NULL"),
      to: formatAmount(overrides.totalAmount),
    });
  }

  if (textChanged(original.costCenter, overrides.costCenter)) {
    effective.costCenter = overrides.costCenter;
    changes.push({
      field: "costCenter",
      label: "Cost Center",
      from: original.costCenter ?? "NULL",
      to: overrides.costCenter,
    });
  }

  return { effective, changes };
}

export function buildChangeSummary(changes: FieldChange[]): string {
  if (changes.length === 0) return NO_CHANGES;
  return changes.map((c) => `${c.label}: ${c.from} → ${c.to}; `).join("");
}
