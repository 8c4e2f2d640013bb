import type Database from "better-sqlite3";
import { openDb } from "../src/db/sqlite.js";
import { migrate } from "../src/db/migrations.js";
import { createLogger } from "../src/utils/logger.js";
import { insertExtractedInvoice } from "../src/db/extractionStore.js";
import { insertLedgerItem, insertLedgerTotals } from "../src/db/ledgerStore.js";
import type { ExtractedInvoice, LedgerItem, LedgerTotals } from "../src/types/reconciliation.js";

export const silentLogger = createLogger("silent");

export function createTestDb(): Database.Database {
  const db = openDb(":memory:");
  migrate(db);
  return db;
}

export function extracted(overrides: Partial<ExtractedInvoice> & { invoiceNo: string }): ExtractedInvoice {
  return {
    fileName: `invoice_${overrides.invoiceNo}.pdf`,
    customerNo: "CUST001",
    invoiceDate: "2025-04-25",
    totalAmount: 100,
    costCenter: "CC001",
    fileSize: 45000,
    lastModified: "2025-05-01T10:00:00.000Z",
    fileUrl: `file://stage/invoice_${overrides.invoiceNo}.pdf`,
    ...overrides,
  };
}

export function ledger(overrides: Partial<LedgerTotals> & { invoiceId: string }): LedgerTotals {
  return {
    invoiceDate: "2025-04-25",
    subtotal: null,
    tax: null,
    total: 100,
    ...overrides,
  };
}

export function item(invoiceId: string, line: number): LedgerItem {
  return { invoiceId, line, productName: `Widget ${line}`, quantity: 2, unitPrice: 5, totalPrice: 10 };
}

export function addExtracted(db: Database.Database, ...rows: ExtractedInvoice[]) {
  for (const r of rows) insertExtractedInvoice(db, r);
}

export function addLedger(db: Database.Database, ...rows: LedgerTotals[]) {
  for (const r of rows) insertLedgerTotals(db, r);
}

export function addItems(db: Database.Database, ...rows: LedgerItem[]) {
  for (const r of rows) insertLedgerItem(db, r);
}
