import fs from "node:fs";
import type Database from "better-sqlite3";
import { z } from "zod";
import { insertExtractedInvoice } from "../db/extractionStore.js";
import { insertLedgerItem, insertLedgerTotals } from "../db/ledgerStore.js";

const extractedInvoiceSchema = z.object({
  invoiceNo: z.string().min(1),
  fileName: z.string().min(1),
  customerNo: z.string().nullable().default(null),
  invoiceDate: z.string().nullable().default(null),
  totalAmount: z.number().nullable().default(null),
  costCenter: z.string().nullable().default(null),
  fileSize: z.number().int().nullable().default(null),
  lastModified: z.string().nullable().default(null),
  fileUrl: z.string().nullable().default(null),
});

const ledgerTotalsSchema = z.object({
  invoiceId: z.string().min(1),
  invoiceDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  subtotal: z.number().nullable().default(null),
  tax: z.number().nullable().default(null),
  total: z.number(),
});

const ledgerItemSchema = z.object({
  invoiceId: z.string().min(1),
  line: z.number().int().positive(),
  productName: z.string().min(1),
  quantity: z.number().int(),
  unitPrice: z.number(),
  totalPrice: z.number(),
});

export const seedDataSchema = z.object({
  invoices: z.array(extractedInvoiceSchema).default([]),
  totals: z.array(ledgerTotalsSchema).default([]),
  items: z.array(ledgerItemSchema).default([]),
});

export type SeedData = z.infer<typeof seedDataSchema>;

export function loadSeedData(filePath: string): SeedData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return seedDataSchema.parse(raw);
}

/** Stand-in for the ingestion tier: writes the bronze tables. */
export function seedDatabase(db: Database.Database, data: SeedData) {
  db.transaction(() => {
    for (const inv of data.invoices) insertExtractedInvoice(db, inv);
    for (const t of data.totals) insertLedgerTotals(db, t);
    for (const item of data.items) insertLedgerItem(db, item);
  })();

  return { invoices: data.invoices.length, totals: data.totals.length, items: data.items.length };
}
