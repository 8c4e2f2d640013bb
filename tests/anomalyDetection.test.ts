import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import {
  detectAnomalies,
  detectionIdFor,
  findAmountOutliers,
  findWeekendInvoices,
} from "../src/engine/anomalyDetection.js";
import { getAnomalies } from "../src/db/anomalyResults.js";
import { getAuditEvents } from "../src/db/auditEvents.js";
import type { LedgerTotals } from "../src/types/reconciliation.js";
import { addLedger, createTestDb, ledger, silentLogger } from "./helpers.js";

const WEEKDAYS = ["2025-04-14", "2025-04-15", "2025-04-16", "2025-04-17", "2025-04-18"];

// nine ordinary invoices and one large one, all on weekdays
function batch(): LedgerTotals[] {
  return Array.from({ length: 10 }, (_, i) =>
    ledger({ invoiceId: `30${String(i).padStart(2, "0")}`, invoiceDate: WEEKDAYS[i % 5], total: i === 9 ? 1000 : 100 })
  );
}

describe("findAmountOutliers", () => {
  it("should flag amounts beyond the z-score threshold", () => {
    const outliers = findAmountOutliers(batch(), 2);

    expect(outliers).toHaveLength(1);
    expect(outliers[0].invoiceId).toBe("3009");
    expect(outliers[0].mean).toBe(190);
    expect(outliers[0].z.toFixed(2)).toBe("2.85");
  });

  it("should find nothing when there is no spread", () => {
    expect(findAmountOutliers([ledger({ invoiceId: "1" }), ledger({ invoiceId: "2" })], 2)).toEqual([]);
    expect(findAmountOutliers([ledger({ invoiceId: "1" })], 2)).toEqual([]);
  });
});

describe("findWeekendInvoices", () => {
  it("should flag Saturday and Sunday dates", () => {
    const found = findWeekendInvoices([
      ledger({ invoiceId: "4001", invoiceDate: "2025-04-18" }),
      ledger({ invoiceId: "4002", invoiceDate: "2025-04-19" }),
      ledger({ invoiceId: "4003", invoiceDate: "2025-04-20" }),
    ]);

    expect(found).toEqual([
      { invoiceId: "4002", date: "2025-04-19", weekday: "Saturday" },
      { invoiceId: "4003", date: "2025-04-20", weekday: "Sunday" },
    ]);
  });
});

describe("detectAnomalies", () => {
  let db: Database.Database;
  const now = new Date("2025-05-01T12:34:56.000Z");

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it("should derive the batch id from the scan time", () => {
    expect(detectionIdFor(now)).toBe("DETECT_20250501123456");
  });

  it("should store outliers and weekend invoices under one batch", () => {
    addLedger(db, ...batch());
    addLedger(db, ledger({ invoiceId: "3000", invoiceDate: "2025-04-19" }));

    const outcome = detectAnomalies(db, { now, logger: silentLogger });

    expect(outcome).toMatchObject({
      ok: true,
      detectionId: "DETECT_20250501123456",
      message:
        "Detected anomalies in batch: DETECT_20250501123456. Found 1 amount outliers and 1 weekend invoices.",
    });

    const stored = getAnomalies(db, "DETECT_20250501123456");
    expect(stored.map((a) => [a.invoiceId, a.anomalyType, a.severity])).toEqual([
      ["3009", "AMOUNT_OUTLIER", "High"],
      ["3000", "TIMING_ANOMALY", "Medium"],
    ]);
    expect(stored[1].description).toBe("Invoice dated on weekend: Saturday, 2025-04-19");
    expect(getAuditEvents(db, "ANOMALY_SCAN")).toHaveLength(1);
  });

  it("should honour a stricter threshold", () => {
    addLedger(db, ...batch());

    const outcome = detectAnomalies(db, { now, zThreshold: 3, logger: silentLogger });

    expect(outcome.ok && outcome.anomalies).toEqual([]);
  });
});
