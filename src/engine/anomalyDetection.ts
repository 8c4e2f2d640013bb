import type Database from "better-sqlite3";
import type { Logger } from "pino";
import type { LedgerTotals } from "../types/reconciliation.js";
import { getAllLedgerTotals } from "../db/ledgerStore.js";
import { insertAnomalies, type AnomalyRecord, type AnomalySeverity } from "../db/anomalyResults.js";
import { logAuditEvent } from "../db/auditEvents.js";
import { errorMessage } from "../utils/errors.js";
import { normalizeInvoiceDate, nowIso } from "./values.js";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export type AnomalyOutcome =
  | { ok: true; message: string; detectionId: string; anomalies: AnomalyRecord[] }
  | { ok: false; message: string };

export function detectionIdFor(d: Date) {
  const stamp = d.toISOString().replace(/[-:T]/g, "").slice(0, 14);
  return `DETECT_${stamp}`;
}

function severityFor(z: number): AnomalySeverity {
  const abs = Math.abs(z);
  if (abs > 3) return "Critical";
  if (abs > 2.5) return "High";
  return "Medium";
}

export function findAmountOutliers(totals: LedgerTotals[], zThreshold: number) {
  if (totals.length < 2) return [];

  const amounts = totals.map((t) => t.total);
  const mean = amounts.reduce((s, x) => s + x, 0) / amounts.length;
  // sample standard deviation
  const variance = amounts.reduce((s, x) => s + (x - mean) ** 2, 0) / (amounts.length - 1);
  const stddev = Math.sqrt(variance);
  if (stddev === 0) return [];

  return totals
    .map((t) => ({ invoiceId: t.invoiceId, amount: t.total, mean, z: (t.total - mean) / stddev }))
    .filter((o) => Math.abs(o.z) > zThreshold);
}

export function findWeekendInvoices(totals: LedgerTotals[]) {
  const out: Array<{ invoiceId: string; date: string; weekday: string }> = [];
  for (const t of totals) {
    const date = normalizeInvoiceDate(t.invoiceDate);
    if (!date) continue;
    const day = new Date(`${date}T00:00:00Z`).getUTCDay();
    if (day === 0 || day === 6) out.push({ invoiceId: t.invoiceId, date, weekday: WEEKDAYS[day] });
  }
  return out;
}

/**
 * Statistical side-annotations over ledger totals. Best effort: results go to
 * their own table and nothing in reconciliation or validation reads them.
 */
export function detectAnomalies(
  db: Database.Database,
  opts: { zThreshold?: number; now?: Date; logger?: Logger } = {}
): AnomalyOutcome {
  const now = opts.now ?? new Date();
  const detectedAt = nowIso(now);
  const detectionId = detectionIdFor(now);
  const zThreshold = opts.zThreshold ?? 2;

  try {
    const totals = getAllLedgerTotals(db);
    const outliers = findAmountOutliers(totals, zThreshold);
    const weekend = findWeekendInvoices(totals);

    const anomalies: AnomalyRecord[] = [
      ...outliers.map(
        (o): AnomalyRecord => ({
          detectionId,
          invoiceId: o.invoiceId,
          anomalyType: "AMOUNT_OUTLIER",
          severity: severityFor(o.z),
          description: `Invoice amount significantly deviates from normal pattern. Z-score: ${o.z.toFixed(2)}`,
          metrics: { zScore: o.z, amount: o.amount, avgAmount: o.mean },
          detectedAt,
        })
      ),
      ...weekend.map(
        (w): AnomalyRecord => ({
          detectionId,
          invoiceId: w.invoiceId,
          anomalyType: "TIMING_ANOMALY",
          severity: "Medium",
          description: `Invoice dated on weekend: ${w.weekday}, ${w.date}`,
          metrics: null,
          detectedAt,
        })
      ),
    ];

    db.transaction(() => {
      insertAnomalies(db, anomalies);
      logAuditEvent(db, {
        eventType: "ANOMALY_SCAN",
        entityType: "anomaly_detection_results",
        entityId: detectionId,
        meta: { outliers: outliers.length, weekend: weekend.length, zThreshold },
        now,
      });
    })();

    const message =
      `Detected anomalies in batch: ${detectionId}. ` +
      `Found ${outliers.length} amount outliers and ${weekend.length} weekend invoices.`;
    opts.logger?.info({ event: "anomaly.scan.complete", detectionId, count: anomalies.length }, message);
    return { ok: true, message, detectionId, anomalies };
  } catch (err) {
    opts.logger?.warn({ event: "anomaly.scan.error", err }, "Anomaly detection failed");
    return { ok: false, message: `Error during anomaly detection: ${errorMessage(err)}` };
  }
}
