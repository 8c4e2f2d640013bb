// src/db/anomalyResults.ts
import type Database from "better-sqlite3";

export type AnomalyType = "AMOUNT_OUTLIER" | "TIMING_ANOMALY";
export type AnomalySeverity = "Critical" | "High" | "Medium";

export type AnomalyRecord = {
  detectionId: string;
  invoiceId: string;
  anomalyType: AnomalyType;
  severity: AnomalySeverity;
  description: string;
  metrics: Record<string, number> | null;
  detectedAt: string;
};

type AnomalyRow = {
  detection_id: string;
  invoice_id: string;
  anomaly_type: AnomalyType;
  severity: AnomalySeverity;
  description: string;
  metrics_json: string | null;
  detected_at: string;
};

function parseMetrics(json: string | null): Record<string, number> | null {
  if (!json) return null;
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== "object" || parsed === null) return null;

  const out: Record<string, number> = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (typeof v === "number") out[k] = v;
  }
  return out;
}

export function insertAnomalies(db: Database.Database, records: AnomalyRecord[]) {
  const stmt = db.prepare(`
    INSERT INTO anomaly_detection_results
      (detection_id, invoice_id, anomaly_type, severity, description, metrics_json, detected_at)
    VALUES (@detectionId, @invoiceId, @anomalyType, @severity, @description, @metricsJson, @detectedAt)
  `);
  for (const r of records) {
    stmt.run({
      detectionId: r.detectionId,
      invoiceId: r.invoiceId,
      anomalyType: r.anomalyType,
      severity: r.severity,
      description: r.description,
      metricsJson: r.metrics ? JSON.stringify(r.metrics) : null,
      detectedAt: r.detectedAt,
    });
  }
}

export function getAnomalies(db: Database.Database, detectionId?: string): AnomalyRecord[] {
  const rows = detectionId
    ? db
        .prepare<[string], AnomalyRow>(`SELECT * FROM anomaly_detection_results WHERE detection_id = ? ORDER BY id`)
        .all(detectionId)
    : db.prepare<[], AnomalyRow>(`SELECT * FROM anomaly_detection_results ORDER BY id`).all();

  return rows.map((r) => ({
    detectionId: r.detection_id,
    invoiceId: r.invoice_id,
    anomalyType: r.anomaly_type,
    severity: r.severity,
    description: r.description,
    metrics: parseMetrics(r.metrics_json),
    detectedAt: r.detected_at,
  }));
}
