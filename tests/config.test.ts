import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      dbPath: "storage/reconcile.db",
      reconcileIntervalMs: 180_000,
      reportUnavailableFields: true,
      anomalyDetectionEnabled: true,
      anomalyZThreshold: 2,
      nodeEnv: "development",
      logLevel: "info",
    });
  });

  it("should read and coerce environment values", () => {
    const config = loadConfig({
      DB_PATH: "/tmp/recon.db",
      RECONCILE_INTERVAL_MS: "5000",
      REPORT_UNAVAILABLE_FIELDS: "FALSE",
      ANOMALY_DETECTION_ENABLED: "0",
      ANOMALY_Z_THRESHOLD: "2.5",
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    });

    expect(config).toEqual({
      dbPath: "/tmp/recon.db",
      reconcileIntervalMs: 5000,
      reportUnavailableFields: false,
      anomalyDetectionEnabled: false,
      anomalyZThreshold: 2.5,
      nodeEnv: "test",
      logLevel: "silent",
    });
  });

  it("should list every invalid setting", () => {
    expect(() => loadConfig({ RECONCILE_INTERVAL_MS: "10", LOG_LEVEL: "loud" })).toThrow(
      /^Configuration validation failed:\nreconcileIntervalMs: .*\nlogLevel: /
    );
  });
});
