import { z } from "zod";
import { formatZodIssues } from "./utils/errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  dbPath: z.string().min(1, "DB_PATH must not be empty").default("storage/reconcile.db"),

  // Scheduled reconciliation task (three minutes by default)
  reconcileIntervalMs: z.coerce.number().int().min(1000).max(86_400_000).default(180_000),

  // Report ledger fields that extraction never carries (subtotal, tax)
  reportUnavailableFields: booleanFlag.default("true"),

  anomalyDetectionEnabled: booleanFlag.default("true"),
  anomalyZThreshold: z.coerce.number().positive().default(2),

  nodeEnv: z.enum(["development", "test", "production"]).default("development"),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    dbPath: env["DB_PATH"] || undefined,
    reconcileIntervalMs: env["RECONCILE_INTERVAL_MS"] || undefined,
    reportUnavailableFields: env["REPORT_UNAVAILABLE_FIELDS"]?.toLowerCase() || undefined,
    anomalyDetectionEnabled: env["ANOMALY_DETECTION_ENABLED"]?.toLowerCase() || undefined,
    anomalyZThreshold: env["ANOMALY_Z_THRESHOLD"] || undefined,
    nodeEnv: env["NODE_ENV"] || undefined,
    logLevel: env["LOG_LEVEL"] || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatZodIssues(result.error, "\n")}`);
  }

  return result.data;
}
