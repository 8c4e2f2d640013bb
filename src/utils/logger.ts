import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

/**
 * Structured logger using pino.
 *
 * LOG_LEVEL controls verbosity; timestamps are ISO strings and the level is
 * written as its label so the output can be grepped without a pino reader.
 */
export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["*.password", "*.token", "*.secret", "*.apiKey"],
      censor: "[REDACTED]",
    },
  });
}

export const logger = createLogger();
