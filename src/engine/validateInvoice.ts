import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { z } from "zod";
import { VALIDATION_STATUSES, type ValidatedInvoice } from "../types/reconciliation.js";
import { getExtractedInvoice } from "../db/extractionStore.js";
import { getValidatedInvoice, replaceValidatedInvoice } from "../db/validationStore.js";
import { logAuditEvent } from "../db/auditEvents.js";
import { errorMessage, formatZodIssues } from "../utils/errors.js";
import { nonBlankString } from "../utils/schemas.js";
import { applyOverrides, buildChangeSummary, pickOverridable } from "./changeSummary.js";
import { nowIso } from "./values.js";

export const validateInvoiceInputSchema = z.object({
  invoiceNo: nonBlankString,
  fileName: nonBlankString,
  validatedBy: nonBlankString,
  overrides: z
    .object({
      customerNo: z.string().nullish(),
      invoiceDate: z.string().nullish(),
      totalAmount: z.number().finite().nullish(),
      costCenter: z.string().nullish(),
    })
    .default({}),
  notes: z.string().nullish(),
  status: z.enum(VALIDATION_STATUSES).default("VALIDATED"),
  // optimistic concurrency: the version the caller last read (0 = never validated)
  expectedVersion: z.number().int().nonnegative().optional(),
});

export type ValidateInvoiceInput = z.input<typeof validateInvoiceInputSchema>;

export type ValidationOutcome =
  | { status: "validated"; message: string; record: ValidatedInvoice }
  | { status: "not_found"; message: string }
  | { status: "conflict"; message: string; currentVersion: number }
  | { status: "error"; message: string };

/**
 * Record a human validation for one (invoice_no, file_name) pair.
 *
 * The original-values snapshot always comes from the current extraction row,
 * never from an earlier validation, and the silver row is replaced rather
 * than accumulated. Concurrent writers without `expectedVersion` follow
 * last-writer-wins.
 */
export function validateInvoice(
  db: Database.Database,
  rawInput: ValidateInvoiceInput,
  opts: { now?: Date; logger?: Logger } = {}
): ValidationOutcome {
  const { logger } = opts;

  const parsed = validateInvoiceInputSchema.safeParse(rawInput);
  if (!parsed.success) {
    return { status: "error", message: `Error validating invoice: ${formatZodIssues(parsed.error)}` };
  }
  const input = parsed.data;
  const ts = nowIso(opts.now);

  try {
    const run = db.transaction((): ValidationOutcome => {
      const source = getExtractedInvoice(db, input.invoiceNo, input.fileName);
      if (!source) {
        return {
          status: "not_found",
          message: `Invoice ${input.invoiceNo} (${input.fileName}) not found in extraction feed; nothing written`,
        };
      }

      const current = getValidatedInvoice(db, input.invoiceNo, input.fileName);
      const currentVersion = current?.version ?? 0;

      if (input.expectedVersion !== undefined && input.expectedVersion !== currentVersion) {
        logAuditEvent(db, {
          eventType: "VALIDATION_CONFLICT",
          invoiceId: input.invoiceNo,
          entityType: "silver_validated_invoices",
          entityId: input.fileName,
          meta: { expectedVersion: input.expectedVersion, currentVersion, validatedBy: input.validatedBy },
          now: opts.now,
        });
        return {
          status: "conflict",
          message: `Error validating invoice: version conflict (expected ${input.expectedVersion}, found ${currentVersion})`,
          currentVersion,
        };
      }

      const originalValues = pickOverridable(source);
      const { effective, changes } = applyOverrides(originalValues, input.overrides);

      const record: ValidatedInvoice = {
        ...source,
        ...effective,
        validationStatus: input.status,
        validatedBy: input.validatedBy,
        validatedAt: ts,
        changesMade: changes.length > 0,
        originalValues,
        changeSummary: buildChangeSummary(changes),
        notes: input.notes ?? null,
        createdAt: current?.createdAt ?? ts,
        updatedAt: ts,
        version: currentVersion + 1,
      };

      replaceValidatedInvoice(db, record);

      logAuditEvent(db, {
        eventType: "INVOICE_VALIDATED",
        invoiceId: input.invoiceNo,
        entityType: "silver_validated_invoices",
        entityId: input.fileName,
        meta: {
          status: input.status,
          validatedBy: input.validatedBy,
          changedFields: changes.map((c) => c.field),
          version: record.version,
        },
        now: opts.now,
      });

      return { status: "validated", message: `Invoice ${input.invoiceNo} validated successfully`, record };
    });

    const outcome = run();
    if (outcome.status === "validated") {
      logger?.info(
        {
          event: "validation.saved",
          invoiceNo: input.invoiceNo,
          fileName: input.fileName,
          status: input.status,
          changesMade: outcome.record.changesMade,
        },
        outcome.message
      );
    } else {
      logger?.warn({ event: `validation.${outcome.status}`, invoiceNo: input.invoiceNo }, outcome.message);
    }
    return outcome;
  } catch (err) {
    logger?.error({ event: "validation.error", invoiceNo: input.invoiceNo, err }, "Validation failed");
    return { status: "error", message: `Error validating invoice: ${errorMessage(err)}` };
  }
}
