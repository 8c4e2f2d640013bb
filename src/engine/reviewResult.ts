import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { z } from "zod";
import type { ReconcileResult } from "../types/reconciliation.js";
import { createReconcileStore } from "../db/reconcileStore.js";
import { logAuditEvent } from "../db/auditEvents.js";
import { errorMessage, formatZodIssues } from "../utils/errors.js";
import { nonBlankString } from "../utils/schemas.js";
import { nowIso } from "./values.js";

export const markReviewedInputSchema = z.object({
  kind: z.enum(["totals", "items"]),
  invoiceId: nonBlankString,
  reviewedBy: nonBlankString,
  notes: z.string().nullish(),
});

export type MarkReviewedInput = z.input<typeof markReviewedInputSchema>;

export type ReviewOutcome =
  | { status: "reviewed"; message: string; result: ReconcileResult }
  | { status: "not_found"; message: string }
  | { status: "not_reviewable"; message: string }
  | { status: "error"; message: string };

/** A reviewer confirms a reconciliation result; later pending re-runs keep it. */
export function markReviewed(
  db: Database.Database,
  rawInput: MarkReviewedInput,
  opts: { now?: Date; logger?: Logger } = {}
): ReviewOutcome {
  const parsed = markReviewedInputSchema.safeParse(rawInput);
  if (!parsed.success) {
    return { status: "error", message: `Error marking invoice as reviewed: ${formatZodIssues(parsed.error)}` };
  }
  const input = parsed.data;

  try {
    const store = createReconcileStore(db, input.kind);
    const reviewedAt = nowIso(opts.now);

    const run = db.transaction((): ReviewOutcome => {
      const current = store.get(input.invoiceId);
      if (!current) {
        return { status: "not_found", message: `No ${input.kind} reconciliation result for invoice ${input.invoiceId}` };
      }
      // the next run would reset it straight back to Auto-reconciled
      if (current.reviewStatus === "Auto-reconciled") {
        return {
          status: "not_reviewable",
          message: `Invoice ${input.invoiceId} is Auto-reconciled; only discrepancies can be reviewed`,
        };
      }

      store.markReviewed({
        invoiceId: input.invoiceId,
        reviewedBy: input.reviewedBy,
        reviewedAt,
        notes: input.notes ?? null,
      });
      logAuditEvent(db, {
        eventType: "RESULT_REVIEWED",
        invoiceId: input.invoiceId,
        entityType: `reconcile_results_${input.kind}`,
        entityId: input.invoiceId,
        meta: { reviewedBy: input.reviewedBy },
        now: opts.now,
      });

      return {
        status: "reviewed",
        message: `Invoice ${input.invoiceId} marked as Reviewed`,
        result: { ...current, reviewStatus: "Reviewed", reviewedBy: input.reviewedBy, reviewedAt, notes: input.notes ?? null },
      };
    });

    const outcome = run();
    if (outcome.status === "reviewed") {
      opts.logger?.info(
        { event: "review.saved", kind: input.kind, invoiceId: input.invoiceId },
        "Reconciliation result reviewed"
      );
    } else {
      opts.logger?.warn({ event: `review.${outcome.status}`, invoiceId: input.invoiceId }, outcome.message);
    }
    return outcome;
  } catch (err) {
    opts.logger?.error({ event: "review.error", invoiceId: input.invoiceId, err }, "Review failed");
    return { status: "error", message: `Error marking invoice as reviewed: ${errorMessage(err)}` };
  }
}
