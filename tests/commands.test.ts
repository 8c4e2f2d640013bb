import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig } from "../src/config.js";
import { parseCliArgs, getArg, hasFlag } from "../src/utils/args.js";
import {
  metricsCommand,
  reconcileCommand,
  resultsCommand,
  statsCommand,
  validateCommand,
  type CommandContext,
} from "../src/admin/commands.js";
import { addExtracted, addLedger, createTestDb, extracted, ledger, silentLogger } from "./helpers.js";

describe("parseCliArgs", () => {
  it("should split positionals from flags", () => {
    const args = parseCliArgs(["validate", "--invoice", "2004", "--total=12.5", "--force"]);

    expect(args._).toEqual(["validate"]);
    expect(getArg(args, "invoice")).toBe("2004");
    expect(getArg(args, "total")).toBe("12.5");
    expect(getArg(args, "force", "none")).toBe("none");
    expect(hasFlag(args, "force")).toBe(true);
    expect(hasFlag(args, "missing")).toBe(false);
  });
});

describe("admin commands", () => {
  let ctx: CommandContext;

  beforeEach(() => {
    ctx = {
      db: createTestDb(),
      config: { ...loadConfig({}), anomalyDetectionEnabled: false },
      logger: silentLogger,
    };
    addLedger(ctx.db, ledger({ invoiceId: "2004", total: 309.73 }), ledger({ invoiceId: "2010" }));
    addExtracted(ctx.db, extracted({ invoiceNo: "2004", totalAmount: 209.73 }), extracted({ invoiceNo: "2010" }));
  });

  afterEach(() => {
    ctx.db.close();
  });

  it("should reconcile and then list pending totals by default", () => {
    expect(reconcileCommand(ctx, parseCliArgs([])).ok).toBe(true);

    const pending = resultsCommand(ctx, parseCliArgs([]));
    expect(pending.ok).toBe(true);
    expect(pending.output).toMatchObject([{ invoiceId: "2004", reviewStatus: "Pending Review" }]);

    expect(reconcileCommand(ctx, parseCliArgs([]))).toEqual({ ok: true, output: { skipped: "no_changes" } });
    expect(metricsCommand(ctx).output).toMatchObject({ totalInvoiceCount: 2, autoReconciledCount: 1 });
  });

  it("should reject an unknown result status", () => {
    expect(() => resultsCommand(ctx, parseCliArgs(["--status", "Closed"]))).toThrow(
      "--status must be one of Auto-reconciled, Pending Review, Reviewed, All"
    );
  });

  it("should validate from command-line flags", () => {
    const result = validateCommand(
      ctx,
      parseCliArgs(["--invoice", "2004", "--file", "invoice_2004.pdf", "--by", "clerk", "--total", "309.73", "--status", "validated"])
    );

    expect(result.ok).toBe(true);
    expect(result.output).toMatchObject({ status: "validated", record: { changeSummary: "Total Amount: 209.73 → 309.73; " } });
    expect(statsCommand(ctx).output).toMatchObject({ validatedCount: 1, correctionsMade: 1, validationRate: 50 });
  });

  it("should refuse a non-numeric total", () => {
    expect(() =>
      validateCommand(ctx, parseCliArgs(["--invoice", "2004", "--file", "invoice_2004.pdf", "--by", "clerk", "--total", "abc"]))
    ).toThrow('--total must be a number (got "abc")');
  });
});
