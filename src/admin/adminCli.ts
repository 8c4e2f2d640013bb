#!/usr/bin/env node
import { fileURLToPath } from "node:url";
import path from "node:path";

import { loadConfig } from "../config.js";
import { openDb } from "../db/sqlite.js";
import { migrate } from "../db/migrations.js";
import { createLogger } from "../utils/logger.js";
import { parseCliArgs } from "../utils/args.js";
import {
  anomaliesCommand,
  createTask,
  metricsCommand,
  reconcileCommand,
  resultsCommand,
  reviewCommand,
  seedCommand,
  statsCommand,
  statusCommand,
  validateCommand,
  type CommandContext,
  type CommandResult,
} from "./commands.js";

const USAGE = `Usage: invoice-recon <command> [--db path] [options]

  seed        [--file data/seed.json]
  reconcile   [--force]
  watch
  suspend | resume
  validate    --invoice <no> --file <name> --by <user> [--customer x] [--date x] [--total n]
              [--cost-center x] [--notes x] [--status VALIDATED|REJECTED|PENDING] [--expected-version n]
  review      --invoice <id> --by <user> [--kind totals|items] [--notes x]
  results     [--kind totals|items] [--status "Pending Review"|Reviewed|Auto-reconciled|All]
  status      [--invoice <no>] [--status PENDING|VALIDATED|REJECTED]
  stats
  metrics
  anomalies   [--scan] [--batch <detection id>]`;

function print(result: CommandResult) {
  console.log(JSON.stringify(result.output, null, 2));
  if (!result.ok) process.exitCode = 1;
}

export async function runAdminCli(argv: string[]) {
  const args = parseCliArgs(argv);
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const dbFlag = args.flags["db"];
  const db = openDb(typeof dbFlag === "string" ? dbFlag : config.dbPath);
  migrate(db);

  const ctx: CommandContext = { db, config, logger };
  const cmd = args._[0] ?? "";

  if (cmd === "watch") {
    const task = createTask(ctx);
    task.start();
    task.execute();
    await new Promise<void>((resolve) => {
      const shutdown = () => {
        task.stop();
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
    db.close();
    return;
  }

  try {
    switch (cmd) {
      case "seed":
        return print(seedCommand(ctx, args));
      case "reconcile":
        return print(reconcileCommand(ctx, args));
      case "suspend":
        createTask(ctx).suspend();
        return print({ ok: true, output: { suspended: true } });
      case "resume":
        createTask(ctx).resume();
        return print({ ok: true, output: { suspended: false } });
      case "validate":
        return print(validateCommand(ctx, args));
      case "review":
        return print(reviewCommand(ctx, args));
      case "results":
        return print(resultsCommand(ctx, args));
      case "status":
        return print(statusCommand(ctx, args));
      case "stats":
        return print(statsCommand(ctx));
      case "metrics":
        return print(metricsCommand(ctx));
      case "anomalies":
        return print(anomaliesCommand(ctx, args));
      default:
        console.error(USAGE);
        throw new Error(cmd ? `Unknown command: ${cmd}` : "Missing command");
    }
  } finally {
    db.close();
  }
}

const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isEntry) {
  runAdminCli(process.argv.slice(2)).catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
