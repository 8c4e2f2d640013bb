import type Database from "better-sqlite3";

function nowIso(now?: Date) {
  return (now ?? new Date()).toISOString();
}

export type AuditEventType =
  | "RECONCILIATION_RUN"
  | "GOLD_PROMOTED"
  | "INVOICE_VALIDATED"
  | "VALIDATION_CONFLICT"
  | "RESULT_REVIEWED"
  | "ANOMALY_SCAN";

export type AuditEventRow = {
  id: number;
  ts: string;
  eventType: AuditEventType;
  invoiceId: string | null;
  entityType: string | null;
  entityId: string | null;
  metaJson: string | null;
};

export function logAuditEvent(
  db: Database.Database,
  args: {
    eventType: AuditEventType;
    invoiceId?: string | null;
    entityType?: string | null;
    entityId?: string | null;
    meta?: unknown;
    now?: Date;
  }
) {
  const stmt = db.prepare(`
    INSERT INTO audit_events (ts, eventType, invoiceId, entityType, entityId, metaJson)
    VALUES (@ts, @eventType, @invoiceId, @entityType, @entityId, @metaJson)
  `);

  stmt.run({
    ts: nowIso(args.now),
    eventType: args.eventType,
    invoiceId: args.invoiceId ?? null,
    entityType: args.entityType ?? null,
    entityId: args.entityId ?? null,
    metaJson: args.meta ? JSON.stringify(args.meta) : null,
  });
}

export function getAuditEvents(db: Database.Database, eventType?: AuditEventType): AuditEventRow[] {
  if (eventType) {
    return db
      .prepare<[string], AuditEventRow>(`SELECT * FROM audit_events WHERE eventType = ? ORDER BY id`)
      .all(eventType);
  }
  return db.prepare<[], AuditEventRow>(`SELECT * FROM audit_events ORDER BY id`).all();
}
