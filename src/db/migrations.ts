import type Database from "better-sqlite3";

const CHANGE_TRACKED_TABLES = ["invoice_info", "transact_totals", "transact_items"] as const;

export function migrate(db: Database.Database) {
  // Bronze: extraction and ledger feeds. The core only reads these.
  db.exec(`
    CREATE TABLE IF NOT EXISTS invoice_info (
      invoice_no TEXT NOT NULL,
      file_name TEXT NOT NULL,
      customer_no TEXT,
      invoice_date TEXT,
      total_amount REAL,
      cost_center TEXT,
      file_size INTEGER,
      last_modified TEXT,
      file_url TEXT,
      PRIMARY KEY (invoice_no, file_name)
    );

    CREATE TABLE IF NOT EXISTS transact_totals (
      invoice_id TEXT PRIMARY KEY,
      invoice_date TEXT NOT NULL,
      subtotal REAL,
      tax REAL,
      total REAL NOT NULL
    );

    CREATE TABLE IF NOT EXISTS transact_items (
      invoice_id TEXT NOT NULL,
      line INTEGER NOT NULL,
      product_name TEXT NOT NULL,
      quantity INTEGER NOT NULL,
      unit_price REAL NOT NULL,
      total_price REAL NOT NULL,
      PRIMARY KEY (invoice_id, line)
    );
  `);

  for (const table of ["reconcile_results_totals", "reconcile_results_items"]) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        invoice_id TEXT PRIMARY KEY,
        mismatch_details TEXT NOT NULL DEFAULT '',
        availability_notes TEXT,
        review_status TEXT NOT NULL,
        last_reconciled_at TEXT NOT NULL,
        reviewed_by TEXT,
        reviewed_at TEXT,
        notes TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_${table}_status ON ${table}(review_status);
    `);
  }

  // Gold: derived, fully recomputable. gold_invoice_items has no writer yet.
  db.exec(`
    CREATE TABLE IF NOT EXISTS gold_invoice_totals (
      invoice_id TEXT PRIMARY KEY,
      invoice_date TEXT NOT NULL,
      subtotal REAL,
      tax REAL,
      total REAL NOT NULL,
      reviewed_by TEXT NOT NULL,
      reviewed_at TEXT NOT NULL,
      notes TEXT
    );

    CREATE TABLE IF NOT EXISTS gold_invoice_items (
      invoice_id TEXT NOT NULL,
      line INTEGER NOT NULL,
      product_name TEXT NOT NULL,
      quantity INTEGER NOT NULL,
      unit_price REAL NOT NULL,
      total_price REAL NOT NULL,
      reviewed_by TEXT NOT NULL,
      reviewed_at TEXT NOT NULL,
      notes TEXT,
      PRIMARY KEY (invoice_id, line)
    );
  `);

  // Silver: one live human-validated record per (invoice_no, file_name).
  db.exec(`
    CREATE TABLE IF NOT EXISTS silver_validated_invoices (
      invoice_no TEXT NOT NULL,
      file_name TEXT NOT NULL,
      customer_no TEXT,
      invoice_date TEXT,
      total_amount REAL,
      cost_center TEXT,
      file_size INTEGER,
      last_modified TEXT,
      file_url TEXT,
      validation_status TEXT NOT NULL DEFAULT 'PENDING',
      validated_by TEXT NOT NULL,
      validated_at TEXT NOT NULL,
      changes_made INTEGER NOT NULL DEFAULT 0,
      original_values TEXT NOT NULL,
      change_summary TEXT NOT NULL,
      validation_notes TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      version INTEGER NOT NULL DEFAULT 1,
      PRIMARY KEY (invoice_no, file_name)
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ts TEXT NOT NULL,
      eventType TEXT NOT NULL,
      invoiceId TEXT,
      entityType TEXT,
      entityId TEXT,
      metaJson TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_audit_events_invoice ON audit_events(invoiceId);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS anomaly_detection_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      detection_id TEXT NOT NULL,
      invoice_id TEXT NOT NULL,
      anomaly_type TEXT NOT NULL,
      severity TEXT NOT NULL,
      description TEXT NOT NULL,
      metrics_json TEXT,
      detected_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_anomaly_detection_batch ON anomaly_detection_results(detection_id);
  `);

  // Change tracking for the scheduled task: every write to a bronze table
  // appends to change_log; task_state keeps the consumed watermark.
  db.exec(`
    CREATE TABLE IF NOT EXISTS change_log (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      source_table TEXT NOT NULL,
      operation TEXT NOT NULL,
      changed_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    );

    CREATE TABLE IF NOT EXISTS task_state (
      task_name TEXT PRIMARY KEY,
      watermark INTEGER NOT NULL DEFAULT 0,
      suspended INTEGER NOT NULL DEFAULT 0,
      last_run_at TEXT,
      last_message TEXT
    );
  `);

  for (const table of CHANGE_TRACKED_TABLES) {
    for (const op of ["INSERT", "UPDATE", "DELETE"]) {
      db.exec(`
        CREATE TRIGGER IF NOT EXISTS trg_${table}_${op.toLowerCase()}
        AFTER ${op} ON ${table}
        BEGIN
          INSERT INTO change_log (source_table, operation) VALUES ('${table}', '${op}');
        END;
      `);
    }
  }

  db.exec(`
    CREATE VIEW IF NOT EXISTS vw_pending_validations AS
    SELECT
      i.invoice_no,
      i.customer_no,
      i.invoice_date,
      i.total_amount,
      i.cost_center,
      i.file_name,
      i.file_size,
      i.last_modified,
      i.file_url,
      COALESCE(sv.validation_status, 'PENDING') AS current_status,
      sv.validated_by,
      sv.validated_at,
      sv.change_summary
    FROM invoice_info i
    LEFT JOIN silver_validated_invoices sv
      ON i.invoice_no = sv.invoice_no AND i.file_name = sv.file_name;

    CREATE VIEW IF NOT EXISTS vw_validation_stats AS
    SELECT
      COUNT(*) AS total_invoices,
      COUNT(CASE WHEN sv.validation_status = 'VALIDATED' THEN 1 END) AS validated_count,
      COUNT(CASE WHEN sv.validation_status = 'REJECTED' THEN 1 END) AS rejected_count,
      COUNT(CASE WHEN COALESCE(sv.validation_status, 'PENDING') = 'PENDING' THEN 1 END) AS pending_count,
      CASE
        WHEN COUNT(*) = 0 THEN 0
        ELSE ROUND(COUNT(CASE WHEN sv.validation_status = 'VALIDATED' THEN 1 END) * 100.0 / COUNT(*), 2)
      END AS validation_rate,
      COUNT(CASE WHEN sv.changes_made = 1 THEN 1 END) AS corrections_made
    FROM invoice_info i
    LEFT JOIN silver_validated_invoices sv
      ON i.invoice_no = sv.invoice_no AND i.file_name = sv.file_name;
  `);
}
