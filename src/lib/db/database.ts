import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { getEnv } from "../config/env";

export type SalesDatabase = Database.Database;

let _db: SalesDatabase | null = null;

/**
 * Open a SQLite database with the sales schema applied.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filePath: string): SalesDatabase {
  if (filePath !== ":memory:") {
    mkdirSync(dirname(filePath), { recursive: true });
  }
  const db = new Database(filePath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  initDatabase(db);
  return db;
}

/** Shared connection at DATABASE_PATH, opened on first use. */
export function getDb(): SalesDatabase {
  if (_db) return _db;
  const { DATABASE_PATH } = getEnv();
  _db = openDatabase(DATABASE_PATH);
  console.log(`[db] SQLite database opened at ${DATABASE_PATH}`);
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    console.log("[db] SQLite database closed");
  }
}

export function initDatabase(db: SalesDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source TEXT NOT NULL,
      ran_at TEXT DEFAULT (datetime('now')),
      record_counts TEXT NOT NULL,
      duration_ms INTEGER
    );

    CREATE TABLE IF NOT EXISTS sales_records (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
      invoice_id TEXT NOT NULL,
      stock_code TEXT NOT NULL,
      description TEXT,
      quantity INTEGER NOT NULL,
      invoice_timestamp TEXT NOT NULL,
      unit_price REAL NOT NULL,
      customer_id TEXT NOT NULL,
      country TEXT
    );

    CREATE TABLE IF NOT EXISTS daily_revenue (
      run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
      day TEXT NOT NULL,
      revenue REAL NOT NULL,
      previous_revenue REAL,
      growth_pct REAL,
      cumulative_revenue REAL NOT NULL,
      moving_avg_7 REAL NOT NULL,
      PRIMARY KEY (run_id, day)
    );

    CREATE TABLE IF NOT EXISTS country_summary (
      run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
      country TEXT NOT NULL,
      total_customers INTEGER NOT NULL,
      total_revenue REAL NOT NULL,
      average_revenue REAL NOT NULL,
      tier TEXT NOT NULL,
      ranking INTEGER NOT NULL,
      contribution_pct REAL NOT NULL,
      PRIMARY KEY (run_id, country)
    );

    CREATE TABLE IF NOT EXISTS top_customers (
      run_id INTEGER NOT NULL REFERENCES pipeline_runs(id),
      country TEXT NOT NULL,
      customer_id TEXT NOT NULL,
      total_revenue REAL NOT NULL,
      ranking INTEGER NOT NULL,
      PRIMARY KEY (run_id, country, customer_id)
    );

    CREATE INDEX IF NOT EXISTS idx_sales_run ON sales_records(run_id);
    CREATE INDEX IF NOT EXISTS idx_sales_customer ON sales_records(customer_id);
    CREATE INDEX IF NOT EXISTS idx_country_name ON country_summary(country);
  `);
}
