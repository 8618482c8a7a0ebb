import type BetterSqlite3 from 'better-sqlite3';

const baseStatements = [
  `CREATE TABLE IF NOT EXISTS bills (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    uploaded_at TEXT DEFAULT CURRENT_TIMESTAMP,
    original_filename TEXT,
    file_path TEXT,
    billing_period TEXT,
    layout TEXT NOT NULL,
    family_count INTEGER NOT NULL,
    plan_cost_for_all_members INTEGER NOT NULL DEFAULT 0,
    stated_total REAL NOT NULL
  );`,
  `CREATE TABLE IF NOT EXISTS allocations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    bill_id INTEGER NOT NULL,
    position INTEGER NOT NULL,
    member TEXT NOT NULL,
    total REAL NOT NULL,
    plan_price REAL NOT NULL,
    equipment REAL NOT NULL,
    services REAL NOT NULL,
    one_time_charges REAL NOT NULL,
    FOREIGN KEY (bill_id) REFERENCES bills(id) ON DELETE CASCADE
  );`,
];

export const applyMigrations = (db: BetterSqlite3.Database): void => {
  baseStatements.forEach((statement) => {
    db.prepare(statement).run();
  });
};
