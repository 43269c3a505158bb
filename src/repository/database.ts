//database schema and initialization for learned mappings, run states and their audit trail

import Database from 'better-sqlite3';

//SQL SCHEMA DEFINITION
const SCHEMA = `
-- Learned operation-code (CFOP) mappings, one row per code
CREATE TABLE IF NOT EXISTS operation_code_mappings (
  operation_code TEXT PRIMARY KEY CHECK (length(operation_code) = 4),
  debit_account TEXT NOT NULL,
  credit_account TEXT NOT NULL,
  rationale TEXT NOT NULL,
  confidence REAL NOT NULL CHECK (confidence > 0 AND confidence <= 1),
  regime TEXT,
  updated_at TEXT NOT NULL
);

-- Workflow runs (suspended runs are resumed from here, possibly by another process)
CREATE TABLE IF NOT EXISTS workflow_runs (
  run_id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  document_name TEXT NOT NULL,
  state TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_workflow_runs_status ON workflow_runs(status);

-- Audit Trail Table
CREATE TABLE IF NOT EXISTS audit_trail (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL,
  step TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  details TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_trail_run_id ON audit_trail(run_id);
`;

//WAL lets lookups read the last committed mapping while another process writes
export function initializeDatabase(dbPath: string = ':memory:'): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  db.exec(SCHEMA);

  return db;
}

export function closeDatabase(db: Database.Database): void {
  db.close();
}
