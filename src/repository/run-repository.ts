//durable run states: a run suspended for review is resumed from here, often by a later process
import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry, RunState } from '../models/index.js';

//it keeps the audit entries linked to runs
export interface StoredAuditEntry extends AuditEntry { runId: string; }

export interface IRunRepository {
  saveRun(state: RunState): void;
  findRun(runId: string): RunState | undefined;
  findRunsByStatus(status: RunState['status']): RunState[];
  saveAuditEntry(entry: StoredAuditEntry): void;
  getAuditTrail(runId: string): AuditEntry[];
}

export class RunRepository implements IRunRepository {
  constructor(private db: Database.Database) {}

  saveRun(state: RunState): void {
    this.db.prepare(`INSERT INTO workflow_runs (run_id, status, document_name, state, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(run_id) DO UPDATE SET status = excluded.status, state = excluded.state, updated_at = excluded.updated_at`)
      .run(state.runId, state.status, state.document.name, JSON.stringify(state), state.createdAt, state.updatedAt);
  }

  findRun(runId: string): RunState | undefined {
    const row = this.db.prepare(`SELECT state FROM workflow_runs WHERE run_id = ?`).get(runId) as RunRow | undefined;
    return row ? JSON.parse(row.state) as RunState : undefined;
  }

  findRunsByStatus(status: RunState['status']): RunState[] {
    return (this.db.prepare(`SELECT state FROM workflow_runs WHERE status = ? ORDER BY created_at ASC`).all(status) as RunRow[])
      .map(r => JSON.parse(r.state) as RunState);
  }

  //audit Trail
  saveAuditEntry(entry: StoredAuditEntry): void {
    this.db.prepare(`INSERT INTO audit_trail (id, run_id, step, timestamp, details) VALUES (?, ?, ?, ?, ?)`).run(uuidv4(), entry.runId, entry.step, entry.timestamp, entry.details);
  }

  getAuditTrail(runId: string): AuditEntry[] {
    return (this.db.prepare(`SELECT step, timestamp, details FROM audit_trail WHERE run_id = ? ORDER BY rowid ASC`).all(runId) as AuditEntryRow[])
      .map(r => ({ step: r.step as AuditEntry['step'], timestamp: r.timestamp, details: r.details }));
  }
}

//row types (DB → App mapping)
interface RunRow { state: string; }
interface AuditEntryRow { step: string; timestamp: string; details: string; }
