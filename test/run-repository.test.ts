import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { RunRepository } from '../src/repository/run-repository.js';
import type { RunState } from '../src/models/index.js';
import { createTestStore, cleanupTestDatabase, buildPayload } from './setup.js';

const runState = (runId: string, status: RunState['status'], createdAt: string): RunState => ({
  runId, document: { kind: 'structured', name: `${runId}.xml` }, regimeHint: null, status,
  payload: buildPayload(), classification: null, reviewReason: null, reviewInput: null, error: null,
  warnings: [], auditLog: [], createdAt, updatedAt: createdAt,
});

describe('Run Repository', () => {
  let db: Database.Database, runs: RunRepository;

  beforeEach(() => { const s = createTestStore(); db = s.db; runs = s.runs; });
  afterEach(() => cleanupTestDatabase(db));

  it('stores and reloads a run state', () => {
    const state = runState('run-1', 'awaiting_review', '2024-01-01T10:00:00.000Z');
    runs.saveRun(state);
    expect(runs.findRun('run-1')).toEqual(state);
    expect(runs.findRun('run-2')).toBeUndefined();
  });

  it('overwrites a run on save', () => {
    runs.saveRun(runState('run-1', 'awaiting_review', '2024-01-01T10:00:00.000Z'));
    runs.saveRun(runState('run-1', 'finalized', '2024-01-01T10:00:00.000Z'));
    expect(runs.findRun('run-1')?.status).toBe('finalized');
    expect(runs.findRunsByStatus('awaiting_review')).toEqual([]);
  });

  it('finds runs by status, oldest first', () => {
    runs.saveRun(runState('run-b', 'awaiting_review', '2024-01-02T10:00:00.000Z'));
    runs.saveRun(runState('run-a', 'awaiting_review', '2024-01-01T10:00:00.000Z'));
    runs.saveRun(runState('run-c', 'failed', '2024-01-01T09:00:00.000Z'));
    expect(runs.findRunsByStatus('awaiting_review').map(r => r.runId)).toEqual(['run-a', 'run-b']);
  });

  it('keeps the audit trail in insertion order', () => {
    runs.saveAuditEntry({ runId: 'run-1', step: 'extract', timestamp: '2024-01-01T10:00:00.000Z', details: 'started' });
    runs.saveAuditEntry({ runId: 'run-1', step: 'validate', timestamp: '2024-01-01T10:00:00.000Z', details: 'valid' });
    runs.saveAuditEntry({ runId: 'run-2', step: 'extract', timestamp: '2024-01-01T10:00:00.000Z', details: 'other run' });
    expect(runs.getAuditTrail('run-1')).toEqual([
      { step: 'extract', timestamp: '2024-01-01T10:00:00.000Z', details: 'started' },
      { step: 'validate', timestamp: '2024-01-01T10:00:00.000Z', details: 'valid' },
    ]);
  });
});
