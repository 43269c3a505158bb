//persistence for learned operation-code mappings
//process-wide: every run sharing the database file sees a committed upsert on its next lookup
import Database from 'better-sqlite3';
import type { MappingRecord, StoredMapping, TaxRegime } from '../models/index.js';
import { TAX_REGIMES } from '../models/index.js';
import { LearningStoreError, describeCause } from '../errors.js';

export interface ILearningStore {
  lookup(operationCode: string): StoredMapping | undefined;
  upsert(operationCode: string, record: MappingRecord): StoredMapping;
  list(): StoredMapping[];
  //lowest confidence among learned mappings, undefined when nothing is learned yet
  minConfidence(): number | undefined;
  importMappings(mappings: StoredMapping[]): number;
}

const OPERATION_CODE = /^\d{4}$/;

export class SqliteLearningStore implements ILearningStore {
  constructor(private db: Database.Database) {}

  lookup(operationCode: string): StoredMapping | undefined {
    const row = this.guard('lookup', () =>
      this.db.prepare(`SELECT * FROM operation_code_mappings WHERE operation_code = ?`).get(operationCode) as MappingRow | undefined);
    return row ? this.toMapping(row) : undefined;
  }

  //single-statement upsert inside an immediate transaction: concurrent writers serialize, last write wins
  upsert(operationCode: string, record: MappingRecord): StoredMapping {
    this.assertWritable(operationCode, record);
    const stored: StoredMapping = { ...record, operationCode, updatedAt: new Date().toISOString() };
    this.guard('upsert', () => this.db.transaction((m: StoredMapping) => this.write(m)).immediate(stored));
    return stored;
  }

  list(): StoredMapping[] {
    return this.guard('list', () =>
      (this.db.prepare(`SELECT * FROM operation_code_mappings ORDER BY operation_code ASC`).all() as MappingRow[]).map(r => this.toMapping(r)));
  }

  minConfidence(): number | undefined {
    const row = this.guard('minConfidence', () =>
      this.db.prepare(`SELECT MIN(confidence) AS min FROM operation_code_mappings`).get() as { min: number | null } | undefined);
    return row?.min ?? undefined;
  }

  //all-or-nothing import of an operator-edited mapping file
  importMappings(mappings: StoredMapping[]): number {
    mappings.forEach(m => this.assertWritable(m.operationCode, m));
    this.guard('import', () => this.db.transaction((all: StoredMapping[]) => { all.forEach(m => this.write(m)); }).immediate(mappings));
    return mappings.length;
  }

  private write(m: StoredMapping): void {
    this.db.prepare(`INSERT INTO operation_code_mappings (operation_code, debit_account, credit_account, rationale, confidence, regime, updated_at) VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(operation_code) DO UPDATE SET debit_account = excluded.debit_account, credit_account = excluded.credit_account, rationale = excluded.rationale, confidence = excluded.confidence, regime = excluded.regime, updated_at = excluded.updated_at`)
      .run(m.operationCode, m.debitAccount, m.creditAccount, m.rationale, m.confidence, m.regime, m.updatedAt);
  }

  private assertWritable(operationCode: string, r: MappingRecord): void {
    if (!OPERATION_CODE.test(operationCode)) throw new LearningStoreError(`Refusing to store mapping: operation code "${operationCode}" is not 4 digits`);
    if (!(r.confidence > 0 && r.confidence <= 1)) throw new LearningStoreError(`Refusing to store mapping for ${operationCode}: confidence ${r.confidence} outside (0, 1]`);
    if (!r.debitAccount.trim() || !r.creditAccount.trim()) throw new LearningStoreError(`Refusing to store mapping for ${operationCode}: empty account`);
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof LearningStoreError) throw err;
      throw new LearningStoreError(`Learning store ${operation} failed: ${describeCause(err)}`, { cause: err });
    }
  }

  private toMapping(r: MappingRow): StoredMapping {
    return {
      operationCode: r.operation_code, debitAccount: r.debit_account, creditAccount: r.credit_account,
      rationale: r.rationale, confidence: r.confidence, regime: toRegime(r.regime), updatedAt: r.updated_at,
    };
  }
}

function toRegime(value: string | null): TaxRegime | null {
  return TAX_REGIMES.find(r => r === value) ?? null;
}

//row types (DB → App mapping)
interface MappingRow { operation_code: string; debit_account: string; credit_account: string; rationale: string; confidence: number; regime: string | null; updated_at: string; }
