import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type Database from 'better-sqlite3';
import type { SqliteLearningStore } from '../src/repository/learning-store.js';
import { parseMappings, importMappingsFile, exportMappingsFile } from '../src/services/mappings.js';
import { LearningStoreError } from '../src/errors.js';
import { createTestStore, cleanupTestDatabase, sale5102 } from './setup.js';

const SEED_FILE = join(dirname(fileURLToPath(import.meta.url)), '..', 'data', 'operation-code-mappings.json');
const NOW = '2024-03-01T12:00:00.000Z';

describe('Mapping files', () => {
  let db: Database.Database, store: SqliteLearningStore, dir: string;

  beforeEach(() => { const s = createTestStore(); db = s.db; store = s.store; dir = mkdtempSync(join(tmpdir(), 'mappings-')); });
  afterEach(() => { cleanupTestDatabase(db); rmSync(dir, { recursive: true, force: true }); });

  it('parses operator-edited entries', () => {
    expect(parseMappings([
      { operationCode: 5102, debitAccount: ' Clientes ', creditAccount: 'Receita de Vendas', confidence: 0.9, regime: '*' },
      { operationCode: '1102', debitAccount: 'Estoques de Mercadorias', creditAccount: 'Fornecedores', rationale: 'Compra', confidence: 0.8, regime: 'real', updatedAt: '2024-01-01T00:00:00.000Z' },
    ], NOW)).toEqual([
      { operationCode: '5102', debitAccount: 'Clientes', creditAccount: 'Receita de Vendas', rationale: '', confidence: 0.9, regime: null, updatedAt: NOW },
      { operationCode: '1102', debitAccount: 'Estoques de Mercadorias', creditAccount: 'Fornecedores', rationale: 'Compra', confidence: 0.8, regime: 'real', updatedAt: '2024-01-01T00:00:00.000Z' },
    ]);
  });

  it('names the offending entries of an invalid file', () => {
    expect(() => parseMappings([{ operationCode: '51', debitAccount: 'Clientes', creditAccount: 'Receita de Vendas', confidence: 2, regime: null }]))
      .toThrow('Invalid mapping file: 0.operationCode: must be exactly 4 digits; 0.confidence: must be above 0 and at most 1');
    expect(() => parseMappings([{ ...sale5102, operationCode: '5102', confidence: 0 }]))
      .toThrow('Invalid mapping file: 0.confidence: must be above 0 and at most 1');
    expect(() => parseMappings({ '5102': sale5102 })).toThrow(LearningStoreError);
  });

  it('ships a seed file that parses', () => {
    const seed = parseMappings(JSON.parse(readFileSync(SEED_FILE, 'utf-8')));
    expect(seed.find(m => m.operationCode === '5102')).toMatchObject({ debitAccount: 'Clientes', creditAccount: 'Receita de Vendas', confidence: 0.9 });
    expect(seed.every(m => m.confidence >= 0.75)).toBe(true);
  });

  it('imports a file into the store and exports it back', async () => {
    const source = join(dir, 'in.json'), target = join(dir, 'out.json');
    writeFileSync(source, JSON.stringify([{ operationCode: '5102', ...sale5102, updatedAt: NOW }]));

    expect(await importMappingsFile(store, source)).toBe(1);
    expect(store.lookup('5102')?.confidence).toBe(0.9);

    expect(await exportMappingsFile(store, target)).toBe(1);
    expect(JSON.parse(readFileSync(target, 'utf-8'))).toEqual([{ operationCode: '5102', ...sale5102, updatedAt: NOW }]);
  });

  it('reports unreadable files', async () => {
    const source = join(dir, 'broken.json');
    writeFileSync(source, '{ not json');
    await expect(importMappingsFile(store, source)).rejects.toThrow(/^Could not read mapping file .*broken\.json: /);
    expect(store.list()).toEqual([]);
  });
});
