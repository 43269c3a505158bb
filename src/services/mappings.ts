//operator-facing mapping files: JSON import/export of the Learning Store
import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { StoredMapping } from '../models/index.js';
import { INDETERMINATE_REGIME, TAX_REGIMES } from '../models/index.js';
import { LearningStoreError, describeCause, formatIssues } from '../errors.js';
import type { ILearningStore } from '../repository/learning-store.js';
import { createLogger } from '../logger.js';

const log = createLogger('mappings');

const mappingSchema = z.object({
  operationCode: z.preprocess(v => (typeof v === 'number' ? String(v) : v), z.string().trim().regex(/^\d{4}$/, 'must be exactly 4 digits')),
  debitAccount: z.string().trim().min(1, 'must not be empty'),
  creditAccount: z.string().trim().min(1, 'must not be empty'),
  rationale: z.string().trim().default(''),
  confidence: z.number().gt(0, 'must be above 0 and at most 1').max(1, 'must be above 0 and at most 1'),
  //"*", the sentinel and null all mean "no regime recorded"
  regime: z.preprocess(
    v => (v === '*' || v === INDETERMINATE_REGIME || v === undefined ? null : v),
    z.enum(TAX_REGIMES).nullable(),
  ),
  updatedAt: z.string().optional(),
});

const mappingFileSchema = z.array(mappingSchema);

export function parseMappings(raw: unknown, now: string = new Date().toISOString()): StoredMapping[] {
  const parsed = mappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => ({ path: i.path.length ? i.path.join('.') : '(file)', message: i.message }));
    throw new LearningStoreError(`Invalid mapping file: ${formatIssues(issues)}`);
  }
  return parsed.data.map(m => ({ ...m, updatedAt: m.updatedAt ?? now }));
}

export async function importMappingsFile(store: ILearningStore, path: string): Promise<number> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new LearningStoreError(`Could not read mapping file ${path}: ${describeCause(err)}`, { cause: err });
  }
  const count = store.importMappings(parseMappings(raw));
  log.info(`Imported ${count} mappings from ${path}`);
  return count;
}

export async function exportMappingsFile(store: ILearningStore, path: string): Promise<number> {
  const mappings = store.list();
  await writeFile(path, `${JSON.stringify(mappings, null, 2)}\n`, 'utf-8');
  log.info(`Exported ${mappings.length} mappings to ${path}`);
  return mappings.length;
}
