#!/usr/bin/env node
import { mkdirSync, readFileSync } from 'fs';
import { dirname } from 'path';
import { env } from './config/env.js';
import { initializeDatabase, closeDatabase } from './repository/database.js';
import { SqliteLearningStore } from './repository/learning-store.js';
import { RunRepository } from './repository/run-repository.js';
import { WorkflowEngine } from './services/workflow.js';
import { toRunOutput, exitCodeFor } from './services/output.js';
import { importMappingsFile, exportMappingsFile } from './services/mappings.js';
import { WorkflowError } from './errors.js';
import type { DocumentSource, RunState, TaxRegime } from './models/index.js';
import { EXIT_CODES, INDETERMINATE_REGIME, TAX_REGIMES } from './models/index.js';
import type Database from 'better-sqlite3';

const USAGE = `Usage:
  fiscal-workflow run --xml <file> | --pdf <file> [--regime simples|presumido|real] [--review <json|@file>]
  fiscal-workflow resume <runId> --review <json|@file>
  fiscal-workflow runs pending
  fiscal-workflow mappings list | import <file> | export <file>`;

class UsageError extends Error {}

//flag value lookup: "--name value"
const flag = (args: string[], name: string): string | undefined => {
  const i = args.indexOf(name);
  return i >= 0 ? args[i + 1] : undefined;
};

const print = (value: unknown) => console.log(JSON.stringify(value, null, 2));

function parseRegime(value: string | undefined): TaxRegime | null {
  if (value === undefined || value === '*' || value === INDETERMINATE_REGIME) return null;
  const regime = TAX_REGIMES.find(r => r === value.toLowerCase());
  if (!regime) throw new UsageError(`Unknown regime "${value}"`);
  return regime;
}

//review input inline as JSON, or "@path" to read it from a file
function parseReview(value: string | undefined): unknown {
  if (value === undefined) throw new UsageError('--review is required');
  const text = value.startsWith('@') ? readFileSync(value.slice(1), 'utf-8') : value;
  try {
    return JSON.parse(text);
  } catch {
    throw new UsageError(`--review is not valid JSON: ${text}`);
  }
}

function documentFrom(args: string[]): DocumentSource {
  const xml = flag(args, '--xml'), pdf = flag(args, '--pdf');
  if (xml) return { kind: 'structured', path: xml };
  if (pdf) return { kind: 'unstructured', path: pdf };
  throw new UsageError('run needs --xml <file> or --pdf <file>');
}

const finish = (state: RunState) => { print(toRunOutput(state)); process.exitCode = exitCodeFor(state); };

async function execute(db: Database.Database, [command, sub, ...rest]: string[]): Promise<void> {
  const store = new SqliteLearningStore(db), runs = new RunRepository(db);
  const engine = new WorkflowEngine(store, runs);
  const args = [sub ?? '', ...rest];

  switch (command) {
    case 'run': {
      const document = documentFrom(args);
      const review = flag(args, '--review');
      let state = await engine.run(document, { regimeHint: parseRegime(flag(args, '--regime')) });
      if (review !== undefined && state.status === 'awaiting_review') state = await engine.resume(state, parseReview(review));
      return finish(state);
    }
    case 'resume': {
      if (!sub || sub.startsWith('--')) throw new UsageError('resume needs a run id');
      return finish(await engine.resume(sub, parseReview(flag(args, '--review'))));
    }
    case 'runs': {
      if (sub !== 'pending') throw new UsageError(`Unknown runs command "${sub ?? ''}"`);
      return print(runs.findRunsByStatus('awaiting_review').map(toRunOutput));
    }
    case 'mappings': {
      const file = rest[0];
      if (sub === 'list') return print(store.list());
      if (sub === 'import' && file) return print({ imported: await importMappingsFile(store, file) });
      if (sub === 'export' && file) return print({ exported: await exportMappingsFile(store, file) });
      throw new UsageError(`Unknown mappings command "${[sub, file].filter(Boolean).join(' ')}"`);
    }
    default:
      throw new UsageError(command ? `Unknown command "${command}"` : 'No command given');
  }
}

//entry point
async function main() {
  if (env.DATABASE_PATH !== ':memory:') mkdirSync(dirname(env.DATABASE_PATH), { recursive: true });
  const db = initializeDatabase(env.DATABASE_PATH);
  try {
    await execute(db, process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) console.error(`${err.message}\n\n${USAGE}`);
    else if (err instanceof WorkflowError) console.error(`${err.kind}: ${err.message}`);
    else throw err;
    process.exitCode = EXIT_CODES.failure;
  } finally { closeDatabase(db); }
}
main().catch(err => { console.error(err); process.exitCode = EXIT_CODES.failure; });
