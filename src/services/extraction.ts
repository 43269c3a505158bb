//extraction capability: one interface, one implementation per document kind
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DocumentKind, DocumentRef, DocumentSource, PayloadCandidate } from '../models/index.js';
import { ExtractionError, WorkflowError, describeCause } from '../errors.js';

export interface ExtractionAdapter {
  readonly kind: DocumentKind;
  extract(document: DocumentSource): Promise<PayloadCandidate>;
}

export type AdapterRegistry = Record<DocumentKind, ExtractionAdapter>;

export function describeDocument(document: DocumentSource): DocumentRef {
  return 'path' in document
    ? { kind: document.kind, name: basename(document.path), path: document.path }
    : { kind: document.kind, name: document.name };
}

export async function readDocument(document: DocumentSource): Promise<Uint8Array> {
  if ('bytes' in document) return document.bytes;
  try {
    return await readFile(document.path);
  } catch (err) {
    throw new ExtractionError(`Could not read document ${document.path}: ${describeCause(err)}`, { cause: err });
  }
}

//collaborator failures become extraction errors; ours pass through untouched
export async function attempt<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof WorkflowError) throw err;
    throw new ExtractionError(`${what}: ${describeCause(err)}`, { cause: err });
  }
}
