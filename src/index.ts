/**
 * Fiscal Classification Workflow
 *
 * Turns NF-e documents (XML or PDF) into debit/credit account classifications,
 * suspends low-confidence results for human review and learns the reviewer's
 * decision for every later document with the same operation code.
 */

export * from './models/index.js';
export * from './errors.js';
export * from './services/index.js';
export * from './repository/index.js';
