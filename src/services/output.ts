//run output artifact and the exit-code convention orchestration scripts branch on
import type { RunOutput, RunState } from '../models/index.js';
import { EXIT_CODES } from '../models/index.js';

export function toRunOutput(state: RunState): RunOutput {
  return {
    runId: state.runId,
    status: state.status,
    success: state.status === 'finalized',
    needsReview: state.status === 'awaiting_review',
    reviewReason: state.reviewReason,
    classification: state.classification,
    payload: state.payload,
    error: state.error,
    warnings: state.warnings,
  };
}

export function exitCodeFor(state: RunState): number {
  if (state.status === 'finalized') return EXIT_CODES.success;
  if (state.status === 'awaiting_review') return EXIT_CODES.pendingReview;
  return EXIT_CODES.failure;
}
