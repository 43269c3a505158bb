//typed failures for every stage; the workflow records them on the run instead of throwing them at callers
import type { ErrorKind, FieldIssue, RunError, WorkflowStage } from './models/index.js';

export abstract class WorkflowError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    readonly stage: WorkflowStage,
    readonly issues: FieldIssue[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toRunError(): RunError {
    return { kind: this.kind, stage: this.stage, message: this.message, issues: this.issues };
  }
}

//document unreadable, required structure missing, or an OCR/LLM collaborator failed
export class ExtractionError extends WorkflowError {
  readonly kind = 'ExtractionError' as const;

  constructor(message: string, options?: { cause?: unknown; issues?: FieldIssue[] }) {
    super(message, 'extract', options?.issues ?? [], options);
  }
}

export class ValidationError extends WorkflowError {
  readonly kind = 'ValidationError' as const;

  constructor(issues: FieldIssue[]) {
    super(`Payload validation failed: ${formatIssues(issues)}`, 'validate', issues);
  }
}

export class ReviewInputError extends WorkflowError {
  readonly kind = 'ReviewInputError' as const;

  constructor(message: string, issues: FieldIssue[] = []) {
    super(issues.length ? `${message}: ${formatIssues(issues)}` : message, 'review', issues);
  }
}

export class LearningStoreError extends WorkflowError {
  readonly kind = 'LearningStoreError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'learn', [], options);
  }
}

export function formatIssues(issues: FieldIssue[]): string {
  return issues.map(i => `${i.path}: ${i.message}`).join('; ');
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
