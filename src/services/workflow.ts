// Stateful workflow engine: Extract → Validate → Classify → (Finalize | Await review → Learn → Reclassify → Finalize)
import { v4 as uuidv4 } from 'uuid';
import type { AuditEntry, CanonicalPayload, DocumentSource, ResolvedReview, RunState, RunStatus, TaxRegime } from '../models/index.js';
import type { ILearningStore } from '../repository/learning-store.js';
import type { IRunRepository } from '../repository/run-repository.js';
import { ExtractionError, ReviewInputError, ValidationError, WorkflowError, describeCause } from '../errors.js';
import { createLogger } from '../logger.js';
import type { AdapterRegistry } from './extraction.js';
import { describeDocument } from './extraction.js';
import { createDefaultAdapters } from './adapters.js';
import { ClassificationEngine, type IClassificationEngine } from './classifier.js';
import { validatePayload } from './validator.js';
import { parseReviewInput, resolveReview } from './review.js';

const log = createLogger('workflow');

//strictly forward: nothing is re-entered once left
const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  extracting: ['validating', 'failed'],
  validating: ['classifying', 'failed'],
  classifying: ['finalized', 'awaiting_review', 'failed'],
  awaiting_review: ['reclassifying', 'failed'],
  reclassifying: ['finalized', 'failed'],
  finalized: [],
  failed: [],
};

export interface RunOptions {
  regimeHint?: TaxRegime | null;
}

export interface WorkflowOptions {
  adapters?: Partial<AdapterRegistry>;
  classifier?: IClassificationEngine;
}

//public workflow interface: two entry points over a persisted run state
export interface IWorkflowEngine {
  run(document: DocumentSource, options?: RunOptions): Promise<RunState>;
  resume(run: string | RunState, reviewInput: unknown): Promise<RunState>;
}

export class WorkflowEngine implements IWorkflowEngine {
  private adapters: AdapterRegistry;
  private classifier: IClassificationEngine;

  constructor(private learningStore: ILearningStore, private runs: IRunRepository, options: WorkflowOptions = {}) {
    this.adapters = { ...createDefaultAdapters(), ...options.adapters };
    this.classifier = options.classifier ?? new ClassificationEngine(learningStore);
  }

  async run(document: DocumentSource, options: RunOptions = {}): Promise<RunState> {
    const state = this.createState(document, options.regimeHint ?? null);
    this.audit(state, 'extract', `Run ${state.runId} started for ${state.document.kind} document ${state.document.name}`);
    this.process(state, await this.extract(state, document));
    this.runs.saveRun(state);
    return state;
  }

  async resume(run: string | RunState, reviewInput: unknown): Promise<RunState> {
    //a passed-in state only names the run; the persisted copy is the one resumed
    const runId = typeof run === 'string' ? run : run.runId;
    const stored = this.runs.findRun(runId);
    if (!stored) throw new ReviewInputError(`Unknown run ${runId}`);
    if (stored.status !== 'awaiting_review' || !stored.payload) {
      throw new ReviewInputError(`Run ${runId} is not awaiting review (status: ${stored.status})`);
    }

    const pending = structuredClone(stored);
    const payload = stored.payload;
    const state = structuredClone(stored);

    const resolved = this.learn(state, payload, reviewInput);
    if (resolved instanceof WorkflowError) {
      //this attempt fails; the stored run keeps waiting so the reviewer can be prompted again
      this.fail(state, resolved);
      pending.auditLog.push(...state.auditLog.slice(stored.auditLog.length));
      this.runs.saveRun(pending);
      return state;
    }

    this.transition(state, 'reclassifying');
    state.classification = this.classifier.classifyFromReview(payload, resolved);
    state.reviewReason = null;
    this.transition(state, 'finalized');
    this.audit(state, 'finalize', `Finalized from human review: conf=${state.classification.confidence.toFixed(2)}`);
    this.runs.saveRun(state);
    log.info(`Run ${runId} finalized from human review for CFOP ${payload.operationCode}`);
    return state;
  }

  //Review → Learn: the mapping is persisted before the run is reclassified
  private learn(state: RunState, payload: CanonicalPayload, reviewInput: unknown): ResolvedReview | WorkflowError {
    try {
      const input = parseReviewInput(reviewInput);
      state.reviewInput = input;
      const resolved = resolveReview(input, state.regimeHint);
      this.audit(state, 'review', `Review input accepted: debit="${input.debitAccount}" credit="${input.creditAccount}" conf=${input.confidence.toFixed(2)} regime=${resolved.regime ?? '*'}`);

      this.learningStore.upsert(payload.operationCode, {
        debitAccount: resolved.debitAccount, creditAccount: resolved.creditAccount,
        rationale: resolved.rationale, confidence: resolved.confidence, regime: resolved.regime,
      });
      this.audit(state, 'learn', `Mapping for operation code ${payload.operationCode} persisted`);
      return resolved;
    } catch (err) {
      if (err instanceof WorkflowError) return err;
      throw err;
    }
  }

  private async extract(state: RunState, document: DocumentSource): Promise<unknown> {
    try {
      return await this.adapters[document.kind].extract(document);
    } catch (err) {
      this.fail(state, err instanceof WorkflowError ? err : new ExtractionError(`Unexpected extraction failure: ${describeCause(err)}`, { cause: err }));
      return undefined;
    }
  }

  //Validate → Classify → branch
  private process(state: RunState, candidate: unknown): void {
    if (state.status === 'failed') return;

    this.transition(state, 'validating');
    const validation = validatePayload(candidate);
    if (!validation.ok) {
      this.fail(state, new ValidationError(validation.issues));
      return;
    }
    state.payload = validation.payload;
    state.warnings = validation.warnings;
    validation.warnings.forEach(w => log.warn(`Run ${state.runId}: ${w}`));
    this.audit(state, 'validate', `Payload valid: cfop=${validation.payload.operationCode} ${validation.payload.origin}→${validation.payload.destination} total=${validation.payload.totalValue.toFixed(2)} items=${validation.payload.items.length}`);

    this.transition(state, 'classifying');
    try {
      state.classification = this.classifier.classify(validation.payload, state.regimeHint);
    } catch (err) {
      if (!(err instanceof WorkflowError)) throw err;
      this.fail(state, err);
      return;
    }
    const c = state.classification;
    this.audit(state, 'classify', `${c.source} classification: debit="${c.debitAccount}" credit="${c.creditAccount}" conf=${c.confidence.toFixed(2)}`);

    if (!c.needsReview) {
      this.transition(state, 'finalized');
      this.audit(state, 'finalize', 'Confidence at or above threshold. Auto-accepted.');
      return;
    }
    state.reviewReason = c.reviewReason;
    this.transition(state, 'awaiting_review');
    this.audit(state, 'suspend', `Human review required: ${c.reviewReason ?? 'low confidence'}`);
    log.warn(`Run ${state.runId} awaiting review: ${c.reviewReason ?? 'low confidence'}`);
  }

  private createState(document: DocumentSource, regimeHint: TaxRegime | null): RunState {
    const now = new Date().toISOString();
    return {
      runId: uuidv4(), document: describeDocument(document), regimeHint, status: 'extracting',
      payload: null, classification: null, reviewReason: null, reviewInput: null, error: null,
      warnings: [], auditLog: [], createdAt: now, updatedAt: now,
    };
  }

  private transition(state: RunState, to: RunStatus): void {
    if (!TRANSITIONS[state.status].includes(to)) {
      throw new Error(`Illegal workflow transition ${state.status} → ${to} for run ${state.runId}`);
    }
    state.status = to;
    state.updatedAt = new Date().toISOString();
  }

  private fail(state: RunState, err: WorkflowError): void {
    this.transition(state, 'failed');
    state.error = err.toRunError();
    this.audit(state, err.stage, `${err.kind}: ${err.message}`);
    log.warn(`Run ${state.runId} failed at ${err.stage}: ${err.message}`);
  }

  private audit(state: RunState, step: AuditEntry['step'], details: string): void {
    const entry: AuditEntry = { step, timestamp: new Date().toISOString(), details };
    state.auditLog.push(entry);
    this.runs.saveAuditEntry({ ...entry, runId: state.runId });
  }
}
