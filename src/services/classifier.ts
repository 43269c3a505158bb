//Classification Engine: learned lookup first, prefix heuristics when the code was never reviewed
//the store is injected; nothing here reaches for process-wide state
import type { CanonicalPayload, ClassificationResult, OperationNature, ResolvedReview, TaxRegime } from '../models/index.js';
import { CLASSIFICATION_CONFIG } from '../models/index.js';
import type { ILearningStore } from '../repository/learning-store.js';
import { createLogger } from '../logger.js';

const log = createLogger('classifier');

export interface IClassificationEngine {
  classify(payload: CanonicalPayload, regimeHint?: TaxRegime | null): ClassificationResult;
  //human-declared pair and confidence are authoritative: no lookup, no heuristics
  classifyFromReview(payload: CanonicalPayload, review: ResolvedReview): ClassificationResult;
}

type Direction = 'inbound' | 'outbound' | 'unknown';
type Scope = 'intrastate' | 'interstate' | 'foreign' | 'unknown';

interface AccountDecision {
  debitAccount: string;
  creditAccount: string;
  rationale: string;
  confidence: number;
}

//CFOP first digit: 1/2/3 entries, 5/6/7 exits; within each, state / other state / abroad
const DIRECTION: Record<string, Direction> = { '1': 'inbound', '2': 'inbound', '3': 'inbound', '5': 'outbound', '6': 'outbound', '7': 'outbound' };
const SCOPE: Record<string, Scope> = { '1': 'intrastate', '2': 'interstate', '3': 'foreign', '5': 'intrastate', '6': 'interstate', '7': 'foreign' };

const FALLBACK_ACCOUNTS: Record<Direction, Omit<AccountDecision, 'confidence'>> = {
  inbound: { debitAccount: 'Estoques de Mercadorias', creditAccount: 'Fornecedores', rationale: 'Inbound operation (purchase) identified by CFOP starting with 1/2/3.' },
  outbound: { debitAccount: 'Clientes', creditAccount: 'Receita de Vendas', rationale: 'Outbound operation (sale) identified by CFOP starting with 5/6/7.' },
  unknown: { debitAccount: 'Conta a Classificar (Débito)', creditAccount: 'Conta a Classificar (Crédito)', rationale: 'CFOP outside the inbound/outbound ranges; detailed rules required.' },
};

export function operationNature(payload: CanonicalPayload): OperationNature {
  return payload.origin === payload.destination ? 'intrastate' : 'interstate';
}

const round = (n: number) => Math.round(n * 1e4) / 1e4;

export class ClassificationEngine implements IClassificationEngine {
  constructor(private store: ILearningStore) {}

  classify(payload: CanonicalPayload, regimeHint: TaxRegime | null = null): ClassificationResult {
    const { autoAcceptThreshold } = CLASSIFICATION_CONFIG;
    const code = payload.operationCode;
    const regimeLabel = regimeHint ?? '*';
    const learned = this.store.lookup(code);

    if (learned) {
      const needsReview = learned.confidence < autoAcceptThreshold;
      const result = this.build(payload, {
        debitAccount: learned.debitAccount, creditAccount: learned.creditAccount,
        rationale: learned.rationale || `CFOP ${code} (regime=${learned.regime ?? '*'})`,
        confidence: learned.confidence,
      }, 'learned', needsReview
        ? `low confidence ${learned.confidence.toFixed(2)} < ${autoAcceptThreshold.toFixed(2)} for operation code ${code} (regime=${regimeLabel})`
        : null);
      this.logResult(result, regimeLabel);
      return result;
    }

    const guess = this.fallback(payload, regimeHint);
    const result = this.build(payload, guess, 'fallback',
      `unmapped operation code ${code} (regime=${regimeLabel}); fallback by CFOP prefix applied with confidence ${guess.confidence.toFixed(2)}`);
    this.logResult(result, regimeLabel);
    return result;
  }

  classifyFromReview(payload: CanonicalPayload, review: ResolvedReview): ClassificationResult {
    const result = this.build(payload, review, 'human', null);
    this.logResult(result, review.regime ?? '*');
    return result;
  }

  //base 0.50; +0.15 when the CFOP scope agrees with the jurisdictions and the code is not an "other operations" x9xx; +0.05 with a regime hint
  private fallback(payload: CanonicalPayload, regimeHint: TaxRegime | null): AccountDecision {
    const cfg = CLASSIFICATION_CONFIG;
    const code = payload.operationCode;
    const direction = DIRECTION[code.charAt(0)] ?? 'unknown';
    const scope = SCOPE[code.charAt(0)] ?? 'unknown';
    const accounts = FALLBACK_ACCOUNTS[direction];

    let confidence = cfg.unknownDirectionConfidence;
    let rationale = accounts.rationale;
    if (direction !== 'unknown') {
      confidence = cfg.fallbackBaseConfidence;
      const consistent = this.scopeMatches(scope, payload);
      if (!consistent) rationale += ` Jurisdictions ${payload.origin}→${payload.destination} do not match the CFOP ${scope} scope.`;
      if (consistent && code.charAt(1) !== '9') {
        confidence += cfg.fallbackConsistencyBonus;
        if (regimeHint) confidence += cfg.fallbackRegimeBonus;
      }
    }

    //a guess never outranks a mapping a reviewer confirmed
    const floor = this.store.minConfidence();
    if (floor !== undefined) confidence = Math.min(confidence, Math.max(0, floor - cfg.learnedConfidenceMargin));

    return { ...accounts, rationale, confidence: round(confidence) };
  }

  private scopeMatches(scope: Scope, payload: CanonicalPayload): boolean {
    if (scope === 'foreign') return payload.origin === 'OTHER' || payload.destination === 'OTHER';
    return scope === operationNature(payload);
  }

  private build(payload: CanonicalPayload, decision: AccountDecision, source: ClassificationResult['source'], reviewReason: string | null): ClassificationResult {
    const nature = operationNature(payload);
    return {
      operationCode: payload.operationCode,
      operationNature: nature,
      debitAccount: decision.debitAccount,
      creditAccount: decision.creditAccount,
      rationale: `${decision.rationale} Operation nature: ${nature}. Document total considered: ${payload.totalValue.toFixed(2)}.`,
      confidence: decision.confidence,
      needsReview: reviewReason !== null,
      reviewReason,
      source,
      productCodes: payload.items.map(i => i.productCode),
      ruleVersion: CLASSIFICATION_CONFIG.ruleVersion,
    };
  }

  private logResult(r: ClassificationResult, regime: string): void {
    log.info(`cfop=${r.operationCode} nature=${r.operationNature} debit="${r.debitAccount}" credit="${r.creditAccount}" conf=${r.confidence.toFixed(2)} regime=${regime} source=${r.source} review=${r.needsReview}`);
  }
}
