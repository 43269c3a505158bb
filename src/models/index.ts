//data contracts for the fiscal classification workflow
//everything that crosses a stage boundary is declared here

//UF codes accepted on NF-e documents, plus the catch-all for anything else (EX, typos, blanks from OCR)
export const JURISDICTIONS = [
  'AC', 'AL', 'AP', 'AM', 'BA', 'CE', 'DF', 'ES', 'GO', 'MA', 'MT', 'MS', 'MG', 'PA',
  'PB', 'PR', 'PE', 'PI', 'RJ', 'RN', 'RS', 'RO', 'RR', 'SC', 'SP', 'SE', 'TO', 'OTHER',
] as const;
export type Jurisdiction = typeof JURISDICTIONS[number];

export const TAX_REGIMES = ['simples', 'presumido', 'real'] as const;
export type TaxRegime = typeof TAX_REGIMES[number];

//"do not set" marker coming from review forms; filtered before anything reaches the classifier or the store
export const INDETERMINATE_REGIME = 'indeterminate' as const;
export type ReviewRegime = TaxRegime | typeof INDETERMINATE_REGIME;

//Canonical Payload
//issuer/recipient identity; informational only, never required for classification
export interface Party {
  name: string | null;
  //CNPJ (14 digits) or CPF (11 digits)
  taxId: string | null;
  taxIdKind: 'cnpj' | 'cpf' | null;
  //IE, "ISENTO" when exempt
  stateRegistration: string | null;
  //indIEDest: 1 contributor, 2 exempt, 9 non-contributor
  stateRegistrationIndicator: string | null;
}

//per-item tax situation codes and amounts
export interface ItemTaxes {
  icmsOrigin: string | null;
  //CST under the normal regime, CSOSN under Simples Nacional
  icmsCst: string | null;
  icmsCsosn: string | null;
  icmsValue: number | null;
  ipiCst: string | null;
  ipiValue: number | null;
  pisCst: string | null;
  pisValue: number | null;
  cofinsCst: string | null;
  cofinsValue: number | null;
}

export interface TaxTotals {
  icmsBase: number | null;
  icms: number | null;
  ipi: number | null;
  pis: number | null;
  cofins: number | null;
}

export interface LineItem {
  description: string;
  productCode: string | null;
  value: number;
  quantity: number | null;
  unitPrice: number | null;
  itemCode: string | null;
  unit: string | null;
  cest: string | null;
  taxes: ItemTaxes | null;
}

export interface CanonicalPayload {
  operationCode: string;
  origin: Jurisdiction;
  destination: Jurisdiction;
  totalValue: number;
  items: LineItem[];
  documentKey: string | null;
  issuer: Party | null;
  recipient: Party | null;
  taxTotals: TaxTotals | null;
}

//what an adapter hands to the validator; shape-compatible with the payload but nothing is trusted yet
export interface PayloadCandidate {
  operationCode?: unknown;
  origin?: unknown;
  destination?: unknown;
  totalValue?: unknown;
  items?: unknown;
  documentKey?: unknown;
  issuer?: unknown;
  recipient?: unknown;
  taxTotals?: unknown;
}

//Document source
export type DocumentKind = 'structured' | 'unstructured';

export type DocumentSource =
  | { kind: DocumentKind; path: string }
  | { kind: DocumentKind; bytes: Uint8Array; name: string };

export interface DocumentRef {
  kind: DocumentKind;
  name: string;
  path?: string;
}

//Operation-code mapping, one row per code
export interface MappingRecord {
  debitAccount: string;
  creditAccount: string;
  rationale: string;
  confidence: number;
  regime: TaxRegime | null;
}

export interface StoredMapping extends MappingRecord {
  operationCode: string;
  updatedAt: string;
}

//Classification
export type OperationNature = 'intrastate' | 'interstate';
export type ClassificationSource = 'learned' | 'fallback' | 'human';

export interface ClassificationResult {
  operationCode: string;
  operationNature: OperationNature;
  debitAccount: string;
  creditAccount: string;
  rationale: string;
  confidence: number;
  needsReview: boolean;
  reviewReason: string | null;
  source: ClassificationSource;
  productCodes: (string | null)[];
  ruleVersion: string;
}

//Human review input, after validation
export interface HumanReviewInput {
  regime: ReviewRegime;
  debitAccount: string;
  creditAccount: string;
  rationale: string;
  confidence: number;
}

//review input once the regime sentinel is filtered out; the only form the classifier and the store accept
export interface ResolvedReview {
  regime: TaxRegime | null;
  debitAccount: string;
  creditAccount: string;
  rationale: string;
  confidence: number;
}

//Run state
export type RunStatus =
  | 'extracting'
  | 'validating'
  | 'classifying'
  | 'awaiting_review'
  | 'reclassifying'
  | 'finalized'
  | 'failed';

export type WorkflowStage = 'extract' | 'validate' | 'classify' | 'review' | 'reclassify' | 'learn';

export type ErrorKind = 'ExtractionError' | 'ValidationError' | 'ReviewInputError' | 'LearningStoreError';

export interface FieldIssue {
  path: string;
  message: string;
}

export interface RunError {
  kind: ErrorKind;
  stage: WorkflowStage;
  message: string;
  issues: FieldIssue[];
}

export interface AuditEntry {
  step: WorkflowStage | 'finalize' | 'suspend';
  timestamp: string;
  details: string;
}

export interface RunState {
  runId: string;
  document: DocumentRef;
  regimeHint: TaxRegime | null;
  status: RunStatus;
  payload: CanonicalPayload | null;
  classification: ClassificationResult | null;
  reviewReason: string | null;
  reviewInput: HumanReviewInput | null;
  error: RunError | null;
  warnings: string[];
  auditLog: AuditEntry[];
  createdAt: string;
  updatedAt: string;
}

//the serialized snapshot API, UI and batch layers depend on
export interface RunOutput {
  runId: string;
  status: RunStatus;
  success: boolean;
  needsReview: boolean;
  reviewReason: string | null;
  classification: ClassificationResult | null;
  payload: CanonicalPayload | null;
  error: RunError | null;
  warnings: string[];
}

//Classification configuration
export interface ClassificationConfig {
  //at or above: finalize automatically; below: suspend for human review
  autoAcceptThreshold: number;
  fallbackBaseConfidence: number;
  fallbackConsistencyBonus: number;
  fallbackRegimeBonus: number;
  unknownDirectionConfidence: number;
  //keeps a guess strictly under every learned mapping
  learnedConfidenceMargin: number;
  //tolerance for line arithmetic and item-sum checks, in currency units
  amountTolerance: number;
  minTextLength: number;
  maxStructuringTextLength: number;
  ruleVersion: string;
}

export const CLASSIFICATION_CONFIG: ClassificationConfig = {
  autoAcceptThreshold: 0.75,
  fallbackBaseConfidence: 0.5,
  fallbackConsistencyBonus: 0.15,
  fallbackRegimeBonus: 0.05,
  unknownDirectionConfidence: 0.4,
  learnedConfidenceMargin: 0.01,
  amountTolerance: 0.02,
  minTextLength: 20,
  maxStructuringTextLength: 150_000,
  ruleVersion: 'v0.4',
} as const;

export const AUTO_ACCEPT_THRESHOLD = CLASSIFICATION_CONFIG.autoAcceptThreshold;

//process exit codes for orchestration scripts
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  pendingReview: 5,
} as const;
