//human review input: validation and regime-sentinel filtering
import { z } from 'zod';
import type { HumanReviewInput, ResolvedReview, ReviewRegime, TaxRegime } from '../models/index.js';
import { INDETERMINATE_REGIME, TAX_REGIMES } from '../models/index.js';
import { ReviewInputError } from '../errors.js';
import { isRecord, parseDecimal } from './sanitize.js';

const REVIEW_REGIMES = [...TAX_REGIMES, INDETERMINATE_REGIME] as const;

const text = (field: string) => z.string({ required_error: 'is required', invalid_type_error: 'must be text' }).trim().min(1, `${field} must not be empty`);

const reviewInputSchema = z.object({
  //"*" is how mapping files spell "any regime"; it means the same as the sentinel
  regime: z.preprocess(
    v => (typeof v === 'string' ? (v.trim() === '*' ? INDETERMINATE_REGIME : v.trim().toLowerCase()) : v),
    z.enum(REVIEW_REGIMES, { errorMap: (_issue, ctx) => ({ message: ctx.data === undefined ? 'is required' : `must be one of ${REVIEW_REGIMES.join(', ')}` }) }),
  ),
  debitAccount: text('debit account'),
  creditAccount: text('credit account'),
  rationale: text('rationale'),
  confidence: z.preprocess(parseDecimal, z.number({ required_error: 'is required', invalid_type_error: 'must be a number' }).gt(0, 'must be above 0 and at most 1').max(1, 'must be above 0 and at most 1')),
}, { required_error: 'review input is required', invalid_type_error: 'review input must be an object' });

//accepts the record itself or one wrapped as { reviewInput: … }
export function parseReviewInput(raw: unknown): HumanReviewInput {
  const input = isRecord(raw) && isRecord(raw['reviewInput']) ? raw['reviewInput'] : raw;
  const parsed = reviewInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ReviewInputError('Malformed review input', parsed.error.issues.map(i => ({
      path: i.path.length ? i.path.join('.') : '(input)', message: i.message,
    })));
  }
  return parsed.data;
}

//the sentinel keeps whatever regime the run already had; it is never passed on as a value
export function resolveRegime(regime: ReviewRegime, regimeHint: TaxRegime | null): TaxRegime | null {
  return regime === INDETERMINATE_REGIME ? regimeHint : regime;
}

export function resolveReview(input: HumanReviewInput, regimeHint: TaxRegime | null): ResolvedReview {
  return {
    regime: resolveRegime(input.regime, regimeHint),
    debitAccount: input.debitAccount,
    creditAccount: input.creditAccount,
    rationale: input.rationale,
    confidence: input.confidence,
  };
}
