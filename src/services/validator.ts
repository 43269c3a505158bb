//Payload Validator: candidate → canonical payload, or every failing field at once
//pure and total: data-shape problems come back as issues, never as exceptions
import { z } from 'zod';
import type { CanonicalPayload, FieldIssue, Jurisdiction } from '../models/index.js';
import { CLASSIFICATION_CONFIG, JURISDICTIONS } from '../models/index.js';
import {
  parseDecimal, sanitizePositive, sanitizeProductCode, sanitizeDocumentKey,
  sanitizeText, sanitizeCode, sanitizeParty, sanitizeItemTaxes, sanitizeTaxTotals,
} from './sanitize.js';

export type ValidationResult =
  | { ok: true; payload: CanonicalPayload; warnings: string[] }
  | { ok: false; issues: FieldIssue[] };

export function toJurisdiction(value: string): Jurisdiction {
  return JURISDICTIONS.find(j => j === value) ?? 'OTHER';
}

const trimmed = (v: unknown) => (typeof v === 'string' ? v.trim() : v);

const required = (what: string) => ({ required_error: 'is required', invalid_type_error: `must be ${what}` });

const amount = z.preprocess(parseDecimal, z.number(required('a number')).finite('must be finite').nonnegative('must be >= 0'));

const jurisdiction = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toUpperCase() : v),
  z.string(required('a region code')).min(1, 'is required').transform(toJurisdiction),
);

//enrichment fields: malformed values collapse to null in the sanitizer, so these never fail
const code = z.string().nullable();
const optionalAmount = z.number().nullable();

const partySchema = z.object({
  name: code, taxId: code, taxIdKind: z.enum(['cnpj', 'cpf']).nullable(),
  stateRegistration: code, stateRegistrationIndicator: code,
}).nullable();

const itemTaxesSchema = z.object({
  icmsOrigin: code, icmsCst: code, icmsCsosn: code, icmsValue: optionalAmount,
  ipiCst: code, ipiValue: optionalAmount, pisCst: code, pisValue: optionalAmount,
  cofinsCst: code, cofinsValue: optionalAmount,
}).nullable();

const taxTotalsSchema = z.object({
  icmsBase: optionalAmount, icms: optionalAmount, ipi: optionalAmount, pis: optionalAmount, cofins: optionalAmount,
}).nullable();

const lineItemSchema = z.object({
  description: z.preprocess(trimmed, z.string(required('text')).min(1, 'must be a non-empty description')),
  productCode: z.preprocess(sanitizeProductCode, z.string().nullable()),
  value: amount,
  quantity: z.preprocess(sanitizePositive, z.number().nullable()),
  unitPrice: z.preprocess(sanitizePositive, z.number().nullable()),
  itemCode: z.preprocess(sanitizeText, code),
  unit: z.preprocess(sanitizeText, code),
  cest: z.preprocess(v => sanitizeCode(v, 7), code),
  taxes: z.preprocess(sanitizeItemTaxes, itemTaxesSchema),
}, required('an object'));

const payloadSchema = z.object({
  operationCode: z.preprocess(
    v => (typeof v === 'number' && Number.isInteger(v) ? String(v) : trimmed(v)),
    z.string(required('a string')).regex(/^\d{4}$/, 'must be exactly 4 digits'),
  ),
  origin: jurisdiction,
  destination: jurisdiction,
  totalValue: amount,
  items: z.array(lineItemSchema, required('a list')).default([]),
  documentKey: z.preprocess(sanitizeDocumentKey, z.string().nullable()),
  issuer: z.preprocess(sanitizeParty, partySchema),
  recipient: z.preprocess(sanitizeParty, partySchema),
  taxTotals: z.preprocess(sanitizeTaxTotals, taxTotalsSchema),
}, required('an object'));

export function validatePayload(candidate: unknown): ValidationResult {
  const parsed = payloadSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(i => ({ path: i.path.length ? i.path.join('.') : '(payload)', message: i.message })),
    };
  }
  const payload: CanonicalPayload = parsed.data;
  return { ok: true, payload, warnings: collectWarnings(payload) };
}

//cross-field checks the original documents are known to fail by a few cents; reported, never fatal
function collectWarnings(payload: CanonicalPayload): string[] {
  const { amountTolerance } = CLASSIFICATION_CONFIG;
  const warnings: string[] = [];

  payload.items.forEach((item, i) => {
    if (item.quantity === null || item.unitPrice === null) return;
    const computed = item.quantity * item.unitPrice;
    if (Math.abs(computed - item.value) > amountTolerance) {
      warnings.push(`items.${i}: quantity × unit price = ${computed.toFixed(2)} differs from value ${item.value.toFixed(2)}`);
    }
  });

  if (payload.items.length) {
    const sum = payload.items.reduce((acc, item) => acc + item.value, 0);
    if (Math.abs(sum - payload.totalValue) > amountTolerance) {
      warnings.push(`items sum ${sum.toFixed(2)} differs from total value ${payload.totalValue.toFixed(2)}`);
    }
  }
  return warnings;
}
