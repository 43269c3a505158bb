//sanitization rules shared by every extraction adapter
//both adapters run their raw output through sanitizeCandidate, so the validator sees one shape

import type { ItemTaxes, Party, PayloadCandidate, TaxTotals } from '../models/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function digitsOnly(value: string): string {
  return value.replace(/\D/g, '');
}

//"1.500,00", "1,500.00", "R$ 1500,00", "1500.00" → number
//with both separators present the last one is the decimal mark; ambiguous shapes ("1,500,00") and
//anything unparseable are returned untouched for the validator to report
export function parseDecimal(value: unknown): unknown {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return value;
  let s = value.replace('R$', '').replace(/\s+/g, '');
  if (s === '') return value;
  const comma = s.lastIndexOf(','), dot = s.lastIndexOf('.');
  if (comma >= 0 && dot >= 0) {
    const decimal = comma > dot ? ',' : '.';
    const grouping = comma > dot ? '.' : ',';
    if (s.split(decimal).length > 2) return value;
    s = s.split(grouping).join('').replace(decimal, '.');
  } else if (comma >= 0) {
    if (s.split(',').length > 2) return value;
    s = s.replace(',', '.');
  }
  const n = Number(s);
  return Number.isFinite(n) ? n : value;
}

//CFOPs are often printed as "5.102"; separators go, anything else stays for the validator to reject
export function sanitizeOperationCode(value: unknown): unknown {
  if (typeof value === 'number' && Number.isInteger(value)) return String(value);
  if (typeof value !== 'string') return value;
  return value.trim().replace(/[.\s-]/g, '');
}

//NCM: exactly 8 digits once dots are dropped, otherwise absent; never rejected, never propagated raw
export function sanitizeProductCode(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const s = String(value).trim().replace(/\./g, '');
  return /^\d{8}$/.test(s) ? s : null;
}

export function sanitizeJurisdiction(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toUpperCase() : value;
}

//quantities and unit prices are informational: unusable values collapse to null
export function sanitizePositive(value: unknown): number | null {
  const n = parseDecimal(value);
  return typeof n === 'number' && Number.isFinite(n) && n > 0 ? n : null;
}

//NF-e access key, 44 digits ("NFe" prefix and spacing removed)
export function sanitizeDocumentKey(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const digits = digitsOnly(value);
  return digits.length === 44 ? digits : null;
}

//optional free text (cProd, uCom, names): blank collapses to null
export function sanitizeText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const s = value.trim();
  return s === '' ? null : s;
}

//fixed-width numeric codes: CEST 7 digits, CSOSN 3, CST 2; dots and spaces dropped, any other shape is null
export function sanitizeCode(value: unknown, length: number): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const s = String(value).replace(/[.\s]/g, '');
  return new RegExp(`^\\d{${length}}$`).test(s) ? s : null;
}

//tax amounts may legitimately be zero
export function sanitizeAmount(value: unknown): number | null {
  const n = parseDecimal(value);
  return typeof n === 'number' && Number.isFinite(n) && n >= 0 ? n : null;
}

//IE: any spelling of "isento" becomes ISENTO, anything else is kept uppercased
export function sanitizeStateRegistration(value: unknown): string | null {
  const s = sanitizeText(value);
  if (s === null) return null;
  return s.toUpperCase().includes('ISENT') ? 'ISENTO' : s.toUpperCase();
}

export function sanitizeParty(value: unknown): Party | null {
  if (!isRecord(value)) return null;
  const raw = sanitizeText(value['taxId']);
  const digits = raw === null ? '' : digitsOnly(raw);
  const taxIdKind = digits.length === 14 ? 'cnpj' : digits.length === 11 ? 'cpf' : null;
  const indicator = sanitizeText(value['stateRegistrationIndicator']);
  return {
    name: sanitizeText(value['name']),
    taxId: taxIdKind ? digits : null,
    taxIdKind,
    stateRegistration: sanitizeStateRegistration(value['stateRegistration']),
    stateRegistrationIndicator: indicator !== null && ['1', '2', '9'].includes(indicator) ? indicator : null,
  };
}

export function sanitizeItemTaxes(value: unknown): ItemTaxes | null {
  if (!isRecord(value)) return null;
  const origin = sanitizeText(value['icmsOrigin']);
  return {
    icmsOrigin: origin !== null && /^[0-8]$/.test(origin) ? origin : null,
    icmsCst: sanitizeCode(value['icmsCst'], 2),
    icmsCsosn: sanitizeCode(value['icmsCsosn'], 3),
    icmsValue: sanitizeAmount(value['icmsValue']),
    ipiCst: sanitizeCode(value['ipiCst'], 2),
    ipiValue: sanitizeAmount(value['ipiValue']),
    pisCst: sanitizeCode(value['pisCst'], 2),
    pisValue: sanitizeAmount(value['pisValue']),
    cofinsCst: sanitizeCode(value['cofinsCst'], 2),
    cofinsValue: sanitizeAmount(value['cofinsValue']),
  };
}

export function sanitizeTaxTotals(value: unknown): TaxTotals | null {
  if (!isRecord(value)) return null;
  return {
    icmsBase: sanitizeAmount(value['icmsBase']),
    icms: sanitizeAmount(value['icms']),
    ipi: sanitizeAmount(value['ipi']),
    pis: sanitizeAmount(value['pis']),
    cofins: sanitizeAmount(value['cofins']),
  };
}

function sanitizeDescription(value: unknown): unknown {
  if (typeof value === 'string') return value.trim();
  return typeof value === 'number' ? String(value) : value;
}

function sanitizeItem(item: unknown): unknown {
  if (!isRecord(item)) return item;
  return {
    description: sanitizeDescription(item['description']),
    productCode: sanitizeProductCode(item['productCode']),
    value: parseDecimal(item['value']),
    quantity: sanitizePositive(item['quantity']),
    unitPrice: sanitizePositive(item['unitPrice']),
    itemCode: sanitizeText(item['itemCode']),
    unit: sanitizeText(item['unit']),
    cest: sanitizeCode(item['cest'], 7),
    taxes: sanitizeItemTaxes(item['taxes']),
  };
}

export function sanitizeCandidate(candidate: PayloadCandidate): PayloadCandidate {
  return {
    operationCode: sanitizeOperationCode(candidate.operationCode),
    origin: sanitizeJurisdiction(candidate.origin),
    destination: sanitizeJurisdiction(candidate.destination),
    totalValue: parseDecimal(candidate.totalValue),
    items: Array.isArray(candidate.items) ? candidate.items.map(sanitizeItem) : candidate.items,
    documentKey: sanitizeDocumentKey(candidate.documentKey),
    issuer: sanitizeParty(candidate.issuer),
    recipient: sanitizeParty(candidate.recipient),
    taxTotals: sanitizeTaxTotals(candidate.taxTotals),
  };
}
