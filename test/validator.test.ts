import { describe, it, expect } from 'vitest';
import { validatePayload, toJurisdiction } from '../src/services/validator.js';

describe('Payload Validator', () => {
  it('normalizes a loosely typed candidate into the canonical payload', () => {
    const result = validatePayload({
      operationCode: ' 5102 ', origin: 'sp', destination: 'RJ', totalValue: '1.500,00',
      items: [{ description: ' Notebook ', productCode: '8471.30.12', value: '1500', quantity: '10', unitPrice: '150' }],
    });

    expect(result).toEqual({
      ok: true,
      warnings: [],
      payload: {
        operationCode: '5102', origin: 'SP', destination: 'RJ', totalValue: 1500, documentKey: null,
        issuer: null, recipient: null, taxTotals: null,
        items: [{
          description: 'Notebook', productCode: '84713012', value: 1500, quantity: 10, unitPrice: 150,
          itemCode: null, unit: null, cest: null, taxes: null,
        }],
      },
    });
  });

  it('accepts a numeric operation code and an empty item list', () => {
    const result = validatePayload({ operationCode: 6949, origin: 'SP', destination: 'SP', totalValue: 0 });
    expect(result.ok && result.payload.operationCode).toBe('6949');
    expect(result.ok && result.payload.items).toEqual([]);
  });

  it('maps unknown jurisdictions to OTHER', () => {
    expect(toJurisdiction('EX')).toBe('OTHER');
    expect(toJurisdiction('MG')).toBe('MG');
    const result = validatePayload({ operationCode: '7102', origin: 'SP', destination: 'EX', totalValue: 10 });
    expect(result.ok && result.payload.destination).toBe('OTHER');
  });

  it('collapses malformed product codes to null without failing', () => {
    const result = validatePayload({
      operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: 5,
      items: [{ description: 'Parafuso', productCode: '9999', value: 5 }],
    });
    expect(result.ok && result.payload.items[0]?.productCode).toBeNull();
  });

  it('collapses short and non-numeric NCMs to null', () => {
    for (const productCode of ['123', '8471A012']) {
      const result = validatePayload({
        operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: 5,
        items: [{ description: 'Parafuso', productCode, value: 5 }],
      });
      expect(result.ok).toBe(true);
      expect(result.ok && result.payload.items[0]?.productCode).toBeNull();
    }
  });

  it('reads either decimal convention when both separators appear', () => {
    for (const totalValue of ['1,500.00', '1.500,00', '1500.00', 'R$ 1.500,00']) {
      const result = validatePayload({ operationCode: '5102', origin: 'SP', destination: 'SP', totalValue });
      expect(result.ok && result.payload.totalValue).toBe(1500);
    }
  });

  it('reports ambiguous amounts instead of guessing', () => {
    const result = validatePayload({ operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: '1,500,00' });
    expect(result.ok ? [] : result.issues).toEqual([{ path: 'totalValue', message: 'must be a number' }]);
  });

  it('keeps well-formed tax codes and nulls malformed ones', () => {
    const result = validatePayload({
      operationCode: '5405', origin: 'SP', destination: 'SP', totalValue: 10,
      recipient: { name: ' Cliente ', taxId: '11.222.333/0001-81', stateRegistration: 'isenta', stateRegistrationIndicator: '4' },
      items: [{
        description: 'Oleo', value: 10, cest: '1234567890', itemCode: '  ', unit: 'UN',
        taxes: { icmsOrigin: '2', icmsCst: '000', icmsCsosn: '102', icmsValue: '1,80', pisCst: '1', cofinsCst: '01' },
      }],
    });
    expect(result.ok && result.payload.recipient).toEqual({
      name: 'Cliente', taxId: '11222333000181', taxIdKind: 'cnpj', stateRegistration: 'ISENTO', stateRegistrationIndicator: null,
    });
    expect(result.ok && result.payload.items[0]).toMatchObject({
      itemCode: null, unit: 'UN', cest: null,
      taxes: {
        icmsOrigin: '2', icmsCst: null, icmsCsosn: '102', icmsValue: 1.8,
        ipiCst: null, ipiValue: null, pisCst: null, pisValue: null, cofinsCst: '01', cofinsValue: null,
      },
    });
    expect(result.ok && result.payload.issuer).toBeNull();
  });

  it('reports every failing field at once', () => {
    const result = validatePayload({
      operationCode: '51A2', totalValue: -1,
      items: [{ description: '  ', value: -5 }],
    });

    expect(result).toEqual({
      ok: false,
      issues: [
        { path: 'operationCode', message: 'must be exactly 4 digits' },
        { path: 'origin', message: 'is required' },
        { path: 'destination', message: 'is required' },
        { path: 'totalValue', message: 'must be >= 0' },
        { path: 'items.0.description', message: 'must be a non-empty description' },
        { path: 'items.0.value', message: 'must be >= 0' },
      ],
    });
  });

  it('rejects operation codes that are not exactly four digits', () => {
    for (const operationCode of ['510', '51022', 'CFOP']) {
      const result = validatePayload({ operationCode, origin: 'SP', destination: 'SP', totalValue: 1 });
      expect(result.ok ? [] : result.issues).toEqual([{ path: 'operationCode', message: 'must be exactly 4 digits' }]);
    }
  });

  it('reports a non-object candidate at the root', () => {
    expect(validatePayload(null)).toEqual({ ok: false, issues: [{ path: '(payload)', message: 'must be an object' }] });
  });

  it('warns when line arithmetic is off', () => {
    const result = validatePayload({
      operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: 100,
      items: [{ description: 'Caixa', value: 100, quantity: 2, unitPrice: 40 }],
    });
    expect(result.ok && result.warnings).toEqual(['items.0: quantity × unit price = 80.00 differs from value 100.00']);
  });

  it('warns when items do not add up to the total', () => {
    const result = validatePayload({
      operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: 150,
      items: [{ description: 'Caixa', value: 100 }],
    });
    expect(result.ok && result.warnings).toEqual(['items sum 100.00 differs from total value 150.00']);
  });

  it('tolerates differences of a few cents', () => {
    const result = validatePayload({
      operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: 100.01,
      items: [{ description: 'Caixa', value: 100, quantity: 3, unitPrice: 33.33 }],
    });
    expect(result.ok && result.warnings).toEqual([]);
  });
});
