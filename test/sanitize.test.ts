import { describe, it, expect } from 'vitest';
import { parseDecimal, sanitizeCandidate, sanitizeCode, sanitizeParty } from '../src/services/sanitize.js';

describe('Sanitization', () => {
  describe('parseDecimal', () => {
    it('takes the last separator as the decimal mark', () => {
      expect(parseDecimal('1,500.00')).toBe(1500);
      expect(parseDecimal('1.500,00')).toBe(1500);
      expect(parseDecimal('1500.00')).toBe(1500);
      expect(parseDecimal('12.345.678,90')).toBe(12345678.9);
      expect(parseDecimal('12,345,678.90')).toBe(12345678.9);
      expect(parseDecimal('150,5')).toBe(150.5);
    });

    it('returns ambiguous or unparseable text untouched', () => {
      expect(parseDecimal('1,500,00')).toBe('1,500,00');
      expect(parseDecimal('1.500.00,00,00')).toBe('1.500.00,00,00');
      expect(parseDecimal('abc')).toBe('abc');
      expect(parseDecimal('  ')).toBe('  ');
      expect(parseDecimal(null)).toBeNull();
    });
  });

  describe('sanitizeCandidate', () => {
    it('collapses short and non-numeric NCMs to null', () => {
      const candidate = sanitizeCandidate({
        operationCode: '5102', origin: 'SP', destination: 'SP', totalValue: '10,00',
        items: [
          { description: 'Parafuso', productCode: '123', value: '5,00' },
          { description: 'Porca', productCode: '8471A012', value: '5,00' },
          { description: 'Arruela', productCode: '8471.30.12', value: '0' },
        ],
      });
      expect(candidate.items).toMatchObject([{ productCode: null }, { productCode: null }, { productCode: '84713012' }]);
    });
  });

  it('keeps fixed-width codes only at their exact width', () => {
    expect(sanitizeCode('06.001.00', 7)).toBe('0600100');
    expect(sanitizeCode('123', 7)).toBeNull();
    expect(sanitizeCode('101', 3)).toBe('101');
    expect(sanitizeCode('10A', 3)).toBeNull();
    expect(sanitizeCode('00', 2)).toBe('00');
    expect(sanitizeCode(undefined, 2)).toBeNull();
  });

  it('recognizes CNPJ and CPF by length and drops anything else', () => {
    expect(sanitizeParty({ taxId: '123.456.789-09' })).toMatchObject({ taxId: '12345678909', taxIdKind: 'cpf' });
    expect(sanitizeParty({ taxId: '1234' })).toMatchObject({ taxId: null, taxIdKind: null });
    expect(sanitizeParty('Cliente')).toBeNull();
  });
});
