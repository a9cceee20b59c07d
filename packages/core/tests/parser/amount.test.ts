import { describe, it, expect } from 'vitest';
import { parseAmount, tryParseAmount } from '../../src/parser/amount.js';
import { InvalidAmountError } from '../../src/errors.js';

describe('parseAmount', () => {
    it('parses plain decimals exactly', () => {
        expect(parseAmount('100.10', '1').toFixed()).toBe('100.1');
        expect(parseAmount('0.1', '1').plus(parseAmount('0.2', '2')).toFixed()).toBe('0.3');
    });

    it('accepts signs and partial fractions', () => {
        expect(parseAmount('-3.50', '1').toFixed()).toBe('-3.5');
        expect(parseAmount('+0.5', '1').toFixed()).toBe('0.5');
        expect(parseAmount('.75', '1').toFixed()).toBe('0.75');
        expect(parseAmount('10.', '1').toFixed()).toBe('10');
    });

    it('ignores surrounding whitespace', () => {
        expect(parseAmount('  12.5 ', '1').toFixed()).toBe('12.5');
    });

    it.each(['abc', '', '   ', '1e3', '1,000.00', 'NaN', 'Infinity', '12.5.3', '$10', '- 5'])(
        'rejects %j',
        (raw) => {
            expect(() => parseAmount(raw, '9')).toThrow(InvalidAmountError);
        }
    );

    it('carries the transaction id and raw text in the error', () => {
        try {
            parseAmount('abc', 'T-42');
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(InvalidAmountError);
            if (err instanceof InvalidAmountError) {
                expect(err.txnId).toBe('T-42');
                expect(err.rawAmount).toBe('abc');
                expect(err.message).toBe('Monto inválido en la transacción T-42: abc');
            }
        }
    });
});

describe('tryParseAmount', () => {
    it('returns ok with the value', () => {
        const result = tryParseAmount('5.25', '1');
        expect(result.ok).toBe(true);
        if (result.ok) {
            expect(result.value.toFixed()).toBe('5.25');
        }
    });

    it('returns the error instead of throwing', () => {
        const result = tryParseAmount('x', '3');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.txnId).toBe('3');
        }
    });
});
