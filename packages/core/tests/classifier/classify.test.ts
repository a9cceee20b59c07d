import { describe, it, expect } from 'vitest';
import { classifyType, buildTypeKeywords } from '../../src/classifier/classify.js';

describe('classifyType', () => {
    it.each(['CRÉDITO', 'credito', 'Credito', 'Crédito', 'crédito'])('classifies %j as credito', (raw) => {
        expect(classifyType(raw)).toBe('credito');
    });

    it.each(['Débito', 'debito', 'DEBITO', 'DÉBITO'])('classifies %j as debito', (raw) => {
        expect(classifyType(raw)).toBe('debito');
    });

    it('ignores surrounding whitespace', () => {
        expect(classifyType('  credito ')).toBe('credito');
    });

    it('handles already-decomposed accents', () => {
        expect(classifyType('Cre\u0301dito')).toBe('credito');
    });

    it.each(['transferencia', '', 'credit', 'debitos', 'cred ito'])('classifies %j as desconocido', (raw) => {
        expect(classifyType(raw)).toBe('desconocido');
    });
});

describe('buildTypeKeywords', () => {
    const keywords = buildTypeKeywords({ credito: ['Abono'], debito: ['CARGO', 'Comisión'] });

    it('adds aliases to the built-in spellings', () => {
        expect(classifyType('abono', keywords)).toBe('credito');
        expect(classifyType('Cargo', keywords)).toBe('debito');
        expect(classifyType('comision', keywords)).toBe('debito');
    });

    it('keeps the built-in spellings', () => {
        expect(classifyType('Crédito', keywords)).toBe('credito');
        expect(classifyType('débito', keywords)).toBe('debito');
    });

    it('does not leak aliases into the default classification', () => {
        expect(classifyType('abono')).toBe('desconocido');
    });
});
