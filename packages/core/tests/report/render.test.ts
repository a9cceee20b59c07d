import { describe, it, expect } from 'vitest';
import { renderReport, renderReportLines } from '../../src/report/render.js';
import { formatMoney } from '../../src/report/format.js';
import type { StatisticsSummary } from '../../src/types/index.js';

const summary: StatisticsSummary = {
    total_credits: '150.1',
    total_debits: '30.05',
    final_balance: '120.05',
    largest_transaction: { id: '1', amount: '100.1' },
    credit_count: 2,
    debit_count: 1,
};

describe('renderReportLines', () => {
    it('renders the fixed report layout', () => {
        expect(renderReportLines(summary)).toEqual([
            '===== REPORTE DE TRANSACCIONES BANCARIAS =====',
            '',
            'Resumen de Montos:',
            '  - Total Créditos: $150.10',
            '  - Total Débitos: $30.05',
            'Balance Final: $120.05',
            '',
            'Transacción de Mayor Monto: ID 1 con $100.10',
            '',
            'Conteo de Transacciones:',
            '  - Créditos: 2',
            '  - Débitos: 1',
            '  - Total: 3',
        ]);
    });

    it('renders a missing largest transaction id as N/A', () => {
        const empty: StatisticsSummary = {
            total_credits: '0',
            total_debits: '0',
            final_balance: '0',
            largest_transaction: { id: null, amount: '0' },
            credit_count: 0,
            debit_count: 0,
        };

        const lines = renderReportLines(empty);

        expect(lines[7]).toBe('Transacción de Mayor Monto: ID N/A con $0.00');
        expect(lines[12]).toBe('  - Total: 0');
    });

    it('uses the configured currency symbol', () => {
        const lines = renderReportLines(summary, { currencySymbol: '€' });
        expect(lines[5]).toBe('Balance Final: €120.05');
    });
});

describe('renderReport', () => {
    it('joins lines without a trailing newline', () => {
        const text = renderReport(summary);
        expect(text.startsWith('===== REPORTE DE TRANSACCIONES BANCARIAS =====\n\nResumen de Montos:\n')).toBe(true);
        expect(text.endsWith('  - Total: 3')).toBe(true);
        expect(text.split('\n')).toHaveLength(13);
    });
});

describe('formatMoney', () => {
    it('pads to two fraction digits', () => {
        expect(formatMoney('150.1')).toBe('$150.10');
        expect(formatMoney('0')).toBe('$0.00');
        expect(formatMoney('7')).toBe('$7.00');
    });

    it('keeps extra precision without rounding', () => {
        expect(formatMoney('12.345')).toBe('$12.345');
    });

    it('formats negative values', () => {
        expect(formatMoney('-30.05')).toBe('$-30.05');
    });
});
