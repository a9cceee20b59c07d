import { describe, it, expect, vi, afterEach } from 'vitest';
import { isAffirmative, promptSave } from '../src/utils/prompt.js';

describe('isAffirmative', () => {
    it.each(['s', 'S', ' s '])('accepts %j', (answer) => {
        expect(isAffirmative(answer)).toBe(true);
    });

    it.each(['n', 'si', 'y', ''])('rejects %j', (answer) => {
        expect(isAffirmative(answer)).toBe(false);
    });
});

describe('promptSave', () => {
    const originalIsTTY = process.stdin.isTTY;

    afterEach(() => {
        process.stdin.isTTY = originalIsTTY;
        vi.restoreAllMocks();
    });

    it('returns true without asking when --yes is set', async () => {
        await expect(promptSave('¿Guardar?', { yes: true })).resolves.toBe(true);
    });

    it('returns false when stdin is not a terminal', async () => {
        process.stdin.isTTY = false;
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        await expect(promptSave('¿Guardar?', { yes: false })).resolves.toBe(false);
        expect(log).toHaveBeenCalledWith('Modo no interactivo: el reporte no se guarda. Use --yes para guardarlo.');
    });
});
