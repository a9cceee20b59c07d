import { createInterface } from 'node:readline';
import { AFFIRMATIVE_ANSWER } from '@bank-report/shared';
import type { ReportOptions } from '../types.js';

/**
 * Asks whether to save the report.
 * If --yes is provided, returns true automatically.
 * If not a TTY and --yes is not provided, returns false.
 */
export async function promptSave(message: string, options: ReportOptions): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.log('Modo no interactivo: el reporte no se guarda. Use --yes para guardarlo.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    return new Promise((resolve) => {
        rl.question(`${message} (${AFFIRMATIVE_ANSWER}/n): `, (answer) => {
            rl.close();
            resolve(isAffirmative(answer));
        });
    });
}

export function isAffirmative(answer: string): boolean {
    return answer.trim().toLowerCase() === AFFIRMATIVE_ANSWER;
}
