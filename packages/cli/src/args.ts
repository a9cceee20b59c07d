import type { ReportOptions } from './types.js';

export interface ParsedArgs {
    inputPath?: string;
    options: ReportOptions;
}

/**
 * Splits argv into the input path and flags.
 * Unrecognized flags are ignored; the first positional argument wins.
 */
export function parseArgs(args: string[]): ParsedArgs {
    const options: ReportOptions = { yes: false };
    let inputPath: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--yes' || arg === '-y') {
            options.yes = true;
        } else if (arg === '--workspace' && i + 1 < args.length) {
            options.workspace = args[++i];
        } else if (!arg.startsWith('-') && inputPath === undefined) {
            inputPath = arg;
        }
    }

    return { inputPath, options };
}

export function printUsage(): void {
    console.log('Uso: bank-report <archivo_csv> [--yes] [--workspace <dir>]');
    console.log('Ejemplo: bank-report transacciones.csv');
}
