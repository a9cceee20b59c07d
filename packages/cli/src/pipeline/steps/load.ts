import { readFile } from 'node:fs/promises';
import { IoError, NotFoundError, parseTransactionCsv } from '@bank-report/core';
import type { TransactionRecord } from '@bank-report/shared';
import type { PipelineStep } from '../types.js';
import { errorMessage, isErrnoException } from '../../utils/fs.js';

/**
 * Reads the input file and parses it into records.
 *
 * @throws NotFoundError if the file does not exist
 * @throws IoError on any other read or decoding failure
 * @throws SchemaError if a required column is missing
 */
export async function loadTransactionFile(path: string): Promise<TransactionRecord[]> {
    let buffer: Buffer;
    try {
        buffer = await readFile(path);
    } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
            throw new NotFoundError(path, { cause: err });
        }
        throw new IoError(`Error inesperado al leer el archivo: ${errorMessage(err)}`, path, { cause: err });
    }

    return parseTransactionCsv(buffer, path);
}

/**
 * Step 1: Load
 * Any failure here is fatal: no partial report is produced.
 */
export const loadInput: PipelineStep = async (state) => {
    try {
        state.records = await loadTransactionFile(state.inputPath);
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: errorMessage(err),
            fatal: true,
            error: err,
        });
    }
    return state;
};
