#!/usr/bin/env node
/**
 * Bank Report CLI
 *
 * Summarizes a CSV of bank transactions into credit/debit totals:
 * - CLI handles all file I/O and console output
 * - Core receives bytes, returns records, statistics and report text
 */

import { run } from './cli.js';
import { errorMessage } from './utils/fs.js';

run(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        console.log(`Error inesperado: ${errorMessage(err)}`);
        process.exitCode = 1;
    });
