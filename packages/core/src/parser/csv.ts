/**
 * Transaction CSV reader.
 *
 * Format:
 * - UTF-8, comma separated, header row required
 * - Header must contain id, tipo and monto; any other column is ignored
 * - Values are kept verbatim (no trimming, no number or date coercion)
 *
 * ARCHITECTURAL NOTE: No file system access. The caller supplies the bytes.
 */

import * as XLSX from 'xlsx';
import type { TransactionRecord } from '../types/index.js';
import { REQUIRED_COLUMNS } from '../types/index.js';
import { IoError, SchemaError } from '../errors.js';

/**
 * raw: every cell stays the literal text from the file.
 * FS: the separator is always a comma, never guessed from the content.
 */
const READ_OPTIONS = { type: 'string', raw: true, FS: ',' } as const;

/**
 * Parse a transaction CSV into ordered records.
 *
 * @param data - Raw file contents
 * @param sourceFile - Original path, used in error messages
 * @returns One record per non-blank data row, in file order
 * @throws IoError if the bytes are not valid UTF-8
 * @throws SchemaError if the header lacks a required column
 */
export function parseTransactionCsv(data: ArrayBuffer | Uint8Array, sourceFile?: string): TransactionRecord[] {
    let text: string;
    try {
        text = new TextDecoder('utf-8', { fatal: true }).decode(data);
    } catch (err) {
        throw new IoError(
            'Error inesperado al leer el archivo: el contenido no es texto UTF-8 válido',
            sourceFile,
            { cause: err }
        );
    }

    text = stripBom(text);
    if (text.trim().length === 0) {
        throw new SchemaError(REQUIRED_COLUMNS, [...REQUIRED_COLUMNS]);
    }

    const workbook = XLSX.read(text, READ_OPTIONS);
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    const rows = sheet
        ? XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '', blankrows: false })
        : [];

    const header = (rows[0] ?? []).map(cell => stripBom(cellText(cell)));
    const missingColumns = REQUIRED_COLUMNS.filter(col => !header.includes(col));
    if (missingColumns.length > 0) {
        throw new SchemaError(REQUIRED_COLUMNS, missingColumns);
    }

    const idIndex = header.indexOf('id');
    const typeIndex = header.indexOf('tipo');
    const amountIndex = header.indexOf('monto');

    return rows.slice(1).map(row => ({
        id: cellText(row[idIndex]),
        tipo: cellText(row[typeIndex]),
        monto: cellText(row[amountIndex]),
    }));
}

function cellText(value: unknown): string {
    if (value === undefined || value === null) {
        return '';
    }
    return String(value);
}

/**
 * Strip a leading byte order mark, which would otherwise stick to the first column name.
 */
function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}
