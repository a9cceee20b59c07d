/**
 * Transaction type normalization for classification.
 *
 * Transformations:
 * - Decompose accented letters (NFD) and drop the combining marks
 * - Convert to lowercase
 * - Trim leading/trailing whitespace
 *
 * @param raw - Raw type string as read from the CSV
 * @returns Normalized type for keyword comparison
 */
export function normalizeType(raw: string): string {
    return raw
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .trim();
}
