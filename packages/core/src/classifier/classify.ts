/**
 * Transaction type classification.
 *
 * Matching is case-insensitive and accent-insensitive: "Crédito", "CRÉDITO"
 * and "credito" all resolve to credito. Anything unrecognized resolves to
 * desconocido; classification never fails.
 *
 * ARCHITECTURAL NOTE: No console.* calls. The aggregator reports unknown types.
 */

import { normalizeType } from '../utils/normalize.js';
import { CATEGORY, DEFAULT_TYPE_KEYWORDS } from '../types/index.js';
import type { Category, TypeAliases } from '../types/index.js';

/**
 * Normalized keyword sets, one per contributing category.
 */
export interface TypeKeywords {
    credito: Set<string>;
    debito: Set<string>;
}

/**
 * Build keyword sets from the built-in spellings plus configured aliases.
 * Aliases go through the same normalization as the values they match.
 */
export function buildTypeKeywords(aliases?: Partial<TypeAliases>): TypeKeywords {
    return {
        credito: new Set(
            [...DEFAULT_TYPE_KEYWORDS.credito, ...(aliases?.credito ?? [])].map(normalizeType)
        ),
        debito: new Set(
            [...DEFAULT_TYPE_KEYWORDS.debito, ...(aliases?.debito ?? [])].map(normalizeType)
        ),
    };
}

const DEFAULT_KEYWORDS = buildTypeKeywords();

/**
 * Resolve a raw type string to its category.
 *
 * @param raw - Value of the tipo column
 * @param keywords - Keyword sets; defaults to the built-in spellings
 */
export function classifyType(raw: string, keywords: TypeKeywords = DEFAULT_KEYWORDS): Category {
    const normalized = normalizeType(raw);
    if (keywords.credito.has(normalized)) {
        return CATEGORY.CREDIT;
    }
    if (keywords.debito.has(normalized)) {
        return CATEGORY.DEBIT;
    }
    return CATEGORY.UNKNOWN;
}
