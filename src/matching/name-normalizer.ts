/**
 * Titles, honorifics and post-nominals dropped before comparing names.
 */
const NAME_TITLES: ReadonlySet<string> = new Set([
    'dr', 'doctor', 'prof', 'professor', 'assoc', 'adj', 'emeritus',
    'mr', 'mrs', 'ms', 'miss', 'mx', 'sir', 'dame',
    'phd', 'md', 'mbbs', 'dphil', 'frs', 'jr', 'sr', 'ii', 'iii', 'iv',
]);

/**
 * Canonicalize a person name into comparable tokens.
 *
 * - lowercase, diacritics stripped, apostrophes removed ("O'Brien" → "obrien")
 * - any other non-letter separates tokens
 * - titles and post-nominals dropped
 * - single-letter initials dropped when a multi-letter token remains
 *
 * "Downey, Luke A." and "Dr Luke Downey" both yield {luke, downey}.
 * Empty input yields an empty set, which never matches.
 */
export function normalizeName(raw: string): Set<string> {
    if (!raw || !raw.trim()) return new Set();

    const tokens = raw
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/['’`]/g, '')
        .replace(/[^a-z]+/g, ' ')
        .split(' ')
        .filter((token) => token.length > 0 && !NAME_TITLES.has(token));

    const hasMultiLetter = tokens.some((token) => token.length > 1);
    return new Set(hasMultiLetter ? tokens.filter((token) => token.length > 1) : tokens);
}

/**
 * Split a cell holding several names.
 * Semicolons win when present so "Last, First; Last, First" survives.
 */
export function splitNameList(raw: string | null | undefined): string[] {
    if (!raw) return [];
    const separator = raw.includes(';') ? ';' : ',';
    return raw
        .split(separator)
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
}
