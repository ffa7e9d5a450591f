import type { InvestigatorMatch } from '../types/index.js';
import { normalizeName } from './name-normalizer.js';

export interface MatchOptions {
    /**
     * Share of the shorter name's multi-letter tokens that must be shared
     * when both names have at least two.
     */
    minOverlapRatio?: number;
}

const DEFAULT_MIN_OVERLAP_RATIO = 0.5;

/**
 * Decide whether two normalized names refer to the same person.
 *
 * Requires one shared multi-letter token; when both names carry two or more,
 * the shared count must also reach `minOverlapRatio` of the shorter one.
 */
export function namesMatch(
    a: ReadonlySet<string>,
    b: ReadonlySet<string>,
    minOverlapRatio = DEFAULT_MIN_OVERLAP_RATIO
): boolean {
    const longA = [...a].filter((token) => token.length > 1);
    const longB = new Set([...b].filter((token) => token.length > 1));

    const shared = longA.filter((token) => longB.has(token)).length;
    if (shared === 0) return false;

    if (longA.length >= 2 && longB.size >= 2) {
        const shorter = Math.min(longA.length, longB.size);
        return shared >= minOverlapRatio * shorter;
    }

    return true;
}

/**
 * Every (author, investigator) pair that matches, in author order.
 */
export function findInvestigatorMatches(
    authorNames: readonly string[],
    investigatorNames: readonly string[],
    options: MatchOptions = {}
): InvestigatorMatch[] {
    const ratio = options.minOverlapRatio ?? DEFAULT_MIN_OVERLAP_RATIO;
    const investigators = investigatorNames.map((name) => ({ name, tokens: normalizeName(name) }));
    const matches: InvestigatorMatch[] = [];

    for (const author of authorNames) {
        const authorTokens = normalizeName(author);
        if (authorTokens.size === 0) continue;

        for (const investigator of investigators) {
            if (namesMatch(authorTokens, investigator.tokens, ratio)) {
                matches.push({ author, investigator: investigator.name });
            }
        }
    }

    return matches;
}

/**
 * Investigator names (as given) overlapping with some author.
 * No match is an empty set.
 */
export function matchInvestigators(
    authorNames: readonly string[],
    investigatorNames: readonly string[],
    options: MatchOptions = {}
): Set<string> {
    return new Set(
        findInvestigatorMatches(authorNames, investigatorNames, options).map((m) => m.investigator)
    );
}
