import type { CandidateGrant, Grant, Publication, SelectionMode } from '../types/index.js';
import { findInvestigatorMatches } from './investigator-matcher.js';
import { temporalScore } from './temporal-filter.js';

export interface SelectOptions {
    maxCandidates: number;
    graceYears?: number;
    temporalFloor?: number;
    minOverlapRatio?: number;
    mode?: SelectionMode;
}

/**
 * All investigators named on a grant, primary first.
 */
export function grantInvestigators(grant: Grant): string[] {
    return [grant.primaryInvestigator, ...grant.otherInvestigators].filter((name) => name.trim().length > 0);
}

/**
 * Narrow the grant list to the candidates worth a relevance assessment.
 *
 * A grant with neither an investigator match nor a temporal overlap is
 * discarded (`all-signals` mode requires both). Survivors are ranked by
 * temporalScore × (1 + matches), ties in grant order, and capped at
 * `maxCandidates`.
 */
export function selectCandidates(
    publication: Publication,
    grants: readonly Grant[],
    options: SelectOptions
): CandidateGrant[] {
    const { maxCandidates, mode = 'any-signal' } = options;
    if (maxCandidates < 1) return [];

    const candidates: CandidateGrant[] = [];

    grants.forEach((grant, grantIndex) => {
        const evidence = findInvestigatorMatches(publication.authors, grantInvestigators(grant), {
            minOverlapRatio: options.minOverlapRatio,
        });
        const investigatorMatches = [...new Set(evidence.map((m) => m.investigator))];
        const score = temporalScore(publication.year, grant.startDate, grant.endDate, {
            graceYears: options.graceYears,
            floor: options.temporalFloor,
        });

        const hasMatch = investigatorMatches.length > 0;
        const inWindow = score > 0;
        const keep = mode === 'all-signals' ? hasMatch && inWindow : hasMatch || inWindow;
        if (!keep) return;

        candidates.push({
            grant,
            grantIndex,
            investigatorMatches,
            evidence,
            temporalScore: score,
            rankScore: score * (1 + investigatorMatches.length),
        });
    });

    candidates.sort((a, b) => b.rankScore - a.rankScore || a.grantIndex - b.grantIndex);
    return candidates.slice(0, maxCandidates);
}
