import type { CandidateGrant, Publication } from '../types/index.js';
import { CONFIDENCE_LEVELS } from '../types/index.js';

const MAX_TITLE_LENGTH = 300;
const MAX_DESCRIPTION_LENGTH = 1200;
const MAX_EVIDENCE_PAIRS = 8;

/** Line prefixes of the prompt sections */
export const PROMPT_LABELS = {
    investigators: '- Matching investigators: ',
    grant: 'GRANT:',
    publication: 'PUBLICATION:',
    title: 'Title: ',
} as const;

/** Separator between an author and the investigator it matched */
export const EVIDENCE_ARROW = ' -> ';

export const SYSTEM_PROMPT =
    'You are a research analyst assessing topical relationships between grants and publications. ' +
    'Be concise and focus only on content alignment.';

/**
 * Build the relevance prompt for one publication/grant pair.
 *
 * Investigator overlap and timing were established by pre-filtering; the
 * prompt states them as facts and asks only for a topical judgment.
 */
export function buildRelevancePrompt(publication: Publication, candidate: CandidateGrant): string {
    const { grant } = candidate;

    const evidence = candidate.evidence
        .slice(0, MAX_EVIDENCE_PAIRS)
        .map((m) => `${m.author}${EVIDENCE_ARROW}${m.investigator}`);
    const evidenceLine = evidence.length > 0 ? evidence.join('; ') : 'none (timing overlap only)';

    const lines = [
        'This publication-grant pair already passed deterministic pre-filtering:',
        `${PROMPT_LABELS.investigators}${evidenceLine}`,
        `- Temporal alignment score: ${candidate.temporalScore.toFixed(2)} (1.00 = published at grant start)`,
        '',
        'Assess the TOPICAL relationship between the grant and the publication.',
        '',
        PROMPT_LABELS.grant,
        `${PROMPT_LABELS.title}${truncate(grant.title, MAX_TITLE_LENGTH)}`,
        `Project code: ${grant.projectCode || 'N/A'}`,
        `Period: ${formatYear(grant.startDate)} to ${formatYear(grant.endDate)}`,
        `Description: ${grant.description ? truncate(grant.description, MAX_DESCRIPTION_LENGTH) : 'Not provided'}`,
        '',
        PROMPT_LABELS.publication,
        `${PROMPT_LABELS.title}${truncate(publication.title, MAX_TITLE_LENGTH)}`,
        `Year: ${publication.year ?? 'unknown'}`,
        `Type: ${publication.type ?? 'unknown'}`,
        '',
        'Rate the likelihood that this publication resulted from this grant:',
        '- Very High: publication clearly addresses the grant objectives',
        '- High: strong topical overlap',
        '- Medium: moderate topical connection',
        '- Low: minimal topical alignment',
        '- Very Low: no clear topical connection',
        '',
        'Respond with JSON only:',
        `{"confidence": "${[...CONFIDENCE_LEVELS].reverse().join('|')}", "reasoning": "one or two sentences"}`,
    ];

    return lines.join('\n');
}

function truncate(text: string, max: number): string {
    const clean = text.replace(/\s+/g, ' ').trim();
    return clean.length > max ? `${clean.slice(0, max - 1)}…` : clean;
}

function formatYear(date: Date | null): string {
    return date && !isNaN(date.getTime()) ? String(date.getUTCFullYear()) : 'unknown';
}
