import type { ConfidenceLevel, LlmCompletionResult, LlmProvider } from '../../types/index.js';
import { EVIDENCE_ARROW, PROMPT_LABELS } from '../prompt.js';

/**
 * Keyword groups; a group counts as a shared theme when both titles contain
 * at least one of its terms.
 */
const TOPIC_GROUPS: ReadonlyArray<readonly string[]> = [
    ['psychological', 'mental', 'cognitive', 'depression', 'anxiety', 'stress', 'psychotherapy', 'therapy'],
    ['brain', 'neural', 'neurocognitive', 'neurobiological', 'eeg', 'imaging'],
    ['alcohol', 'drug', 'cannabis', 'psilocybin', 'amphetamine', 'cbd', 'ketamine', 'benzodiazepine'],
    ['sleep', 'insomnia', 'circadian', 'fatigue'],
    ['aged', 'aging', 'elderly', 'dementia', 'alzheimer'],
];

export interface DemoPair {
    grantTitle: string;
    publicationTitle: string;
    /** Distinct publication authors that matched a grant investigator */
    matchedAuthors: string[];
}

export interface TopicOverlap {
    /** Number of keyword groups both titles touch */
    groups: number;
    /** Terms found in both titles */
    sharedTerms: string[];
}

export function topicOverlap(grantTitle: string, publicationTitle: string): TopicOverlap {
    const grant = grantTitle.toLowerCase();
    const publication = publicationTitle.toLowerCase();
    let groups = 0;
    const sharedTerms: string[] = [];

    for (const terms of TOPIC_GROUPS) {
        if (terms.some((t) => publication.includes(t)) && terms.some((t) => grant.includes(t))) {
            groups++;
            sharedTerms.push(...terms.filter((t) => publication.includes(t) && grant.includes(t)));
        }
    }

    return { groups, sharedTerms };
}

/**
 * Recover the titles and investigator evidence from a relevance prompt.
 */
export function readRelevancePrompt(prompt: string): DemoPair {
    const lines = prompt.split('\n');

    const titleAfter = (heading: string): string => {
        const start = lines.indexOf(heading);
        if (start < 0) return '';
        const line = lines.slice(start + 1).find((l) => l.startsWith(PROMPT_LABELS.title));
        return line?.slice(PROMPT_LABELS.title.length) ?? '';
    };

    const evidenceLine = lines.find((l) => l.startsWith(PROMPT_LABELS.investigators)) ?? '';
    const authors = evidenceLine
        .slice(PROMPT_LABELS.investigators.length)
        .split('; ')
        .filter((pair) => pair.includes(EVIDENCE_ARROW))
        .map((pair) => pair.slice(0, pair.indexOf(EVIDENCE_ARROW)).trim());

    return {
        grantTitle: titleAfter(PROMPT_LABELS.grant),
        publicationTitle: titleAfter(PROMPT_LABELS.publication),
        matchedAuthors: [...new Set(authors)],
    };
}

/**
 * Rate a pair from shared themes and investigator overlap.
 */
export function judgePair(pair: DemoPair): { confidence: ConfidenceLevel; reasoning: string } {
    const { groups, sharedTerms } = topicOverlap(pair.grantTitle, pair.publicationTitle);
    const authors = pair.matchedAuthors;

    if (groups >= 2 && authors.length >= 2) {
        return {
            confidence: 'High',
            reasoning: `Strong topic alignment (shared terms: ${listOrNone(sharedTerms.slice(0, 3))}) and several investigator matches: ${authors.slice(0, 2).join(', ')}`,
        };
    }
    if (groups >= 1 && authors.length >= 1) {
        return {
            confidence: 'Medium',
            reasoning: `Moderate alignment with shared topics (${listOrNone(sharedTerms.slice(0, 2))}) and investigator match: ${authors[0]}`,
        };
    }
    if (authors.length >= 1) {
        return {
            confidence: 'Low',
            reasoning: `Investigator overlap (${authors[0]}) with limited topic alignment`,
        };
    }
    return { confidence: 'Very Low', reasoning: 'Linked only by timing; no shared topics or investigators' };
}

function listOrNone(terms: string[]): string {
    return terms.length > 0 ? terms.join(', ') : 'none';
}

/**
 * Offline judgment backend for trying the pipeline without a service.
 * Answers with the same JSON verdict a remote model is asked for.
 */
export class DemoProvider implements LlmProvider {
    readonly name = 'demo';
    readonly model = 'topic-keywords';
    readonly supportsStructuredOutput = true;

    async complete(prompt: string): Promise<LlmCompletionResult> {
        const verdict = judgePair(readRelevancePrompt(prompt));
        return {
            text: JSON.stringify(verdict),
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            model: this.model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return true;
    }
}
