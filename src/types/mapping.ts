import type { Grant } from './publication.js';

/**
 * Ordered confidence levels, lowest first.
 */
export const CONFIDENCE_LEVELS = ['Very Low', 'Low', 'Medium', 'High', 'Very High'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/**
 * Confidence written for publications that were not associated with a grant.
 */
export const NO_CONFIDENCE = 'None';

export type ResultConfidence = ConfidenceLevel | typeof NO_CONFIDENCE;

/**
 * Rank of a confidence level (0 = Very Low … 4 = Very High).
 */
export function confidenceRank(level: ConfidenceLevel): number {
    return CONFIDENCE_LEVELS.indexOf(level);
}

export function isConfidenceLevel(value: string): value is ConfidenceLevel {
    return (CONFIDENCE_LEVELS as readonly string[]).includes(value);
}

/**
 * An author/investigator pair that passed the name matcher.
 */
export interface InvestigatorMatch {
    author: string;
    investigator: string;
}

/**
 * A grant that survived pre-filtering for one publication.
 * Recomputed per publication, never persisted.
 */
export interface CandidateGrant {
    grant: Grant;
    /** Position of the grant in the grant list (tie-breaker) */
    grantIndex: number;
    /** Investigator names (as given on the grant) matched by some author */
    investigatorMatches: string[];
    evidence: InvestigatorMatch[];
    /** Temporal alignment in [0, 1]; 0 = outside the grant window */
    temporalScore: number;
    /** temporalScore × (1 + investigatorMatches.length) */
    rankScore: number;
}

/**
 * Relevance verdict returned by the judgment service.
 */
export interface Verdict {
    confidence: ConfidenceLevel;
    reasoning: string;
}

/**
 * Outcome of a single relevance assessment.
 * Callers must handle each case; only `rate-limit` halts a run.
 */
export type Assessment =
    | { kind: 'verdict'; verdict: Verdict; fallback: boolean; cached: boolean }
    | { kind: 'rate-limit'; message: string; retryAfterMs?: number }
    | { kind: 'transient'; reason: string };

/**
 * Final mapping outcome for one publication.
 */
export interface MappingResult {
    publicationKey: string;
    publicationIndex: number;
    associatedGrant: string | null;
    grantIdentifier: string | null;
    confidenceLevel: ResultConfidence;
    reasoning: string;
    /** ISO timestamp of when the result was recorded */
    recordedAt: string;
}

/**
 * Derived columns appended to every output row.
 */
export const RESULT_COLUMNS = ['Associated Grant', 'Grant identifier', 'Confidence level', 'Reasoning'] as const;
