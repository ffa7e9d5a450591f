import type { ProgressState } from '../types/index.js';
import { CONFIDENCE_LEVELS, NO_CONFIDENCE } from '../types/index.js';
import type { ResultRow } from './result-sink.js';

/**
 * Figures reported when a run completes.
 */
export interface RunSummary {
    totalPublications: number;
    mappedPublications: number;
    /** Percentage of publications associated with a grant */
    mappingRate: number;
    apiCallsMade: number;
    apiCallsFailed: number;
    /** Percentage of API calls that produced a usable verdict */
    apiSuccessRate: number;
    /** Row count per confidence level, `None` included */
    confidenceDistribution: Record<string, number>;
    /** Assessments avoided by pre-filtering versus judging every pair */
    callsSaved: number;
}

function percent(part: number, whole: number): number {
    return whole > 0 ? Math.round((part / whole) * 1000) / 10 : 0;
}

export function summarizeRun(rows: readonly ResultRow[], progress: ProgressState, grantCount: number): RunSummary {
    const distribution: Record<string, number> = {};
    for (const level of [...CONFIDENCE_LEVELS].reverse()) distribution[level] = 0;
    distribution[NO_CONFIDENCE] = 0;

    let mapped = 0;
    for (const row of rows) {
        const level = row['Confidence level'] ?? NO_CONFIDENCE;
        distribution[level] = (distribution[level] ?? 0) + 1;
        if (row['Associated Grant']) mapped++;
    }

    const { api_calls_made: made, api_calls_failed: failed } = progress;

    return {
        totalPublications: rows.length,
        mappedPublications: mapped,
        mappingRate: percent(mapped, rows.length),
        apiCallsMade: made,
        apiCallsFailed: failed,
        apiSuccessRate: percent(Math.max(0, made - failed), made),
        confidenceDistribution: distribution,
        callsSaved: Math.max(0, rows.length * grantCount - made),
    };
}
