import type { MappingResult, Publication } from '../types/index.js';
import { NO_CONFIDENCE, RESULT_COLUMNS } from '../types/index.js';
import type { ResultStore } from '../storage/database.js';

export const NO_CANDIDATE_REASONING = 'No candidate grants passed pre-filtering';

/**
 * Output row: original publication columns plus the derived result columns.
 */
export type ResultRow = Record<string, string>;

/**
 * Explicit no-match result for a publication.
 */
export function noMatchResult(publication: Publication, reasoning = NO_CANDIDATE_REASONING): MappingResult {
    return {
        publicationKey: publication.key,
        publicationIndex: publication.index,
        associatedGrant: null,
        grantIdentifier: null,
        confidenceLevel: NO_CONFIDENCE,
        reasoning,
        recordedAt: new Date().toISOString(),
    };
}

/**
 * Merge results by publication key. For a key present in both, the more
 * recently recorded result wins; equal timestamps favour `current`.
 */
export function mergeResults(
    previous: Iterable<MappingResult>,
    current: Iterable<MappingResult>
): Map<string, MappingResult> {
    const merged = new Map<string, MappingResult>();
    for (const result of previous) {
        const existing = merged.get(result.publicationKey);
        if (!existing || result.recordedAt >= existing.recordedAt) {
            merged.set(result.publicationKey, result);
        }
    }
    for (const result of current) {
        const existing = merged.get(result.publicationKey);
        if (!existing || result.recordedAt >= existing.recordedAt) {
            merged.set(result.publicationKey, result);
        }
    }
    return merged;
}

/**
 * Flatten a result into the four derived output columns.
 */
export function toResultColumns(result: MappingResult): Record<(typeof RESULT_COLUMNS)[number], string> {
    return {
        'Associated Grant': result.associatedGrant ?? '',
        'Grant identifier': result.grantIdentifier ?? '',
        'Confidence level': result.confidenceLevel,
        'Reasoning': result.reasoning,
    };
}

/**
 * Accumulates per-publication outcomes.
 *
 * Each result is written through to the durable store before the checkpoint
 * that covers it, so results from an interrupted run are available when the
 * final table is assembled.
 */
export class ResultSink {
    private readonly previous: MappingResult[];
    private readonly current = new Map<string, MappingResult>();

    constructor(private readonly store: ResultStore) {
        this.previous = store.getAllResults();
    }

    /**
     * Results carried over from earlier invocations.
     */
    get carriedOver(): number {
        return this.previous.length;
    }

    record(result: MappingResult): void {
        this.store.upsertResult(result);
        this.current.set(result.publicationKey, result);
    }

    /**
     * Build the final table: one row per publication in input order, with an
     * explicit no-match row for any publication lacking a result.
     */
    finalize(publications: readonly Publication[]): ResultRow[] {
        const merged = mergeResults(this.previous, this.current.values());

        return publications.map((publication) => {
            const result = merged.get(publication.key) ?? noMatchResult(publication);
            return { ...publication.row, ...toResultColumns(result) };
        });
    }
}
