import type {
    Assessment,
    CandidateGrant,
    EngineState,
    Grant,
    GrantMapConfig,
    MappingResult,
    ProgressState,
    Publication,
    Verdict,
} from '../types/index.js';
import { confidenceRank } from '../types/index.js';
import { selectCandidates } from '../matching/candidate-selector.js';
import { transientVerdict } from '../assessment/relevance-assessor.js';
import { ResultSink, noMatchResult } from '../output/result-sink.js';
import { summarizeRun, type RunSummary } from '../output/summary.js';
import { writeResultTable } from '../exporters/export.js';
import type { ResultStore } from '../storage/database.js';
import { sleep as defaultSleep } from '../utils/time.js';
import { getLogger } from '../utils/logger.js';
import { assertSameInput, freshProgress, type CheckpointStore } from './checkpoint.js';

/**
 * Anything that can judge a candidate; `RelevanceAssessor` in production.
 */
export interface Assessor {
    assess(publication: Publication, candidate: CandidateGrant): Promise<Assessment>;
}

export interface BatchEngineOptions {
    publications: readonly Publication[];
    /** Header of the publications table, for the output columns */
    inputHeader: readonly string[];
    grants: readonly Grant[];
    assessor: Assessor;
    checkpoint: CheckpointStore;
    store: ResultStore;
    config: Pick<GrantMapConfig, 'selection' | 'batch' | 'out' | 'outputFormat'>;
    sleep?: (ms: number) => Promise<void>;
}

export type RunOutcome =
    | { status: 'complete'; progress: ProgressState; summary: RunSummary; outputPath: string }
    | { status: 'halted'; progress: ProgressState; reason: string; retryAfterMs?: number };

type StepOutcome =
    | { kind: 'done'; result: MappingResult; callsMade: number; callsFailed: number }
    | { kind: 'rate-limit'; message: string; retryAfterMs?: number };

interface JudgedCandidate {
    candidate: CandidateGrant;
    verdict: Verdict;
}

/**
 * Drives the publication loop.
 *
 * FRESH → RUNNING → HALTED_RATE_LIMIT | COMPLETE
 *
 * Progress is checkpointed after every publication. A rate limit abandons the
 * in-flight publication and returns; resuming is done by running again, which
 * picks up at `last_processed_index + 1`.
 */
export class BatchEngine {
    private state: EngineState = 'FRESH';
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(private readonly options: BatchEngineOptions) {
        this.sleep = options.sleep ?? defaultSleep;
    }

    getState(): EngineState {
        return this.state;
    }

    async run(): Promise<RunOutcome> {
        const logger = getLogger();
        const { publications, checkpoint, store, config } = this.options;

        let progress: ProgressState;
        const loaded = checkpoint.load();
        if (loaded) {
            assertSameInput(loaded, publications);
            progress = loaded;
            logger.info(
                {
                    processed: progress.processed_count,
                    total: progress.total_publications,
                    mapped: progress.mapped_count,
                    apiCalls: progress.api_calls_made,
                },
                'Resuming from checkpoint'
            );
        } else {
            // Leftovers from a run that died during finalization
            store.clearResults();
            progress = freshProgress(publications);
            checkpoint.save(progress);
            logger.info({ total: publications.length }, 'Starting fresh run');
        }

        const sink = new ResultSink(store);
        if (sink.carriedOver > 0) {
            logger.debug({ carriedOver: sink.carriedOver }, 'Partial results loaded from earlier invocations');
        }
        const runId = store.insertRun({
            started_at: new Date().toISOString(),
            finished_at: null,
            state: 'RUNNING',
            config_json: JSON.stringify({ selection: config.selection, batch: config.batch }),
            stats_json: '{}',
        });
        this.transition('RUNNING');

        try {
            for (let i = progress.last_processed_index + 1; i < publications.length; i++) {
                const publication = publications[i];
                if (!publication) break;

                const step = await this.processPublication(publication);

                if (step.kind === 'rate-limit') {
                    // Counters stay at the last completed publication; only the failed call is added
                    const halted: ProgressState = {
                        ...progress,
                        api_calls_failed: progress.api_calls_failed + 1,
                        timestamp: new Date().toISOString(),
                    };
                    checkpoint.save(halted);
                    this.transition('HALTED_RATE_LIMIT');
                    store.finishRun(runId, 'HALTED_RATE_LIMIT', halted);

                    logger.warn(
                        {
                            processed: halted.processed_count,
                            total: halted.total_publications,
                            nextIndex: halted.last_processed_index + 1,
                            apiCalls: halted.api_calls_made,
                            apiFailures: halted.api_calls_failed,
                            retryAfterMs: step.retryAfterMs,
                        },
                        'Rate limit reached, progress saved. Run again to resume'
                    );
                    return { status: 'halted', progress: halted, reason: step.message, retryAfterMs: step.retryAfterMs };
                }

                sink.record(step.result);
                progress = {
                    ...progress,
                    processed_count: progress.processed_count + 1,
                    mapped_count: progress.mapped_count + (step.result.associatedGrant ? 1 : 0),
                    last_processed_index: i,
                    api_calls_made: progress.api_calls_made + step.callsMade,
                    api_calls_failed: progress.api_calls_failed + step.callsFailed,
                    timestamp: new Date().toISOString(),
                };
                checkpoint.save(progress);

                logger.debug(
                    { index: i, key: publication.key, grant: step.result.grantIdentifier, confidence: step.result.confidenceLevel },
                    'Publication recorded'
                );

                if ((i + 1) % config.batch.batchSize === 0) {
                    logger.info(
                        {
                            processed: progress.processed_count,
                            total: progress.total_publications,
                            mapped: progress.mapped_count,
                            apiCalls: progress.api_calls_made,
                        },
                        'Progress'
                    );
                }

                if (step.callsMade > 0 && i < publications.length - 1) {
                    await this.sleep(config.batch.interCallDelayMs);
                }
            }

            const outcome = this.finalize(sink, progress);
            store.finishRun(runId, 'COMPLETE', outcome.summary);
            return outcome;
        } catch (error) {
            store.finishRun(runId, 'FAILED', progress);
            logger.error({ error, nextIndex: progress.last_processed_index + 1 }, 'Run failed; progress up to the last recorded publication is kept');
            throw error;
        }
    }

    /**
     * Select and judge the candidates for one publication.
     */
    private async processPublication(publication: Publication): Promise<StepOutcome> {
        const logger = getLogger();
        const { grants, assessor, config } = this.options;

        const candidates = selectCandidates(publication, grants, {
            maxCandidates: config.selection.maxCandidates,
            graceYears: config.selection.graceYears,
            temporalFloor: config.selection.temporalFloor,
            minOverlapRatio: config.selection.minOverlapRatio,
            mode: config.selection.mode,
        });

        if (candidates.length === 0) {
            return { kind: 'done', result: noMatchResult(publication), callsMade: 0, callsFailed: 0 };
        }

        let best: JudgedCandidate | null = null;
        let callsMade = 0;
        let callsFailed = 0;

        for (const candidate of candidates) {
            const assessment = await assessor.assess(publication, candidate);
            if (assessment.kind === 'rate-limit') {
                return { kind: 'rate-limit', message: assessment.message, retryAfterMs: assessment.retryAfterMs };
            }

            let verdict: Verdict;
            if (assessment.kind === 'transient') {
                callsMade++;
                callsFailed++;
                logger.warn(
                    { publication: publication.key, grant: candidate.grant.projectCode, reason: assessment.reason },
                    'Assessment failed, recording low-confidence verdict'
                );
                verdict = transientVerdict(assessment.reason);
            } else {
                if (!assessment.cached) callsMade++;
                if (assessment.fallback) callsFailed++;
                verdict = assessment.verdict;
            }

            if (!best || confidenceRank(verdict.confidence) > confidenceRank(best.verdict.confidence)) {
                best = { candidate, verdict };
            }
        }

        return { kind: 'done', result: this.toResult(publication, best), callsMade, callsFailed };
    }

    private toResult(publication: Publication, best: JudgedCandidate | null): MappingResult {
        if (!best) return noMatchResult(publication);

        const { minConfidence } = this.options.config.batch;
        const { grant } = best.candidate;

        if (confidenceRank(best.verdict.confidence) < confidenceRank(minConfidence)) {
            return noMatchResult(
                publication,
                `Best candidate "${grant.title}" (${grant.projectCode}) was rated ${best.verdict.confidence}, below the ${minConfidence} threshold: ${best.verdict.reasoning}`
            );
        }

        return {
            publicationKey: publication.key,
            publicationIndex: publication.index,
            associatedGrant: grant.title,
            grantIdentifier: grant.projectCode || null,
            confidenceLevel: best.verdict.confidence,
            reasoning: best.verdict.reasoning,
            recordedAt: new Date().toISOString(),
        };
    }

    /**
     * Write the final table, then drop the checkpoint and partial results.
     */
    private finalize(sink: ResultSink, progress: ProgressState): Extract<RunOutcome, { status: 'complete' }> {
        const logger = getLogger();
        const { publications, inputHeader, grants, checkpoint, store, config } = this.options;

        const rows = sink.finalize(publications);
        writeResultTable(rows, inputHeader, config.out, config.outputFormat);

        const summary = summarizeRun(rows, progress, grants.length);

        checkpoint.clear();
        store.clearResults();
        this.transition('COMPLETE');

        logger.info({ ...summary, outputPath: config.out }, 'Processing complete');
        return { status: 'complete', progress, summary, outputPath: config.out };
    }

    private transition(next: EngineState): void {
        getLogger().debug({ from: this.state, to: next }, 'Engine state change');
        this.state = next;
    }
}
