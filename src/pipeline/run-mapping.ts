import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import type { GrantMapConfig, LlmProvider } from '../types/index.js';
import { loadGrants, loadPublications } from '../io/loaders.js';
import { ResultStore } from '../storage/database.js';
import { ResponseCache } from '../cache/response-cache.js';
import { RelevanceAssessor } from '../assessment/relevance-assessor.js';
import { createProvider } from '../assessment/providers/index.js';
import { CheckpointStore } from '../engine/checkpoint.js';
import { BatchEngine, type RunOutcome } from '../engine/batch-engine.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { sleep as defaultSleep } from '../utils/time.js';

/**
 * Files kept in the work directory between invocations.
 */
export interface WorkPaths {
    checkpoint: string;
    database: string;
    cache: string;
}

export function workPaths(workDir: string): WorkPaths {
    return {
        checkpoint: join(workDir, 'checkpoint.json'),
        database: join(workDir, 'results.db'),
        cache: join(workDir, 'cache'),
    };
}

export interface RunMappingDeps {
    /** Judgment provider; built from `config.llm` when omitted */
    provider?: LlmProvider;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Load inputs, wire the engine and run it.
 *
 * With `batch.autoResume`, a rate-limit halt is followed by a wait of
 * `batch.retryDelayMs` (or the server's Retry-After, if longer) and a fresh
 * engine invocation, up to `batch.maxResumes` times. With `batch.limit`, only
 * the first publications are loaded into the engine, and the checkpoint is
 * tied to that sample.
 */
export async function runMapping(config: GrantMapConfig, deps: RunMappingDeps = {}): Promise<RunOutcome> {
    const logger = getLogger();
    const sleep = deps.sleep ?? defaultSleep;
    const paths = workPaths(config.workDir);

    const loaded = loadPublications(config.publications, config.columns.publications);
    const { header } = loaded;
    const { limit } = config.batch;
    const publications = limit === undefined ? loaded.publications : loaded.publications.slice(0, limit);
    if (publications.length < loaded.publications.length) {
        logger.info({ limit, available: loaded.publications.length }, 'Processing a leading sample of publications');
    }
    const grants = loadGrants(config.grants, config.columns.grants);

    mkdirSync(config.workDir, { recursive: true });

    let http: HttpClient | null = null;
    let provider = deps.provider;
    if (!provider) {
        http = createHttpClient({ timeout: config.llm.timeoutMs, maxRetries: config.llm.maxRetries });
        provider = createProvider(config.llm, http);
    }
    if (!(await provider.isAvailable())) {
        logger.warn({ provider: provider.name }, 'Judgment provider does not look available; every call may fail');
    }

    const cache = new ResponseCache({
        cacheDir: paths.cache,
        ttlHours: config.cache.ttlHours,
        enabled: config.cache.enabled,
    });
    const assessor = new RelevanceAssessor(provider, {
        temperature: config.llm.temperature,
        maxTokens: config.llm.maxTokens,
        cache,
    });

    const store = new ResultStore(paths.database);
    const checkpoint = new CheckpointStore(paths.checkpoint);

    try {
        const invoke = () =>
            new BatchEngine({
                publications,
                inputHeader: header,
                grants,
                assessor,
                checkpoint,
                store,
                config,
                sleep,
            }).run();

        let outcome = await invoke();

        for (let resumes = 0; outcome.status === 'halted' && config.batch.autoResume && resumes < config.batch.maxResumes; resumes++) {
            const waitMs = Math.max(config.batch.retryDelayMs, outcome.retryAfterMs ?? 0);
            logger.info({ waitMs, attempt: resumes + 1, maxResumes: config.batch.maxResumes }, 'Waiting before resuming');
            await sleep(waitMs);
            outcome = await invoke();
        }

        return outcome;
    } finally {
        store.close();
        if (http) {
            logger.info({ provider: provider.name, requests: http.getAllRequestCounts() }, 'Judgment service requests');
        }
    }
}
