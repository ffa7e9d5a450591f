#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import { resolveConfig, ConfigError, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { runMapping, workPaths } from '../pipeline/run-mapping.js';
import { CheckpointStore, CheckpointError, InputMismatchError } from '../engine/checkpoint.js';
import { ResultStore } from '../storage/database.js';
import { ResponseCache } from '../cache/response-cache.js';
import { InputError } from '../io/loaders.js';
import { parseConfidence } from '../assessment/relevance-assessor.js';
import { DEFAULT_CONFIG, type LogLevel, type LlmProviderName, type OutputFormat, type SelectionMode } from '../types/index.js';

const VERSION = '1.0.0';

/** Exit code when a checkpoint belongs to a different input. */
const EXIT_INPUT_MISMATCH = 2;

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
    return parsed;
}

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) throw new InvalidArgumentError('Not a number.');
    return parsed;
}

function parseLevel(value: string): string {
    const level = parseConfidence(value);
    if (!level) throw new InvalidArgumentError('Expected Very High | High | Medium | Low | Very Low.');
    return level;
}

interface RunOptions {
    grants: string;
    publications: string;
    out?: string;
    format?: OutputFormat;
    workDir?: string;
    maxCandidates?: number;
    graceYears?: number;
    minOverlap?: number;
    mode?: SelectionMode;
    delay?: number;
    retryWait?: number;
    autoResume?: boolean;
    maxResumes?: number;
    limit?: number;
    minConfidence?: string;
    provider?: LlmProviderName;
    model?: string;
    baseUrl?: string;
    timeout?: number;
    cache: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

const program = new Command();

program
    .name('grantmap')
    .description('Link research publications to the grants that funded them.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Map publications to grants, resuming from the checkpoint if one exists')
    .requiredOption('-g, --grants <path>', 'Grants CSV')
    .requiredOption('-p, --publications <path>', 'Publications CSV')
    .option('-o, --out <path>', 'Output table path')
    .option('-f, --format <format>', 'Output format: csv | json')
    .option('-w, --work-dir <dir>', 'Directory for checkpoint, partial results and cache')
    .option('-c, --max-candidates <n>', 'Maximum grants assessed per publication', parseInteger)
    .option('--grace-years <n>', 'Years after grant end still in the window', parseInteger)
    .option('--min-overlap <ratio>', 'Share of name tokens that must match (0-1]', parseNumber)
    .option('--mode <mode>', 'Candidate filter: any-signal | all-signals')
    .option('--delay <ms>', 'Pause between publications', parseInteger)
    .option('--retry-wait <ms>', 'Wait before resuming after a rate limit', parseInteger)
    .option('--auto-resume', 'Wait and resume automatically after a rate limit')
    .option('--max-resumes <n>', 'Automatic resumes before giving up', parseInteger)
    .option('-n, --limit <n>', 'Process only the first n publications', parseInteger)
    .option('--min-confidence <level>', 'Lowest confidence that still associates a grant', parseLevel)
    .option('--provider <provider>', 'Judgment backend: openai | ollama | demo (offline keyword heuristic)')
    .option('--model <model>', 'Model name')
    .option('--base-url <url>', 'Judgment service base URL')
    .option('--timeout <ms>', 'Per-call timeout', parseInteger)
    .option('--no-cache', 'Disable the verdict cache')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        const cliConfig: ConfigOverrides = {
            grants: opts.grants,
            publications: opts.publications,
            out: opts.out,
            outputFormat: opts.format,
            workDir: opts.workDir,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
            selection: {
                maxCandidates: opts.maxCandidates,
                graceYears: opts.graceYears,
                minOverlapRatio: opts.minOverlap,
                mode: opts.mode,
            },
            batch: {
                interCallDelayMs: opts.delay,
                retryDelayMs: opts.retryWait,
                autoResume: opts.autoResume,
                maxResumes: opts.maxResumes,
                limit: opts.limit,
                minConfidence: opts.minConfidence ? parseConfidence(opts.minConfidence) ?? undefined : undefined,
            },
            llm: {
                provider: opts.provider,
                model: opts.model,
                baseUrl: opts.baseUrl,
                timeoutMs: opts.timeout,
            },
            cache: opts.cache ? undefined : { enabled: false },
        };

        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const outcome = await runMapping(config);
            if (outcome.status === 'halted') {
                const waitSeconds = Math.ceil(Math.max(config.batch.retryDelayMs, outcome.retryAfterMs ?? 0) / 1000);
                getLogger().info(
                    { nextIndex: outcome.progress.last_processed_index + 1, total: outcome.progress.total_publications },
                    `Halted on rate limit. Wait ~${waitSeconds}s and run the same command again to resume`
                );
            } else {
                getLogger().info({ outputPath: outcome.outputPath }, 'Mapping complete!');
            }
        } catch (error) {
            if (error instanceof InputMismatchError) {
                getLogger().error(
                    { expected: error.expected, actual: error.actual },
                    `${error.message}. Restore the original input or run \`grantmap reset\` to start over`
                );
                process.exit(EXIT_INPUT_MISMATCH);
            }
            if (error instanceof ConfigError || error instanceof InputError || error instanceof CheckpointError) {
                getLogger().error(error.message);
                process.exit(1);
            }
            getLogger().error({ error }, 'Run failed');
            process.exit(1);
        }
    });

// ─── STATUS command ───────────────────────────────────────

program
    .command('status')
    .description('Show checkpoint progress and recent runs')
    .option('-w, --work-dir <dir>', 'Work directory', DEFAULT_CONFIG.workDir)
    .action((opts: { workDir: string }) => {
        const paths = workPaths(opts.workDir);

        try {
            const progress = new CheckpointStore(paths.checkpoint).load();

            console.log('\n📊 grantmap status\n');
            if (progress) {
                console.log(`  Processed:    ${progress.processed_count}/${progress.total_publications}`);
                console.log(`  Mapped:       ${progress.mapped_count}`);
                console.log(`  Next index:   ${progress.last_processed_index + 1}`);
                console.log(`  API calls:    ${progress.api_calls_made} (${progress.api_calls_failed} failed)`);
                console.log(`  Last update:  ${progress.timestamp}`);
            } else {
                console.log('  No checkpoint: the last run completed or none has started.');
            }

            if (existsSync(paths.database)) {
                const store = new ResultStore(paths.database);
                const runs = store.getRecentRuns(5);
                store.close();

                if (runs.length > 0) {
                    console.log('\n  Recent runs:');
                    for (const run of runs) {
                        console.log(`    #${run.run_id} ${run.started_at} ${run.state}`);
                    }
                }
            }

            console.log('');
        } catch (error) {
            console.error('Status failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// ─── RESET command ────────────────────────────────────────

program
    .command('reset')
    .description('Discard the checkpoint and partial results so the next run starts fresh')
    .option('-w, --work-dir <dir>', 'Work directory', DEFAULT_CONFIG.workDir)
    .action((opts: { workDir: string }) => {
        const paths = workPaths(opts.workDir);

        try {
            new CheckpointStore(paths.checkpoint).clear();
            if (existsSync(paths.database)) {
                const store = new ResultStore(paths.database);
                store.clearResults();
                store.close();
            }
            console.log('Checkpoint and partial results cleared.');
        } catch (error) {
            console.error('Reset failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the verdict cache')
    .argument('<action>', 'Action: clear | stats')
    .option('-w, --work-dir <dir>', 'Work directory', DEFAULT_CONFIG.workDir)
    .action((action: string, opts: { workDir: string }) => {
        const cache = new ResponseCache({ cacheDir: workPaths(opts.workDir).cache, enabled: false });

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB (${stats.directory})`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

await program.parseAsync();
