import type { ConfidenceLevel } from './mapping.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Judgment backend.
 */
export type LlmProviderName = 'openai' | 'ollama' | 'demo';

/**
 * Candidate filtering mode.
 * - any-signal: keep a grant with an investigator match OR a temporal overlap
 * - all-signals: require both
 */
export type SelectionMode = 'any-signal' | 'all-signals';

export type OutputFormat = 'csv' | 'json';

/**
 * Pre-filtering configuration.
 */
export interface SelectionConfig {
    /** Maximum candidates sent to the judgment service per publication */
    maxCandidates: number;
    /** Years after the grant end date still inside the window */
    graceYears: number;
    /** Temporal score at the far edge of the window, in (0, 1] */
    temporalFloor: number;
    /** Share of the shorter name's tokens that must be shared */
    minOverlapRatio: number;
    mode: SelectionMode;
}

/**
 * Batch engine configuration.
 */
export interface BatchConfig {
    /** Publications per progress report */
    batchSize: number;
    /** Pause between publications (ms) */
    interCallDelayMs: number;
    /** Wait before re-invoking after a rate-limit halt (ms) */
    retryDelayMs: number;
    /** Re-invoke automatically after a halt */
    autoResume: boolean;
    maxResumes: number;
    /** Process only the first N publications */
    limit?: number;
    /** Lowest verdict that still associates a grant */
    minConfidence: ConfidenceLevel;
}

/**
 * Judgment service configuration.
 */
export interface LlmConfig {
    provider: LlmProviderName;
    model: string;
    baseUrl?: string;
    /** Name of the environment variable holding the API key */
    apiKeyEnv: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    /** Retries for 5xx / socket errors (429 is never retried) */
    maxRetries: number;
}

export interface CacheConfig {
    enabled: boolean;
    ttlHours: number;
}

/**
 * Column names in the grants table.
 */
export interface GrantColumns {
    title: string;
    primaryInvestigator: string;
    otherInvestigators: string;
    startDate: string;
    endDate: string;
    projectCode: string;
    description: string;
}

/**
 * Column names in the publications table.
 */
export interface PublicationColumns {
    title: string;
    year: string;
    authors: string;
    doi: string;
    type: string;
    key: string;
}

export interface ColumnsConfig {
    grants: GrantColumns;
    publications: PublicationColumns;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface GrantMapConfig {
    // Input
    grants: string;
    publications: string;

    // Output
    out: string;
    outputFormat: OutputFormat;

    /** Holds checkpoint.json, results.db and the response cache */
    workDir: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    selection: SelectionConfig;
    batch: BatchConfig;
    llm: LlmConfig;
    cache: CacheConfig;
    columns: ColumnsConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<GrantMapConfig, 'grants' | 'publications'> = {
    out: './mapped_publications.csv',
    outputFormat: 'csv',
    workDir: '.grantmap',
    logLevel: 'info',
    jsonLogs: false,
    selection: {
        maxCandidates: 2,
        graceYears: 2,
        temporalFloor: 0.3,
        minOverlapRatio: 0.5,
        mode: 'any-signal',
    },
    batch: {
        batchSize: 20,
        interCallDelayMs: 2000,
        retryDelayMs: 60000,
        autoResume: false,
        maxResumes: 10,
        minConfidence: 'Very Low',
    },
    llm: {
        provider: 'openai',
        model: 'gpt-4o-mini',
        apiKeyEnv: 'OPENAI_API_KEY',
        temperature: 0.1,
        maxTokens: 300,
        timeoutMs: 30000,
        maxRetries: 2,
    },
    cache: {
        enabled: true,
        ttlHours: 24 * 30,
    },
    columns: {
        grants: {
            title: 'TITLE',
            primaryInvestigator: 'Preferred Full Name',
            otherInvestigators: 'Other Investigators',
            startDate: 'Start Date',
            endDate: 'End Date',
            projectCode: 'Project Code',
            description: 'Project Description',
        },
        publications: {
            title: 'title',
            year: 'publication_year',
            authors: 'authors_list',
            doi: 'doi',
            type: 'type',
            key: 'key',
        },
    },
};
