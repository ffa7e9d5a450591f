/**
 * Barrel export for all shared types.
 */
export type { Publication, Grant } from './publication.js';
export {
    CONFIDENCE_LEVELS,
    NO_CONFIDENCE,
    RESULT_COLUMNS,
    confidenceRank,
    isConfidenceLevel,
} from './mapping.js';
export type {
    ConfidenceLevel,
    ResultConfidence,
    InvestigatorMatch,
    CandidateGrant,
    Verdict,
    Assessment,
    MappingResult,
} from './mapping.js';
export type { EngineState, ProgressState, RunRecord, RunState } from './progress.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    GrantMapConfig,
    LogLevel,
    LlmProviderName,
    SelectionMode,
    OutputFormat,
    SelectionConfig,
    BatchConfig,
    LlmConfig,
    CacheConfig,
    GrantColumns,
    PublicationColumns,
    ColumnsConfig,
} from './config.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
