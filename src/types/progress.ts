/**
 * Engine lifecycle states.
 */
export type EngineState = 'FRESH' | 'RUNNING' | 'HALTED_RATE_LIMIT' | 'COMPLETE';

/**
 * State recorded for a run; FAILED marks an invocation that ended in an error.
 */
export type RunState = Exclude<EngineState, 'FRESH'> | 'FAILED';

/**
 * Checkpoint record persisted after every publication.
 * Field names match the on-disk JSON.
 */
export interface ProgressState {
    total_publications: number;
    processed_count: number;
    mapped_count: number;
    /** Last publication whose result is durably recorded; -1 before the first */
    last_processed_index: number;
    api_calls_made: number;
    api_calls_failed: number;
    /** ISO timestamp of the last write */
    timestamp: string;
    /** SHA-256 over the ordered publication keys */
    input_fingerprint: string;
}

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    started_at: string;
    finished_at: string | null;
    state: RunState;
    config_json: string;
    stats_json: string;
}
