import Database from 'better-sqlite3';
import type { MappingResult, ResultConfidence, RunRecord, RunState } from '../types/index.js';
import { NO_CONFIDENCE, isConfidenceLevel } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per engine invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  state TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Mapping results recorded since the last completed run
CREATE TABLE IF NOT EXISTS mapping_results (
  publication_key TEXT PRIMARY KEY,
  publication_index INTEGER NOT NULL,
  associated_grant TEXT,
  grant_identifier TEXT,
  confidence_level TEXT NOT NULL,
  reasoning TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_results_index ON mapping_results(publication_index);
`;

interface MappingResultRow {
    publication_key: string;
    publication_index: number;
    associated_grant: string | null;
    grant_identifier: string | null;
    confidence_level: string;
    reasoning: string;
    recorded_at: string;
}

/**
 * Durable store for partial mapping results and run history,
 * a thin wrapper around better-sqlite3 (WAL mode, user_version migrations).
 */
export class ResultStore {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');

        // Run migrations
        this.migrate();

        getLogger().debug({ dbPath }, 'Result store initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().debug('Result store migrated to v1');
        }
    }

    // ─── Mapping results ──────────────────────────────────────

    /**
     * Insert or replace the result for a publication. The latest write wins.
     */
    upsertResult(result: MappingResult): void {
        this.db.prepare(`
      INSERT INTO mapping_results (publication_key, publication_index, associated_grant, grant_identifier, confidence_level, reasoning, recorded_at)
      VALUES (@publication_key, @publication_index, @associated_grant, @grant_identifier, @confidence_level, @reasoning, @recorded_at)
      ON CONFLICT(publication_key) DO UPDATE SET
        publication_index = excluded.publication_index,
        associated_grant = excluded.associated_grant,
        grant_identifier = excluded.grant_identifier,
        confidence_level = excluded.confidence_level,
        reasoning = excluded.reasoning,
        recorded_at = excluded.recorded_at
    `).run({
            publication_key: result.publicationKey,
            publication_index: result.publicationIndex,
            associated_grant: result.associatedGrant,
            grant_identifier: result.grantIdentifier,
            confidence_level: result.confidenceLevel,
            reasoning: result.reasoning,
            recorded_at: result.recordedAt,
        });
    }

    getAllResults(): MappingResult[] {
        const rows = this.db
            .prepare('SELECT * FROM mapping_results ORDER BY publication_index')
            .all() as MappingResultRow[];
        return rows.map(toMappingResult);
    }

    getResultCount(): number {
        const row = this.db.prepare('SELECT COUNT(*) as count FROM mapping_results').get() as { count: number };
        return row.count;
    }

    /**
     * Drop all partial results (fresh start or after finalization).
     */
    clearResults(): void {
        this.db.prepare('DELETE FROM mapping_results').run();
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (started_at, finished_at, state, config_json, stats_json)
      VALUES (@started_at, @finished_at, @state, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    finishRun(runId: number, state: RunState, stats: object): void {
        this.db
            .prepare('UPDATE runs SET finished_at = ?, state = ?, stats_json = ? WHERE run_id = ?')
            .run(new Date().toISOString(), state, JSON.stringify(stats), runId);
    }

    getRecentRuns(limit = 10): RunRecord[] {
        return this.db
            .prepare('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?')
            .all(limit) as RunRecord[];
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Result store closed');
    }
}

function toMappingResult(row: MappingResultRow): MappingResult {
    return {
        publicationKey: row.publication_key,
        publicationIndex: row.publication_index,
        associatedGrant: row.associated_grant,
        grantIdentifier: row.grant_identifier,
        confidenceLevel: toResultConfidence(row.confidence_level),
        reasoning: row.reasoning,
        recordedAt: row.recorded_at,
    };
}

function toResultConfidence(value: string): ResultConfidence {
    return isConfidenceLevel(value) ? value : NO_CONFIDENCE;
}
