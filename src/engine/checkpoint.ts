import { existsSync, readFileSync, rmSync } from 'node:fs';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { ProgressState, Publication } from '../types/index.js';
import { writeFileAtomic } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';

const ProgressStateSchema = z.object({
    total_publications: z.number().int().min(0),
    processed_count: z.number().int().min(0),
    mapped_count: z.number().int().min(0),
    last_processed_index: z.number().int().min(-1),
    api_calls_made: z.number().int().min(0),
    api_calls_failed: z.number().int().min(0),
    timestamp: z.string(),
    input_fingerprint: z.string(),
});

/**
 * The checkpoint file exists but cannot be trusted.
 */
export class CheckpointError extends Error {
    constructor(message: string, public readonly path: string) {
        super(message);
        this.name = 'CheckpointError';
    }
}

/**
 * The input changed since the checkpoint was written; resuming would
 * attribute recorded results to the wrong publications.
 */
export class InputMismatchError extends Error {
    constructor(
        message: string,
        public readonly expected: { total: number; fingerprint: string },
        public readonly actual: { total: number; fingerprint: string }
    ) {
        super(message);
        this.name = 'InputMismatchError';
    }
}

/**
 * SHA-256 over the ordered publication keys.
 */
export function fingerprintPublications(publications: readonly Publication[]): string {
    const hash = createHash('sha256');
    for (const publication of publications) {
        hash.update(publication.key);
        hash.update('\n');
    }
    return hash.digest('hex');
}

/**
 * Initial progress for a fresh run.
 */
export function freshProgress(publications: readonly Publication[]): ProgressState {
    return {
        total_publications: publications.length,
        processed_count: 0,
        mapped_count: 0,
        last_processed_index: -1,
        api_calls_made: 0,
        api_calls_failed: 0,
        timestamp: new Date().toISOString(),
        input_fingerprint: fingerprintPublications(publications),
    };
}

/**
 * Refuse to resume when the checkpoint was written for another input.
 */
export function assertSameInput(progress: ProgressState, publications: readonly Publication[]): void {
    const fingerprint = fingerprintPublications(publications);
    const expected = { total: progress.total_publications, fingerprint: progress.input_fingerprint };
    const actual = { total: publications.length, fingerprint };

    if (progress.total_publications !== publications.length) {
        throw new InputMismatchError(
            `Checkpoint was written for ${progress.total_publications} publications but the input has ${publications.length}`,
            expected,
            actual
        );
    }
    if (progress.input_fingerprint !== fingerprint) {
        throw new InputMismatchError(
            'Checkpoint was written for a different publication list (keys or order changed)',
            expected,
            actual
        );
    }
}

/**
 * JSON checkpoint file holding the ProgressState.
 * Written atomically after every publication; deleted when a run completes.
 */
export class CheckpointStore {
    constructor(public readonly path: string) {}

    exists(): boolean {
        return existsSync(this.path);
    }

    /**
     * Load the checkpoint, or null when none exists.
     * A corrupt checkpoint is an error, not a fresh start.
     */
    load(): ProgressState | null {
        if (!this.exists()) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(readFileSync(this.path, 'utf-8'));
        } catch (error) {
            throw new CheckpointError(
                `Checkpoint is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
                this.path
            );
        }

        const result = ProgressStateSchema.safeParse(raw);
        if (!result.success) {
            const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
            throw new CheckpointError(`Checkpoint has invalid fields: ${fields}`, this.path);
        }

        const progress = result.data;
        if (progress.last_processed_index >= progress.total_publications) {
            throw new CheckpointError('Checkpoint index is beyond the recorded total', this.path);
        }

        getLogger().debug({ path: this.path, progress }, 'Checkpoint loaded');
        return progress;
    }

    save(progress: ProgressState): void {
        writeFileAtomic(this.path, `${JSON.stringify(progress, null, 2)}\n`);
    }

    clear(): void {
        rmSync(this.path, { force: true });
    }
}
