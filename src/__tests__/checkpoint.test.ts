import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
    CheckpointError,
    CheckpointStore,
    InputMismatchError,
    assertSameInput,
    fingerprintPublications,
    freshProgress,
} from '../engine/checkpoint.js';
import { makePublication, makeTmpDir } from './fixtures.js';

const publications = [makePublication(0), makePublication(1), makePublication(2)];

describe('CheckpointStore', () => {
    let store: CheckpointStore;

    beforeEach(() => {
        store = new CheckpointStore(path.join(makeTmpDir(), 'state', 'checkpoint.json'));
    });

    it('should return null when no checkpoint exists', () => {
        expect(store.exists()).toBe(false);
        expect(store.load()).toBeNull();
    });

    it('should round-trip progress', () => {
        const progress = { ...freshProgress(publications), last_processed_index: 1, processed_count: 2, api_calls_made: 3 };
        store.save(progress);

        expect(store.exists()).toBe(true);
        expect(store.load()).toEqual(progress);
    });

    it('should leave no temp file behind', () => {
        store.save(freshProgress(publications));
        expect(fs.readdirSync(path.dirname(store.path))).toEqual(['checkpoint.json']);
    });

    it('should delete the checkpoint on clear', () => {
        store.save(freshProgress(publications));
        store.clear();
        expect(store.exists()).toBe(false);
        // Clearing twice is harmless
        store.clear();
    });

    it('should reject a checkpoint that is not JSON', () => {
        fs.mkdirSync(path.dirname(store.path), { recursive: true });
        fs.writeFileSync(store.path, '{"total_publications": 3,');
        expect(() => store.load()).toThrow(CheckpointError);
    });

    it('should reject a checkpoint with missing fields', () => {
        fs.mkdirSync(path.dirname(store.path), { recursive: true });
        fs.writeFileSync(store.path, JSON.stringify({ total_publications: 3, processed_count: 1 }));
        expect(() => store.load()).toThrow(/invalid fields: .*last_processed_index/);
    });

    it('should reject an index beyond the total', () => {
        store.save({ ...freshProgress(publications), last_processed_index: 3 });
        expect(() => store.load()).toThrow('Checkpoint index is beyond the recorded total');
    });
});

describe('freshProgress', () => {
    it('should start before the first publication with zero counters', () => {
        const progress = freshProgress(publications);
        expect(progress).toMatchObject({
            total_publications: 3,
            processed_count: 0,
            mapped_count: 0,
            last_processed_index: -1,
            api_calls_made: 0,
            api_calls_failed: 0,
        });
        expect(progress.input_fingerprint).toBe(fingerprintPublications(publications));
    });
});

describe('assertSameInput', () => {
    const progress = freshProgress(publications);

    it('should accept the same publication list', () => {
        expect(() => assertSameInput(progress, publications.map((p) => ({ ...p })))).not.toThrow();
    });

    it('should reject a different publication count', () => {
        expect(() => assertSameInput(progress, publications.slice(0, 2))).toThrow(InputMismatchError);
    });

    it('should reject reordered keys', () => {
        const reordered = [publications[1], publications[0], publications[2]].flatMap((p) => (p ? [p] : []));
        expect(() => assertSameInput(progress, reordered)).toThrow(/different publication list/);
    });

    it('should report expected and actual totals', () => {
        try {
            assertSameInput(progress, publications.slice(0, 1));
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InputMismatchError);
            if (error instanceof InputMismatchError) {
                expect(error.expected.total).toBe(3);
                expect(error.actual.total).toBe(1);
            }
        }
    });
});
