import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { ResultStore } from '../storage/database.js';
import { NO_CANDIDATE_REASONING, ResultSink, mergeResults, noMatchResult } from '../output/result-sink.js';
import { summarizeRun } from '../output/summary.js';
import { resultHeader, writeResultTable } from '../exporters/export.js';
import { freshProgress } from '../engine/checkpoint.js';
import type { MappingResult } from '../types/index.js';
import { makePublication, makeTmpDir } from './fixtures.js';

function result(index: number, overrides: Partial<MappingResult> = {}): MappingResult {
    return {
        publicationKey: `pub-${index}`,
        publicationIndex: index,
        associatedGrant: 'Cognitive effects of sleep loss',
        grantIdentifier: 'GNT-001',
        confidenceLevel: 'High',
        reasoning: 'Same topic.',
        recordedAt: '2024-01-01T00:00:00.000Z',
        ...overrides,
    };
}

// ─── ResultStore ──────────────────────────────────────────

describe('ResultStore', () => {
    let store: ResultStore;
    let dbPath: string;

    beforeEach(() => {
        dbPath = path.join(makeTmpDir(), 'results.db');
        store = new ResultStore(dbPath);
    });

    afterEach(() => {
        store.close();
    });

    it('should set PRAGMA user_version = 1', () => {
        const db = new Database(dbPath);
        try {
            expect(db.pragma('user_version', { simple: true })).toBe(1);
        } finally {
            db.close();
        }
    });

    it('should keep one row per publication, latest write winning', () => {
        store.upsertResult(result(0));
        store.upsertResult(result(0, { confidenceLevel: 'Low', reasoning: 'Revised.' }));

        expect(store.getResultCount()).toBe(1);
        expect(store.getAllResults()).toEqual([result(0, { confidenceLevel: 'Low', reasoning: 'Revised.' })]);
    });

    it('should return results in publication order', () => {
        store.upsertResult(result(2));
        store.upsertResult(result(0, { associatedGrant: null, grantIdentifier: null, confidenceLevel: 'None' }));
        store.upsertResult(result(1));

        expect(store.getAllResults().map((r) => r.publicationIndex)).toEqual([0, 1, 2]);
        expect(store.getAllResults()[0]?.associatedGrant).toBeNull();
    });

    it('should clear results', () => {
        store.upsertResult(result(0));
        store.clearResults();
        expect(store.getResultCount()).toBe(0);
        expect(store.getAllResults()).toEqual([]);
    });

    it('should record run history', () => {
        const runId = store.insertRun({
            started_at: '2024-01-01T00:00:00.000Z',
            finished_at: null,
            state: 'RUNNING',
            config_json: '{}',
            stats_json: '{}',
        });
        store.finishRun(runId, 'COMPLETE', { mapped: 2 });

        const [run] = store.getRecentRuns(1);
        expect(run?.run_id).toBe(runId);
        expect(run?.state).toBe('COMPLETE');
        expect(run?.finished_at).not.toBeNull();
        expect(JSON.parse(run?.stats_json ?? '{}')).toEqual({ mapped: 2 });
    });

    it('should persist results across connections', () => {
        const dbPath = path.join(makeTmpDir(), 'reopen.db');
        const first = new ResultStore(dbPath);
        first.upsertResult(result(0));
        first.close();

        const second = new ResultStore(dbPath);
        expect(second.getResultCount()).toBe(1);
        second.close();
    });
});

// ─── Result merging ───────────────────────────────────────

describe('mergeResults', () => {
    it('should keep the more recent result for a key', () => {
        const older = result(0, { confidenceLevel: 'Low', recordedAt: '2024-01-01T00:00:00.000Z' });
        const newer = result(0, { confidenceLevel: 'High', recordedAt: '2024-02-01T00:00:00.000Z' });

        expect(mergeResults([newer], [older]).get('pub-0')).toBe(newer);
        expect(mergeResults([older], [newer]).get('pub-0')).toBe(newer);
    });

    it('should favour the current result on equal timestamps', () => {
        const previous = result(0, { reasoning: 'previous' });
        const current = result(0, { reasoning: 'current' });
        expect(mergeResults([previous], [current]).get('pub-0')).toBe(current);
    });

    it('should keep every distinct key', () => {
        expect([...mergeResults([result(0)], [result(1)]).keys()]).toEqual(['pub-0', 'pub-1']);
    });
});

// ─── ResultSink ───────────────────────────────────────────

describe('ResultSink', () => {
    let store: ResultStore;

    beforeEach(() => {
        store = new ResultStore(path.join(makeTmpDir(), 'results.db'));
    });

    afterEach(() => {
        store.close();
    });

    it('should write each result through to the store', () => {
        const sink = new ResultSink(store);
        sink.record(result(0));
        expect(store.getResultCount()).toBe(1);
    });

    it('should combine earlier results with the current run in input order', () => {
        store.upsertResult(result(1, { reasoning: 'earlier run' }));
        const sink = new ResultSink(store);
        sink.record(result(0, { reasoning: 'this run' }));

        const publications = [makePublication(0), makePublication(1), makePublication(2)];
        const rows = sink.finalize(publications);

        expect(sink.carriedOver).toBe(1);
        expect(rows.map((r) => r['key'])).toEqual(['pub-0', 'pub-1', 'pub-2']);
        expect(rows[0]?.['Reasoning']).toBe('this run');
        expect(rows[1]?.['Reasoning']).toBe('earlier run');
        expect(rows[2]).toEqual({
            key: 'pub-2',
            title: 'Publication 2',
            'Associated Grant': '',
            'Grant identifier': '',
            'Confidence level': 'None',
            'Reasoning': NO_CANDIDATE_REASONING,
        });
    });

    it('should build explicit no-match results', () => {
        const noMatch = noMatchResult(makePublication(4), 'Below threshold');
        expect(noMatch).toMatchObject({
            publicationKey: 'pub-4',
            publicationIndex: 4,
            associatedGrant: null,
            grantIdentifier: null,
            confidenceLevel: 'None',
            reasoning: 'Below threshold',
        });
    });
});

// ─── Export ───────────────────────────────────────────────

describe('result table export', () => {
    const rows = [
        {
            key: 'pub-0',
            title: 'Sleep, memory',
            'Associated Grant': 'Cognitive effects of sleep loss',
            'Grant identifier': 'GNT-001',
            'Confidence level': 'High',
            'Reasoning': 'Same topic.',
        },
    ];

    it('should append the result columns after the input columns', () => {
        expect(resultHeader(['key', 'Reasoning', 'title'])).toEqual([
            'key',
            'title',
            'Associated Grant',
            'Grant identifier',
            'Confidence level',
            'Reasoning',
        ]);
    });

    it('should write CSV', () => {
        const out = path.join(makeTmpDir(), 'out', 'mapped.csv');
        writeResultTable(rows, ['key', 'title'], out, 'csv');

        expect(fs.readFileSync(out, 'utf-8')).toBe(
            'key,title,Associated Grant,Grant identifier,Confidence level,Reasoning\n' +
            'pub-0,"Sleep, memory",Cognitive effects of sleep loss,GNT-001,High,Same topic.\n'
        );
    });

    it('should write JSON with ordered keys', () => {
        const out = path.join(makeTmpDir(), 'mapped.json');
        writeResultTable(rows, ['key', 'title'], out, 'json');

        // Fixture rows are already in output column order
        expect(fs.readFileSync(out, 'utf-8')).toBe(`${JSON.stringify(rows, null, 2)}\n`);
    });
});

// ─── Summary ──────────────────────────────────────────────

describe('summarizeRun', () => {
    it('should report rates, distribution and calls saved', () => {
        const progress = {
            ...freshProgress([makePublication(0), makePublication(1)]),
            api_calls_made: 4,
            api_calls_failed: 1,
        };
        const rows = [
            { 'Associated Grant': 'G', 'Confidence level': 'High' },
            { 'Associated Grant': '', 'Confidence level': 'None' },
        ];

        expect(summarizeRun(rows, progress, 3)).toEqual({
            totalPublications: 2,
            mappedPublications: 1,
            mappingRate: 50,
            apiCallsMade: 4,
            apiCallsFailed: 1,
            apiSuccessRate: 75,
            confidenceDistribution: { 'Very High': 0, High: 1, Medium: 0, Low: 0, 'Very Low': 0, None: 1 },
            callsSaved: 2,
        });
    });
});
