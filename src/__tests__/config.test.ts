import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { ConfigError, mergeConfig, resolveConfig, validateConfig } from '../utils/config.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { makeTmpDir } from './fixtures.js';

const inputs = { grants: 'grants.csv', publications: 'pubs.csv' };

describe('mergeConfig', () => {
    it('should start from the defaults', () => {
        expect(mergeConfig(inputs)).toEqual({ ...DEFAULT_CONFIG, ...inputs });
    });

    it('should merge nested sections key by key, later layers winning', () => {
        const merged = mergeConfig(
            { selection: { maxCandidates: 5 }, llm: { model: 'file-model' } },
            null,
            { selection: { graceYears: 3 }, llm: { model: 'cli-model' } }
        );

        expect(merged.selection).toEqual({ ...DEFAULT_CONFIG.selection, maxCandidates: 5, graceYears: 3 });
        expect(merged.llm?.model).toBe('cli-model');
    });

    it('should ignore undefined values', () => {
        const merged = mergeConfig(
            { out: 'file.csv', batch: { interCallDelayMs: 10 } },
            { out: undefined, batch: { interCallDelayMs: undefined, autoResume: true } }
        );

        expect(merged.out).toBe('file.csv');
        expect(merged.batch).toEqual({ ...DEFAULT_CONFIG.batch, interCallDelayMs: 10, autoResume: true });
    });

    it('should merge column mappings', () => {
        const merged = mergeConfig({ columns: { publications: { key: 'id' } } });
        expect(merged.columns?.publications).toEqual({ ...DEFAULT_CONFIG.columns.publications, key: 'id' });
        expect(merged.columns?.grants).toEqual(DEFAULT_CONFIG.columns.grants);
    });
});

describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
        expect(validateConfig(mergeConfig(inputs)).selection.maxCandidates).toBe(2);
    });

    it('should list every problem', () => {
        try {
            validateConfig(mergeConfig({ selection: { maxCandidates: 0 }, llm: { baseUrl: 'not a url' } }));
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                const fields = error.issues.map((issue) => issue.split(':')[0]);
                expect(fields).toEqual(['grants', 'publications', 'selection.maxCandidates', 'llm.baseUrl']);
                expect(error.message).toMatch(/^Invalid configuration:\n {2}- grants: /);
            }
        }
    });

    it('should reject a zero batch size', () => {
        expect(() => validateConfig(mergeConfig(inputs, { batch: { batchSize: 0 } }))).toThrow(ConfigError);
    });

    it('should reject a zero temporal floor', () => {
        expect(() => validateConfig(mergeConfig(inputs, { selection: { temporalFloor: 0 } }))).toThrow(ConfigError);
        expect(validateConfig(mergeConfig(inputs, { selection: { temporalFloor: 0.01 } })).selection.temporalFloor).toBe(0.01);
    });

    it('should accept a publication limit and the demo provider', () => {
        const config = validateConfig(mergeConfig(inputs, { batch: { limit: 25 }, llm: { provider: 'demo' } }));
        expect(config.batch.limit).toBe(25);
        expect(config.llm.provider).toBe('demo');
        expect(() => validateConfig(mergeConfig(inputs, { batch: { limit: 0 } }))).toThrow(ConfigError);
    });
});

describe('resolveConfig', () => {
    it('should layer file < env < CLI', async () => {
        const dir = makeTmpDir();
        fs.writeFileSync(
            path.join(dir, 'grantmap.config.json'),
            JSON.stringify({ selection: { maxCandidates: 4, graceYears: 5 }, llm: { model: 'file-model' }, workDir: 'file-work' })
        );

        const config = await resolveConfig(
            { ...inputs, selection: { graceYears: 1 } },
            { searchFrom: dir, env: { GRANTMAP_LLM_MODEL: 'env-model', GRANTMAP_WORK_DIR: 'env-work' } }
        );

        expect(config.selection.maxCandidates).toBe(4);
        expect(config.selection.graceYears).toBe(1);
        expect(config.llm.model).toBe('env-model');
        expect(config.workDir).toBe('env-work');
    });

    it('should use defaults when there is no config file', async () => {
        const config = await resolveConfig(inputs, { searchFrom: makeTmpDir(), env: {} });
        expect(config).toEqual({ ...DEFAULT_CONFIG, ...inputs });
    });
});
