import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Grant, Publication } from '../types/index.js';

export function utc(year: number, month = 1, day = 1): Date {
    return new Date(Date.UTC(year, month - 1, day));
}

export function makePublication(index: number, overrides: Partial<Publication> = {}): Publication {
    const key = overrides.key ?? `pub-${index}`;
    const title = overrides.title ?? `Publication ${index}`;
    return {
        key,
        index,
        title,
        year: 2019,
        authors: ['Luke A. Downey'],
        doi: null,
        type: 'article',
        row: { key, title },
        ...overrides,
    };
}

export function makeGrant(overrides: Partial<Grant> = {}): Grant {
    return {
        title: 'Cognitive effects of sleep loss',
        primaryInvestigator: 'Luke Downey',
        otherInvestigators: [],
        startDate: utc(2018),
        endDate: utc(2020, 12, 31),
        projectCode: 'GNT-001',
        description: null,
        ...overrides,
    };
}

export function makeTmpDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'grantmap-test-'));
}
