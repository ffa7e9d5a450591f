import { describe, it, expect } from 'vitest';
import { normalizeName, splitNameList } from '../matching/name-normalizer.js';
import { findInvestigatorMatches, matchInvestigators, namesMatch } from '../matching/investigator-matcher.js';
import { temporalScore } from '../matching/temporal-filter.js';
import { grantInvestigators, selectCandidates } from '../matching/candidate-selector.js';
import { makeGrant, makePublication, utc } from './fixtures.js';

// ─── Name Normalizer ──────────────────────────────────────

describe('normalizeName', () => {
    it('should drop titles and initials', () => {
        expect(normalizeName('Dr. Luke A. Downey')).toEqual(new Set(['luke', 'downey']));
    });

    it('should treat "Last, First" the same as "First Last"', () => {
        expect(normalizeName('Downey, Luke')).toEqual(normalizeName('Luke Downey'));
    });

    it('should strip diacritics and apostrophes', () => {
        expect(normalizeName("O'Brien, Seán")).toEqual(new Set(['obrien', 'sean']));
    });

    it('should drop post-nominals', () => {
        expect(normalizeName('Prof Jane Doe PhD')).toEqual(new Set(['jane', 'doe']));
    });

    it('should keep initials when nothing longer remains', () => {
        expect(normalizeName('J. K.')).toEqual(new Set(['j', 'k']));
    });

    it('should return an empty set for empty input', () => {
        expect(normalizeName('').size).toBe(0);
        expect(normalizeName('   ').size).toBe(0);
    });
});

describe('splitNameList', () => {
    it('should split on semicolons when present', () => {
        expect(splitNameList('Downey, Luke; Doe, Jane')).toEqual(['Downey, Luke', 'Doe, Jane']);
    });

    it('should split on commas otherwise', () => {
        expect(splitNameList('Luke Downey, Jane Doe ,')).toEqual(['Luke Downey', 'Jane Doe']);
    });

    it('should return nothing for an empty cell', () => {
        expect(splitNameList(null)).toEqual([]);
        expect(splitNameList('')).toEqual([]);
    });
});

// ─── Investigator Matcher ─────────────────────────────────

describe('investigator matching', () => {
    it('should match a name with a middle initial', () => {
        expect(matchInvestigators(['Luke A. Downey'], ['Luke Downey'])).toEqual(new Set(['Luke Downey']));
    });

    it('should return an empty set for unrelated names', () => {
        expect(matchInvestigators(['John Smith'], ['Jane Doe']).size).toBe(0);
    });

    it('should accept a single shared token when one side has only one', () => {
        expect(namesMatch(new Set(['luke', 'downey']), new Set(['downey']))).toBe(true);
    });

    it('should require the overlap ratio when both names have several tokens', () => {
        const a = new Set(['sarah', 'jane', 'smith']);
        const b = new Set(['sarah', 'jones', 'brown']);
        expect(namesMatch(a, b)).toBe(false);
        expect(namesMatch(a, b, 0.3)).toBe(true);
    });

    it('should never match an empty name', () => {
        expect(namesMatch(new Set(), new Set(['downey']))).toBe(false);
        expect(matchInvestigators([''], ['Luke Downey']).size).toBe(0);
    });

    it('should report each matching author/investigator pair', () => {
        const matches = findInvestigatorMatches(
            ['Jane Doe', 'Luke A. Downey', 'Someone Else'],
            ['Luke Downey', 'Jane Doe']
        );
        expect(matches).toEqual([
            { author: 'Jane Doe', investigator: 'Jane Doe' },
            { author: 'Luke A. Downey', investigator: 'Luke Downey' },
        ]);
    });
});

// ─── Temporal Filter ──────────────────────────────────────

describe('temporalScore', () => {
    const start = utc(2018);
    const end = utc(2020, 12, 31);

    it('should score 1.0 at the grant start year', () => {
        expect(temporalScore(2018, start, end)).toBe(1);
    });

    it('should decay linearly to the floor at the window edge', () => {
        expect(temporalScore(2020, start, end)).toBeCloseTo(0.65);
        expect(temporalScore(2022, start, end)).toBeCloseTo(0.3);
    });

    it('should include end year + grace and exclude the year after', () => {
        expect(temporalScore(2022, start, end)).toBeGreaterThan(0);
        expect(temporalScore(2023, start, end)).toBe(0);
    });

    it('should exclude years before the start', () => {
        expect(temporalScore(2017, start, end)).toBe(0);
    });

    it('should honour a custom grace period and floor', () => {
        expect(temporalScore(2021, start, end, { graceYears: 0 })).toBe(0);
        expect(temporalScore(2020, start, end, { graceYears: 0, floor: 0 })).toBe(0);
    });

    it('should score 1.0 when the window is a single year', () => {
        expect(temporalScore(2020, utc(2020), utc(2020, 6, 30), { graceYears: 0 })).toBe(1);
    });

    it('should return 0 for unknown year or dates', () => {
        expect(temporalScore(null, start, end)).toBe(0);
        expect(temporalScore(2019, null, end)).toBe(0);
        expect(temporalScore(2019, start, new Date('not a date'))).toBe(0);
    });

    it('should return 0 when the end precedes the start beyond the grace period', () => {
        expect(temporalScore(2020, utc(2020), utc(2017))).toBe(0);
    });
});

// ─── Candidate Selector ───────────────────────────────────

describe('selectCandidates', () => {
    const grants = [
        makeGrant({ projectCode: 'G0', primaryInvestigator: 'Jane Doe' }),
        makeGrant({ projectCode: 'G1', startDate: utc(2010), endDate: utc(2012) }),
        makeGrant({ projectCode: 'G2', startDate: utc(2019), endDate: utc(2021) }),
        makeGrant({ projectCode: 'G3', primaryInvestigator: 'John Smith', startDate: utc(2000), endDate: utc(2001) }),
    ];
    const publication = makePublication(0);

    it('should rank by temporal score weighted by investigator matches', () => {
        const candidates = selectCandidates(publication, grants, { maxCandidates: 5 });
        expect(candidates.map((c) => c.grant.projectCode)).toEqual(['G2', 'G0', 'G1']);
        expect(candidates[0]?.rankScore).toBe(2);
        expect(candidates[1]?.temporalScore).toBeCloseTo(0.825);
        expect(candidates[2]?.investigatorMatches).toEqual(['Luke Downey']);
    });

    it('should discard grants with neither signal', () => {
        const codes = selectCandidates(publication, grants, { maxCandidates: 5 }).map((c) => c.grant.projectCode);
        expect(codes).not.toContain('G3');
    });

    it('should cap the number of candidates', () => {
        const candidates = selectCandidates(publication, grants, { maxCandidates: 2 });
        expect(candidates.map((c) => c.grant.projectCode)).toEqual(['G2', 'G0']);
        expect(selectCandidates(publication, grants, { maxCandidates: 0 })).toEqual([]);
    });

    it('should require both signals in all-signals mode', () => {
        const candidates = selectCandidates(publication, grants, { maxCandidates: 5, mode: 'all-signals' });
        expect(candidates.map((c) => c.grant.projectCode)).toEqual(['G2']);
    });

    it('should break ties by grant order', () => {
        const twins = [makeGrant({ projectCode: 'A' }), makeGrant({ projectCode: 'B' })];
        const candidates = selectCandidates(publication, twins, { maxCandidates: 2 });
        expect(candidates.map((c) => c.grantIndex)).toEqual([0, 1]);
    });

    it('should list every named investigator, primary first', () => {
        const grant = makeGrant({ otherInvestigators: ['Jane Doe', ' '] });
        expect(grantInvestigators(grant)).toEqual(['Luke Downey', 'Jane Doe']);
    });
});
