import { readFileSync } from 'node:fs';
import type { Grant, GrantColumns, Publication, PublicationColumns } from '../types/index.js';
import { splitNameList } from '../matching/name-normalizer.js';
import { getLogger } from '../utils/logger.js';
import { parseCsv, type CsvTable } from './csv.js';

/**
 * An input table cannot be read or lacks required columns.
 */
export class InputError extends Error {
    constructor(message: string, public readonly path: string) {
        super(message);
        this.name = 'InputError';
    }
}

function readTable(path: string): CsvTable {
    let text: string;
    try {
        text = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new InputError(
            `Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }
    return parseCsv(text);
}

function requireColumns(table: CsvTable, columns: string[], path: string): void {
    const missing = columns.filter((column) => !table.header.includes(column));
    if (missing.length > 0) {
        throw new InputError(`Missing column(s) in ${path}: ${missing.join(', ')}`, path);
    }
}

function optional(value: string | undefined): string | null {
    const trimmed = value?.trim() ?? '';
    return trimmed.length > 0 ? trimmed : null;
}

/**
 * Parse a publication year from "2019", "2019.0" or a date such as "2019-05-01".
 */
export function parseYear(value: string | undefined): number | null {
    const match = /\b(\d{4})\b/.exec(value ?? '');
    return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Parse a grant date: ISO ("2018-03-01", "2018/03/01", "2018-03-01T00:00:00"),
 * "DD/MM/YYYY" with an optional time, or "MM/DD/YYYY" when only that reading
 * is valid. Other text carrying a four-digit year ("31-Dec-2020") becomes
 * January 1st of that year. Returns a UTC date, or null when unparseable.
 */
export function parseDate(value: string | undefined): Date | null {
    const text = value?.trim() ?? '';
    if (!text) return null;

    const iso = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:$|[T ])/.exec(text);
    if (iso) return utcDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

    const slashed = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:$|[T ])/.exec(text);
    if (slashed) {
        const first = Number(slashed[1]);
        const second = Number(slashed[2]);
        const monthFirst = first <= 12 && second > 12;
        return monthFirst
            ? utcDate(Number(slashed[3]), first, second)
            : utcDate(Number(slashed[3]), second, first);
    }

    const year = parseYear(text);
    return year === null ? null : utcDate(year, 1, 1);
}

function utcDate(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;
    const date = new Date(Date.UTC(year, month - 1, day));
    return isNaN(date.getTime()) ? null : date;
}

/**
 * Publications plus the original header, in file order.
 */
export interface PublicationTable {
    header: string[];
    publications: Publication[];
}

/**
 * Load the publications table.
 * The key column is optional; without it, publications are keyed by position.
 */
export function loadPublications(path: string, columns: PublicationColumns): PublicationTable {
    const table = readTable(path);
    requireColumns(table, [columns.title, columns.year, columns.authors], path);

    const hasKey = table.header.includes(columns.key);
    const seen = new Set<string>();

    const publications = table.rows.map((row, index): Publication => {
        const key = (hasKey ? optional(row[columns.key]) : null) ?? `row-${index}`;
        if (seen.has(key)) {
            throw new InputError(`Duplicate publication key "${key}" at row ${index + 2}`, path);
        }
        seen.add(key);

        return {
            key,
            index,
            title: row[columns.title]?.trim() ?? '',
            year: parseYear(row[columns.year]),
            authors: splitNameList(row[columns.authors]),
            doi: optional(row[columns.doi]),
            type: optional(row[columns.type]),
            row,
        };
    });

    getLogger().info({ path, count: publications.length, keyed: hasKey }, 'Loaded publications');
    return { header: table.header, publications };
}

/**
 * Load the grants table.
 */
export function loadGrants(path: string, columns: GrantColumns): Grant[] {
    const table = readTable(path);
    requireColumns(
        table,
        [columns.title, columns.primaryInvestigator, columns.startDate, columns.endDate, columns.projectCode],
        path
    );

    const grants = table.rows.map((row): Grant => ({
        title: row[columns.title]?.trim() ?? '',
        primaryInvestigator: row[columns.primaryInvestigator]?.trim() ?? '',
        otherInvestigators: splitNameList(row[columns.otherInvestigators]),
        startDate: parseDate(row[columns.startDate]),
        endDate: parseDate(row[columns.endDate]),
        projectCode: row[columns.projectCode]?.trim() ?? '',
        description: optional(row[columns.description]),
    }));

    const undated = grants.filter((g) => !g.startDate || !g.endDate).length;
    if (undated > 0) {
        getLogger().warn({ path, undated }, 'Grants with missing or unparseable dates never pass the temporal filter');
    }
    getLogger().info({ path, count: grants.length }, 'Loaded grants');
    return grants;
}
