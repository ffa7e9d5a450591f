export interface TemporalOptions {
    /** Years after the grant end year still inside the window */
    graceYears?: number;
    /** Score at the far edge of the window */
    floor?: number;
}

/**
 * Temporal alignment of a publication year with a grant's validity window.
 *
 * Window = [start year, end year + graceYears]. Outside → 0. Inside, the score
 * decays linearly from 1.0 at the start year to `floor` at the window's far
 * edge. Unknown dates or year → 0.
 */
export function temporalScore(
    pubYear: number | null,
    grantStart: Date | null,
    grantEnd: Date | null,
    options: TemporalOptions = {}
): number {
    const { graceYears = 2, floor = 0.3 } = options;

    if (pubYear === null || !Number.isInteger(pubYear)) return 0;
    if (!isValidDate(grantStart) || !isValidDate(grantEnd)) return 0;

    const startYear = grantStart.getUTCFullYear();
    const windowEnd = grantEnd.getUTCFullYear() + graceYears;

    if (windowEnd < startYear) return 0;
    if (pubYear < startYear || pubYear > windowEnd) return 0;

    const span = windowEnd - startYear;
    if (span === 0) return 1.0;

    return 1.0 - ((1.0 - floor) * (pubYear - startYear)) / span;
}

function isValidDate(date: Date | null): date is Date {
    return date !== null && !isNaN(date.getTime());
}
