import type { OutputFormat } from '../types/index.js';
import { RESULT_COLUMNS } from '../types/index.js';
import type { ResultRow } from '../output/result-sink.js';
import { toCsv } from '../io/csv.js';
import { writeFileAtomic } from '../utils/fs.js';
import { getLogger } from '../utils/logger.js';

/**
 * Output header: the input columns in their original order, then the
 * derived result columns (an input column with the same name is replaced).
 */
export function resultHeader(inputHeader: readonly string[]): string[] {
    const derived = new Set<string>(RESULT_COLUMNS);
    return [...inputHeader.filter((name) => !derived.has(name)), ...RESULT_COLUMNS];
}

/**
 * Write the final result table to `outputPath`, replacing any previous file atomically.
 */
export function writeResultTable(
    rows: readonly ResultRow[],
    inputHeader: readonly string[],
    outputPath: string,
    format: OutputFormat
): void {
    const header = resultHeader(inputHeader);

    let content: string;
    switch (format) {
        case 'json':
            content = exportJson(rows, header);
            break;
        case 'csv':
            content = toCsv(header, rows);
            break;
        default:
            throw new Error(`Unsupported output format: ${String(format)}`);
    }

    writeFileAtomic(outputPath, content);
    getLogger().info({ format, outputPath, rows: rows.length }, 'Result table written');
}

function exportJson(rows: readonly ResultRow[], header: readonly string[]): string {
    const ordered = rows.map((row) =>
        Object.fromEntries(header.map((name) => [name, row[name] ?? '']))
    );
    return `${JSON.stringify(ordered, null, 2)}\n`;
}
