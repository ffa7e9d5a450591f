/**
 * Parsed CSV table: header row plus data rows keyed by header.
 */
export interface CsvTable {
    header: string[];
    rows: Array<Record<string, string>>;
}

/**
 * Parse CSV text (RFC 4180): quoted fields, doubled quotes, embedded newlines,
 * CRLF or LF line endings, optional UTF-8 BOM. Blank lines are skipped.
 */
export function parseCsv(text: string): CsvTable {
    const records = parseRecords(text.replace(/^\uFEFF/, ''));
    const [headerRecord, ...dataRecords] = records;
    if (!headerRecord) return { header: [], rows: [] };

    const header = headerRecord.map((name) => name.trim());
    const rows = dataRecords.map((record) => {
        const row: Record<string, string> = {};
        header.forEach((name, i) => {
            row[name] = record[i] ?? '';
        });
        return row;
    });

    return { header, rows };
}

function parseRecords(text: string): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let inQuotes = false;
    let fieldStarted = false;

    const endField = () => {
        record.push(field);
        field = '';
        fieldStarted = false;
    };
    const endRecord = () => {
        endField();
        // A lone empty field is a blank line
        if (record.length > 1 || record[0] !== '') records.push(record);
        record = [];
    };

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];

        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                field += ch;
            }
            continue;
        }

        if (ch === '"' && !fieldStarted) {
            inQuotes = true;
            fieldStarted = true;
        } else if (ch === ',') {
            endField();
        } else if (ch === '\n') {
            endRecord();
        } else if (ch === '\r') {
            if (text[i + 1] === '\n') i++;
            endRecord();
        } else {
            field += ch;
            fieldStarted = true;
        }
    }

    if (fieldStarted || field.length > 0 || record.length > 0) endRecord();
    return records;
}

/**
 * Quote a value when it contains a delimiter, quote or line break.
 */
export function escapeCsvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Serialize rows under the given header. Missing cells are empty.
 */
export function toCsv(header: readonly string[], rows: ReadonlyArray<Record<string, string>>): string {
    let csv = header.map(escapeCsvField).join(',') + '\n';
    for (const row of rows) {
        csv += header.map((name) => escapeCsvField(row[name] ?? '')).join(',') + '\n';
    }
    return csv;
}
