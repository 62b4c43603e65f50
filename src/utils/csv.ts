/**
 * Minimal RFC 4180 CSV reading and writing.
 */

export type CsvRecord = Record<string, string>;

export interface ParsedCsv {
    headers: string[];
    // Records keyed by header, with the 1-based line on which the row starts
    rows: Array<{ line: number; record: CsvRecord }>;
}

interface RawRow {
    // 1-based physical line on which the row starts
    line: number;
    fields: string[];
}

function readRows(text: string): RawRow[] {
    const input = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
    const rows: RawRow[] = [];
    let row: string[] = [];
    let field = '';
    let inQuotes = false;
    let line = 1;
    let rowStart = 1;

    for (let i = 0; i < input.length; i++) {
        const char = input[i];

        if (inQuotes) {
            if (char === '"') {
                if (input[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    inQuotes = false;
                }
            } else {
                // Line breaks inside quoted fields still advance the physical line
                if (char === '\n' || (char === '\r' && input[i + 1] !== '\n')) line++;
                field += char;
            }
            continue;
        }

        if (char === '"') {
            inQuotes = true;
        } else if (char === ',') {
            row.push(field);
            field = '';
        } else if (char === '\n' || char === '\r') {
            if (char === '\r' && input[i + 1] === '\n') i++;
            row.push(field);
            rows.push({ line: rowStart, fields: row });
            row = [];
            field = '';
            line++;
            rowStart = line;
        } else {
            field += char;
        }
    }

    if (field.length > 0 || row.length > 0) {
        row.push(field);
        rows.push({ line: rowStart, fields: row });
    }

    return rows;
}

/**
 * Split CSV text into rows of fields. Handles quoted fields containing
 * commas, doubled quotes and line breaks, CRLF endings and a UTF-8 BOM.
 */
export function parseCsvRows(text: string): string[][] {
    return readRows(text).map(row => row.fields);
}

/**
 * Parse CSV text with a header row into records. Blank lines are skipped.
 */
export function parseCsv(text: string): ParsedCsv {
    const rawRows = readRows(text);
    if (rawRows.length === 0) {
        return { headers: [], rows: [] };
    }

    const headers = rawRows[0].fields.map(h => h.trim());
    const rows: ParsedCsv['rows'] = [];

    for (const { line, fields } of rawRows.slice(1)) {
        if (fields.every(f => f.trim() === '')) continue;

        const record: CsvRecord = {};
        headers.forEach((header, column) => {
            record[header] = fields[column] ?? '';
        });
        rows.push({ line, record });
    }

    return { headers, rows };
}

/**
 * Escape a CSV value, quoting it when it contains a comma, quote or newline
 */
export function escapeCsv(value: string | number | null | undefined): string {
    if (value === null || value === undefined) {
        return '';
    }

    const str = String(value);
    if (/[",\r\n]/.test(str)) {
        return `"${str.replace(/"/g, '""')}"`;
    }
    return str;
}

export function toCsv(headers: readonly string[], rows: ReadonlyArray<ReadonlyArray<string | number>>): string {
    return [
        headers.map(escapeCsv).join(','),
        ...rows.map(row => row.map(escapeCsv).join(','))
    ].join('\n') + '\n';
}
