export type CsvValue = string | number | boolean | null | undefined;

function escapeCell(value: CsvValue): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    // Quote when the cell holds a delimiter, a quote or a line break; double embedded quotes
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Serialise rows under a fixed header. Lines end in CRLF, as RFC 4180 has it. */
export function toCsv<K extends string>(columns: readonly K[], rows: ReadonlyArray<Record<K, CsvValue>>): string {
    const lines = [columns.map(column => escapeCell(column)).join(',')];
    for (const row of rows) {
        lines.push(columns.map(column => escapeCell(row[column])).join(','));
    }
    return `${lines.join('\r\n')}\r\n`;
}
