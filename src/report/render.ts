import { FlatCell, FlatTable, LookupReport, ParsedBody, Row } from '../domain/models';

const MAX_CELL_WIDTH = 60;

function cellText(value: FlatCell | undefined): string {
    if (value === undefined || value === null) return '';
    const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
    const oneLine = text.replace(/\r?\n/g, ' ');
    return oneLine.length > MAX_CELL_WIDTH ? `${oneLine.slice(0, MAX_CELL_WIDTH - 1)}…` : oneLine;
}

function renderGrid(headers: string[], cells: string[][]): string[] {
    const widths = headers.map((header, col) =>
        Math.max(header.length, ...cells.map((line) => line[col].length)),
    );
    const format = (line: string[]) =>
        line.map((cell, col) => cell.padEnd(widths[col])).join('  ').trimEnd();
    return [
        format(headers),
        widths.map((width) => '-'.repeat(width)).join('  '),
        ...cells.map(format),
    ];
}

export function renderKeyValueTable(title: string, rows: Row[]): string {
    const grid = renderGrid(['Field', 'Value'], rows.map((r) => [r.label, r.value]));
    return [`### ${title}`, ...grid].join('\n');
}

export function renderFlatTable(table: FlatTable): string {
    if (table.columns.length === 0) return '(empty table)';
    const cells = table.rows.map((row) => table.columns.map((column) => cellText(row[column])));
    return renderGrid(table.columns.map((c) => cellText(c)), cells).join('\n');
}

// Decoding can lose detail (integers past 2^53, `__proto__` keys), so print what the server sent.
export function renderBody(body: ParsedBody): string {
    return body.text;
}

export function renderReport(report: LookupReport): string {
    const out: string[] = [
        `URL: ${report.url}`,
        `Status code: ${report.statusCode}`,
        `Response time: ${report.durationMs} ms`,
    ];

    if (report.error) {
        out.push('', `ERROR: ${report.error.message}`, '', '## Server response', renderBody(report.body));
        return out.join('\n');
    }

    out.push('', '## Summary');
    if (report.summary) {
        out.push(
            '',
            renderKeyValueTable('Shipment', report.summary.shipment),
            '',
            renderKeyValueTable('Order', report.summary.order),
            '',
            renderKeyValueTable('Merchant', report.summary.merchant),
        );
    }
    for (const warning of report.warnings) {
        out.push(`WARNING: ${warning}`);
    }

    out.push('', '## Raw JSON', renderBody(report.body));

    if (report.table) {
        out.push('', '## Flattened table', renderFlatTable(report.table));
    }
    return out.join('\n');
}
