import { FlatCell, FlatTable, JsonObject, JsonValue } from '../domain/models';
import { FlattenError } from '../domain/errors';
import { isJsonObject } from '../shipstream/extractor';

// Envelope keys tried, in order, when the payload is a mapping. `collection` is what the
// shipments endpoint returns; the rest cover other endpoints and versions.
const LIST_KEYS = ['collection', 'data', 'results', 'items', 'shipments'] as const;

function flattenRecord(record: JsonObject, prefix: string, out: Record<string, FlatCell>): void {
    for (const [key, value] of Object.entries(record)) {
        const column = prefix ? `${prefix}.${key}` : key;
        if (isJsonObject(value)) {
            flattenRecord(value, column, out);
        } else {
            out[column] = value;
        }
    }
}

function tableFromRecords(records: JsonValue[]): FlatTable {
    const columns = new Set<string>();
    const rows = records.map((record, index) => {
        if (!isJsonObject(record)) {
            throw new FlattenError(
                `Element ${index} is ${record === null ? 'null' : Array.isArray(record) ? 'a list' : `a ${typeof record}`}, expected an object`,
            );
        }
        const flat: Record<string, FlatCell> = {};
        flattenRecord(record, '', flat);
        Object.keys(flat).forEach((column) => columns.add(column));
        return flat;
    });
    return { columns: Array.from(columns), rows };
}

export function flatten(payload: JsonValue): FlatTable {
    if (Array.isArray(payload)) {
        return tableFromRecords(payload);
    }

    if (isJsonObject(payload)) {
        for (const key of LIST_KEYS) {
            const candidate = payload[key];
            if (Array.isArray(candidate)) {
                return tableFromRecords(candidate);
            }
        }
        return tableFromRecords([payload]);
    }

    return {
        columns: ['raw'],
        rows: [{ raw: payload === null ? 'null' : String(payload) }],
    };
}

function csvCell(value: FlatCell | undefined): string {
    if (value === undefined || value === null) return '';
    const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
    if (/[",\n\r]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

export function toCsv(table: FlatTable): string {
    const lines = [table.columns.map((column) => csvCell(column)).join(',')];
    for (const row of table.rows) {
        lines.push(table.columns.map((column) => csvCell(row[column])).join(','));
    }
    return lines.join('\n') + '\n';
}

export function csvFileName(identifier: string): string {
    const safe = identifier.trim().replace(/[^a-z0-9_\-]/gi, '_');
    return `shipment_${safe}.csv`;
}
