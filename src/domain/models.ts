import type { ApiError } from './errors';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
    [key: string]: JsonValue;
}

export type ParsedBody =
    | { kind: 'json'; value: JsonValue; text: string }   // text: the body exactly as received
    | { kind: 'text'; text: string };     // non-JSON bodies: HTML error pages, gateway text

/**
 * One shipment from the `collection` envelope. Fields we read: id, unique_id, status,
 * warehouse.id, shipping_method, target_ship_date, the three weight objects, items,
 * packages, order and links. Anything else is carried along untouched.
 */
export type ShipmentRecord = JsonObject;
/** Inlined via `expand=order`. Reads merchant and brand as nested objects. */
export type OrderRecord = JsonObject;
/** Only `type` and `id` are known ahead of time. */
export type MerchantRecord = JsonObject;

export interface Row {
    label: string;
    value: string;
}

export interface SummarySections {
    shipment: Row[];
    order: Row[];
    merchant: Row[];
}

export type FlatCell = JsonPrimitive | JsonValue[];
export interface FlatTable {
    columns: string[];
    rows: Array<Record<string, FlatCell>>;
}

export interface CsvExport {
    fileName: string;
    content: string;
}

export interface LookupRequest {
    identifier: string;
    expandOrder: boolean;
    timeoutSeconds?: number;
    authToken?: string;
}

export interface LookupReport {
    identifier: string;
    url: string;
    statusCode: number;
    durationMs: number;
    body: ParsedBody;
    error?: ApiError;
    summary?: SummarySections;
    table?: FlatTable;
    csv?: CsvExport;
    warnings: string[];
}
