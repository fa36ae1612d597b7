import {
    JsonObject,
    JsonValue,
    MerchantRecord,
    OrderRecord,
    ParsedBody,
    ShipmentRecord,
} from '../domain/models';
import { jsonValueSchema } from '../domain/schemas';

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseBody(raw: string | Buffer): ParsedBody {
    const text = Buffer.isBuffer(raw) ? raw.toString('utf8') : raw;
    let decoded: unknown;
    try {
        decoded = JSON.parse(text);
    } catch {
        return { kind: 'text', text };
    }
    const result = jsonValueSchema.safeParse(decoded);
    return result.success
        ? { kind: 'json', value: result.data, text }
        : { kind: 'text', text };
}

/** The payload a body represents: decoded JSON, or the raw text as a plain string. */
export function payloadOf(body: ParsedBody): JsonValue {
    return body.kind === 'json' ? body.value : body.text;
}

// Every shape mismatch means "nothing to show", never an exception: the envelope is not
// contractually stable across API versions.
export function firstShipment(payload: JsonValue | undefined): ShipmentRecord | undefined {
    if (!isJsonObject(payload)) return undefined;
    const collection = payload.collection;
    if (!Array.isArray(collection) || collection.length === 0) return undefined;
    const first = collection[0];
    return isJsonObject(first) ? first : undefined;
}

export function relatedOrder(shipment: ShipmentRecord | undefined): OrderRecord | undefined {
    const order = shipment?.order;
    return isJsonObject(order) ? order : undefined;
}

export function relatedMerchant(order: OrderRecord | undefined): MerchantRecord | undefined {
    const merchant = order?.merchant;
    return isJsonObject(merchant) ? merchant : undefined;
}
