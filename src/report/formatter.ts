import {
    JsonValue,
    MerchantRecord,
    OrderRecord,
    Row,
    ShipmentRecord,
    SummarySections,
} from '../domain/models';
import { isJsonObject, relatedMerchant, relatedOrder } from '../shipstream/extractor';

/** String form for a table cell. Absent and null render empty; nested values as JSON. */
export function displayValue(value: JsonValue | undefined): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return JSON.stringify(value);
}

export function formatWeight(weight: JsonValue | undefined): string {
    if (isJsonObject(weight)) {
        return `${displayValue(weight.value)} ${displayValue(weight.unit)}`.trim();
    }
    return displayValue(weight);
}

export function countOf(value: JsonValue | undefined): string {
    if (Array.isArray(value)) return String(value.length);
    if (value === undefined || value === null) return '0';
    return displayValue(value);
}

export function humanizeKey(key: string): string {
    const normalized = key.replace(/[_\-\s]+/g, ' ').trim();
    if (!normalized) return key;
    return normalized.toLowerCase().replace(/\b\w/g, (char) => char.toUpperCase());
}

function nestedId(value: JsonValue | undefined): string {
    return isJsonObject(value) ? displayValue(value.id) : '';
}

function row(label: string, value: string): Row {
    return { label, value };
}

export function shipmentRows(shipment: ShipmentRecord): Row[] {
    const rows: Row[] = [
        row('Shipment ID', displayValue(shipment.id)),
        row('unique_id', displayValue(shipment.unique_id)),
        row('status', displayValue(shipment.status)),
        row('warehouse_id', nestedId(shipment.warehouse)),
        row('shipping_method (shipment)', displayValue(shipment.shipping_method)),
        row('target_ship_date', displayValue(shipment.target_ship_date)),
        row('total_weight', formatWeight(shipment.total_weight)),
        row('total_item_weight', formatWeight(shipment.total_item_weight)),
        row('shipped_weight', formatWeight(shipment.shipped_weight)),
        row('items_count', countOf(shipment.items)),
        row('packages_count', countOf(shipment.packages)),
    ];

    const links = shipment.links;
    if (isJsonObject(links) && links.order !== undefined) {
        rows.push(row('order_link', displayValue(links.order)));
    }
    return rows;
}

export function orderRows(order: OrderRecord): Row[] {
    const rows: Row[] = [
        row('Order ID', displayValue(order.id)),
        row('order unique_id', displayValue(order.unique_id)),
        row('order_ref', displayValue(order.order_ref)),
        row('state', displayValue(order.state)),
        row('status', displayValue(order.status)),
        row('carrier_code', displayValue(order.carrier_code)),
        row('shipping_method (order)', displayValue(order.shipping_method)),
        row('priority', displayValue(order.priority)),
        row('signature_required', displayValue(order.signature_required)),
        row('is_saturday_delivery', displayValue(order.is_saturday_delivery)),
        row('is_overbox_required', displayValue(order.is_overbox_required)),
        row('is_declared_value_service', displayValue(order.is_declared_value_service)),
        row('declared_value', displayValue(order.declared_value)),
        row('items_count', countOf(order.items)),
        row('shipments_count', countOf(order.shipments)),
    ];

    const merchantId = nestedId(order.merchant);
    if (merchantId) rows.push(row('merchant_id', merchantId));
    const brandId = nestedId(order.brand);
    if (brandId) rows.push(row('brand_id', brandId));
    return rows;
}

const MERCHANT_FIXED_KEYS = new Set(['type', 'id']);

export function merchantRows(merchant: MerchantRecord): Row[] {
    const rows: Row[] = [
        row('Type', displayValue(merchant.type)),
        row('ID', displayValue(merchant.id)),
    ];
    for (const [key, value] of Object.entries(merchant)) {
        if (MERCHANT_FIXED_KEYS.has(key)) continue;
        rows.push(row(humanizeKey(key), displayValue(value)));
    }
    return rows;
}

export function buildSummary(shipment: ShipmentRecord): SummarySections {
    const order = relatedOrder(shipment) ?? {};
    const merchant = relatedMerchant(order) ?? {};
    return {
        shipment: shipmentRows(shipment),
        order: orderRows(order),
        merchant: merchantRows(merchant),
    };
}
