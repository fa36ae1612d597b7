import { JsonObject, JsonValue, Row } from '../src/domain/models';
import { ShipmentApi, ShipmentApiResponse } from '../src/shipstream/types';
import { firstShipment, parseBody } from '../src/shipstream/extractor';
import expandedFixture from './fixtures/shipment-expanded.json';

export const TEST_SHIPSTREAM_CONFIG = {
    baseUrl: 'https://shipstream.example.test/api/global/beta/shipments/',
    apiVersion: '2020-10',
    authToken: 'test-token',
};

export function buildApiResponse(overrides?: Partial<ShipmentApiResponse>): ShipmentApiResponse {
    return {
        url: `${TEST_SHIPSTREAM_CONFIG.baseUrl}?filter[]=unique_id:5900008555&expand=order`,
        status: 200,
        body: '{"collection":[]}',
        durationMs: 12,
        ...overrides,
    };
}

export function createMockApi(response: ShipmentApiResponse): ShipmentApi {
    return {
        name: 'shipstream',
        getShipments: jest.fn().mockResolvedValue(response),
    };
}

export function createFailingApi(error: Error): ShipmentApi {
    return {
        name: 'shipstream',
        getShipments: jest.fn().mockRejectedValue(error),
    };
}

/** The fixture decoded through parseBody, so records carry the same types as at runtime. */
export function loadExpandedPayload(): JsonValue {
    const body = parseBody(JSON.stringify(expandedFixture));
    if (body.kind !== 'json') throw new Error('fixture is not JSON');
    return body.value;
}

export function loadExpandedShipment(): JsonObject {
    const shipment = firstShipment(loadExpandedPayload());
    if (!shipment) throw new Error('fixture has no shipment');
    return shipment;
}

export function valueOf(rows: Row[], label: string): string | undefined {
    return rows.find(r => r.label === label)?.value;
}
