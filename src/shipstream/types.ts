export interface ShipmentQueryOptions {
    expandOrder: boolean;
    authToken: string;
    timeoutMs?: number;
}

export interface ShipmentApiResponse {
    url: string;
    status: number;
    body: string;
    durationMs: number;
}

export interface ShipmentApi {
    readonly name: string;
    getShipments(uniqueId: string, options: ShipmentQueryOptions): Promise<ShipmentApiResponse>;
}
